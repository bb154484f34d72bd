import { KeyedMutex } from '../storage/locks';

export type SequenceKind = 'product' | 'order';

// Reports the highest identifier of a kind held by one collection, or null when it holds none.
export type SequenceSource = () => Promise<number | null>;

/**
 * Hands out human-facing identifiers as "highest existing + 1".
 *
 * `assign` keeps a per-kind mutex across read-max, compute and persist, so concurrent
 * creations within this process never share an identifier. Another process writing to the
 * same store is not covered: two processes can still read the same maximum.
 */
export class SequenceGenerator {
  private mutex = new KeyedMutex();

  constructor(private readonly sources: Record<SequenceKind, SequenceSource[]>) {}

  // Smallest positive integer above every identifier of `kind` currently stored; 1 when none.
  async next(kind: SequenceKind): Promise<number> {
    const highs = await Promise.all(this.sources[kind].map(source => source()));
    return highs.reduce<number>((max, high) => (high !== null && high > max ? high : max), 0) + 1;
  }

  // Runs `persist` with the next identifier while no other assignment of the same kind is in flight.
  // A failing lookup rejects before `persist` is called.
  assign<T>(kind: SequenceKind, persist: (id: number) => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(kind, async () => persist(await this.next(kind)));
  }
}
