import { HttpError } from './httpError';

// Store unreachable, timed out, or returned something undecodable.
// The message stays server-side; clients only see a generic one.
export class PersistenceError extends HttpError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(500, `${operation} failed: ${detail}`);
    this.operation = operation;
    this.cause = cause;
  }
}

// Unique-key violation, e.g. inserting a record identity that already exists.
export class DuplicateRecordError extends PersistenceError {}

export const CONSISTENCY_MESSAGE =
  'Order delivery left the store in an inconsistent state; manual reconciliation required';

// The delivered transition could not be completed or undone. Never retried automatically.
export class ConsistencyError extends HttpError {
  readonly recordId: string;
  readonly orderId: number;
  readonly detail: string;

  constructor(recordId: string, orderId: number, detail: string, cause?: unknown) {
    super(500, CONSISTENCY_MESSAGE);
    this.recordId = recordId;
    this.orderId = orderId;
    this.detail = detail;
    this.cause = cause;
  }
}
