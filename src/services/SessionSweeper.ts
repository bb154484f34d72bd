import { SessionStore } from '../storage/sessionStore';
import { describeError, logDebug, logError, logInfo } from '../logger';

export const SWEEP_INTERVAL_MS = 60 * 60 * 1000;

// Periodic reclamation of expired sessions with an explicit stop for shutdown.
export class SessionSweeper {
  private timer: NodeJS.Timeout | undefined;

  constructor(
    private readonly sessions: SessionStore,
    private readonly intervalMs: number = SWEEP_INTERVAL_MS
  ) {}

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.runOnce().catch(err => logError('sessions_sweep_failed', describeError(err)));
    }, this.intervalMs);
    // The sweep alone should not keep the process alive.
    this.timer.unref();
    logDebug('sessions_sweeper_started', { intervalMs: this.intervalMs });
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
    logDebug('sessions_sweeper_stopped', {});
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  async runOnce(): Promise<number> {
    const removed = await this.sessions.sweep();
    if (removed > 0) {
      logInfo('sessions_swept', { removed });
    }
    return removed;
  }
}
