import { randomUUID } from 'node:crypto';
import type { Counts, Label, SessionSnapshot, SessionStatus } from '../../shared/src/index.js';

/**
 * One sorting session and its per-bin counters.
 *
 * Every mutation is a single synchronous step, so a snapshot taken from any
 * request handler sees either the counts before an increment or after it.
 */
export class Session {
  readonly id = randomUUID();
  private current: SessionStatus;
  private readonly counts: Counts = { can: 0, plastic: 0 };
  readonly startedAt: string | null;

  private constructor(status: SessionStatus) {
    this.current = status;
    this.startedAt = status === 'running' ? new Date().toISOString() : null;
  }

  /** Placeholder before the first start(). */
  static idle(): Session {
    return new Session('idle');
  }

  static begin(): Session {
    return new Session('running');
  }

  get status(): SessionStatus {
    return this.current;
  }

  get isRunning(): boolean {
    return this.current === 'running';
  }

  stop(): void {
    if (this.current === 'running') this.current = 'stopped';
  }

  /**
   * Count one sorted item. Accepted after stop() too: an item whose motor
   * already ran belongs to the session it started in.
   */
  record(label: Label): Counts {
    this.counts[label] += 1;
    return { ...this.counts };
  }

  snapshot(): SessionSnapshot {
    return {
      id: this.id,
      status: this.current,
      counts: { ...this.counts },
      startedAt: this.startedAt,
    };
  }
}
