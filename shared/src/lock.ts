import { CycleError } from './errors.js';

/**
 * Non-blocking mutual exclusion for one physical resource set.
 *
 * `tryRun` either takes the lock immediately or fails with `Busy`; it never
 * queues.
 */
export class ResourceLock {
  private holder: string | null = null;
  private waiters: Array<() => void> = [];

  constructor(private readonly name: string) {}

  get isHeld(): boolean {
    return this.holder !== null;
  }

  /** Label of the operation currently holding the lock, if any. */
  get heldBy(): string | null {
    return this.holder;
  }

  /** Resolves once nothing holds the lock. Does not acquire it. */
  whenFree(): Promise<void> {
    if (this.holder === null) return Promise.resolve();
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  async tryRun<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    if (this.holder !== null) {
      throw new CycleError('Busy', `${this.name} is busy (${this.holder} in progress)`);
    }

    this.holder = operation;
    try {
      return await fn();
    } finally {
      this.holder = null;
      for (const wake of this.waiters.splice(0)) wake();
    }
  }
}
