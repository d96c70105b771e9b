import type { CycleError, CycleFailure, CycleState } from '../../shared/src/index.js';

const TRANSITIONS: Record<CycleState, readonly CycleState[]> = {
  IDLE: ['CAPTURING'],
  CAPTURING: ['CLASSIFYING'],
  CLASSIFYING: ['ACTUATING', 'DONE'],
  ACTUATING: ['DONE'],
  DONE: [],
  FAILED: [],
};

export type StageState = Exclude<CycleState, 'IDLE' | 'FAILED'>;

/**
 * State of a single capture → classify → actuate cycle. Each cycle gets a
 * fresh instance; states only move forward and FAILED/DONE are final.
 */
export class CycleRun {
  private current: CycleState = 'IDLE';
  private failure: CycleFailure | null = null;
  private failedState: CycleState | null = null;
  readonly history: CycleState[] = ['IDLE'];
  readonly startedAt = new Date().toISOString();

  constructor(
    readonly peripheralId: string,
    /** Cycles on uploaded images stop after classification */
    readonly actuates: boolean,
  ) {}

  get state(): CycleState {
    return this.current;
  }

  get isTerminal(): boolean {
    return this.current === 'DONE' || this.current === 'FAILED';
  }

  get error(): CycleFailure | null {
    return this.failure;
  }

  /** State the cycle was in when it failed. */
  get failedIn(): CycleState | null {
    return this.failedState;
  }

  advance(next: StageState): void {
    const skipsActuation = this.current === 'CLASSIFYING' && next === 'DONE' && this.actuates;
    if (!TRANSITIONS[this.current].includes(next) || skipsActuation) {
      throw new Error(`Illegal cycle transition ${this.current} -> ${next}`);
    }
    this.current = next;
    this.history.push(next);
  }

  fail(error: CycleError): CycleFailure {
    if (this.isTerminal) {
      throw new Error(`Cycle already finished in ${this.current}`);
    }
    this.failedState = this.current;
    this.failure = error.toFailure();
    this.current = 'FAILED';
    this.history.push('FAILED');
    return this.failure;
  }
}
