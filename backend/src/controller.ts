import {
  CycleError,
  ResourceLock,
  commandFor,
  deriveClassification,
  toCycleError,
  type ActuationCommand,
  type ActuationConfig,
  type ActuatorController,
  type CaptureSource,
  type ClassificationResult,
  type Counts,
  type CycleFailure,
  type CycleState,
  type ErrorKind,
  type SessionSnapshot,
} from '../../shared/src/index.js';
import { CycleRun } from './cycle.js';
import type { InferenceEngine } from './inference.js';
import { Session } from './session.js';

/** Camera and motors of one peripheral, chosen once at startup. */
export interface PeripheralBinding {
  id: string;
  camera: CaptureSource;
  actuator: ActuatorController;
}

export interface SessionControllerOptions {
  engine: InferenceEngine;
  peripherals: readonly PeripheralBinding[];
  actuation: ActuationConfig;
}

export type CycleOutcome =
  | {
      success: true;
      peripheralId: string;
      classification: ClassificationResult;
      /** null for uploaded images, which are never actuated */
      command: ActuationCommand | null;
      counts: Counts;
    }
  | {
      success: false;
      peripheralId: string;
      error: CycleFailure;
      failedIn: CycleState;
    };

/** Source id for images supplied through /api/classify */
export const UPLOAD_SOURCE = 'upload';

const STAGE_ERROR: Partial<Record<CycleState, ErrorKind>> = {
  CAPTURING: 'CaptureUnavailable',
  CLASSIFYING: 'ClassificationError',
  ACTUATING: 'ActuationError',
};

interface PeripheralEntry {
  binding: PeripheralBinding;
  lock: ResourceLock;
}

/**
 * Owns the session and drives cycles. At most one cycle is in flight per
 * peripheral; different peripherals run independently. Counters move only
 * when a cycle reaches DONE.
 */
export class SessionController {
  private session = Session.idle();
  private readonly peripherals = new Map<string, PeripheralEntry>();
  private readonly cycles = new Map<string, CycleRun>();

  constructor(private readonly options: SessionControllerOptions) {
    for (const binding of options.peripherals) {
      this.peripherals.set(binding.id, { binding, lock: new ResourceLock(`peripheral ${binding.id}`) });
    }
  }

  /** Open a fresh session with zeroed counters. */
  start(): SessionSnapshot {
    this.session.stop();
    this.session = Session.begin();
    console.log(`[session] Started ${this.session.id}`);
    return this.session.snapshot();
  }

  /** Stop accepting cycles; the final counts stay readable. */
  stop(): SessionSnapshot {
    this.session.stop();
    const snapshot = this.session.snapshot();
    console.log(`[session] Stopped ${snapshot.id} (can: ${snapshot.counts.can}, plastic: ${snapshot.counts.plastic})`);
    return snapshot;
  }

  status(): SessionSnapshot {
    return this.session.snapshot();
  }

  /** State of the latest cycle started for a peripheral (or the upload source). */
  cycleState(peripheralId: string): CycleState | null {
    return this.cycles.get(peripheralId)?.state ?? null;
  }

  /** Resolves once no peripheral has a cycle in flight. */
  async drain(): Promise<void> {
    await Promise.all([...this.peripherals.values()].map((entry) => entry.lock.whenFree()));
  }

  /** capture → classify → actuate on one peripheral. Never throws. */
  async runCycle(peripheralId: string): Promise<CycleOutcome> {
    const entry = this.peripherals.get(peripheralId);
    if (!entry) {
      return rejected(peripheralId, new CycleError('InvalidState', `Unknown peripheral: ${peripheralId}`));
    }
    if (!this.session.isRunning) {
      return rejected(peripheralId, new CycleError('InvalidState', 'Session not active. Please start first.'));
    }

    const { binding, lock } = entry;
    try {
      return await lock.tryRun('cycle', () => this.execute(binding.id, binding.camera, binding.actuator));
    } catch (err) {
      return rejected(peripheralId, toCycleError(err, 'Busy'));
    }
  }

  /**
   * Classify an image the caller already has. No peripheral is involved, so
   * there is no per-peripheral serialization and no actuation step.
   */
  async classifyImage(source: CaptureSource): Promise<CycleOutcome> {
    if (!this.session.isRunning) {
      return rejected(UPLOAD_SOURCE, new CycleError('InvalidState', 'Session not active. Please start first.'));
    }
    return this.execute(UPLOAD_SOURCE, source, null);
  }

  private async execute(
    peripheralId: string,
    camera: CaptureSource,
    actuator: ActuatorController | null,
  ): Promise<CycleOutcome> {
    const session = this.session;
    const cycle = new CycleRun(peripheralId, actuator !== null);
    this.cycles.set(peripheralId, cycle);

    try {
      cycle.advance('CAPTURING');
      const frame = await camera.capture();

      cycle.advance('CLASSIFYING');
      const classification = deriveClassification(await this.options.engine.classify(frame));

      let command: ActuationCommand | null = null;
      if (actuator) {
        cycle.advance('ACTUATING');
        command = commandFor(classification.label, this.options.actuation);
        await actuator.activate(command);
      }

      cycle.advance('DONE');
      const counts = session.record(classification.label);
      console.log(
        `[session] ${peripheralId}: ${classification.label} (${classification.confidence.toFixed(2)}%) ` +
          `can=${counts.can} plastic=${counts.plastic}`,
      );
      return { success: true, peripheralId, classification, command, counts };
    } catch (err) {
      const failedIn = cycle.state;
      const error = cycle.fail(toCycleError(err, STAGE_ERROR[failedIn] ?? 'InvalidState'));
      console.warn(`[session] ${peripheralId}: ${error.kind} while ${failedIn}: ${error.message}`);
      return { success: false, peripheralId, error, failedIn };
    }
  }
}

function rejected(peripheralId: string, error: CycleError): CycleOutcome {
  return { success: false, peripheralId, error: error.toFailure(), failedIn: 'IDLE' };
}
