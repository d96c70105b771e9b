import { CycleError, toCycleError } from '../errors.js';
import type { ActuationCommand } from '../types.js';
import type { ActuatorController, DigitalOutput } from './types.js';

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface LocalActuatorOptions {
  output: DigitalOutput;
  /** Channels this node is wired to drive */
  channels: readonly number[];
  sleep?: Sleep;
}

/**
 * Motor outputs wired to this node.
 *
 * An activation is a critical section: the channel is claimed before the
 * first await, energized, held for the full duration and switched off on
 * every exit path. A fault while energized switches the channel off at once,
 * but the call still does not return before the duration has elapsed.
 */
export class LocalActuator implements ActuatorController {
  private activeChannel: number | null = null;
  private initialized = false;
  private readonly sleep: Sleep;

  constructor(private readonly options: LocalActuatorOptions) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  get isReady(): boolean {
    return this.initialized;
  }

  get active(): number | null {
    return this.activeChannel;
  }

  /** Configure every channel as an output and make sure all motors are off. */
  async init(): Promise<void> {
    if (this.initialized) return;
    for (const channel of this.options.channels) {
      await this.options.output.setup(channel);
    }
    this.initialized = true;
    console.log(`[motor] Outputs initialized (${this.options.channels.join(', ')})`);
  }

  async activate(command: ActuationCommand): Promise<void> {
    if (!this.options.channels.includes(command.channel)) {
      throw new CycleError('ActuationError', `Channel ${command.channel} is not wired to this node`);
    }
    if (this.activeChannel !== null) {
      throw new CycleError('Busy', `Channel ${this.activeChannel} is still running`);
    }

    this.activeChannel = command.channel;
    try {
      await this.init();
      await this.run(command);
    } catch (err) {
      throw toCycleError(err, 'ActuationError');
    } finally {
      this.activeChannel = null;
    }
  }

  /** Drive every channel low. Used on shutdown. */
  async shutdown(): Promise<void> {
    if (!this.initialized) return;
    for (const channel of this.options.channels) {
      await this.options.output.write(channel, false);
    }
  }

  private async run(command: ActuationCommand): Promise<void> {
    const { output } = this.options;
    const startedAt = Date.now();
    const faults: unknown[] = [];

    console.log(`[motor] ${command.label} on channel ${command.channel} for ${command.durationMs}ms`);
    try {
      await output.write(command.channel, true);
      await this.sleep(command.durationMs);
    } catch (err) {
      faults.push(err);
    }

    try {
      await output.write(command.channel, false);
    } catch (err) {
      console.error(`[motor] Failed to switch off channel ${command.channel}:`, err);
      faults.push(err);
    }

    const remaining = command.durationMs - (Date.now() - startedAt);
    if (remaining > 0) await this.sleep(remaining);

    if (faults.length > 0) throw toCycleError(faults[0], 'ActuationError');
  }
}
