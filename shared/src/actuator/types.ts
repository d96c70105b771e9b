import type { ActuationCommand } from '../types.js';

/**
 * Energizes one channel for the command's fixed duration. Resolves only
 * after the channel is off again; a second call while one is running
 * rejects with Busy.
 */
export interface ActuatorController {
  activate(command: ActuationCommand): Promise<void>;
}

/** Digital output pins, e.g. GPIO lines driving motor relays. */
export interface DigitalOutput {
  /** Configure a pin as an output, driven low. Safe to call repeatedly. */
  setup(channel: number): Promise<void>;
  write(channel: number, high: boolean): Promise<void>;
}
