import { motorResponseSchema, type MotorRequest } from '../contracts.js';
import { requestJson, type FetchLike } from '../http/client.js';
import { ResourceLock } from '../lock.js';
import type { ActuationCommand } from '../types.js';
import type { ActuatorController } from './types.js';

export interface RemoteActuatorOptions {
  peripheralId: string;
  baseUrl: string;
  /** Network allowance on top of the motor run time */
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

/**
 * Motors on a peripheral. One activation is one POST /api/motor; the
 * peripheral holds the request open while the motor runs, and picks channel
 * and duration from its own configuration.
 */
export class RemoteActuator implements ActuatorController {
  private readonly lock: ResourceLock;

  constructor(private readonly options: RemoteActuatorOptions) {
    this.lock = new ResourceLock(`actuator on ${options.peripheralId}`);
  }

  activate(command: ActuationCommand): Promise<void> {
    return this.lock.tryRun(`activate ${command.label}`, async () => {
      const { baseUrl, timeoutMs, fetchImpl } = this.options;
      const body: MotorRequest = { prediction: command.label };

      const response = await requestJson(`${baseUrl}/api/motor`, {
        method: 'POST',
        body,
        schema: motorResponseSchema,
        timeoutMs: timeoutMs + command.durationMs,
        failureKind: 'ActuationError',
        fetchImpl,
      });
      console.log(`[motor] ${this.options.peripheralId}: ${response.message}`);
    });
  }
}
