import {
  peripheralStatusSchema,
  peripheralTestSchema,
  requestJson,
  type FetchLike,
  type PeripheralStatus,
  type PeripheralTestBody,
} from '../../shared/src/index.js';

export interface PeripheralClientOptions {
  baseUrl: string;
  timeoutMs: number;
  /** The self-test grabs a frame, so it gets the capture allowance */
  selfTestTimeoutMs: number;
  fetchImpl?: FetchLike;
}

/** Read-only calls to a peripheral, used for connectivity checks. */
export class PeripheralClient {
  constructor(private readonly options: PeripheralClientOptions) {}

  async status(): Promise<PeripheralStatus> {
    const { baseUrl, timeoutMs, fetchImpl } = this.options;
    const body = await requestJson(`${baseUrl}/api/status`, {
      schema: peripheralStatusSchema,
      timeoutMs,
      failureKind: 'TransportError',
      fetchImpl,
    });
    return {
      cameraAvailable: body.camera_available,
      actuatorReady: body.gpio_initialized,
      lastSeen: new Date().toISOString(),
    };
  }

  /** Grab a frame and initialize the motor outputs without moving anything. */
  async selfTest(): Promise<PeripheralTestBody> {
    const { baseUrl, selfTestTimeoutMs, fetchImpl } = this.options;
    return requestJson(`${baseUrl}/api/test`, {
      schema: peripheralTestSchema,
      timeoutMs: selfTestTimeoutMs,
      failureKind: 'CaptureUnavailable',
      fetchImpl,
    });
  }
}
