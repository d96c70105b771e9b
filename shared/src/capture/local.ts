import { CycleError } from '../errors.js';
import type { FrameConfig } from '../config.js';
import { jpegSize } from '../image.js';
import type { CaptureResult } from '../types.js';
import type { CameraDriver, CaptureSource } from './types.js';

export interface LocalCameraOptions {
  source: string;
  /** Candidate devices, tried in this order */
  devices: readonly string[];
  frame: FrameConfig;
  driver: CameraDriver;
}

/**
 * Camera attached to this node. Probes the configured devices in order and
 * sticks with the first one that produces a frame.
 */
export class LocalCamera implements CaptureSource {
  private workingDevice: string | null = null;

  constructor(private readonly options: LocalCameraOptions) {
    if (options.devices.length === 0) {
      throw new Error('LocalCamera needs at least one candidate device');
    }
  }

  /** Device that last produced a frame, if any. */
  get device(): string | null {
    return this.workingDevice;
  }

  get isAvailable(): boolean {
    return this.workingDevice !== null;
  }

  async capture(): Promise<CaptureResult> {
    const { frame } = this.options;
    const failures: string[] = [];

    for (const device of this.candidates()) {
      try {
        const image = await this.options.driver.grab(device, frame.width, frame.height);
        if (image.length === 0) throw new Error('empty frame');

        if (this.workingDevice !== device) {
          console.log(`[camera] Using ${device}`);
          this.workingDevice = device;
        }
        // The driver may negotiate a different size than the one asked for.
        const { width, height } = jpegSize(image) ?? frame;
        return {
          image,
          width,
          height,
          source: this.options.source,
          capturedAt: new Date().toISOString(),
        };
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        console.warn(`[camera] ${device} failed: ${reason}`);
        failures.push(`${device}: ${reason}`);
        if (this.workingDevice === device) this.workingDevice = null;
      }
    }

    throw new CycleError('CaptureUnavailable', `No working camera (${failures.join('; ')})`);
  }

  private candidates(): string[] {
    const { devices } = this.options;
    if (this.workingDevice === null) return [...devices];
    return [this.workingDevice, ...devices.filter((d) => d !== this.workingDevice)];
  }
}
