import type { CaptureResult } from '../types.js';

/** Anything that can hand over one frame. Local and remote cameras look the same to callers. */
export interface CaptureSource {
  capture(): Promise<CaptureResult>;
}

/** Low-level grabber for one device. Rejects when the device yields no frame. */
export interface CameraDriver {
  grab(device: string, width: number, height: number): Promise<Buffer>;
}
