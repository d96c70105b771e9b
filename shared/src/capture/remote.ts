import { captureResponseSchema } from '../contracts.js';
import type { FrameConfig } from '../config.js';
import { requestJson, type FetchLike } from '../http/client.js';
import { decodeImage, jpegSize } from '../image.js';
import type { CaptureResult } from '../types.js';
import type { CaptureSource } from './types.js';

export interface RemoteCameraOptions {
  peripheralId: string;
  baseUrl: string;
  timeoutMs: number;
  /** The peripheral grabs at the same configured frame size */
  frame: FrameConfig;
  fetchImpl?: FetchLike;
}

/** Camera on a peripheral, reached through its /api/capture endpoint. */
export class RemoteCamera implements CaptureSource {
  constructor(private readonly options: RemoteCameraOptions) {}

  async capture(): Promise<CaptureResult> {
    const { peripheralId, baseUrl, timeoutMs, frame, fetchImpl } = this.options;

    const body = await requestJson(`${baseUrl}/api/capture`, {
      schema: captureResponseSchema,
      timeoutMs,
      failureKind: 'CaptureUnavailable',
      fetchImpl,
    });

    const image = decodeImage(body.image);
    const { width, height } = jpegSize(image) ?? frame;
    return {
      image,
      width,
      height,
      source: peripheralId,
      capturedAt: new Date().toISOString(),
    };
  }
}
