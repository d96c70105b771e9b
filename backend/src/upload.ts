import { decodeImage, jpegSize, type CaptureResult, type CaptureSource, type FrameConfig } from '../../shared/src/index.js';
import { UPLOAD_SOURCE } from './controller.js';

/** An image posted to /api/classify, decoded when the cycle captures it. */
export class UploadedImage implements CaptureSource {
  constructor(
    private readonly encoded: string,
    private readonly frame: FrameConfig,
  ) {}

  async capture(): Promise<CaptureResult> {
    const image = decodeImage(this.encoded);
    const { width, height } = jpegSize(image) ?? this.frame;
    return {
      image,
      width,
      height,
      source: UPLOAD_SOURCE,
      capturedAt: new Date().toISOString(),
    };
  }
}
