import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { CameraDriver } from './types.js';

const execFileAsync = promisify(execFile);

const JPEG_QUALITY = 2; // ffmpeg qscale, 2 is near-lossless

/** Grabs a single JPEG frame from a V4L2 device by shelling out to ffmpeg. */
export class FfmpegCameraDriver implements CameraDriver {
  constructor(
    private readonly timeoutMs: number,
    private readonly binary = 'ffmpeg',
  ) {}

  async grab(device: string, width: number, height: number): Promise<Buffer> {
    const args = [
      '-hide_banner',
      '-loglevel', 'error',
      '-f', 'v4l2',
      '-video_size', `${width}x${height}`,
      '-i', device,
      '-frames:v', '1',
      '-q:v', String(JPEG_QUALITY),
      '-f', 'image2pipe',
      '-vcodec', 'mjpeg',
      'pipe:1',
    ];

    const { stdout } = await execFileAsync(this.binary, args, {
      encoding: 'buffer',
      timeout: this.timeoutMs,
      maxBuffer: 16 * 1024 * 1024,
    });
    return stdout;
  }
}
