import { CycleError } from './errors.js';

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

/** Decode a base64 image, with or without a `data:` URL prefix. */
export function decodeImage(encoded: string): Buffer {
  const data = encoded.replace(/^data:[^;,]+;base64,/, '').replace(/\s+/g, '');
  if (data.length === 0 || data.length % 4 !== 0 || !BASE64_PATTERN.test(data)) {
    throw new CycleError('ProtocolError', 'Image is not valid base64');
  }
  return Buffer.from(data, 'base64');
}

export function encodeImage(image: Buffer): string {
  return image.toString('base64');
}

// SOF0..SOF15, minus DHT (c4), JPG (c8) and DAC (cc)
const START_OF_FRAME = new Set([0xc0, 0xc1, 0xc2, 0xc3, 0xc5, 0xc6, 0xc7, 0xc9, 0xca, 0xcb, 0xcd, 0xce, 0xcf]);

/** Frame size from a JPEG's start-of-frame header, or null if there is none. */
export function jpegSize(image: Buffer): { width: number; height: number } | null {
  if (image.length < 4 || image[0] !== 0xff || image[1] !== 0xd8) return null;

  let offset = 2;
  while (offset + 4 <= image.length) {
    if (image[offset] !== 0xff) return null;
    const marker = image[offset + 1];
    if (marker === 0xff) {
      offset += 1;
      continue;
    }
    if (marker === 0x01 || (marker >= 0xd0 && marker <= 0xd8)) {
      offset += 2;
      continue;
    }
    if (marker === 0xd9 || marker === 0xda) return null;

    if (START_OF_FRAME.has(marker)) {
      if (offset + 9 > image.length) return null;
      return { height: image.readUInt16BE(offset + 5), width: image.readUInt16BE(offset + 7) };
    }
    offset += 2 + image.readUInt16BE(offset + 2);
  }
  return null;
}
