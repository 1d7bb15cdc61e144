/**
 * Image helpers: header sniffing and content hashing for embedded artwork.
 * No decoding; only the JPEG/PNG headers are read.
 */

import * as crypto from 'crypto';

export interface ImageDimensions {
  width: number;
  height: number;
  /** Bits per pixel */
  depth: number;
}

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

/**
 * Detects the MIME type from magic bytes, falling back to `fallback`.
 */
export function detectImageMimeType(data: Buffer, fallback = 'image/jpeg'): string {
  if (data.length >= 8 && data.subarray(0, 8).equals(PNG_SIGNATURE)) return 'image/png';
  if (data.length >= 3 && data[0] === 0xff && data[1] === 0xd8 && data[2] === 0xff) return 'image/jpeg';
  return fallback;
}

/**
 * Extracts width, height and bit depth from a JPEG or PNG header.
 * Returns zeros when the header cannot be parsed.
 */
export function getImageDimensions(data: Buffer, mimeType: string = detectImageMimeType(data)): ImageDimensions {
  try {
    if (mimeType === 'image/png') {
      // PNG IHDR starts at byte 16 (after 8-byte sig + 4-byte length + 4-byte type)
      if (data.length >= 26) {
        const width = data.readUInt32BE(16);
        const height = data.readUInt32BE(20);
        const bitDepth = data[24];
        const colorType = data[25];
        // channels: 0=greyscale(1), 2=RGB(3), 3=indexed(1), 4=greyscale+alpha(2), 6=RGBA(4)
        const channels = [1, 0, 3, 1, 2, 0, 4][colorType] ?? 3;
        return { width, height, depth: bitDepth * channels };
      }
    } else {
      // JPEG: scan for SOF0..SOF3 marker (FF C0..C3)
      let i = 2; // skip SOI marker (FF D8)
      while (i < data.length - 9) {
        if (data[i] !== 0xff) {
          i++;
          continue;
        }
        const marker = data[i + 1];
        if (marker >= 0xc0 && marker <= 0xc3) {
          // SOF: [FF][marker][segLen(2)][precision(1)][height(2)][width(2)][components(1)]
          const height = data.readUInt16BE(i + 5);
          const width = data.readUInt16BE(i + 7);
          const components = data[i + 9];
          return { width, height, depth: 8 * components };
        }
        if (marker === 0xda) break; // Start of Scan
        const segLen = data.readUInt16BE(i + 2);
        i += 2 + segLen;
      }
    }
  } catch {
    // truncated header
  }
  return { width: 0, height: 0, depth: 0 };
}

/** Largest pixel dimension, 0 when unknown */
export function largestSide(dimensions: Pick<ImageDimensions, 'width' | 'height'>): number {
  return Math.max(dimensions.width, dimensions.height);
}

export function md5Hex(data: Buffer): string {
  return crypto.createHash('md5').update(data).digest('hex');
}
