/**
 * Shared test fixtures: temp directories and tiny image headers.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

/** Creates a unique temporary directory for test isolation */
export function createTempDir(prefix = 'crate-tagger-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** Recursively removes a directory */
export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** PNG signature + IHDR with the given size (8-bit RGB) */
export function pngHeader(width: number, height: number): Buffer {
  const data = Buffer.alloc(33);
  Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]).copy(data, 0);
  data.writeUInt32BE(13, 8);
  data.write('IHDR', 12, 'ascii');
  data.writeUInt32BE(width, 16);
  data.writeUInt32BE(height, 20);
  data[24] = 8;
  data[25] = 2;
  return data;
}

/** SOI + SOF0 segment with the given size (3 components) */
export function jpegHeader(width: number, height: number): Buffer {
  const data = Buffer.alloc(24);
  data[0] = 0xff;
  data[1] = 0xd8;
  data[2] = 0xff;
  data[3] = 0xc0;
  data.writeUInt16BE(17, 4);
  data[6] = 8;
  data.writeUInt16BE(height, 7);
  data.writeUInt16BE(width, 9);
  data[11] = 3;
  return data;
}
