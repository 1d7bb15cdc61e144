/**
 * File Scanner Utility
 *
 * Scans a folder (optionally its subfolders) for supported audio files.
 * The sorted result is the traversal order used for the audit CSV.
 */

import * as fs from 'fs';
import * as path from 'path';
import { AudioFormat, EXTENSION_FORMATS, SUPPORTED_EXTENSIONS } from '../../shared/types';

/** Options for scanning a folder */
export interface ScanOptions {
  /** Descend into subfolders. Defaults to false */
  recursive?: boolean;
  /** Called for each directory that could not be read */
  onUnreadable?: (dirPath: string, error: unknown) => void;
}

/**
 * Checks if a file has a supported audio extension.
 */
export function isSupportedAudioFile(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return SUPPORTED_EXTENSIONS.includes(ext);
}

/**
 * Maps a file path to its audio format by extension, or null if unsupported.
 */
export function detectFormat(filePath: string): AudioFormat | null {
  const ext = path.extname(filePath).toLowerCase();
  return EXTENSION_FORMATS[ext] ?? null;
}

/**
 * Scans a directory for audio files with supported extensions.
 * @returns Absolute paths, sorted
 */
export function scanDirectoryForAudioFiles(dirPath: string, options?: ScanOptions): string[] {
  const recursive = options?.recursive ?? false;
  const audioFiles: string[] = [];

  function scan(currentPath: string): void {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(currentPath, { withFileTypes: true });
    } catch (error: unknown) {
      options?.onUnreadable?.(currentPath, error);
      return;
    }

    for (const entry of entries) {
      const fullPath = path.join(currentPath, entry.name);

      if (entry.isDirectory()) {
        if (recursive) scan(fullPath);
      } else if (entry.isFile() && isSupportedAudioFile(entry.name)) {
        audioFiles.push(fullPath);
      }
    }
  }

  scan(path.resolve(dirPath));
  return audioFiles.sort();
}

/**
 * Temporarily clears the read-only bit on a file, runs `fn`, and restores
 * the original mode afterwards.
 */
export async function withWritableFile<T>(filePath: string, fn: () => Promise<T>): Promise<T> {
  const { mode } = await fs.promises.stat(filePath);
  const writable = (mode & 0o200) !== 0;
  if (!writable) {
    await fs.promises.chmod(filePath, mode | 0o200);
  }
  try {
    return await fn();
  } finally {
    if (!writable) {
      await fs.promises.chmod(filePath, mode);
    }
  }
}
