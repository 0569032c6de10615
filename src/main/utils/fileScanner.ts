/**
 * File Scanner Utility
 *
 * Recursively scans a directory for files with a recognized audio extension.
 */

import * as fs from 'fs';
import * as path from 'path';
import { SUPPORTED_EXTENSIONS } from '../../shared/types';
import { ScanError } from '../services/errors';

/**
 * Checks if a file has a recognized audio extension (case-insensitive).
 * @param filePath - File name or path
 */
export function isAudioFile(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return SUPPORTED_EXTENSIONS.includes(ext);
}

/**
 * Recursively scans a directory for audio files.
 * Directories are traversed but never returned. Any error while walking
 * (missing root, unreadable subdirectory) aborts the scan.
 *
 * @param dirPath - Path to the directory to scan
 * @returns Sorted absolute paths of the audio files found
 * @throws ScanError if any part of the tree cannot be read
 */
export async function scanDirectoryForAudioFiles(dirPath: string): Promise<string[]> {
  const audioFiles: string[] = [];

  async function scanRecursive(currentPath: string): Promise<void> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(currentPath, { withFileTypes: true });
    } catch (error: unknown) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ScanError(`Cannot read directory: ${cause.message}`, {
        filePath: currentPath,
        cause,
      });
    }

    for (const entry of entries) {
      const fullPath = path.join(currentPath, entry.name);

      if (entry.isDirectory()) {
        await scanRecursive(fullPath);
      } else if (isAudioFile(entry.name)) {
        audioFiles.push(fullPath);
      }
    }
  }

  await scanRecursive(path.resolve(dirPath));
  return audioFiles.sort();
}
