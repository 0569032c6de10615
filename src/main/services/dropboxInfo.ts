/**
 * Locates the Dropbox desktop client's sync folder and maps local folders
 * inside it onto Dropbox paths.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ConfigError } from './errors';

/** info.json locations, relative to the home directory, in lookup order */
export const INFO_JSON_CANDIDATES: readonly string[] = [
  path.join('.dropbox', 'info.json'),
  path.join('Library', 'Application Support', 'Dropbox', 'info.json'),
];

function accountPath(info: unknown, account: string): string {
  if (info === null || typeof info !== 'object') return '';
  const section: unknown = Object.getOwnPropertyDescriptor(info, account)?.value;
  if (section === null || typeof section !== 'object') return '';
  const value: unknown = Object.getOwnPropertyDescriptor(section, 'path')?.value;
  return typeof value === 'string' ? value : '';
}

/**
 * Reads the sync root from the desktop client's info.json, preferring the
 * personal account over the business one.
 *
 * @throws ConfigError when no candidate file yields a path
 */
export async function detectDropboxRoot(homeDir: string = os.homedir()): Promise<string> {
  const candidates = INFO_JSON_CANDIDATES.map((rel) => path.join(homeDir, rel));

  for (const candidate of candidates) {
    let info: unknown;
    try {
      info = JSON.parse(await fs.promises.readFile(candidate, 'utf-8'));
    } catch {
      continue;
    }

    const root = accountPath(info, 'personal') || accountPath(info, 'business');
    if (root) return root;
  }

  throw new ConfigError(
    `Could not find Dropbox folder. Is the Dropbox desktop client installed? Looked in: ${candidates.join(', ')}`,
  );
}

/**
 * Converts an absolute local path inside the Dropbox folder into the
 * corresponding Dropbox path. Symlinks are resolved on both sides.
 *
 * @returns '' when the path is the Dropbox folder itself, else e.g. '/Music/Rock'
 * @throws ConfigError when the path is outside the Dropbox folder or cannot be resolved
 */
export async function computeRemotePath(localAbs: string, dropboxRoot: string): Promise<string> {
  let resolvedLocal: string;
  let resolvedRoot: string;
  try {
    resolvedLocal = await fs.promises.realpath(localAbs);
    resolvedRoot = await fs.promises.realpath(dropboxRoot);
  } catch (error: unknown) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigError(`Cannot resolve path: ${cause.message}`, { filePath: localAbs, cause });
  }

  if (resolvedLocal === resolvedRoot) return '';

  const rel = path.relative(resolvedRoot, resolvedLocal);
  if (rel === '' || rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    throw new ConfigError(
      `Local folder "${resolvedLocal}" is not inside the Dropbox folder "${resolvedRoot}"`,
      { filePath: localAbs },
    );
  }

  return '/' + rel.split(path.sep).join('/');
}
