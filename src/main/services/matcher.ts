/**
 * Matcher Service
 *
 * Reconciles scanned local files against a Dropbox listing by relative path.
 * Comparison is case-insensitive and Unicode-normalized (NFC), because macOS
 * file systems hand out decomposed (NFD) names while Dropbox usually stores
 * composed ones.
 */

import * as path from 'path';
import { MatchedPair, ReconciliationResult, RemoteEntry } from '../../shared/types';
import { isAudioFile } from '../utils/fileScanner';

/**
 * Builds the comparison key for a path: NFC composition, then lower case.
 */
export function normalizePathKey(value: string): string {
  return value.normalize('NFC').toLowerCase();
}

/**
 * Lower-cased remote prefix without trailing slashes. The Dropbox root is ''.
 */
export function remotePrefixKey(remotePath: string): string {
  return normalizePathKey(remotePath).replace(/\/+$/, '');
}

/**
 * Computes the remote lookup key for a local file, or null when the file does
 * not live under the scanned root.
 *
 * @param localRoot - Directory that was scanned
 * @param remotePrefix - Result of remotePrefixKey()
 * @param localPath - Absolute path of a scanned file
 */
export function localLookupKey(
  localRoot: string,
  remotePrefix: string,
  localPath: string,
): string | null {
  const rel = path.relative(localRoot, localPath);
  if (rel === '' || rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    return null;
  }
  const slashed = rel.split(path.sep).join('/');
  return `${remotePrefix}/${normalizePathKey(slashed)}`;
}

/**
 * Matches local files against Dropbox entries.
 *
 * Remote entries are indexed by their normalized lower-cased path; when two
 * entries share a key the last one listed wins. Remote entries left over are
 * reported only when they look like audio files, so cover art and hidden
 * files never show up as unmatched.
 *
 * @param localRoot - Local directory that was scanned
 * @param remotePath - Dropbox path of that directory ('' for the Dropbox root)
 * @param localFiles - Absolute paths returned by the scanner
 * @param entries - File entries returned by the Dropbox listing
 */
export function matchFiles(
  localRoot: string,
  remotePath: string,
  localFiles: readonly string[],
  entries: readonly RemoteEntry[],
): ReconciliationResult {
  const remoteIndex = new Map<string, RemoteEntry>();
  for (const entry of entries) {
    remoteIndex.set(normalizePathKey(entry.lowercasePath), entry);
  }

  const consumed = new Set<string>();
  const matched: MatchedPair[] = [];
  const unmatchedLocal: string[] = [];
  const prefix = remotePrefixKey(remotePath);

  for (const localPath of localFiles) {
    const key = localLookupKey(localRoot, prefix, localPath);
    const remoteEntry = key === null ? undefined : remoteIndex.get(key);

    // A remote file pairs with at most one local file
    if (key !== null && remoteEntry && !consumed.has(key)) {
      matched.push({ localPath, remoteEntry });
      consumed.add(key);
    } else {
      unmatchedLocal.push(localPath);
    }
  }

  const unmatchedRemote: RemoteEntry[] = [];
  for (const [key, entry] of remoteIndex) {
    if (!consumed.has(key) && isAudioFile(entry.name)) {
      unmatchedRemote.push(entry);
    }
  }

  return { matched, unmatchedLocal, unmatchedRemote };
}
