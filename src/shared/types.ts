/**
 * Shared type definitions for the CloudBeats backup generator.
 * These interfaces are used across the scanner, matcher, cache and writer.
 */

/** Recognized audio file extensions (with dot prefix, lower case) */
export const SUPPORTED_EXTENSIONS: readonly string[] = [
  '.mp3',
  '.m4a',
  '.flac',
  '.ogg',
  '.opus',
  '.wav',
  '.wma',
  '.aac',
  '.dsf',
  '.aiff',
  '.aif',
  '.ape',
  '.wv',
  '.mpc',
] as const;

/** Kind of a Dropbox listing entry */
export type RemoteEntryKind = 'file' | 'folder';

/** A file or folder returned by the Dropbox listing API */
export interface RemoteEntry {
  kind: RemoteEntryKind;
  /** Dropbox file identifier (e.g. "id:abc123") */
  id: string;
  /** Display file name */
  name: string;
  /** Lower-cased full path; the identity key for matching */
  lowercasePath: string;
  /** Full path with the user's original casing */
  displayPath: string;
}

/** A local file paired with its Dropbox entry */
export interface MatchedPair {
  /** Absolute local path */
  localPath: string;
  remoteEntry: RemoteEntry;
}

/** Outcome of reconciling a local scan against a remote listing */
export interface ReconciliationResult {
  matched: MatchedPair[];
  /** Local audio files with no remote counterpart */
  unmatchedLocal: string[];
  /** Remote audio files with no local counterpart */
  unmatchedRemote: RemoteEntry[];
}

/** Metadata extracted from an audio file (or restored from the cache) */
export interface AudioMetadata {
  title: string;
  artist: string;
  album: string;
  albumArtist: string;
  /** Genre, null when the file carries none */
  genre: string | null;
  /** Release year, 0 when unknown */
  year: number;
  /** Track number, null when absent */
  trackNumber: number | null;
  /** Disk number, defaults to 1 */
  diskNumber: number;
  /** Duration in seconds */
  durationSeconds: number;
}

/** Dropbox OAuth2 credential triple used for refresh-token auth */
export interface Credentials {
  appKey: string;
  appSecret: string;
  refreshToken: string;
}

/** Log level names accepted on the command line */
export type LogLevelName = 'error' | 'warn' | 'info' | 'debug';

/** Resolved configuration for a single run */
export interface AppSettings {
  /** Absolute path of the local folder to scan (inside the Dropbox folder) */
  localDir: string;
  /** Output .cbbackup file path */
  outputPath: string;
  /** Short-lived Dropbox access token, '' when not given */
  accessToken: string;
  /** Dropbox app key, '' when not given */
  appKey: string;
  /** Dropbox app secret, '' when not given */
  appSecret: string;
  /** Dropbox refresh token, '' when not given */
  refreshToken: string;
  /** Number of parallel tag readers */
  workers: number;
  /** Show the Dropbox mapping without reading tags or writing a file */
  dryRun: boolean;
  /** Whether the tag cache is used */
  useCache: boolean;
  /** Path of the tag cache JSON file */
  cachePath: string;
  /** Path of the stored credentials file */
  credentialsPath: string;
  /** Minimum log level */
  logLevel: LogLevelName;
}
