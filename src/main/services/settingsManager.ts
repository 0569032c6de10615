/**
 * Settings for the Backup Generator
 *
 * Builds the explicit AppSettings struct for one run from command-line flags
 * and environment variables. Every component receives what it needs from this
 * struct through its constructor; nothing reads process-wide configuration.
 *
 * Default paths:
 * - cache:       <cache dir>/cloudbeats-backup/cache.json
 * - credentials: <config dir>/cloudbeats-backup/credentials.json
 */

import * as os from 'os';
import * as path from 'path';
import { AppSettings, LogLevelName } from '../../shared/types';
import { ConfigError } from './errors';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Raw command-line flag values, as produced by the argument parser */
export interface CliFlags {
  local?: string;
  output?: string;
  token?: string;
  'app-key'?: string;
  'app-secret'?: string;
  'refresh-token'?: string;
  workers?: string;
  'dry-run'?: boolean;
  'no-cache'?: boolean;
  'log-level'?: string;
  'cache-path'?: string;
}

/** Environment variables consulted as flag fallbacks */
export type Environment = Record<string, string | undefined>;

// ─── Constants ───────────────────────────────────────────────────────────────

/** App data directory name */
const APP_DIR_NAME = 'cloudbeats-backup';

/** Default output file name */
export const DEFAULT_OUTPUT_PATH = 'cloudbeats.cbbackup';

const LOG_LEVEL_NAMES: readonly LogLevelName[] = ['error', 'warn', 'info', 'debug'];

// ─── Helper Functions ────────────────────────────────────────────────────────

/**
 * Returns the directory for configuration files (credentials, logs).
 * On Windows: %APPDATA%/cloudbeats-backup/
 * On other platforms: $XDG_CONFIG_HOME or ~/.config, then cloudbeats-backup/
 */
export function getDefaultConfigDir(): string {
  if (process.platform === 'win32') {
    const appData = process.env.APPDATA || path.join(os.homedir(), 'AppData', 'Roaming');
    return path.join(appData, APP_DIR_NAME);
  }
  const base = process.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(base, APP_DIR_NAME);
}

/**
 * Returns the directory for the tag cache.
 * On Windows: %LOCALAPPDATA%/cloudbeats-backup/
 * On macOS: ~/Library/Caches/cloudbeats-backup/
 * Elsewhere: $XDG_CACHE_HOME or ~/.cache, then cloudbeats-backup/
 */
export function getDefaultCacheDir(): string {
  if (process.platform === 'win32') {
    const localAppData = process.env.LOCALAPPDATA || path.join(os.homedir(), 'AppData', 'Local');
    return path.join(localAppData, APP_DIR_NAME);
  }
  if (process.platform === 'darwin') {
    return path.join(os.homedir(), 'Library', 'Caches', APP_DIR_NAME);
  }
  const base = process.env.XDG_CACHE_HOME || path.join(os.homedir(), '.cache');
  return path.join(base, APP_DIR_NAME);
}

export function getDefaultCachePath(): string {
  return path.join(getDefaultCacheDir(), 'cache.json');
}

export function getDefaultCredentialsPath(): string {
  return path.join(getDefaultConfigDir(), 'credentials.json');
}

/**
 * Default worker count: two per available processing unit.
 */
export function getDefaultWorkers(): number {
  return os.availableParallelism() * 2;
}

/**
 * Validates a worker count. Missing, non-numeric, or non-positive values
 * select the automatic default.
 */
export function validateWorkers(value: unknown): number {
  const parsed = typeof value === 'string' ? Number(value.trim()) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed) || parsed < 1) {
    return getDefaultWorkers();
  }
  return Math.floor(parsed);
}

/**
 * Validates a log level name, falling back to 'info'.
 */
export function validateLogLevel(value: unknown): LogLevelName {
  if (typeof value !== 'string') return 'info';
  const lower = value.trim().toLowerCase();
  return LOG_LEVEL_NAMES.find((name) => name === lower) ?? 'info';
}

/**
 * Returns the first non-empty, trimmed value.
 */
export function firstNonEmpty(...values: Array<string | undefined>): string {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) return trimmed;
  }
  return '';
}

// ─── Settings Resolution ─────────────────────────────────────────────────────

/**
 * Builds validated settings from flags and the environment.
 *
 * @param flags - Parsed command-line flags
 * @param env - Environment variables (DROPBOX_TOKEN, DROPBOX_APP_KEY, ...)
 * @param cwd - Directory relative paths are resolved against
 * @throws ConfigError if --local is missing
 */
export function resolveSettings(
  flags: CliFlags,
  env: Environment = process.env,
  cwd: string = process.cwd(),
): AppSettings {
  const local = firstNonEmpty(flags.local);
  if (!local) {
    throw new ConfigError('--local flag is required');
  }

  return {
    localDir: path.resolve(cwd, local),
    outputPath: path.resolve(cwd, firstNonEmpty(flags.output) || DEFAULT_OUTPUT_PATH),
    accessToken: firstNonEmpty(flags.token, env.DROPBOX_TOKEN),
    appKey: firstNonEmpty(flags['app-key'], env.DROPBOX_APP_KEY),
    appSecret: firstNonEmpty(flags['app-secret'], env.DROPBOX_APP_SECRET),
    refreshToken: firstNonEmpty(flags['refresh-token'], env.DROPBOX_REFRESH_TOKEN),
    workers: validateWorkers(flags.workers),
    dryRun: flags['dry-run'] ?? false,
    useCache: !(flags['no-cache'] ?? false),
    cachePath: firstNonEmpty(flags['cache-path'])
      ? path.resolve(cwd, firstNonEmpty(flags['cache-path']))
      : getDefaultCachePath(),
    credentialsPath: getDefaultCredentialsPath(),
    logLevel: validateLogLevel(flags['log-level']),
  };
}
