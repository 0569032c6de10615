/**
 * Stored Dropbox app credentials (app key, app secret, refresh token).
 *
 * File layout: pretty-printed JSON with snake_case keys, readable by the
 * owner only.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Credentials } from '../../shared/types';
import { ConfigError, WriteError } from './errors';

/** On-disk shape of the credentials file */
interface CredentialsFile {
  app_key: string;
  app_secret: string;
  refresh_token: string;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function isCredentialsFile(value: unknown): value is CredentialsFile {
  if (value === null || typeof value !== 'object') return false;
  const raw: Record<string, unknown> = { ...value };
  return (
    typeof raw.app_key === 'string' &&
    typeof raw.app_secret === 'string' &&
    typeof raw.refresh_token === 'string'
  );
}

/**
 * Loads saved credentials.
 *
 * @returns null if the file does not exist
 * @throws ConfigError if the file cannot be read or is not a credentials file
 */
export async function loadCredentials(filePath: string): Promise<Credentials | null> {
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    const cause = toError(error);
    if ('code' in cause && cause.code === 'ENOENT') return null;
    throw new ConfigError(`Reading credentials failed: ${cause.message}`, { filePath, cause });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error: unknown) {
    const cause = toError(error);
    throw new ConfigError(`Parsing credentials failed: ${cause.message}`, { filePath, cause });
  }

  if (!isCredentialsFile(parsed)) {
    throw new ConfigError('Credentials file is missing app_key, app_secret or refresh_token', {
      filePath,
    });
  }

  return {
    appKey: parsed.app_key,
    appSecret: parsed.app_secret,
    refreshToken: parsed.refresh_token,
  };
}

/**
 * Saves credentials, creating the parent directory (mode 0700) if needed.
 * The file is written with mode 0600.
 *
 * @throws WriteError on any filesystem failure
 */
export async function saveCredentials(filePath: string, credentials: Credentials): Promise<void> {
  const body: CredentialsFile = {
    app_key: credentials.appKey,
    app_secret: credentials.appSecret,
    refresh_token: credentials.refreshToken,
  };

  try {
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true, mode: 0o700 });
    await fs.promises.writeFile(filePath, JSON.stringify(body, null, 2) + '\n', { mode: 0o600 });
    // writeFile leaves the mode of an existing file untouched
    await fs.promises.chmod(filePath, 0o600);
  } catch (error: unknown) {
    const cause = toError(error);
    throw new WriteError(`Saving credentials failed: ${cause.message}`, { filePath, cause });
  }
}
