/**
 * Token Resolver
 *
 * Picks the bearer token for a run. Precedence:
 *  1. app key + app secret + refresh token given on the command line / env
 *  2. credentials saved by the interactive setup
 *  3. a direct access token
 */

import { Credentials } from '../../shared/types';
import { refreshAccessToken } from './dropboxAuth';
import { loadCredentials } from './credentialsStore';
import { AuthError, wrapError } from './errors';
import type { Logger } from './logger';

/** Where the resolved token came from */
export type TokenSource = 'refresh-flags' | 'stored-credentials' | 'access-token';

export interface TokenInput {
  accessToken: string;
  appKey: string;
  appSecret: string;
  refreshToken: string;
  credentialsPath: string;
}

export interface ResolvedToken {
  accessToken: string;
  source: TokenSource;
}

/** Collaborators, replaceable in tests */
export interface TokenResolverDeps {
  refresh?: (appKey: string, appSecret: string, refreshToken: string) => Promise<string>;
  loadCredentials?: (filePath: string) => Promise<Credentials | null>;
  logger?: Logger;
}

export const NO_CREDENTIALS_MESSAGE =
  'No Dropbox credentials. Authenticate with one of:\n' +
  '  1. --app-key, --app-secret and --refresh-token (or DROPBOX_APP_KEY, DROPBOX_APP_SECRET, DROPBOX_REFRESH_TOKEN)\n' +
  '  2. credentials saved by the interactive setup\n' +
  '  3. --token (or DROPBOX_TOKEN) with a short-lived access token';

/**
 * Resolves an access token following the precedence above.
 *
 * @throws AuthError if no method applies or a refresh is rejected
 */
export async function resolveAccessToken(
  input: TokenInput,
  deps: TokenResolverDeps = {},
): Promise<ResolvedToken> {
  const refresh = deps.refresh ?? refreshAccessToken;
  const load = deps.loadCredentials ?? loadCredentials;
  const logger = deps.logger;

  if (input.appKey && input.appSecret && input.refreshToken) {
    logger?.debug('Refreshing access token from supplied app credentials', {
      step: 'authentication',
    });
    const accessToken = await refresh(input.appKey, input.appSecret, input.refreshToken);
    return { accessToken, source: 'refresh-flags' };
  }

  let stored: Credentials | null = null;
  try {
    stored = await load(input.credentialsPath);
  } catch (error: unknown) {
    logger?.logPipelineError(
      wrapError(error, 'ConfigError', { filePath: input.credentialsPath }),
      'WARN',
    );
  }

  if (stored && stored.appKey && stored.appSecret && stored.refreshToken) {
    logger?.debug(`Refreshing access token from ${input.credentialsPath}`, {
      step: 'authentication',
    });
    const accessToken = await refresh(stored.appKey, stored.appSecret, stored.refreshToken);
    return { accessToken, source: 'stored-credentials' };
  }

  if (input.accessToken) {
    return { accessToken: input.accessToken, source: 'access-token' };
  }

  throw new AuthError(NO_CREDENTIALS_MESSAGE);
}
