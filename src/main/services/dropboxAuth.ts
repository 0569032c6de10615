/**
 * Dropbox OAuth2 helpers
 *
 * One-shot calls against the token endpoint:
 *  - refresh token -> short-lived access token
 *  - authorization code -> refresh token (+ access token)
 *
 * Neither call is retried; a rejected grant means the operator has to act.
 */

import axios, { AxiosResponse } from 'axios';
import { AuthError } from './errors';

const TOKEN_URL = 'https://api.dropboxapi.com/oauth2/token';
const AUTHORIZE_URL = 'https://www.dropbox.com/oauth2/authorize';
const REQUEST_TIMEOUT_MS = 30_000;

/** Options shared by the token endpoint calls */
export interface TokenRequestOptions {
  /** Token endpoint URL (for testing) */
  tokenUrl?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/** Tokens returned by an authorization-code exchange */
export interface AuthorizationTokens {
  refreshToken: string;
  accessToken: string;
}

function readString(data: unknown, key: string): string {
  if (data === null || typeof data !== 'object') return '';
  const value: unknown = Object.getOwnPropertyDescriptor(data, key)?.value;
  return typeof value === 'string' ? value : '';
}

function describeBody(data: unknown): string {
  return typeof data === 'string' ? data : JSON.stringify(data ?? '');
}

/**
 * POSTs a form-encoded grant and returns the decoded body of a 200 response.
 */
async function postTokenRequest(
  form: URLSearchParams,
  grant: string,
  options: TokenRequestOptions,
): Promise<unknown> {
  let response: AxiosResponse<unknown>;
  try {
    response = await axios.post<unknown>(options.tokenUrl ?? TOKEN_URL, form.toString(), {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      timeout: options.timeoutMs ?? REQUEST_TIMEOUT_MS,
      signal: options.signal,
      validateStatus: () => true,
    });
  } catch (error: unknown) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new AuthError(`Token request (${grant}) failed: ${cause.message}`, { cause });
  }

  if (response.status !== 200) {
    throw new AuthError(
      `Token request (${grant}) failed with status ${response.status}: ${describeBody(response.data)}`,
      { statusCode: response.status },
    );
  }
  return response.data;
}

/**
 * Exchanges a long-lived refresh token for an access token.
 *
 * @throws AuthError on a non-200 response or a response without access_token
 */
export async function refreshAccessToken(
  appKey: string,
  appSecret: string,
  refreshToken: string,
  options: TokenRequestOptions = {},
): Promise<string> {
  const form = new URLSearchParams({
    grant_type: 'refresh_token',
    refresh_token: refreshToken,
    client_id: appKey,
    client_secret: appSecret,
  });

  const data = await postTokenRequest(form, 'refresh_token', options);
  const accessToken = readString(data, 'access_token');
  if (!accessToken) {
    throw new AuthError('Token refresh response contained no access_token');
  }
  return accessToken;
}

/**
 * Exchanges an authorization code (from the authorize page) for tokens.
 *
 * @throws AuthError on a non-200 response or if either token is missing
 */
export async function exchangeAuthorizationCode(
  appKey: string,
  appSecret: string,
  code: string,
  options: TokenRequestOptions = {},
): Promise<AuthorizationTokens> {
  const form = new URLSearchParams({
    code,
    grant_type: 'authorization_code',
    client_id: appKey,
    client_secret: appSecret,
  });

  const data = await postTokenRequest(form, 'authorization_code', options);
  const refreshToken = readString(data, 'refresh_token');
  const accessToken = readString(data, 'access_token');
  if (!refreshToken || !accessToken) {
    throw new AuthError('Authorization response is missing refresh_token or access_token');
  }
  return { refreshToken, accessToken };
}

/**
 * URL of the page where the user grants offline access to the app.
 */
export function authorizationUrl(appKey: string): string {
  const params = new URLSearchParams({
    client_id: appKey,
    response_type: 'code',
    token_access_type: 'offline',
  });
  return `${AUTHORIZE_URL}?${params.toString()}`;
}
