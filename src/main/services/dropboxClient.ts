/**
 * Dropbox API Client
 *
 * Authenticated access to the two Dropbox endpoints the backup needs:
 *  - /users/get_current_account (account identity)
 *  - /files/list_folder + /files/list_folder/continue (recursive listing)
 *
 * Rate limiting:
 *  - HTTP 429 is retried until it clears, waiting `Retry-After` seconds when
 *    the server sends it, else an exponential backoff from 1 s capped at 60 s
 *  - HTTP 401 is never retried: the token must be replaced
 *
 * Calls are cancelled through the AbortSignal given at construction, including
 * while sleeping between retries.
 */

import axios, { AxiosInstance } from 'axios';
import { RemoteEntry } from '../../shared/types';
import { APIError, AuthError, CancelledError } from './errors';
import type { Logger } from './logger';

// ─── Constants ────────────────────────────────────────────────────────────────

const API_BASE_URL = 'https://api.dropboxapi.com/2';
const REQUEST_TIMEOUT_MS = 30_000;
const INITIAL_BACKOFF_MS = 1_000;
const MAX_BACKOFF_MS = 60_000;

// ─── Types ────────────────────────────────────────────────────────────────────

/** HTTP transport; an axios instance in production */
export type HttpTransport = Pick<AxiosInstance, 'post'>;

/** Sleep function used between retries */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Options for DropboxClient */
export interface DropboxClientOptions {
  /** Bearer token sent on every call */
  accessToken: string;
  /** API base URL (for testing) */
  apiBaseUrl?: string;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
  /** First backoff delay after a 429 without Retry-After */
  initialBackoffMs?: number;
  /** Backoff ceiling */
  maxBackoffMs?: number;
  /** HTTP transport, shared across calls. Defaults to a fresh axios instance */
  http?: HttpTransport;
  /** Sleep implementation (for testing) */
  sleep?: SleepFn;
  /** Cancels in-flight calls and retry waits */
  signal?: AbortSignal;
  logger?: Logger;
}

/** One page of a folder listing */
export interface ListFolderPage {
  entries: RemoteEntry[];
  cursor: string;
  hasMore: boolean;
}

// Raw shapes we parse from the Dropbox responses ──────────────────────────────

interface RawResponse {
  status: number;
  data: unknown;
  headers: Record<string, unknown>;
}

// ─── Helper Functions ─────────────────────────────────────────────────────────

/**
 * Resolves after `ms` milliseconds, or rejects with CancelledError as soon as
 * the signal aborts.
 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError('Cancelled while waiting for the Dropbox rate limit'));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError('Cancelled while waiting for the Dropbox rate limit'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Parses a Retry-After header given in whole seconds. Returns null when the
 * header is missing or not a plain number.
 */
export function parseRetryAfter(value: unknown): number | null {
  const text = typeof value === 'number' ? String(value) : value;
  if (typeof text !== 'string' || !/^\s*\d+\s*$/.test(text)) return null;
  return parseInt(text, 10) * 1000;
}

/**
 * Renders a response body for an error message.
 */
export function bodyToString(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Maps a raw listing entry onto RemoteEntry. Entries of other kinds
 * (e.g. "deleted") and entries missing fields are dropped.
 */
export function parseRemoteEntry(value: unknown): RemoteEntry | null {
  if (!isRecord(value)) return null;
  const tag = value['.tag'];
  if (tag !== 'file' && tag !== 'folder') return null;

  const { id, name, path_lower: lowercasePath, path_display: displayPath } = value;
  if (
    typeof id !== 'string' ||
    typeof name !== 'string' ||
    typeof lowercasePath !== 'string' ||
    typeof displayPath !== 'string'
  ) {
    return null;
  }

  return { kind: tag, id, name, lowercasePath, displayPath };
}

/**
 * Validates a list_folder (or continue) response body.
 *
 * @throws APIError if the body does not have the expected shape
 */
export function parseListFolderPage(data: unknown, endpoint: string): ListFolderPage {
  if (!isRecord(data) || !Array.isArray(data.entries) || typeof data.has_more !== 'boolean') {
    throw new APIError(`Malformed response from ${endpoint}`, {
      endpoint,
      body: bodyToString(data),
    });
  }

  const cursor = typeof data.cursor === 'string' ? data.cursor : '';
  if (data.has_more && cursor === '') {
    throw new APIError(`Missing cursor in paginated response from ${endpoint}`, {
      endpoint,
      body: bodyToString(data),
    });
  }

  const entries: RemoteEntry[] = [];
  for (const raw of data.entries) {
    const entry = parseRemoteEntry(raw);
    if (entry) entries.push(entry);
  }

  return { entries, cursor, hasMore: data.has_more };
}

// ─── Client ───────────────────────────────────────────────────────────────────

/**
 * Dropbox API client bound to one access token.
 */
export class DropboxClient {
  private readonly accessToken: string;
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly initialBackoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly http: HttpTransport;
  private readonly sleep: SleepFn;
  private readonly signal: AbortSignal | undefined;
  private readonly logger: Logger | null;

  constructor(options: DropboxClientOptions) {
    this.accessToken = options.accessToken;
    this.apiBaseUrl = options.apiBaseUrl ?? API_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.initialBackoffMs = options.initialBackoffMs ?? INITIAL_BACKOFF_MS;
    this.maxBackoffMs = options.maxBackoffMs ?? MAX_BACKOFF_MS;
    this.http = options.http ?? axios.create();
    this.sleep = options.sleep ?? abortableSleep;
    this.signal = options.signal;
    this.logger = options.logger ?? null;
  }

  /**
   * Retrieves the current user's account ID.
   *
   * @throws AuthError on 401, APIError on other failures or an empty account_id
   */
  async getAccountId(): Promise<string> {
    const endpoint = '/users/get_current_account';
    const data = await this.apiCall(endpoint, 'null');

    const accountId = isRecord(data) ? data.account_id : undefined;
    if (typeof accountId !== 'string' || accountId === '') {
      throw new APIError('Empty account_id in response', { endpoint, body: bodyToString(data) });
    }
    return accountId;
  }

  /**
   * Lists every file under `remotePath`, following continuation cursors until
   * the listing is complete. Folders are not returned.
   *
   * @param remotePath - '' for the Dropbox root (not '/'), else e.g. '/Music'
   */
  async listFolder(remotePath: string): Promise<RemoteEntry[]> {
    this.logger?.debug(`Listing Dropbox folder "${remotePath}"`, { step: 'listing' });

    let endpoint = '/files/list_folder';
    let page = parseListFolderPage(
      await this.apiCall(endpoint, JSON.stringify({ path: remotePath, recursive: true })),
      endpoint,
    );
    const files = page.entries.filter((e) => e.kind === 'file');
    this.logger?.debug(`Received first page: ${files.length} files, has_more=${page.hasMore}`, {
      step: 'listing',
    });

    endpoint = '/files/list_folder/continue';
    while (page.hasMore) {
      page = parseListFolderPage(
        await this.apiCall(endpoint, JSON.stringify({ cursor: page.cursor })),
        endpoint,
      );
      const pageFiles = page.entries.filter((e) => e.kind === 'file');
      files.push(...pageFiles);
      this.logger?.debug(
        `Received continuation page: ${pageFiles.length} files, has_more=${page.hasMore}`,
        { step: 'listing' },
      );
    }

    this.logger?.info(`Dropbox listing complete: ${files.length} files`, { step: 'listing' });
    return files;
  }

  /**
   * POSTs a JSON body to an RPC endpoint and returns the decoded response,
   * retrying through rate limits.
   */
  private async apiCall(endpoint: string, body: string): Promise<unknown> {
    let backoff = this.initialBackoffMs;

    for (;;) {
      const response = await this.send(endpoint, body);

      if (response.status === 200) {
        return response.data;
      }

      if (response.status === 401) {
        throw new AuthError(
          'Dropbox authentication failed (401). Your token may be invalid or expired. ' +
            'Generate a new token at https://www.dropbox.com/developers/apps',
          { statusCode: 401 },
        );
      }

      if (response.status === 429) {
        const wait = parseRetryAfter(response.headers['retry-after']) ?? backoff;
        this.logger?.warn(`Rate limited by Dropbox, waiting ${wait / 1000}s`, {
          step: 'api_call',
        });
        await this.sleep(wait, this.signal);
        backoff = Math.min(backoff * 2, this.maxBackoffMs);
        continue;
      }

      const text = bodyToString(response.data);
      throw new APIError(`Dropbox API error ${response.status} on ${endpoint}: ${text}`, {
        statusCode: response.status,
        endpoint,
        body: text,
      });
    }
  }

  private async send(endpoint: string, body: string): Promise<RawResponse> {
    if (this.signal?.aborted) {
      throw new CancelledError(`Cancelled before calling ${endpoint}`);
    }

    try {
      const response = await this.http.post<unknown>(`${this.apiBaseUrl}${endpoint}`, body, {
        headers: {
          Authorization: `Bearer ${this.accessToken}`,
          'Content-Type': 'application/json',
        },
        timeout: this.timeoutMs,
        signal: this.signal,
        validateStatus: () => true,
      });
      return {
        status: response.status,
        data: response.data,
        headers: isRecord(response.headers) ? { ...response.headers } : {},
      };
    } catch (error: unknown) {
      if (this.signal?.aborted) {
        throw new CancelledError(`Cancelled while calling ${endpoint}`);
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new APIError(`Request to ${endpoint} failed: ${cause.message}`, { endpoint, cause });
    }
  }
}
