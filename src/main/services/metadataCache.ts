/**
 * Persistent Tag Cache (JSON file)
 *
 * Caches extracted AudioMetadata per absolute file path so unchanged files are
 * not parsed again on the next run. An entry is trusted only while the file's
 * size and modification time (in nanoseconds) are exactly what they were when
 * the entry was stored.
 *
 * Size + mtime is a heuristic, not a content hash:
 * - a rewrite that keeps the same size and restores the old mtime is served stale
 * - a touch without a content change is a miss and the file is parsed again
 *
 * On disk the cache is one JSON object keyed by file path:
 *   { "/music/a.mp3": { "key": { "size": 123, "mod_time": "1714564800000000000" }, "meta": {...} } }
 * `mod_time` is a decimal string because nanosecond timestamps exceed 2^53.
 *
 * Concurrency: lookup() only reads the in-memory map and may run from any
 * number of pool tasks at once. store() and persist() must run after the pool
 * has joined.
 */

import * as fs from 'fs';
import * as path from 'path';
import { AudioMetadata } from '../../shared/types';
import { CacheError } from './errors';
import type { Logger } from './logger';

// ─── Types ───────────────────────────────────────────────────────────────────

/** The (size, mtime) pair a cache entry is valid for */
export interface ValidityKey {
  size: number;
  modTimeNs: bigint;
}

export interface CacheEntry {
  validityKey: ValidityKey;
  metadata: AudioMetadata;
}

/** Serialized form of one entry */
interface StoredEntry {
  key: { size: number; mod_time: string };
  meta: AudioMetadata;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

/**
 * Reads the validity key of a file, or null if it cannot be stat'd.
 */
export function readValidityKey(filePath: string): ValidityKey | null {
  try {
    const stats = fs.statSync(filePath, { bigint: true });
    return { size: Number(stats.size), modTimeNs: stats.mtimeNs };
  } catch {
    return null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Type guard for metadata restored from JSON.
 */
export function isAudioMetadata(value: unknown): value is AudioMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.title === 'string' &&
    typeof value.artist === 'string' &&
    typeof value.album === 'string' &&
    typeof value.albumArtist === 'string' &&
    (value.genre === null || typeof value.genre === 'string') &&
    typeof value.year === 'number' &&
    (value.trackNumber === null || typeof value.trackNumber === 'number') &&
    typeof value.diskNumber === 'number' &&
    typeof value.durationSeconds === 'number'
  );
}

/**
 * Restores one serialized entry, or null when its shape is wrong.
 */
export function parseStoredEntry(value: unknown): CacheEntry | null {
  if (!isRecord(value) || !isRecord(value.key)) return null;
  const { size, mod_time: modTime } = value.key;
  if (typeof size !== 'number' || typeof modTime !== 'string' || !/^\d+$/.test(modTime)) {
    return null;
  }
  if (!isAudioMetadata(value.meta)) return null;
  return { validityKey: { size, modTimeNs: BigInt(modTime) }, metadata: value.meta };
}

function toStoredEntry(entry: CacheEntry): StoredEntry {
  return {
    key: { size: entry.validityKey.size, mod_time: entry.validityKey.modTimeNs.toString() },
    meta: entry.metadata,
  };
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// ─── Metadata Cache ──────────────────────────────────────────────────────────

/**
 * Tag cache loaded into memory at start-up and written back once at the end
 * of a run.
 */
export class MetadataCache {
  private readonly filePath: string;
  private readonly logger: Logger | null;
  private readonly entries = new Map<string, CacheEntry>();
  private dirty = false;

  private constructor(filePath: string, logger: Logger | null) {
    this.filePath = filePath;
    this.logger = logger;
  }

  /**
   * Loads the cache from a JSON file. A missing file gives an empty cache;
   * an unreadable or corrupt one gives an empty cache and a warning. Never
   * writes to disk.
   */
  static load(filePath: string, logger: Logger | null = null): MetadataCache {
    const cache = new MetadataCache(filePath, logger);
    cache.readFromDisk();
    return cache;
  }

  /** Number of entries held in memory */
  get size(): number {
    return this.entries.size;
  }

  getPath(): string {
    return this.filePath;
  }

  /** Whether entries were stored since the last load or persist */
  isDirty(): boolean {
    return this.dirty;
  }

  /**
   * Returns cached metadata if the file at `filePath` still has the size and
   * mtime recorded with the entry. Any stat failure is a miss.
   */
  lookup(filePath: string): AudioMetadata | undefined {
    const entry = this.entries.get(filePath);
    if (!entry) return undefined;

    const current = readValidityKey(filePath);
    if (
      current === null ||
      current.size !== entry.validityKey.size ||
      current.modTimeNs !== entry.validityKey.modTimeNs
    ) {
      return undefined;
    }

    return entry.metadata;
  }

  /**
   * Records metadata for a file, overwriting any previous entry.
   *
   * @returns false if the file could not be stat'd (nothing is stored)
   */
  store(filePath: string, metadata: AudioMetadata): boolean {
    const validityKey = readValidityKey(filePath);
    if (validityKey === null) return false;

    this.entries.set(filePath, { validityKey, metadata });
    this.dirty = true;
    return true;
  }

  /**
   * Writes the whole cache to disk if anything changed since the last load.
   * A failed write is logged as a warning and reported by the return value.
   *
   * @returns true if the file was written
   */
  persist(): boolean {
    if (!this.dirty) return false;

    const serialized: Record<string, StoredEntry> = {};
    for (const [filePath, entry] of this.entries) {
      serialized[filePath] = toStoredEntry(entry);
    }

    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, JSON.stringify(serialized), 'utf-8');
    } catch (error: unknown) {
      const cause = toError(error);
      this.logger?.logPipelineError(
        new CacheError(`Saving tag cache failed: ${cause.message}`, { filePath: this.filePath, cause }),
        'WARN',
      );
      return false;
    }

    this.dirty = false;
    return true;
  }

  // ─── Loading ─────────────────────────────────────────────────────────────

  private readFromDisk(): void {
    let content: string;
    try {
      content = fs.readFileSync(this.filePath, 'utf-8');
    } catch (error: unknown) {
      if (isRecord(error) && error.code === 'ENOENT') return;
      this.warnUnreadable('Reading tag cache failed, starting empty', toError(error));
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error: unknown) {
      this.warnUnreadable('Parsing tag cache failed, starting empty', toError(error));
      return;
    }
    if (!isRecord(parsed)) {
      this.warnUnreadable(
        'Parsing tag cache failed, starting empty',
        new Error('top-level value is not an object'),
      );
      return;
    }

    let skipped = 0;
    for (const [filePath, value] of Object.entries(parsed)) {
      const entry = parseStoredEntry(value);
      if (entry) {
        this.entries.set(filePath, entry);
      } else {
        skipped++;
      }
    }

    if (skipped > 0) {
      this.logger?.warn(`Skipped ${skipped} malformed tag cache entries`, {
        category: 'CacheError',
        filePath: this.filePath,
      });
    }
  }

  private warnUnreadable(message: string, cause: Error): void {
    this.logger?.logPipelineError(
      new CacheError(`${message}: ${cause.message}`, { filePath: this.filePath, cause }),
      'WARN',
    );
  }
}
