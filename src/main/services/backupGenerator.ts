/**
 * Backup Generator
 *
 * Orchestrates one run:
 *   identity -> Dropbox root -> remote path -> local scan -> remote listing
 *   -> match -> (dry run stops here) -> tags (cache, else worker pool)
 *   -> cache store + persist -> backup items -> write
 *
 * Every collaborator is injected so a run can be exercised without network
 * access or a Dropbox desktop installation.
 *
 * Error policy:
 * - configuration, authentication, scan, listing and write failures abort the run
 * - a file whose tags cannot be read is warned, written with default tags,
 *   and never cached
 * - cancellation stops new tag reads; results already read are still cached,
 *   and the run ends with CancelledError before anything is written
 */

import { AudioMetadata, MatchedPair, RemoteEntry } from '../../shared/types';
import { readAudioMetadata, defaultMetadata } from './audioReader';
import { Backup, buildBackupItem, writeBackup } from './backupFormat';
import { computeRemotePath, detectDropboxRoot } from './dropboxInfo';
import { CancelledError, wrapError } from './errors';
import type { Logger } from './logger';
import { matchFiles } from './matcher';
import type { MetadataCache } from './metadataCache';
import { runWorkerPool } from './workerPool';
import { scanDirectoryForAudioFiles } from '../utils/fileScanner';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** The remote calls a run needs; implemented by DropboxClient */
export interface RemoteLibrary {
  getAccountId(): Promise<string>;
  listFolder(remotePath: string): Promise<RemoteEntry[]>;
}

/** Progress of the tag-reading phase */
export interface TagProgress {
  completed: number;
  total: number;
}

export interface BackupGeneratorOptions {
  /** Absolute path of the local music folder */
  localDir: string;
  /** Absolute path of the backup file to write */
  outputPath: string;
  /** Tag-reading concurrency */
  workers: number;
  /** Stop after matching and write nothing */
  dryRun?: boolean;
  client: RemoteLibrary;
  /** Tag cache, or null to always read tags */
  cache?: MetadataCache | null;
  logger?: Logger;
  signal?: AbortSignal;
  /** Called once before tag reading starts */
  onTagsStart?: (total: number) => void;
  onTagProgress?: (progress: TagProgress) => void;

  // Collaborators (replaceable in tests)
  readMetadata?: (filePath: string) => Promise<AudioMetadata>;
  detectRoot?: () => Promise<string>;
  resolveRemotePath?: (localDir: string, dropboxRoot: string) => Promise<string>;
  scan?: (localDir: string) => Promise<string[]>;
  write?: (outputPath: string, backup: Backup) => Promise<void>;
}

/** Outcome of a run */
export interface BackupRunSummary {
  accountId: string;
  remotePath: string;
  localFiles: number;
  remoteFiles: number;
  matched: number;
  unmatchedLocal: string[];
  unmatchedRemote: RemoteEntry[];
  cacheHits: number;
  parsed: number;
  /** Files written with default tags because reading failed */
  extractionFailures: number;
  itemsWritten: number;
  /** null for a dry run */
  outputPath: string | null;
  dryRun: boolean;
}

/** Result of the tag phase for one matched pair */
interface TagResult {
  metadata: AudioMetadata;
  fromCache: boolean;
}

// ─── Generator ───────────────────────────────────────────────────────────────

export class BackupGenerator {
  private readonly options: BackupGeneratorOptions;
  private readonly logger: Logger | null;
  private readonly cache: MetadataCache | null;

  constructor(options: BackupGeneratorOptions) {
    this.options = options;
    this.logger = options.logger ?? null;
    this.cache = options.cache ?? null;
  }

  /**
   * Runs the whole pipeline once.
   *
   * @throws PipelineError subclasses for fatal failures, CancelledError on interrupt
   */
  async run(): Promise<BackupRunSummary> {
    const {
      localDir,
      outputPath,
      client,
      dryRun = false,
      detectRoot = (): Promise<string> => detectDropboxRoot(),
      resolveRemotePath = computeRemotePath,
      scan = scanDirectoryForAudioFiles,
    } = this.options;

    this.logger?.info('Authenticating with Dropbox...', { step: 'authentication' });
    const accountId = await client.getAccountId();
    this.logger?.info(`Authenticated as ${accountId}`, { step: 'authentication' });

    const dropboxRoot = await detectRoot();
    this.logger?.info(`Dropbox folder: ${dropboxRoot}`, { step: 'configuration' });

    const remotePath = await resolveRemotePath(localDir, dropboxRoot);
    this.logger?.info(`Remote path: "${remotePath}"`, { step: 'configuration' });

    this.logger?.info(`Scanning ${localDir}...`, { step: 'scanning' });
    const localFiles = await scan(localDir);
    this.logger?.info(`Found ${localFiles.length} local audio files`, { step: 'scanning' });

    this.throwIfCancelled();
    this.logger?.info('Listing Dropbox files...', { step: 'listing' });
    const entries = await client.listFolder(remotePath);

    const reconciliation = matchFiles(localDir, remotePath, localFiles, entries);
    this.logger?.info(
      `Matched ${reconciliation.matched.length}, unmatched local ${reconciliation.unmatchedLocal.length}, ` +
        `unmatched Dropbox ${reconciliation.unmatchedRemote.length}`,
      { step: 'matching' },
    );
    for (const filePath of reconciliation.unmatchedLocal) {
      this.logger?.debug('Local file has no Dropbox match', { filePath, step: 'matching' });
    }
    for (const entry of reconciliation.unmatchedRemote) {
      this.logger?.debug(`Dropbox file has no local match: ${entry.displayPath}`, {
        step: 'matching',
      });
    }

    const summary: BackupRunSummary = {
      accountId,
      remotePath,
      localFiles: localFiles.length,
      remoteFiles: entries.length,
      matched: reconciliation.matched.length,
      unmatchedLocal: reconciliation.unmatchedLocal,
      unmatchedRemote: reconciliation.unmatchedRemote,
      cacheHits: 0,
      parsed: 0,
      extractionFailures: 0,
      itemsWritten: 0,
      outputPath: null,
      dryRun,
    };

    if (dryRun) {
      return summary;
    }

    const metadata = await this.readTags(reconciliation.matched, summary);

    const backup: Backup = {
      items: reconciliation.matched.map((pair, i) => buildBackupItem(accountId, pair, metadata[i])),
      playlists: [],
    };

    const write = this.options.write ?? writeBackup;
    await write(outputPath, backup);
    this.logger?.info(`Wrote ${backup.items.length} items to ${outputPath}`, { step: 'writing' });

    summary.itemsWritten = backup.items.length;
    summary.outputPath = outputPath;
    return summary;
  }

  /**
   * Reads tags for every matched pair, from the cache when valid, then stores
   * fresh results and persists the cache.
   *
   * @returns one metadata record per pair, in pair order
   */
  private async readTags(pairs: MatchedPair[], summary: BackupRunSummary): Promise<AudioMetadata[]> {
    const readMetadata = this.options.readMetadata ?? readAudioMetadata;
    const cache = this.cache;

    this.logger?.info(`Reading tags with ${this.options.workers} workers...`, {
      step: 'reading_tags',
    });
    this.options.onTagsStart?.(pairs.length);

    const pool = await runWorkerPool<MatchedPair, TagResult>(
      pairs,
      async (pair) => {
        const cached = cache?.lookup(pair.localPath);
        if (cached) return { metadata: cached, fromCache: true };
        return { metadata: await readMetadata(pair.localPath), fromCache: false };
      },
      {
        concurrency: this.options.workers,
        signal: this.options.signal,
        onProgress: (completed, total) => this.options.onTagProgress?.({ completed, total }),
        toError: (error, index) =>
          wrapError(error, 'ExtractionError', {
            filePath: pairs[index].localPath,
            step: 'reading_tags',
          }),
      },
    );

    // All tasks have joined; the cache is written from here on only.
    const metadata: AudioMetadata[] = pairs.map((pair, i) => {
      const result = pool.results[i];
      const error = pool.errors[i];

      if (error) {
        summary.extractionFailures++;
        this.logger?.logPipelineError(
          wrapError(error, 'ExtractionError', { filePath: pair.localPath }),
          'WARN',
        );
        return defaultMetadata(pair.localPath);
      }
      if (!result) {
        return defaultMetadata(pair.localPath);
      }

      if (result.fromCache) {
        summary.cacheHits++;
      } else {
        summary.parsed++;
        cache?.store(pair.localPath, result.metadata);
      }
      return result.metadata;
    });

    if (cache) {
      cache.persist();
      this.logger?.info(`Tag cache: ${summary.cacheHits} hits, ${summary.parsed} parsed`, {
        step: 'cache',
      });
    }

    if (pool.cancelled) {
      throw new CancelledError(
        `Cancelled after reading tags for ${pool.completed} of ${pairs.length} files`,
      );
    }

    return metadata;
  }

  private throwIfCancelled(): void {
    if (this.options.signal?.aborted) {
      throw new CancelledError();
    }
  }
}
