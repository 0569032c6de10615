/**
 * Command-line front end: flag parsing, token resolution (with the
 * interactive setup as a fallback), signal handling, progress display and
 * the final summary.
 */

import { parseArgs } from 'util';
import chalk from 'chalk';
import cliProgress from 'cli-progress';
import { AppSettings } from '../shared/types';
import { BackupGenerator, BackupRunSummary } from './services/backupGenerator';
import { refreshAccessToken } from './services/dropboxAuth';
import { DropboxClient } from './services/dropboxClient';
import { AuthError, CancelledError, isPipelineError } from './services/errors';
import { runInteractiveSetup } from './services/interactiveSetup';
import { Logger, toLogLevel } from './services/logger';
import { MetadataCache } from './services/metadataCache';
import { CliFlags, resolveSettings } from './services/settingsManager';
import { NO_CREDENTIALS_MESSAGE, resolveAccessToken } from './services/tokenResolver';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export const USAGE = `Usage: cloudbeats-backup --local <dir> [options]

Generates a CloudBeats backup (.cbbackup) for a music folder inside Dropbox.

Options:
  --local <dir>            Local music folder inside the Dropbox folder (required)
  --output <file>          Backup file to write (default: cloudbeats.cbbackup)
  --token <token>          Dropbox access token (env: DROPBOX_TOKEN)
  --app-key <key>          Dropbox app key (env: DROPBOX_APP_KEY)
  --app-secret <secret>    Dropbox app secret (env: DROPBOX_APP_SECRET)
  --refresh-token <token>  Dropbox refresh token (env: DROPBOX_REFRESH_TOKEN)
  --workers <n>            Concurrent tag readers (default: 2 x CPUs)
  --dry-run                Match files and print a summary without reading tags
  --no-cache               Do not read or write the tag cache
  --cache-path <file>      Tag cache location
  --log-level <level>      error | warn | info | debug (default: info)
  -h, --help               Show this help
`;

export interface ParsedArgs {
  flags: CliFlags;
  help: boolean;
}

/**
 * Parses command-line arguments.
 *
 * @throws TypeError on unknown flags or missing flag values
 */
export function parseCliArgs(argv: string[]): ParsedArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      local: { type: 'string' },
      output: { type: 'string' },
      token: { type: 'string' },
      'app-key': { type: 'string' },
      'app-secret': { type: 'string' },
      'refresh-token': { type: 'string' },
      workers: { type: 'string' },
      'dry-run': { type: 'boolean' },
      'no-cache': { type: 'boolean' },
      'cache-path': { type: 'string' },
      'log-level': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
    allowPositionals: false,
  });

  const { help, ...flags } = values;
  return { flags, help: help ?? false };
}

/**
 * Formats the end-of-run report. `failedFiles` lists the files whose tags
 * could not be read, as recorded by the logger.
 */
export function formatSummary(
  summary: BackupRunSummary,
  failedFiles: readonly string[] = [],
): string {
  const lines: string[] = [];
  const row = (label: string, value: string | number): void => {
    lines.push(`  ${label.padEnd(19)}${value}`);
  };

  lines.push(chalk.cyan(summary.dryRun ? '--- Dry Run Summary ---' : '--- Backup Summary ---'));
  row('Remote path:', summary.remotePath === '' ? '(Dropbox root)' : summary.remotePath);
  row('Local files:', summary.localFiles);
  row('Dropbox files:', summary.remoteFiles);
  row('Matched:', summary.matched);
  row('Unmatched local:', summary.unmatchedLocal.length);
  row('Unmatched Dropbox:', summary.unmatchedRemote.length);

  if (!summary.dryRun) {
    row('Cache hits:', summary.cacheHits);
    row('Parsed:', summary.parsed);
    if (summary.extractionFailures > 0) {
      lines.push(chalk.yellow(`  ${'Tag read failures:'.padEnd(19)}${summary.extractionFailures}`));
      for (const filePath of failedFiles) {
        lines.push(chalk.yellow(`    ${filePath}`));
      }
    }
    if (summary.outputPath) {
      lines.push(chalk.green(`✓ Wrote ${summary.itemsWritten} items to ${summary.outputPath}`));
    }
  }

  return lines.join('\n');
}

/**
 * Resolves the bearer token, falling back to the interactive setup on a
 * terminal when no credentials are configured.
 */
async function obtainAccessToken(settings: AppSettings, logger: Logger): Promise<string> {
  try {
    const resolved = await resolveAccessToken(settings, { logger });
    logger.debug(`Using token from ${resolved.source}`, { step: 'authentication' });
    return resolved.accessToken;
  } catch (error: unknown) {
    const noCredentials = error instanceof AuthError && error.message === NO_CREDENTIALS_MESSAGE;
    if (!noCredentials || !process.stdin.isTTY) throw error;
  }

  const credentials = await runInteractiveSetup({
    appKey: settings.appKey,
    appSecret: settings.appSecret,
    credentialsPath: settings.credentialsPath,
  });
  return refreshAccessToken(credentials.appKey, credentials.appSecret, credentials.refreshToken);
}

function describeError(error: unknown): string {
  if (isPipelineError(error)) return error.toUserMessage();
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs the CLI and returns the process exit code.
 */
export async function main(argv: string[]): Promise<number> {
  let parsed: ParsedArgs;
  let settings: AppSettings;
  try {
    parsed = parseCliArgs(argv);
    if (parsed.help) {
      process.stdout.write(USAGE);
      return EXIT_OK;
    }
    settings = resolveSettings(parsed.flags);
  } catch (error: unknown) {
    process.stderr.write(`${chalk.red(describeError(error))}\n\n${USAGE}`);
    return EXIT_FAILURE;
  }

  const logger = new Logger({
    minLevel: toLogLevel(settings.logLevel),
    console: process.stderr,
    file: {},
  });
  await logger.initialize();

  const controller = new AbortController();
  const onSigint = (): void => {
    if (controller.signal.aborted) {
      process.exit(EXIT_INTERRUPTED);
    }
    logger.warn('Interrupted, finishing files in progress (press Ctrl-C again to quit now)');
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  const bar = new cliProgress.SingleBar(
    {
      format: 'Reading tags |{bar}| {percentage}% | {value}/{total} files | {eta}s remaining',
      barCompleteChar: '█',
      barIncompleteChar: '░',
      stream: process.stderr,
    },
    cliProgress.Presets.shades_classic,
  );
  let barActive = false;

  try {
    const accessToken = await obtainAccessToken(settings, logger);
    const client = new DropboxClient({ accessToken, signal: controller.signal, logger });
    const cache = settings.useCache ? MetadataCache.load(settings.cachePath, logger) : null;
    if (cache) {
      logger.info(`Tag cache loaded: ${cache.size} entries`, { step: 'cache' });
    }

    const generator = new BackupGenerator({
      localDir: settings.localDir,
      outputPath: settings.outputPath,
      workers: settings.workers,
      dryRun: settings.dryRun,
      client,
      cache,
      logger,
      signal: controller.signal,
      onTagsStart: (total) => {
        if (process.stderr.isTTY && total > 0) {
          bar.start(total, 0);
          barActive = true;
        }
      },
      onTagProgress: ({ completed }) => {
        if (barActive) bar.update(completed);
      },
    });

    const summary = await generator.run();
    if (barActive) {
      bar.stop();
      barActive = false;
    }

    const failedFiles = logger
      .getEntries({ level: 'WARN', category: 'ExtractionError' })
      .flatMap((entry) => (entry.filePath ? [entry.filePath] : []));
    process.stderr.write(`\n${formatSummary(summary, failedFiles)}\n`);
    return EXIT_OK;
  } catch (error: unknown) {
    if (barActive) bar.stop();
    if (error instanceof CancelledError) {
      logger.logPipelineError(error, 'WARN');
      return EXIT_INTERRUPTED;
    }
    logger.logError(error);
    process.stderr.write(`${chalk.red(describeError(error))}\n`);
    return EXIT_FAILURE;
  } finally {
    process.off('SIGINT', onSigint);
  }
}
