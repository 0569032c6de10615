import chalk from 'chalk';
import { describe, it, expect, vi, beforeAll, afterEach } from 'vitest';
import { EXIT_FAILURE, EXIT_OK, USAGE, formatSummary, main, parseCliArgs } from '../../src/main/cli';
import { BackupRunSummary } from '../../src/main/services/backupGenerator';

function summary(overrides: Partial<BackupRunSummary> = {}): BackupRunSummary {
  return {
    accountId: 'dbid:test',
    remotePath: '',
    localFiles: 3,
    remoteFiles: 4,
    matched: 2,
    unmatchedLocal: ['/music/extra.mp3'],
    unmatchedRemote: [
      {
        kind: 'file',
        id: 'id:r',
        name: 'remote-only.mp3',
        lowercasePath: '/remote-only.mp3',
        displayPath: '/remote-only.mp3',
      },
    ],
    cacheHits: 0,
    parsed: 0,
    extractionFailures: 0,
    itemsWritten: 0,
    outputPath: null,
    dryRun: true,
    ...overrides,
  };
}

describe('cli', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // ─── parseCliArgs ──────────────────────────────────────────────────────

  describe('parseCliArgs', () => {
    it('collects flags', () => {
      expect(
        parseCliArgs(['--local', '/music', '--dry-run', '--workers', '4', '--no-cache']),
      ).toEqual({
        flags: { local: '/music', 'dry-run': true, workers: '4', 'no-cache': true },
        help: false,
      });
    });

    it('recognizes -h', () => {
      expect(parseCliArgs(['-h']).help).toBe(true);
    });

    it('rejects unknown flags', () => {
      expect(() => parseCliArgs(['--colour'])).toThrow();
    });

    it('rejects positional arguments', () => {
      expect(() => parseCliArgs(['/music'])).toThrow();
    });
  });

  // ─── formatSummary ─────────────────────────────────────────────────────

  describe('formatSummary', () => {
    it('prints the dry-run mapping', () => {
      expect(formatSummary(summary()).split('\n')).toEqual([
        '--- Dry Run Summary ---',
        '  Remote path:       (Dropbox root)',
        '  Local files:       3',
        '  Dropbox files:     4',
        '  Matched:           2',
        '  Unmatched local:   1',
        '  Unmatched Dropbox: 1',
      ]);
    });

    it('adds tag counts and the output file after a full run', () => {
      const text = formatSummary(
        summary({
          remotePath: '/Music',
          dryRun: false,
          cacheHits: 1,
          parsed: 1,
          extractionFailures: 1,
          itemsWritten: 2,
          outputPath: '/out/library.cbbackup',
        }),
      );

      expect(text.split('\n')).toEqual([
        '--- Backup Summary ---',
        '  Remote path:       /Music',
        '  Local files:       3',
        '  Dropbox files:     4',
        '  Matched:           2',
        '  Unmatched local:   1',
        '  Unmatched Dropbox: 1',
        '  Cache hits:        1',
        '  Parsed:            1',
        '  Tag read failures: 1',
        '✓ Wrote 2 items to /out/library.cbbackup',
      ]);
    });

    it('lists the files whose tags could not be read under the failures line', () => {
      const text = formatSummary(
        summary({ dryRun: false, extractionFailures: 2, itemsWritten: 2, outputPath: '/out/x.cbbackup' }),
        ['/music/bad one.mp3', '/music/bad two.flac'],
      );

      expect(text.split('\n').slice(-4)).toEqual([
        '  Tag read failures: 2',
        '    /music/bad one.mp3',
        '    /music/bad two.flac',
        '✓ Wrote 2 items to /out/x.cbbackup',
      ]);
    });

    it('leaves out the failures line when every file was read', () => {
      const text = formatSummary(summary({ dryRun: false, outputPath: '/out/x.cbbackup' }));
      expect(text).not.toContain('Tag read failures');
    });
  });

  // ─── main ──────────────────────────────────────────────────────────────

  describe('main', () => {
    it('prints usage for --help', async () => {
      const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
      expect(await main(['--help'])).toBe(EXIT_OK);
      expect(stdout).toHaveBeenCalledWith(USAGE);
    });

    it('fails with usage on an unknown flag', async () => {
      const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      expect(await main(['--bogus'])).toBe(EXIT_FAILURE);
      const written = stderr.mock.calls.map((call) => String(call[0])).join('');
      expect(written).toContain(USAGE);
    });
  });
});
