import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect } from 'vitest';
import {
  Backup,
  BackupItem,
  buildBackupItem,
  formatDuration,
  serializeBackup,
  writeBackup,
} from '../../../src/main/services/backupFormat';
import { WriteError } from '../../../src/main/services/errors';
import { AudioMetadata, MatchedPair } from '../../../src/shared/types';

// ─── Fixtures ────────────────────────────────────────────────────────────────

const PAIR: MatchedPair = {
  localPath: '/Users/me/Dropbox/Music/song.mp3',
  remoteEntry: {
    kind: 'file',
    id: 'id:abc',
    name: 'song.mp3',
    lowercasePath: '/music/song.mp3',
    displayPath: '/Music/song.mp3',
  },
};

const METADATA: AudioMetadata = {
  title: 'Song',
  artist: 'Artist',
  album: 'Album',
  albumArtist: 'Album Artist',
  genre: 'Rock',
  year: 2001,
  trackNumber: 5,
  diskNumber: 1,
  durationSeconds: 294,
};

function item(overrides: Partial<BackupItem> = {}): BackupItem {
  return { ...buildBackupItem('dbid:test', PAIR, METADATA), ...overrides };
}

// ─── Tests ───────────────────────────────────────────────────────────────────

describe('backupFormat', () => {
  describe('buildBackupItem', () => {
    it('maps the pair and metadata onto a backup item', () => {
      expect(buildBackupItem('dbid:test', PAIR, METADATA)).toEqual({
        account_id: 'dbid:test',
        key: 'id:abc',
        name: 'song.mp3',
        path: '',
        service: 'dropbox',
        tag_album: 'Album',
        tag_albumArtist: 'Album Artist',
        tag_artist: 'Artist',
        tag_diskNumber: 1,
        tag_duration: 294,
        tag_genre: 'Rock',
        tag_name: 'Song',
        tag_trackNumber: 5,
        tag_year: 2001,
      });
    });
  });

  describe('formatDuration', () => {
    it('always prints one decimal', () => {
      expect(formatDuration(294)).toBe('294.0');
      expect(formatDuration(123.456)).toBe('123.5');
      expect(formatDuration(0)).toBe('0.0');
    });

    it('prints non-finite values as zero', () => {
      expect(formatDuration(Number.NaN)).toBe('0.0');
    });
  });

  describe('serializeBackup', () => {
    it('writes minified JSON with keys in importer order', () => {
      const backup: Backup = { items: [item()], playlists: [] };
      expect(serializeBackup(backup)).toBe(
        '{"items":[{"account_id":"dbid:test","key":"id:abc","name":"song.mp3","path":"",' +
          '"service":"dropbox","tag_album":"Album","tag_albumArtist":"Album Artist",' +
          '"tag_artist":"Artist","tag_diskNumber":1,"tag_duration":294.0,"tag_genre":"Rock",' +
          '"tag_name":"Song","tag_trackNumber":5,"tag_year":2001}],"playlists":[]}',
      );
    });

    it('omits a missing genre and track number', () => {
      const json = serializeBackup({
        items: [item({ tag_genre: null, tag_trackNumber: null, tag_duration: 123.456 })],
        playlists: [],
      });
      expect(json).toBe(
        '{"items":[{"account_id":"dbid:test","key":"id:abc","name":"song.mp3","path":"",' +
          '"service":"dropbox","tag_album":"Album","tag_albumArtist":"Album Artist",' +
          '"tag_artist":"Artist","tag_diskNumber":1,"tag_duration":123.5,' +
          '"tag_name":"Song","tag_year":2001}],"playlists":[]}',
      );
    });

    it('keeps a track number of zero', () => {
      expect(serializeBackup({ items: [item({ tag_trackNumber: 0 })], playlists: [] })).toContain(
        '"tag_trackNumber":0,',
      );
    });

    it('escapes strings', () => {
      const json = serializeBackup({
        items: [item({ tag_name: 'Say "Hi"\\Bye', name: 'Café.mp3' })],
        playlists: [],
      });
      const parsed: unknown = JSON.parse(json);
      expect(parsed).toMatchObject({
        items: [{ tag_name: 'Say "Hi"\\Bye', name: 'Café.mp3' }],
      });
    });

    it('serializes an empty backup', () => {
      expect(serializeBackup({ items: [], playlists: [] })).toBe('{"items":[],"playlists":[]}');
    });
  });

  describe('writeBackup', () => {
    it('writes the serialized backup, creating directories', async () => {
      const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cloudbeats-backup-test-'));
      try {
        const outputPath = path.join(tempDir, 'out', 'library.cbbackup');
        const backup: Backup = { items: [item()], playlists: [] };
        await writeBackup(outputPath, backup);
        expect(fs.readFileSync(outputPath, 'utf-8')).toBe(serializeBackup(backup));
      } finally {
        fs.rmSync(tempDir, { recursive: true, force: true });
      }
    });

    it('raises WriteError when the file cannot be written', async () => {
      const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cloudbeats-backup-test-'));
      try {
        const error: unknown = await writeBackup(tempDir, { items: [], playlists: [] }).catch(
          (e: unknown) => e,
        );
        expect(error).toBeInstanceOf(WriteError);
        expect(error).toMatchObject({ filePath: tempDir });
      } finally {
        fs.rmSync(tempDir, { recursive: true, force: true });
      }
    });
  });
});
