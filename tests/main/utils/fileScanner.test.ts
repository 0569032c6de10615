import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { isAudioFile, scanDirectoryForAudioFiles } from '../../../src/main/utils/fileScanner';
import { ScanError } from '../../../src/main/services/errors';

describe('fileScanner', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cloudbeats-scan-test-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('isAudioFile', () => {
    it('should return true for every recognized extension', () => {
      for (const ext of [
        'mp3', 'm4a', 'flac', 'ogg', 'opus', 'wav', 'wma',
        'aac', 'dsf', 'aiff', 'aif', 'ape', 'wv', 'mpc',
      ]) {
        expect(isAudioFile(`song.${ext}`)).toBe(true);
      }
    });

    it('should ignore extension case', () => {
      expect(isAudioFile('song.MP3')).toBe(true);
      expect(isAudioFile('song.Flac')).toBe(true);
    });

    it('should return false for other files', () => {
      expect(isAudioFile('cover.jpg')).toBe(false);
      expect(isAudioFile('playlist.m3u')).toBe(false);
      expect(isAudioFile('video.mp4')).toBe(false);
      expect(isAudioFile('noextension')).toBe(false);
      expect(isAudioFile('.mp3')).toBe(false);
    });

    it('should handle full file paths', () => {
      expect(isAudioFile('/music/artist/song.mp3')).toBe(true);
    });
  });

  describe('scanDirectoryForAudioFiles', () => {
    it('should find audio files recursively, sorted', async () => {
      fs.mkdirSync(path.join(tempDir, 'b', 'nested'), { recursive: true });
      fs.mkdirSync(path.join(tempDir, 'a'));
      fs.writeFileSync(path.join(tempDir, 'b', 'nested', 'deep.flac'), '');
      fs.writeFileSync(path.join(tempDir, 'a', 'one.mp3'), '');
      fs.writeFileSync(path.join(tempDir, 'top.M4A'), '');

      const files = await scanDirectoryForAudioFiles(tempDir);
      expect(files).toEqual(
        [
          path.join(tempDir, 'a', 'one.mp3'),
          path.join(tempDir, 'b', 'nested', 'deep.flac'),
          path.join(tempDir, 'top.M4A'),
        ].sort(),
      );
    });

    it('should skip non-audio files and directories named like audio files', async () => {
      fs.writeFileSync(path.join(tempDir, 'cover.jpg'), '');
      fs.writeFileSync(path.join(tempDir, 'notes.txt'), '');
      fs.mkdirSync(path.join(tempDir, 'album.mp3'));
      fs.writeFileSync(path.join(tempDir, 'album.mp3', 'track.ogg'), '');

      const files = await scanDirectoryForAudioFiles(tempDir);
      expect(files).toEqual([path.join(tempDir, 'album.mp3', 'track.ogg')]);
    });

    it('should return an empty list for an empty directory', async () => {
      expect(await scanDirectoryForAudioFiles(tempDir)).toEqual([]);
    });

    it('should return absolute paths for a relative root', async () => {
      fs.writeFileSync(path.join(tempDir, 'song.mp3'), '');
      const relative = path.relative(process.cwd(), tempDir);
      expect(await scanDirectoryForAudioFiles(relative)).toEqual([path.join(tempDir, 'song.mp3')]);
    });

    it('should throw ScanError when the root does not exist', async () => {
      const missing = path.join(tempDir, 'missing');
      const error: unknown = await scanDirectoryForAudioFiles(missing).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ScanError);
      expect(error).toMatchObject({ filePath: missing, category: 'ScanError' });
    });

    it('should throw ScanError for an unreadable subdirectory', async () => {
      const locked = path.join(tempDir, 'locked');
      fs.mkdirSync(locked);
      fs.writeFileSync(path.join(tempDir, 'ok.mp3'), '');

      const realReaddir = fs.promises.readdir;
      const readdir = vi.spyOn(fs.promises, 'readdir').mockImplementation(async (dir, options) => {
        if (String(dir) === locked) {
          throw Object.assign(new Error(`EACCES: permission denied, scandir '${locked}'`), {
            code: 'EACCES',
          });
        }
        return realReaddir(dir, options);
      });

      const error: unknown = await scanDirectoryForAudioFiles(tempDir).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ScanError);
      expect(error).toMatchObject({
        filePath: locked,
        message: `Cannot read directory: EACCES: permission denied, scandir '${locked}'`,
      });
      expect(readdir.mock.calls.map(([dir]) => String(dir))).toEqual([tempDir, locked]);
    });
  });
});
