import * as path from 'path';
import { describe, it, expect } from 'vitest';
import {
  localLookupKey,
  matchFiles,
  normalizePathKey,
  remotePrefixKey,
} from '../../../src/main/services/matcher';
import { RemoteEntry } from '../../../src/shared/types';

// ─── Helpers ─────────────────────────────────────────────────────────────────

const ROOT = path.resolve('/Users/me/Dropbox/Music');

function local(...segments: string[]): string {
  return path.join(ROOT, ...segments);
}

function remote(displayPath: string, id = `id:${displayPath}`): RemoteEntry {
  return {
    kind: 'file',
    id,
    name: displayPath.slice(displayPath.lastIndexOf('/') + 1),
    lowercasePath: displayPath.toLowerCase(),
    displayPath,
  };
}

// ─── Tests ───────────────────────────────────────────────────────────────────

describe('matcher', () => {
  describe('normalizePathKey', () => {
    it('composes decomposed characters and lower-cases', () => {
      expect(normalizePathKey('Cafe\u0301')).toBe('caf\u00e9');
      expect(normalizePathKey('CAF\u00c9')).toBe('caf\u00e9');
    });
  });

  describe('remotePrefixKey', () => {
    it('lower-cases and strips trailing slashes', () => {
      expect(remotePrefixKey('/Music/Rock/')).toBe('/music/rock');
      expect(remotePrefixKey('')).toBe('');
    });
  });

  describe('localLookupKey', () => {
    it('joins the prefix and the normalized relative path with /', () => {
      expect(localLookupKey(ROOT, '/music', local('Artist', 'Song.MP3'))).toBe(
        '/music/artist/song.mp3',
      );
    });

    it('uses a bare leading slash for the Dropbox root', () => {
      expect(localLookupKey(ROOT, '', local('a.mp3'))).toBe('/a.mp3');
    });

    it('returns null for paths outside the root', () => {
      expect(localLookupKey(ROOT, '/music', path.resolve('/Users/me/other.mp3'))).toBeNull();
      expect(localLookupKey(ROOT, '/music', ROOT)).toBeNull();
    });

    it('accepts names that merely start with two dots', () => {
      expect(localLookupKey(ROOT, '/music', local('..hidden.mp3'))).toBe('/music/..hidden.mp3');
    });
  });

  describe('matchFiles', () => {
    it('matches case-insensitively under the remote prefix', () => {
      const entries = [remote('/Music/Artist/Song.mp3')];
      const result = matchFiles(ROOT, '/Music', [local('artist', 'SONG.mp3')], entries);

      expect(result.matched).toEqual([
        { localPath: local('artist', 'SONG.mp3'), remoteEntry: entries[0] },
      ]);
      expect(result.unmatchedLocal).toEqual([]);
      expect(result.unmatchedRemote).toEqual([]);
    });

    it('matches composed local names against decomposed remote names', () => {
      const entry: RemoteEntry = {
        kind: 'file',
        id: 'id:cafe',
        name: 'Cafe\u0301.mp3',
        lowercasePath: '/music/cafe\u0301.mp3',
        displayPath: '/Music/Cafe\u0301.mp3',
      };
      const result = matchFiles(ROOT, '/Music', [local('Caf\u00e9.mp3')], [entry]);
      expect(result.matched).toHaveLength(1);
      expect(result.matched[0].remoteEntry.id).toBe('id:cafe');
    });

    it('matches decomposed local names against composed remote names', () => {
      const entries = [remote('/Music/Caf\u00e9.mp3')];
      const result = matchFiles(ROOT, '/Music', [local('Cafe\u0301.mp3')], entries);
      expect(result.matched).toHaveLength(1);
    });

    it('tolerates a trailing slash on the remote path', () => {
      const entries = [remote('/Music/a.mp3')];
      const result = matchFiles(ROOT, '/Music/', [local('a.mp3')], entries);
      expect(result.matched).toHaveLength(1);
    });

    it('matches at the Dropbox root', () => {
      const entries = [remote('/a.mp3')];
      const result = matchFiles(ROOT, '', [local('a.mp3')], entries);
      expect(result.matched).toHaveLength(1);
    });

    it('reports unmatched files on both sides', () => {
      const entries = [remote('/Music/a.mp3'), remote('/Music/only-remote.flac')];
      const result = matchFiles(ROOT, '/Music', [local('a.mp3'), local('only-local.mp3')], entries);

      expect(result.matched.map((m) => m.localPath)).toEqual([local('a.mp3')]);
      expect(result.unmatchedLocal).toEqual([local('only-local.mp3')]);
      expect(result.unmatchedRemote).toEqual([entries[1]]);
    });

    it('leaves non-audio remote files out of the unmatched list', () => {
      const entries = [remote('/Music/cover.jpg'), remote('/Music/.DS_Store'), remote('/Music/b.ogg')];
      const result = matchFiles(ROOT, '/Music', [], entries);
      expect(result.unmatchedRemote).toEqual([entries[2]]);
    });

    it('keeps the last listed entry when two share a key', () => {
      const first = remote('/Music/Song.mp3', 'id:first');
      const second = remote('/Music/SONG.mp3', 'id:second');
      const result = matchFiles(ROOT, '/Music', [local('song.mp3')], [first, second]);

      expect(result.matched[0].remoteEntry.id).toBe('id:second');
      expect(result.unmatchedRemote).toEqual([]);
    });

    it('pairs a remote entry with at most one local file', () => {
      const entries = [remote('/Music/Song.mp3')];
      const localFiles = [local('song.mp3'), local('SONG.mp3')];
      const result = matchFiles(ROOT, '/Music', localFiles, entries);

      expect(result.matched.map((m) => m.localPath)).toEqual([local('song.mp3')]);
      expect(result.unmatchedLocal).toEqual([local('SONG.mp3')]);
    });

    it('partitions every local file and every remote audio file exactly once', () => {
      const entries = [
        remote('/Music/x/1.mp3'),
        remote('/Music/x/2.mp3'),
        remote('/Music/y/3.flac'),
        remote('/Music/y/art.png'),
      ];
      const localFiles = [local('x', '1.mp3'), local('y', '3.flac'), local('z', '4.wav')];
      const result = matchFiles(ROOT, '/Music', localFiles, entries);

      const localSeen = [...result.matched.map((m) => m.localPath), ...result.unmatchedLocal];
      expect(localSeen.sort()).toEqual([...localFiles].sort());

      const remoteSeen = [
        ...result.matched.map((m) => m.remoteEntry.id),
        ...result.unmatchedRemote.map((e) => e.id),
      ];
      expect(remoteSeen.sort()).toEqual(
        ['id:/Music/x/1.mp3', 'id:/Music/x/2.mp3', 'id:/Music/y/3.flac'].sort(),
      );
    });

    it('treats local files outside the root as unmatched', () => {
      const outside = path.resolve('/elsewhere/a.mp3');
      const result = matchFiles(ROOT, '/Music', [outside], [remote('/Music/a.mp3')]);
      expect(result.unmatchedLocal).toEqual([outside]);
      expect(result.matched).toEqual([]);
    });
  });
});
