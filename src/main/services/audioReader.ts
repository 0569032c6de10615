/**
 * Audio Reader Service
 *
 * Reads audio tags with the music-metadata library and maps them onto the
 * AudioMetadata shape written to the backup. Missing tags fall back to
 * defaults ("Unknown" artist/album, filename as title, disk 1).
 */

import * as path from 'path';
import * as mm from 'music-metadata';
import { AudioMetadata } from '../../shared/types';
import { ExtractionError } from './errors';

/** Placeholder for missing artist, album and album artist tags */
export const UNKNOWN_TAG = 'Unknown';

/**
 * Returns the file name without its extension.
 */
export function filenameWithoutExt(filePath: string): string {
  const name = path.basename(filePath);
  return name.slice(0, name.length - path.extname(name).length);
}

/**
 * Extracts a year from a tag value that may be a full ISO date ("2019-03-01").
 * Returns 0 when the first four characters are not a number.
 */
export function parseYear(value: string): number {
  if (value.length < 4) return 0;
  const head = value.slice(0, 4);
  return /^\d{4}$/.test(head) ? parseInt(head, 10) : 0;
}

/**
 * Parses "3/12" style numbers, returning the part before the slash.
 */
export function parseSlashNumber(value: string, fallback: number): number {
  const head = value.split('/')[0].trim();
  return /^-?\d+$/.test(head) ? parseInt(head, 10) : fallback;
}

/**
 * The record used when a file carries no usable tags, or when reading it failed.
 */
export function defaultMetadata(filePath: string): AudioMetadata {
  return {
    title: filenameWithoutExt(filePath),
    artist: UNKNOWN_TAG,
    album: UNKNOWN_TAG,
    albumArtist: UNKNOWN_TAG,
    genre: null,
    year: 0,
    trackNumber: null,
    diskNumber: 1,
    durationSeconds: 0,
  };
}

function nonEmpty(value: string | undefined): string | null {
  return value !== undefined && value.trim() !== '' ? value : null;
}

/**
 * Maps music-metadata parsed results onto AudioMetadata, keeping defaults for
 * anything the file does not carry.
 */
export function mapToAudioMetadata(filePath: string, parsed: mm.IAudioMetadata): AudioMetadata {
  const meta = defaultMetadata(filePath);
  const common = parsed.common;

  meta.title = nonEmpty(common.title) ?? meta.title;
  meta.artist = nonEmpty(common.artist) ?? meta.artist;
  meta.album = nonEmpty(common.album) ?? meta.album;
  meta.albumArtist = nonEmpty(common.albumartist) ?? meta.albumArtist;
  meta.genre = nonEmpty(common.genre?.[0]) ?? null;

  if (common.year) {
    meta.year = common.year;
  } else if (common.date) {
    meta.year = parseYear(common.date);
  }

  if (typeof common.track.no === 'number') {
    meta.trackNumber = common.track.no;
  }
  if (typeof common.disk.no === 'number') {
    meta.diskNumber = common.disk.no;
  }

  meta.durationSeconds = parsed.format.duration ?? 0;
  return meta;
}

/**
 * Reads the tags of one audio file.
 *
 * @param filePath - Absolute path to the audio file
 * @throws ExtractionError if the file cannot be opened or parsed
 */
export async function readAudioMetadata(filePath: string): Promise<AudioMetadata> {
  let parsed: mm.IAudioMetadata;
  try {
    parsed = await mm.parseFile(filePath, {
      duration: true,
      skipCovers: true,
    });
  } catch (error: unknown) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ExtractionError(`Failed to parse audio file "${path.basename(filePath)}": ${cause.message}`, {
      filePath,
      cause,
    });
  }

  return mapToAudioMetadata(filePath, parsed);
}
