/**
 * CloudBeats backup file format.
 *
 * The importer is picky about key order and expects tag_duration to always
 * carry one decimal (294.0, not 294), so the document is serialized field by
 * field instead of through a plain JSON.stringify of the whole object.
 */

import * as fs from 'fs';
import * as path from 'path';
import { AudioMetadata, MatchedPair } from '../../shared/types';
import { WriteError } from './errors';

export const SERVICE_NAME = 'dropbox';

export interface BackupItem {
  account_id: string;
  /** Dropbox file id */
  key: string;
  name: string;
  path: string;
  service: string;
  tag_album: string;
  tag_albumArtist: string;
  tag_artist: string;
  tag_diskNumber: number;
  tag_duration: number;
  /** Omitted from the output when null */
  tag_genre: string | null;
  tag_name: string;
  /** Omitted from the output when null */
  tag_trackNumber: number | null;
  tag_year: number;
}

export interface Backup {
  items: BackupItem[];
  /** Always empty; playlists are not backed up */
  playlists: never[];
}

export function buildBackupItem(
  accountId: string,
  pair: MatchedPair,
  metadata: AudioMetadata,
): BackupItem {
  return {
    account_id: accountId,
    key: pair.remoteEntry.id,
    name: pair.remoteEntry.name,
    path: '',
    service: SERVICE_NAME,
    tag_album: metadata.album,
    tag_albumArtist: metadata.albumArtist,
    tag_artist: metadata.artist,
    tag_diskNumber: metadata.diskNumber,
    tag_duration: metadata.durationSeconds,
    tag_genre: metadata.genre,
    tag_name: metadata.title,
    tag_trackNumber: metadata.trackNumber,
    tag_year: metadata.year,
  };
}

/**
 * Formats a duration with exactly one decimal place.
 */
export function formatDuration(seconds: number): string {
  return Number.isFinite(seconds) ? seconds.toFixed(1) : '0.0';
}

function serializeItem(item: BackupItem): string {
  const fields: string[] = [
    `"account_id":${JSON.stringify(item.account_id)}`,
    `"key":${JSON.stringify(item.key)}`,
    `"name":${JSON.stringify(item.name)}`,
    `"path":${JSON.stringify(item.path)}`,
    `"service":${JSON.stringify(item.service)}`,
    `"tag_album":${JSON.stringify(item.tag_album)}`,
    `"tag_albumArtist":${JSON.stringify(item.tag_albumArtist)}`,
    `"tag_artist":${JSON.stringify(item.tag_artist)}`,
    `"tag_diskNumber":${item.tag_diskNumber}`,
    `"tag_duration":${formatDuration(item.tag_duration)}`,
  ];
  if (item.tag_genre !== null) {
    fields.push(`"tag_genre":${JSON.stringify(item.tag_genre)}`);
  }
  fields.push(`"tag_name":${JSON.stringify(item.tag_name)}`);
  if (item.tag_trackNumber !== null) {
    fields.push(`"tag_trackNumber":${item.tag_trackNumber}`);
  }
  fields.push(`"tag_year":${item.tag_year}`);
  return `{${fields.join(',')}}`;
}

/**
 * Serializes a backup as minified JSON with a stable key order.
 */
export function serializeBackup(backup: Backup): string {
  return `{"items":[${backup.items.map(serializeItem).join(',')}],"playlists":[]}`;
}

/**
 * Writes the backup file, creating the parent directory if needed.
 *
 * @throws WriteError on any filesystem failure
 */
export async function writeBackup(outputPath: string, backup: Backup): Promise<void> {
  try {
    await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.promises.writeFile(outputPath, serializeBackup(backup), 'utf-8');
  } catch (error: unknown) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new WriteError(`Writing backup failed: ${cause.message}`, { filePath: outputPath, cause });
  }
}
