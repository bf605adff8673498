import { createHash } from 'crypto';
import path from 'path';

export const STATE_FILE_NAME = 'state.json';
export const EPISODE_CATALOG_FILE_NAME = 'episodes.json';
export const FEED_FILE_NAME = 'feed.xml';

export const EPISODE_AUDIO_PREFIX = 'episodes/';
export const FEED_STORAGE_KEY = 'feed.xml';
export const AUDIO_CONTENT_TYPE = 'audio/mpeg';
export const FEED_CONTENT_TYPE = 'application/rss+xml; charset=utf-8';

export interface DataFilePaths {
  statePath: string;
  catalogPath: string;
  feedPath: string;
}

/** Locations of the three persisted artifacts inside DATA_DIR */
export function getDataFilePaths(dataDir: string): DataFilePaths {
  return {
    statePath: path.join(dataDir, STATE_FILE_NAME),
    catalogPath: path.join(dataDir, EPISODE_CATALOG_FILE_NAME),
    feedPath: path.join(dataDir, FEED_FILE_NAME),
  };
}

/** Runs of characters that are unsafe in object keys and URLs become a single `_` */
export function sanitizeKeySegment(value: string): string {
  return value.normalize('NFC').replace(/[^a-zA-Z0-9_-]+/g, '_');
}

/**
 * e.g. `episodes/dQw4w9WgXcQ.mp3`. Sanitizing is lossy (`a.b` and `a_b` share a
 * segment), so identities it changed get the first 8 hex digits of their SHA-256
 * appended: `episodes/a_b-2e7336dc.mp3`.
 */
export function getEpisodeAudioKey(identity: string): string {
  const segment = sanitizeKeySegment(identity);
  if (!/[a-zA-Z0-9]/.test(segment)) {
    throw new Error(`Cannot derive an audio key from identity "${identity}"`);
  }
  if (segment === identity) {
    return `${EPISODE_AUDIO_PREFIX}${segment}.mp3`;
  }
  const digest = createHash('sha256').update(identity).digest('hex').slice(0, 8);
  return `${EPISODE_AUDIO_PREFIX}${segment}-${digest}.mp3`;
}
