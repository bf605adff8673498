export {
  STATE_FILE_NAME,
  EPISODE_CATALOG_FILE_NAME,
  FEED_FILE_NAME,
  EPISODE_AUDIO_PREFIX,
  FEED_STORAGE_KEY,
  AUDIO_CONTENT_TYPE,
  FEED_CONTENT_TYPE,
  getDataFilePaths,
  sanitizeKeySegment,
  getEpisodeAudioKey
} from './data-constants.js';

export type { DataFilePaths } from './data-constants.js';
