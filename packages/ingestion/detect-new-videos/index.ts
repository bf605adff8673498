export { backfillState, detectNewItems, initializeState, listRecent } from './change-detector.js';
export type { DetectOptions, DetectionResult } from './change-detector.js';
export { collectRecentItems } from './utils/collect-recent-items.js';
export type { CollectOptions } from './utils/collect-recent-items.js';
export { YouTubeListingClient, getUploadsPlaylistId } from './youtube-client.js';
export type { YouTubeListingClientOptions } from './youtube-client.js';
