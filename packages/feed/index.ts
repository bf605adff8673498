export { renderFeed, compareRecordsNewestFirst } from './feed-generator.js';
export type { RenderFeedOptions } from './feed-generator.js';
export { publishFeed } from './publish-feed.js';
export type { PublishFeedOptions } from './publish-feed.js';
