export { parseIsoDuration, formatDuration } from './duration.js';
export { parseTitleReference } from './title-reference.js';
export type { TitleReference } from './title-reference.js';
