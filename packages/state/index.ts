export { StateStore, compareItemsOldestFirst } from './state-store.js';
export type { LoadStateOptions, StateCounts } from './state-store.js';
export { EpisodeCatalog } from './episode-catalog.js';
export { writeFileAtomic, writeJsonAtomic, readJsonFile } from './atomic-file.js';
export { IsoDateString, RemoteItemSchema, StateFileSchema, EpisodeCatalogFileSchema } from './schemas.js';
