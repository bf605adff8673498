export type { RemoteItem, RemoteListing, RemoteListingPage, ListRecentOptions } from './remote-item.js';
export type { StateEntry, StateFile, StateStatus, MissingStatePolicy } from './state.js';
export type { EpisodeRecord, EpisodeCatalogFile } from './episode.js';
export type { ShowConfig } from './show.js';
export type { ObjectStorage } from './storage.js';
export type { AudioFetcher, AudioProber, AudioProbeResult, AudioTagger, AudioTags } from './audio.js';
