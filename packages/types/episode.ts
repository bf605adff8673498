export interface EpisodeRecord {
    /** Same as the RemoteItem identity */
    identity: string;
    title: string;
    description: string;
    /** ISO 8601 date string */
    publishedAt: string;
    audioUrl: string;
    /** Object-storage key the audio was uploaded under, e.g. `episodes/abc123.mp3` */
    audioKey: string;
    byteLength: number;
    durationSeconds: number;
    episodeNumber: number;
    /** Case or docket reference parsed from the title, e.g. `SJC-13444` */
    reference?: string;
    /** ISO 8601 timestamp */
    processedAt: string;
}

export interface EpisodeCatalogFile {
    version: 1;
    lastUpdated: string;
    episodes: EpisodeRecord[];
}
