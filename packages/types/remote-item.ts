/** An upload as reported by the remote listing. Never mutated locally. */
export interface RemoteItem {
    /** Stable opaque id, e.g. a YouTube video id */
    identity: string;
    title: string;
    description?: string;
    /** ISO 8601 date string */
    publishedAt: string;
    /** From the listing's own metadata; the transcoded artifact is authoritative */
    durationHintSeconds?: number;
}

export interface RemoteListingPage {
    items: RemoteItem[];
    nextPageToken?: string;
}

export interface ListRecentOptions {
    /** Only items published at or after this instant */
    since?: Date;
    pageToken?: string;
}

/** Remote listing capability. Paging and quota accounting belong to the implementation. */
export interface RemoteListing {
    listRecent(channelId: string, options?: ListRecentOptions): Promise<RemoteListingPage>;
}
