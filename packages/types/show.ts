/** Podcast-level metadata rendered into the feed channel and audio tags. */
export interface ShowConfig {
    title: string;
    description: string;
    author: string;
    /** Rendered as `itunes:owner` when present */
    email?: string;
    /** @example `https://www.mass.gov/orgs/supreme-judicial-court` */
    website: string;
    imageUrl?: string;
    /** @example `en` */
    language: string;
    /** @example `Government` */
    category: string;
    explicit: boolean;
    /** Public URL of the feed itself, for `atom:link rel="self"` */
    feedUrl?: string;
    /**
     * Regex source for a trailing title reference.
     * @example `SJC-\\d+` matches "Commonwealth v. Doe, SJC-13444"
     */
    referencePattern?: string;
}
