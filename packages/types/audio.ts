/** Fetch and transcode an upload into an MP3 inside `workDir`; resolves with the file path */
export interface AudioFetcher {
    fetchAudio(identity: string, targetBitrateKbps: number, workDir: string): Promise<string>;
}

export interface AudioProbeResult {
    /** Missing when the container reports no duration */
    durationSeconds?: number;
}

export interface AudioProber {
    probe(localPath: string): Promise<AudioProbeResult>;
}

/** ID3 tags written into the published MP3 */
export interface AudioTags {
    title: string;
    artist: string;
    album: string;
    genre: string;
    year?: string;
    track: number;
    comment?: string;
}

export interface AudioTagger {
    tag(localPath: string, tags: AudioTags): Promise<void>;
}
