/** Object storage capability: durably store a blob and hand back its public URL. */
export interface ObjectStorage {
    /** Upload a local file under `key` and return its public URL */
    put(localPath: string, key: string, contentType: string): Promise<string>;
    /** Deterministic from `key`; never queries the store */
    publicUrl(key: string): string;
}
