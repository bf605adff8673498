import type { RemoteItem } from './remote-item.js';

export type StateStatus = 'seen' | 'processed';

export interface StateEntry {
    status: StateStatus;
    /** ISO 8601 timestamp of the first detection */
    firstSeenAt: string;
    processedAt?: string;
    /** Failed transform attempts while `seen` */
    attempts: number;
    lastError?: string;
    /** Snapshot kept so a `seen` entry can be retried without re-listing it */
    item?: RemoteItem;
}

export interface StateFile {
    version: 1;
    lastCheckedAt: string | null;
    entries: Record<string, StateEntry>;
}

export type MissingStatePolicy = 'empty' | 'abort';
