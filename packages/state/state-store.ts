import { CorruptStateError, InvalidTransitionError } from '@tube-to-pod/errors';
import { getLogger } from '@tube-to-pod/logging';
import type { MissingStatePolicy, RemoteItem, StateEntry, StateFile } from '@tube-to-pod/types';
import { readJsonFile, writeJsonAtomic } from './atomic-file.js';
import { StateFileSchema } from './schemas.js';

const log = getLogger('state-store');

export interface LoadStateOptions {
  missingStatePolicy?: MissingStatePolicy;
}

export interface StateCounts {
  seen: number;
  processed: number;
}

/** Oldest-first by publish time, identity as tie-breaker */
export function compareItemsOldestFirst(a: RemoteItem, b: RemoteItem): number {
  const byDate = Date.parse(a.publishedAt) - Date.parse(b.publishedAt);
  if (byDate !== 0) {
    return byDate;
  }
  return a.identity < b.identity ? -1 : a.identity > b.identity ? 1 : 0;
}

/**
 * Persisted mapping of remote identity -> processing status.
 * The single source of truth for "have we handled this yet".
 *
 * The pipeline only ever moves entries seen -> processed; `requeue` is the operator's
 * way back for backfills. Writes replace the whole file atomically.
 */
export class StateStore {
  private readonly entriesById: Map<string, StateEntry>;
  private lastCheckedAt: string | null;

  private constructor(readonly filePath: string, file: StateFile) {
    this.entriesById = new Map(Object.entries(file.entries));
    this.lastCheckedAt = file.lastCheckedAt;
  }

  static empty(filePath: string): StateStore {
    return new StateStore(filePath, { version: 1, lastCheckedAt: null, entries: {} });
  }

  /**
   * Load the store from disk. A missing file is empty or fatal depending on the
   * policy; an unparsable file is always fatal.
   */
  static async load(filePath: string, options: LoadStateOptions = {}): Promise<StateStore> {
    const policy = options.missingStatePolicy ?? 'empty';
    const file = await readJsonFile(filePath, StateFileSchema);

    if (!file) {
      if (policy === 'abort') {
        throw new CorruptStateError(filePath, 'state file is missing and MISSING_STATE_POLICY=abort');
      }
      log.warn(`State file not found at ${filePath}, starting with nothing seen.`);
      return StateStore.empty(filePath);
    }

    const store = new StateStore(filePath, file);
    log.debug(`Loaded ${store.size} state entries from ${filePath}`);
    return store;
  }

  get size(): number {
    return this.entriesById.size;
  }

  get lastChecked(): string | null {
    return this.lastCheckedAt;
  }

  has(identity: string): boolean {
    return this.entriesById.has(identity);
  }

  get(identity: string): StateEntry | undefined {
    const entry = this.entriesById.get(identity);
    return entry ? { ...entry } : undefined;
  }

  isProcessed(identity: string): boolean {
    return this.entriesById.get(identity)?.status === 'processed';
  }

  /** Copies of every entry, in insertion order */
  entries(): Array<[string, StateEntry]> {
    return [...this.entriesById].map(([identity, entry]) => [identity, { ...entry }]);
  }

  counts(): StateCounts {
    let seen = 0;
    let processed = 0;
    for (const entry of this.entriesById.values()) {
      if (entry.status === 'seen') {
        seen++;
      } else {
        processed++;
      }
    }
    return { seen, processed };
  }

  /**
   * Entries still `seen` that carry an item snapshot, oldest-first.
   * These are the candidates a pipeline run works through.
   */
  pending(): RemoteItem[] {
    const items: RemoteItem[] = [];
    for (const [identity, entry] of this.entriesById) {
      if (entry.status !== 'seen') continue;
      if (!entry.item) {
        log.warn(`Entry ${identity} is seen but has no item snapshot; it cannot be retried automatically.`);
        continue;
      }
      items.push(entry.item);
    }
    return items.sort(compareItemsOldestFirst);
  }

  /** Insert a `seen` entry. Returns false (and changes nothing) if the identity is already known. */
  markSeen(identity: string, timestamp: Date, item?: RemoteItem): boolean {
    if (this.entriesById.has(identity)) {
      return false;
    }
    this.entriesById.set(identity, {
      status: 'seen',
      firstSeenAt: timestamp.toISOString(),
      attempts: 0,
      ...(item ? { item: { ...item } } : {}),
    });
    return true;
  }

  /**
   * Put an identity back in line as `seen` with a fresh snapshot and no failed attempts,
   * whatever its status. `firstSeenAt` is kept for known identities.
   * Returns false when the entry was already waiting with a snapshot and no failures.
   */
  requeue(identity: string, item: RemoteItem, timestamp: Date): boolean {
    const entry = this.entriesById.get(identity);
    if (entry?.status === 'seen' && entry.item && entry.attempts === 0) {
      return false;
    }
    this.entriesById.set(identity, {
      status: 'seen',
      firstSeenAt: entry?.firstSeenAt ?? timestamp.toISOString(),
      attempts: 0,
      item: { ...item },
    });
    return true;
  }

  markProcessed(identity: string, timestamp: Date = new Date()): void {
    const entry = this.entriesById.get(identity);
    if (!entry) {
      throw new InvalidTransitionError(identity, 'no state entry exists');
    }
    if (entry.status === 'processed') {
      throw new InvalidTransitionError(identity, 'it is already processed');
    }
    this.entriesById.set(identity, {
      ...entry,
      status: 'processed',
      processedAt: timestamp.toISOString(),
      lastError: undefined,
    });
  }

  /** Count a failed attempt against a `seen` entry; returns the new attempt count */
  recordFailure(identity: string, message: string): number {
    const entry = this.entriesById.get(identity);
    if (!entry || entry.status !== 'seen') {
      throw new InvalidTransitionError(identity, 'failures can only be recorded against seen entries');
    }
    const attempts = entry.attempts + 1;
    this.entriesById.set(identity, { ...entry, attempts, lastError: message });
    return attempts;
  }

  touchLastChecked(timestamp: Date): void {
    this.lastCheckedAt = timestamp.toISOString();
  }

  toJSON(): StateFile {
    const entries: Record<string, StateEntry> = {};
    for (const [identity, entry] of this.entriesById) {
      entries[identity] = entry;
    }
    return { version: 1, lastCheckedAt: this.lastCheckedAt, entries };
  }

  /** Atomic whole-file rewrite */
  async persist(): Promise<void> {
    await writeJsonAtomic(this.filePath, this.toJSON());
    log.debug(`State persisted to ${this.filePath} (${this.size} entries)`);
  }

  /** Detached in-memory copy for dry runs */
  clone(filePath: string = this.filePath): StateStore {
    return new StateStore(filePath, structuredClone(this.toJSON()));
  }
}
