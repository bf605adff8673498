import { getLogger } from '@tube-to-pod/logging';
import { EpisodeCatalog, StateStore, compareItemsOldestFirst } from '@tube-to-pod/state';
import type { RemoteItem, RemoteListing } from '@tube-to-pod/types';
import { collectRecentItems } from './utils/collect-recent-items.js';

const log = getLogger('change-detector');

const DAY_MS = 24 * 60 * 60 * 1000;

export interface DetectOptions {
  channelId: string;
  /** 0 lists without a cutoff */
  lookbackDays: number;
  /** Most new items recorded per detection; older ones win, newer ones wait for the next run */
  maxItems: number;
  now?: Date;
  /** false for dry runs: the store is updated in memory only */
  persist?: boolean;
}

export interface DetectionResult {
  /** Items not previously in the State Store, oldest-first */
  newItems: RemoteItem[];
  listedCount: number;
}

function getCutoff(lookbackDays: number, now: Date): Date | undefined {
  return lookbackDays > 0 ? new Date(now.getTime() - lookbackDays * DAY_MS) : undefined;
}

function uniqueByIdentity(items: RemoteItem[]): RemoteItem[] {
  const seen = new Set<string>();
  return items.filter(item => {
    if (seen.has(item.identity)) {
      return false;
    }
    seen.add(item.identity);
    return true;
  });
}

/**
 * List the channel and record every unknown upload as `seen`.
 * Paging goes on until a full page holds only known uploads, so a backlog
 * larger than one page is still found. The State Store is persisted before
 * this returns, so a later crash can not make the same upload look new again.
 */
export async function detectNewItems(
  stateStore: StateStore,
  listing: RemoteListing,
  options: DetectOptions
): Promise<DetectionResult> {
  const now = options.now ?? new Date();
  const listed = await collectRecentItems(listing, options.channelId, {
    since: getCutoff(options.lookbackDays, now),
    isLastPage: items => items.length > 0 && items.every(item => stateStore.has(item.identity)),
  });

  const unknown = uniqueByIdentity(listed)
    .filter(item => !stateStore.has(item.identity))
    .sort(compareItemsOldestFirst);
  const newItems = unknown.slice(0, options.maxItems);
  if (unknown.length > newItems.length) {
    log.info(`${unknown.length - newItems.length} newer upload(s) left for a later run.`);
  }

  for (const item of newItems) {
    stateStore.markSeen(item.identity, now, item);
    log.info(`🆕 New upload: ${item.identity} "${item.title}" (${item.publishedAt})`);
  }
  stateStore.touchLastChecked(now);
  if (options.persist !== false) {
    await stateStore.persist();
  }

  log.info(`Listed ${listed.length} upload(s), ${newItems.length} new.`);
  return { newItems, listedCount: listed.length };
}

/**
 * Bootstrap: mark everything currently listed as already processed,
 * without publishing anything. Returns how many identities changed.
 */
export async function initializeState(
  stateStore: StateStore,
  listing: RemoteListing,
  options: DetectOptions
): Promise<number> {
  const now = options.now ?? new Date();
  const listed = await collectRecentItems(listing, options.channelId, {
    since: getCutoff(options.lookbackDays, now),
    maxItems: options.maxItems,
  });

  let marked = 0;
  for (const item of uniqueByIdentity(listed)) {
    if (stateStore.isProcessed(item.identity)) {
      continue;
    }
    stateStore.markSeen(item.identity, now);
    stateStore.markProcessed(item.identity, now);
    marked++;
  }
  stateStore.touchLastChecked(now);
  await stateStore.persist();

  log.info(`✅ Marked ${marked} of ${listed.length} listed upload(s) as processed.`);
  return marked;
}

/**
 * Backfill: put every listed upload that has no catalog record back in line as
 * `seen`, including ones init mode marked processed, so the next pipeline runs
 * publish them. Returns how many identities were queued.
 */
export async function backfillState(
  stateStore: StateStore,
  catalog: EpisodeCatalog,
  listing: RemoteListing,
  options: DetectOptions
): Promise<number> {
  const now = options.now ?? new Date();
  const listed = await collectRecentItems(listing, options.channelId, {
    since: getCutoff(options.lookbackDays, now),
    maxItems: options.maxItems,
  });

  let queued = 0;
  for (const item of uniqueByIdentity(listed).sort(compareItemsOldestFirst)) {
    if (catalog.has(item.identity)) {
      continue;
    }
    if (stateStore.requeue(item.identity, item, now)) {
      queued++;
      log.info(`⏪ Queued ${item.identity} "${item.title}" (${item.publishedAt})`);
    }
  }
  stateStore.touchLastChecked(now);
  if (options.persist !== false) {
    await stateStore.persist();
  }

  log.info(`✅ Queued ${queued} of ${listed.length} listed upload(s) for publishing.`);
  return queued;
}

/** The `count` most recent uploads, newest-first. Read-only. */
export async function listRecent(
  listing: RemoteListing,
  channelId: string,
  count: number
): Promise<RemoteItem[]> {
  const listed = await collectRecentItems(listing, channelId, { maxItems: count });
  return uniqueByIdentity(listed)
    .sort((a, b) => compareItemsOldestFirst(b, a))
    .slice(0, count);
}
