import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { QuotaExceededError } from '@tube-to-pod/errors';
import { EpisodeCatalog, StateStore } from '@tube-to-pod/state';
import type { ListRecentOptions, RemoteItem, RemoteListing, RemoteListingPage } from '@tube-to-pod/types';
import { backfillState, detectNewItems, initializeState, listRecent } from './change-detector.js';

vi.mock('@tube-to-pod/logging', () => ({
  getLogger: () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }),
}));

const CHANNEL_ID = 'UCtestchannel';
const NOW = new Date('2024-06-30T12:00:00.000Z');

function item(identity: string, publishedAt: string): RemoteItem {
  return { identity, title: `Video ${identity}`, publishedAt };
}

/** Serves fixed pages, newest-first, the way an uploads playlist does */
class FakeListing implements RemoteListing {
  readonly calls: ListRecentOptions[] = [];
  failWith?: Error;

  constructor(private readonly pages: RemoteItem[][]) {}

  async listRecent(_channelId: string, options: ListRecentOptions = {}): Promise<RemoteListingPage> {
    this.calls.push(options);
    if (this.failWith) {
      throw this.failWith;
    }
    const index = options.pageToken ? Number(options.pageToken.replace('page-', '')) : 0;
    const since = options.since;
    const items = (this.pages[index] ?? []).filter(
      entry => !since || Date.parse(entry.publishedAt) >= since.getTime()
    );
    const next = index + 1 < this.pages.length ? `page-${index + 1}` : undefined;
    return next ? { items, nextPageToken: next } : { items };
  }
}

describe('change-detector', () => {
  let tempDir: string;
  let statePath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'change-detector-'));
    statePath = path.join(tempDir, 'state.json');
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  describe('detectNewItems', () => {
    it('returns unknown items oldest-first and marks them seen', async () => {
      const store = StateStore.empty(statePath);
      const listing = new FakeListing([[item('B', '2024-06-20T00:00:00Z'), item('A', '2024-06-10T00:00:00Z')]]);

      const result = await detectNewItems(store, listing, {
        channelId: CHANNEL_ID,
        lookbackDays: 0,
        maxItems: 50,
        now: NOW,
      });

      expect(result.newItems.map(entry => entry.identity)).toEqual(['A', 'B']);
      expect(result.listedCount).toBe(2);
      expect(store.get('A')).toMatchObject({
        status: 'seen',
        firstSeenAt: NOW.toISOString(),
        item: { identity: 'A' },
      });
    });

    it('persists the state before returning', async () => {
      const store = StateStore.empty(statePath);
      const listing = new FakeListing([[item('A', '2024-06-10T00:00:00Z')]]);

      await detectNewItems(store, listing, { channelId: CHANNEL_ID, lookbackDays: 0, maxItems: 50, now: NOW });

      const reloaded = await StateStore.load(statePath);
      expect(reloaded.get('A')?.status).toBe('seen');
      expect(reloaded.lastChecked).toBe(NOW.toISOString());
    });

    it('updates the store in memory only when persisting is off', async () => {
      const store = StateStore.empty(statePath);
      const listing = new FakeListing([[item('A', '2024-06-10T00:00:00Z')]]);

      await detectNewItems(store, listing, {
        channelId: CHANNEL_ID,
        lookbackDays: 0,
        maxItems: 50,
        now: NOW,
        persist: false,
      });

      expect(store.has('A')).toBe(true);
      expect(await fs.pathExists(statePath)).toBe(false);
    });

    it('skips identities already in the store, whatever their status', async () => {
      const store = StateStore.empty(statePath);
      store.markSeen('A', NOW);
      store.markProcessed('A', NOW);
      store.markSeen('B', NOW);
      const listing = new FakeListing([
        [item('C', '2024-06-25T00:00:00Z'), item('B', '2024-06-20T00:00:00Z'), item('A', '2024-06-10T00:00:00Z')],
      ]);

      const result = await detectNewItems(store, listing, {
        channelId: CHANNEL_ID,
        lookbackDays: 0,
        maxItems: 50,
        now: NOW,
      });

      expect(result.newItems.map(entry => entry.identity)).toEqual(['C']);
      expect(store.isProcessed('A')).toBe(true);
    });

    it('drops duplicate identities within one listing', async () => {
      const store = StateStore.empty(statePath);
      const listing = new FakeListing([[item('A', '2024-06-10T00:00:00Z')], [item('A', '2024-06-10T00:00:00Z')]]);

      const result = await detectNewItems(store, listing, {
        channelId: CHANNEL_ID,
        lookbackDays: 0,
        maxItems: 50,
        now: NOW,
      });

      expect(result.newItems).toHaveLength(1);
    });

    it('breaks publish-time ties by identity', async () => {
      const store = StateStore.empty(statePath);
      const listing = new FakeListing([[item('b', '2024-06-10T00:00:00Z'), item('a', '2024-06-10T00:00:00Z')]]);

      const result = await detectNewItems(store, listing, {
        channelId: CHANNEL_ID,
        lookbackDays: 0,
        maxItems: 50,
        now: NOW,
      });

      expect(result.newItems.map(entry => entry.identity)).toEqual(['a', 'b']);
    });

    it('passes the lookback cutoff to the listing', async () => {
      const store = StateStore.empty(statePath);
      const listing = new FakeListing([[item('new', '2024-06-29T00:00:00Z'), item('old', '2024-05-01T00:00:00Z')]]);

      const result = await detectNewItems(store, listing, {
        channelId: CHANNEL_ID,
        lookbackDays: 30,
        maxItems: 50,
        now: NOW,
      });

      expect(listing.calls[0].since?.toISOString()).toBe('2024-05-31T12:00:00.000Z');
      expect(result.newItems.map(entry => entry.identity)).toEqual(['new']);
    });

    it('finds a backlog larger than the per-run cap over successive runs', async () => {
      const store = StateStore.empty(statePath);
      // v00 is the oldest upload, v59 the newest
      const uploads = Array.from({ length: 60 }, (_, index) =>
        item(`v${String(index).padStart(2, '0')}`, new Date(Date.UTC(2024, 0, 1 + index)).toISOString())
      ).reverse();
      const listing = new FakeListing([uploads.slice(0, 50), uploads.slice(50)]);
      const options = { channelId: CHANNEL_ID, lookbackDays: 0, maxItems: 50, now: NOW };

      const first = await detectNewItems(store, listing, options);
      const second = await detectNewItems(store, listing, options);
      const third = await detectNewItems(store, listing, options);

      expect(first.newItems).toHaveLength(50);
      expect(first.newItems[0].identity).toBe('v00');
      expect(first.newItems[49].identity).toBe('v49');
      expect(second.newItems.map(entry => entry.identity)).toEqual(
        Array.from({ length: 10 }, (_, index) => `v${50 + index}`)
      );
      expect(third.newItems).toEqual([]);
      expect(store.size).toBe(60);
    });

    it('stops paging at the first page holding only known uploads', async () => {
      const store = StateStore.empty(statePath);
      store.markSeen('B', NOW);
      store.markSeen('A', NOW);
      const listing = new FakeListing([
        [item('C', '2024-06-25T00:00:00Z'), item('B', '2024-06-20T00:00:00Z')],
        [item('A', '2024-06-10T00:00:00Z')],
        [item('Z', '2024-01-01T00:00:00Z')],
      ]);

      const result = await detectNewItems(store, listing, {
        channelId: CHANNEL_ID,
        lookbackDays: 0,
        maxItems: 50,
        now: NOW,
      });

      expect(listing.calls.map(call => call.pageToken)).toEqual([undefined, 'page-1']);
      expect(result.newItems.map(entry => entry.identity)).toEqual(['C']);
    });

    it('leaves the store untouched when the listing fails', async () => {
      const store = StateStore.empty(statePath);
      const listing = new FakeListing([]);
      listing.failWith = new QuotaExceededError('quotaExceeded');

      await expect(
        detectNewItems(store, listing, { channelId: CHANNEL_ID, lookbackDays: 0, maxItems: 50, now: NOW })
      ).rejects.toBeInstanceOf(QuotaExceededError);
      expect(store.size).toBe(0);
      expect(await fs.pathExists(statePath)).toBe(false);
    });
  });

  describe('initializeState', () => {
    it('marks all 50 listed items processed directly', async () => {
      const store = StateStore.empty(statePath);
      const items = Array.from({ length: 50 }, (_, index) =>
        item(`video-${String(index).padStart(2, '0')}`, new Date(Date.UTC(2024, 0, 1 + index)).toISOString())
      );
      const listing = new FakeListing([items]);

      const marked = await initializeState(store, listing, {
        channelId: CHANNEL_ID,
        lookbackDays: 0,
        maxItems: 50,
        now: NOW,
      });

      expect(marked).toBe(50);
      expect(store.counts()).toEqual({ seen: 0, processed: 50 });
      expect(store.pending()).toEqual([]);
    });

    it('promotes seen entries and leaves processed ones alone', async () => {
      const store = StateStore.empty(statePath);
      store.markSeen('A', new Date('2024-06-01T00:00:00Z'));
      store.markProcessed('A', new Date('2024-06-02T00:00:00Z'));
      store.markSeen('B', new Date('2024-06-01T00:00:00Z'), item('B', '2024-05-30T00:00:00Z'));
      const listing = new FakeListing([[item('B', '2024-05-30T00:00:00Z'), item('A', '2024-05-20T00:00:00Z')]]);

      const marked = await initializeState(store, listing, {
        channelId: CHANNEL_ID,
        lookbackDays: 0,
        maxItems: 50,
        now: NOW,
      });

      expect(marked).toBe(1);
      expect(store.get('A')?.processedAt).toBe('2024-06-02T00:00:00.000Z');
      expect(store.get('B')?.status).toBe('processed');
    });
  });

  describe('backfillState', () => {
    it('queues listed uploads missing from the catalog, including ones init marked processed', async () => {
      const store = StateStore.empty(statePath);
      const listing = new FakeListing([
        [item('C', '2024-06-25T00:00:00Z'), item('B', '2024-06-20T00:00:00Z'), item('A', '2024-06-10T00:00:00Z')],
      ]);
      await initializeState(store, listing, { channelId: CHANNEL_ID, lookbackDays: 0, maxItems: 50, now: NOW });

      const catalog = EpisodeCatalog.empty(path.join(tempDir, 'episodes.json'));
      catalog.append({
        identity: 'B',
        title: 'Video B',
        description: '',
        publishedAt: '2024-06-20T00:00:00Z',
        audioUrl: 'https://cdn.example.com/episodes/B.mp3',
        audioKey: 'episodes/B.mp3',
        byteLength: 100,
        durationSeconds: 60,
        episodeNumber: 1,
        processedAt: NOW.toISOString(),
      });

      const queued = await backfillState(store, catalog, listing, {
        channelId: CHANNEL_ID,
        lookbackDays: 0,
        maxItems: 50,
        now: NOW,
      });

      expect(queued).toBe(2);
      expect(store.pending().map(entry => entry.identity)).toEqual(['A', 'C']);
      expect(store.get('B')?.status).toBe('processed');

      const reloaded = await StateStore.load(statePath);
      expect(reloaded.get('A')).toMatchObject({ status: 'seen', attempts: 0, item: { identity: 'A' } });
    });

    it('counts nothing twice when run again', async () => {
      const store = StateStore.empty(statePath);
      const catalog = EpisodeCatalog.empty(path.join(tempDir, 'episodes.json'));
      const listing = new FakeListing([[item('A', '2024-06-10T00:00:00Z')]]);
      const options = { channelId: CHANNEL_ID, lookbackDays: 0, maxItems: 50, now: NOW };

      expect(await backfillState(store, catalog, listing, options)).toBe(1);
      expect(await backfillState(store, catalog, listing, options)).toBe(0);
      expect(store.size).toBe(1);
    });
  });

  describe('listRecent', () => {
    it('returns the newest items first without touching state', async () => {
      const listing = new FakeListing([
        [item('C', '2024-06-25T00:00:00Z'), item('B', '2024-06-20T00:00:00Z')],
        [item('A', '2024-06-10T00:00:00Z')],
      ]);

      const recent = await listRecent(listing, CHANNEL_ID, 2);

      expect(recent.map(entry => entry.identity)).toEqual(['C', 'B']);
      expect(listing.calls).toHaveLength(1);
      expect(await fs.pathExists(statePath)).toBe(false);
    });
  });
});
