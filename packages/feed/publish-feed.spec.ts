import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { TransientIOError } from '@tube-to-pod/errors';
import type { ObjectStorage } from '@tube-to-pod/types';
import { publishFeed } from './publish-feed.js';

vi.mock('@tube-to-pod/logging', () => ({
  getLogger: () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }),
}));

function createStorage(put: ObjectStorage['put']): ObjectStorage {
  return { put, publicUrl: key => `https://cdn.example.com/${key}` };
}

describe('publishFeed', () => {
  let tempDir: string;
  let feedPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'publish-feed-'));
    feedPath = path.join(tempDir, 'feed.xml');
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  it('writes the feed locally', async () => {
    const result = await publishFeed('<rss/>', { feedPath, uploadToStorage: false });

    expect(result).toBeUndefined();
    expect(await fs.readFile(feedPath, 'utf-8')).toBe('<rss/>');
  });

  it('uploads the feed when asked to', async () => {
    const put = vi.fn<ObjectStorage['put']>().mockResolvedValue('https://cdn.example.com/feed.xml');

    const result = await publishFeed('<rss/>', { feedPath, uploadToStorage: true, storage: createStorage(put) });

    expect(result).toBe('https://cdn.example.com/feed.xml');
    expect(put).toHaveBeenCalledWith(feedPath, 'feed.xml', 'application/rss+xml; charset=utf-8');
  });

  it('reports upload failures as feed-stage transient errors', async () => {
    const put = vi.fn<ObjectStorage['put']>().mockRejectedValue(new Error('connection reset'));

    const error = await publishFeed('<rss/>', { feedPath, uploadToStorage: true, storage: createStorage(put) }).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(TransientIOError);
    expect(error).toMatchObject({ stage: 'feed', message: '[feed] could not upload the feed: connection reset' });
    // The local copy is still current
    expect(await fs.readFile(feedPath, 'utf-8')).toBe('<rss/>');
  });
});
