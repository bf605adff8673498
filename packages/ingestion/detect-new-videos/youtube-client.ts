import { z } from 'zod';
import { QuotaExceededError, TransientIOError, describeError } from '@tube-to-pod/errors';
import { getLogger } from '@tube-to-pod/logging';
import { IsoDateString } from '@tube-to-pod/state';
import type { ListRecentOptions, RemoteItem, RemoteListing, RemoteListingPage } from '@tube-to-pod/types';
import { parseIsoDuration } from '@tube-to-pod/utils';

const log = getLogger('youtube');

const YOUTUBE_API_BASE_URL = 'https://www.googleapis.com/youtube/v3';
const PAGE_SIZE = 50;
const MAX_DESCRIPTION_LENGTH = 4000;
const PLACEHOLDER_TITLES = new Set(['Private video', 'Deleted video']);
const QUOTA_REASONS = new Set(['quotaExceeded', 'dailyLimitExceeded', 'rateLimitExceeded']);

const PlaylistItemsResponseSchema = z.object({
  nextPageToken: z.string().optional(),
  items: z
    .array(
      z.object({
        snippet: z.object({
          title: z.string(),
          description: z.string().optional(),
          publishedAt: IsoDateString,
          resourceId: z.object({ videoId: z.string() }),
        }),
      })
    )
    .default([]),
});

const VideosResponseSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.string(),
        contentDetails: z.object({ duration: z.string().optional() }).optional(),
      })
    )
    .default([]),
});

const ApiErrorResponseSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    errors: z.array(z.object({ reason: z.string().optional() })).optional(),
  }),
});

export interface YouTubeListingClientOptions {
  apiKey: string;
  requestTimeoutMs: number;
  baseUrl?: string;
  fetchImpl?: typeof fetch;
}

function parseResponse<T>(resource: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new TransientIOError('list', `${resource} returned an unexpected payload: ${parsed.error.issues[0]?.message}`);
  }
  return parsed.data;
}

/** `UCxxxx` channel ids map to the `UUxxxx` playlist holding every upload */
export function getUploadsPlaylistId(channelId: string): string {
  if (!channelId.startsWith('UC')) {
    throw new Error(`Expected a channel id starting with "UC", got "${channelId}"`);
  }
  return `UU${channelId.slice(2)}`;
}

/**
 * RemoteListing over the YouTube Data API v3 uploads playlist.
 * Each page costs one playlistItems.list call plus one videos.list call for durations.
 */
export class YouTubeListingClient implements RemoteListing {
  private readonly apiKey: string;
  private readonly requestTimeoutMs: number;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: YouTubeListingClientOptions) {
    this.apiKey = options.apiKey;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.baseUrl = options.baseUrl ?? YOUTUBE_API_BASE_URL;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async listRecent(channelId: string, options: ListRecentOptions = {}): Promise<RemoteListingPage> {
    const playlistId = getUploadsPlaylistId(channelId);
    const params: Record<string, string> = {
      part: 'snippet',
      playlistId,
      maxResults: String(PAGE_SIZE),
    };
    if (options.pageToken) {
      params.pageToken = options.pageToken;
    }

    const page = parseResponse('playlistItems', PlaylistItemsResponseSchema, await this.request('playlistItems', params));

    const listed: RemoteItem[] = [];
    let reachedCutoff = false;
    for (const { snippet } of page.items) {
      if (PLACEHOLDER_TITLES.has(snippet.title)) {
        log.debug(`Skipping placeholder entry "${snippet.title}" (${snippet.resourceId.videoId})`);
        continue;
      }
      if (options.since && Date.parse(snippet.publishedAt) < options.since.getTime()) {
        reachedCutoff = true;
        continue;
      }
      listed.push({
        identity: snippet.resourceId.videoId,
        title: snippet.title,
        description: (snippet.description ?? '').slice(0, MAX_DESCRIPTION_LENGTH),
        publishedAt: new Date(snippet.publishedAt).toISOString(),
      });
    }

    const durations = await this.fetchDurations(listed.map(item => item.identity));
    const items = listed.map(item => {
      const durationHintSeconds = durations.get(item.identity);
      return durationHintSeconds === undefined ? item : { ...item, durationHintSeconds };
    });

    log.debug(`Listed ${items.length} item(s) from ${playlistId}${options.pageToken ? ` (page ${options.pageToken})` : ''}`);

    // The uploads playlist is newest-first, so nothing past the cutoff can be newer
    const nextPageToken = reachedCutoff ? undefined : page.nextPageToken;
    return nextPageToken ? { items, nextPageToken } : { items };
  }

  private async fetchDurations(videoIds: string[]): Promise<Map<string, number>> {
    const durations = new Map<string, number>();
    if (videoIds.length === 0) {
      return durations;
    }
    const response = parseResponse(
      'videos',
      VideosResponseSchema,
      await this.request('videos', { part: 'contentDetails', id: videoIds.join(',') })
    );
    for (const video of response.items) {
      const seconds = parseIsoDuration(video.contentDetails?.duration);
      if (seconds !== undefined) {
        durations.set(video.id, seconds);
      }
    }
    return durations;
  }

  private async request(resource: string, params: Record<string, string>): Promise<unknown> {
    const url = new URL(`${this.baseUrl}/${resource}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set('key', this.apiKey);

    let response: Response;
    try {
      response = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.requestTimeoutMs) });
    } catch (error) {
      throw new TransientIOError('list', `${resource} request failed: ${describeError(error)}`, { cause: error });
    }

    const text = await response.text();
    let body: unknown;
    try {
      body = text ? JSON.parse(text) : {};
    } catch (error) {
      throw new TransientIOError('list', `${resource} returned a non-JSON body (HTTP ${response.status})`, {
        cause: error,
      });
    }

    if (!response.ok) {
      const parsedError = ApiErrorResponseSchema.safeParse(body);
      const reasons = parsedError.success
        ? (parsedError.data.error.errors ?? []).flatMap(entry => (entry.reason ? [entry.reason] : []))
        : [];
      const quotaReason = reasons.find(reason => QUOTA_REASONS.has(reason));
      if (response.status === 403 && quotaReason) {
        throw new QuotaExceededError(quotaReason);
      }
      const message = parsedError.success ? parsedError.data.error.message : undefined;
      throw new TransientIOError('list', `${resource} returned HTTP ${response.status}${message ? `: ${message}` : ''}`);
    }

    return body;
  }
}
