import os from 'os';
import * as path from 'path';
import fs from 'fs-extra';
import { AUDIO_CONTENT_TYPE, getEpisodeAudioKey, sanitizeKeySegment } from '@tube-to-pod/constants';
import { TaggingFailureError, TransientIOError, describeError } from '@tube-to-pod/errors';
import type { TransientIOStage } from '@tube-to-pod/errors';
import { getLogger } from '@tube-to-pod/logging';
import type {
  AudioFetcher,
  AudioProber,
  AudioTagger,
  AudioTags,
  EpisodeRecord,
  ObjectStorage,
  RemoteItem,
  ShowConfig,
} from '@tube-to-pod/types';
import { parseTitleReference } from '@tube-to-pod/utils';

const log = getLogger('episode-transformer');

const PODCAST_GENRE = 'Podcast';

export interface TransformOptions {
  /** Catalog size + 1 */
  episodeNumber: number;
}

/** What the pipeline driver needs from a transformer */
export interface ItemTransformer {
  transform(item: RemoteItem, options: TransformOptions): Promise<EpisodeRecord>;
}

export interface EpisodeTransformerOptions {
  fetcher: AudioFetcher;
  prober: AudioProber;
  tagger: AudioTagger;
  storage: ObjectStorage;
  show: ShowConfig;
  targetBitrateKbps: number;
  /** Parent of the per-run work directories */
  workRoot?: string;
  now?: () => Date;
}

function asTransient(stage: TransientIOStage, error: unknown): TransientIOError {
  if (error instanceof TransientIOError) {
    return error;
  }
  return new TransientIOError(stage, describeError(error), { cause: error });
}

/**
 * Turns one remote item into one published episode:
 * fetch, probe, tag, upload, record. Nothing is recorded unless the upload succeeded.
 */
export class EpisodeTransformer implements ItemTransformer {
  private readonly workRoot: string;
  private readonly now: () => Date;

  constructor(private readonly options: EpisodeTransformerOptions) {
    this.workRoot = options.workRoot ?? os.tmpdir();
    this.now = options.now ?? (() => new Date());
  }

  async transform(item: RemoteItem, { episodeNumber }: TransformOptions): Promise<EpisodeRecord> {
    const { fetcher, prober, storage, show, targetBitrateKbps } = this.options;
    await fs.ensureDir(this.workRoot);
    const workDir = await fs.mkdtemp(path.join(this.workRoot, `episode-${sanitizeKeySegment(item.identity)}-`));

    try {
      log.info(`▶️ Fetching ${item.identity} "${item.title}" at ${targetBitrateKbps}kbps`);
      let localPath: string;
      try {
        localPath = await fetcher.fetchAudio(item.identity, targetBitrateKbps, workDir);
      } catch (error) {
        throw asTransient('fetch', error);
      }

      const durationSeconds = await this.measureDuration(item, localPath);
      const { reference } = parseTitleReference(item.title, show.referencePattern);

      await this.tagSafely(localPath, {
        title: item.title,
        artist: show.author,
        album: show.title,
        genre: PODCAST_GENRE,
        year: String(new Date(item.publishedAt).getUTCFullYear()),
        track: episodeNumber,
        comment: reference,
      });

      // Measured after tagging so the enclosure length matches the uploaded bytes
      let byteLength: number;
      try {
        byteLength = (await fs.stat(localPath)).size;
      } catch (error) {
        throw asTransient('probe', error);
      }

      const audioKey = getEpisodeAudioKey(item.identity);
      let audioUrl: string;
      try {
        audioUrl = await storage.put(localPath, audioKey, AUDIO_CONTENT_TYPE);
      } catch (error) {
        throw asTransient('upload', error);
      }

      const record: EpisodeRecord = {
        identity: item.identity,
        title: item.title,
        description: item.description ?? '',
        publishedAt: item.publishedAt,
        audioUrl,
        audioKey,
        byteLength,
        durationSeconds,
        episodeNumber,
        ...(reference ? { reference } : {}),
        processedAt: this.now().toISOString(),
      };
      log.info(`✅ Transformed ${item.identity}: ${byteLength} bytes, ${durationSeconds}s`);
      return record;
    } finally {
      await this.cleanUp(workDir);
    }
  }

  private async measureDuration(item: RemoteItem, localPath: string): Promise<number> {
    let probed: number | undefined;
    try {
      probed = (await this.options.prober.probe(localPath)).durationSeconds;
    } catch (error) {
      throw asTransient('probe', error);
    }

    const durationSeconds = probed ?? item.durationHintSeconds;
    if (durationSeconds === undefined) {
      throw new TransientIOError('probe', `no duration could be determined for ${item.identity}`);
    }
    if (probed === undefined) {
      log.warn(`Probe returned no duration for ${item.identity}, using the listing's ${durationSeconds}s`);
    }
    return durationSeconds;
  }

  private async tagSafely(localPath: string, tags: AudioTags): Promise<void> {
    try {
      await this.options.tagger.tag(localPath, tags);
    } catch (error) {
      const failure = error instanceof TaggingFailureError ? error : new TaggingFailureError(localPath, { cause: error });
      log.warn(`⚠️ ${failure.message}, publishing untagged audio:`, failure.cause);
    }
  }

  private async cleanUp(workDir: string): Promise<void> {
    try {
      await fs.remove(workDir);
    } catch (error) {
      log.warn(`Failed to clean up ${workDir}:`, error);
    }
  }
}
