import type { DataFilePaths } from '@tube-to-pod/constants';
import { detectNewItems } from '@tube-to-pod/detect-new-videos';
import { describeError, isRunLevelError } from '@tube-to-pod/errors';
import { publishFeed, renderFeed } from '@tube-to-pod/feed';
import { getLogger } from '@tube-to-pod/logging';
import { EpisodeCatalog, StateStore } from '@tube-to-pod/state';
import type {
  EpisodeRecord,
  MissingStatePolicy,
  ObjectStorage,
  RemoteItem,
  RemoteListing,
  ShowConfig,
} from '@tube-to-pod/types';
import type { ItemTransformer } from './episode-transformer.js';

const log = getLogger('pipeline');

export type PipelineOutcome = 'success' | 'partial-failure' | 'total-failure';

export interface CandidateFailure {
  identity: string;
  title: string;
  message: string;
  attempts: number;
  /** No further automatic retries once true */
  parked: boolean;
}

export interface PipelineRunSummary {
  detected: number;
  published: number;
  failed: number;
  skipped: number;
  /** Catalog entries whose state had to be healed before the run */
  recovered: number;
  failures: CandidateFailure[];
  outcome: PipelineOutcome;
  publishedIdentities: string[];
  /** Dry runs only: what a real run would attempt, in order */
  wouldProcess: string[];
  dryRun: boolean;
  durationMs: number;
}

export interface PipelineDependencies {
  listing: RemoteListing;
  transformer: ItemTransformer;
  show: ShowConfig;
  paths: DataFilePaths;
  /** Needed when the feed is uploaded */
  storage?: ObjectStorage;
  now?: () => Date;
}

export interface PipelineOptions {
  channelId: string;
  lookbackDays: number;
  maxListedItems: number;
  /** 0 retries forever */
  maxAttempts: number;
  missingStatePolicy: MissingStatePolicy;
  publishFeedToStorage: boolean;
  dryRun?: boolean;
  skipDetection?: boolean;
  maxEpisodes?: number;
}

export function determineOutcome(published: number, failed: number): PipelineOutcome {
  if (failed === 0) {
    return 'success';
  }
  return published === 0 ? 'total-failure' : 'partial-failure';
}

/**
 * Bring the State Store in line with the catalog: anything already published is
 * processed. Heals a crash between persisting the catalog and persisting the state,
 * and a lost state file next to an intact catalog.
 */
export function reconcileStateWithCatalog(stateStore: StateStore, catalog: EpisodeCatalog, now: Date): number {
  let recovered = 0;
  for (const record of catalog.all()) {
    if (stateStore.isProcessed(record.identity)) {
      continue;
    }
    stateStore.markSeen(record.identity, now);
    stateStore.markProcessed(record.identity, now);
    recovered++;
    log.warn(`Recovered ${record.identity}: it is in the catalog but was not marked processed.`);
  }
  return recovered;
}

function isParked(attempts: number, maxAttempts: number): boolean {
  return maxAttempts > 0 && attempts >= maxAttempts;
}

/**
 * One end-to-end run: detect, then transform and publish every pending item
 * sequentially, then regenerate the feed once.
 *
 * Per-item failures are recorded and the run moves on. Run-level failures
 * (quota, corrupt state, duplicate identity) propagate and leave the feed untouched.
 */
export async function runPipeline(deps: PipelineDependencies, options: PipelineOptions): Promise<PipelineRunSummary> {
  const now = deps.now ?? (() => new Date());
  const startedAt = Date.now();
  const dryRun = options.dryRun ?? false;

  log.info(`▶️ Starting pipeline run${dryRun ? ' (dry run)' : ''}`);

  const loadedState = await StateStore.load(deps.paths.statePath, { missingStatePolicy: options.missingStatePolicy });
  const catalog = await EpisodeCatalog.load(deps.paths.catalogPath);
  const stateStore = dryRun ? loadedState.clone() : loadedState;

  const recovered = reconcileStateWithCatalog(stateStore, catalog, now());
  if (recovered > 0 && !dryRun) {
    await stateStore.persist();
  }

  let detected = 0;
  if (options.skipDetection) {
    log.info('Skipping detection, working through previously seen items only.');
  } else {
    const detection = await detectNewItems(stateStore, deps.listing, {
      channelId: options.channelId,
      lookbackDays: options.lookbackDays,
      maxItems: options.maxListedItems,
      now: now(),
      persist: !dryRun,
    });
    detected = detection.newItems.length;
  }

  const candidates: RemoteItem[] = [];
  let skipped = 0;
  for (const item of stateStore.pending()) {
    const attempts = stateStore.get(item.identity)?.attempts ?? 0;
    if (isParked(attempts, options.maxAttempts)) {
      log.warn(`⏭️ Skipping ${item.identity}: failed ${attempts} time(s), retries exhausted.`);
      skipped++;
    } else if (options.maxEpisodes !== undefined && candidates.length >= options.maxEpisodes) {
      skipped++;
    } else {
      candidates.push(item);
    }
  }
  log.info(`Found ${candidates.length} item(s) to process, ${skipped} skipped.`);

  if (dryRun) {
    for (const item of candidates) {
      log.info(`  Would process ${item.identity} "${item.title}" (${item.publishedAt})`);
    }
    return {
      detected,
      published: 0,
      failed: 0,
      skipped,
      recovered,
      failures: [],
      outcome: 'success',
      publishedIdentities: [],
      wouldProcess: candidates.map(item => item.identity),
      dryRun,
      durationMs: Date.now() - startedAt,
    };
  }

  const publishedIdentities: string[] = [];
  const failures: CandidateFailure[] = [];

  for (const item of candidates) {
    let record: EpisodeRecord;
    try {
      record = await deps.transformer.transform(item, { episodeNumber: catalog.size + 1 });
    } catch (error) {
      if (isRunLevelError(error)) {
        throw error;
      }
      const message = describeError(error);
      const attempts = stateStore.recordFailure(item.identity, message);
      await stateStore.persist();
      const parked = isParked(attempts, options.maxAttempts);
      failures.push({ identity: item.identity, title: item.title, message, attempts, parked });
      log.error(`❌ Failed to process ${item.identity} (attempt ${attempts}): ${message}`);
      if (parked) {
        log.error(`${item.identity} will not be retried automatically.`);
      }
      continue;
    }

    // Duplicate identity throws here and ends the run before the feed is touched
    catalog.append(record);
    stateStore.markProcessed(item.identity, now());
    await catalog.persist(now());
    await stateStore.persist();
    publishedIdentities.push(item.identity);
    log.info(`✅ Published episode ${record.episodeNumber}: ${record.title}`);
  }

  const xml = renderFeed(catalog.all(), deps.show, { generatedAt: now() });
  await publishFeed(xml, {
    feedPath: deps.paths.feedPath,
    storage: deps.storage,
    uploadToStorage: options.publishFeedToStorage,
  });

  const summary: PipelineRunSummary = {
    detected,
    published: publishedIdentities.length,
    failed: failures.length,
    skipped,
    recovered,
    failures,
    outcome: determineOutcome(publishedIdentities.length, failures.length),
    publishedIdentities,
    wouldProcess: [],
    dryRun,
    durationMs: Date.now() - startedAt,
  };
  logSummary(summary);
  return summary;
}

function logSummary(summary: PipelineRunSummary): void {
  log.info('\n📊 Pipeline Summary:');
  log.info(`⏱️   Total Duration: ${(summary.durationMs / 1000).toFixed(2)} seconds`);
  log.info(`🆕 Detected: ${summary.detected}`);
  log.info(`🎧 Published: ${summary.published}`);
  log.info(`❌ Failed: ${summary.failed}`);
  log.info(`⏭️  Skipped: ${summary.skipped}`);
  if (summary.recovered > 0) {
    log.info(`🩹 Recovered: ${summary.recovered}`);
  }
  log.info(`Outcome: ${summary.outcome}`);
}
