#!/usr/bin/env tsx

/**
 * Pipeline entry point - one complete sync run
 *
 * Phases:
 * 1. Reconcile the state file with the episode catalog
 * 2. Detect new uploads on the channel
 * 3. Fetch, tag and upload each pending upload, oldest first
 * 4. Regenerate the feed from the catalog
 *
 * Safe to run on a schedule: a run that finds nothing new changes nothing
 * except the last-checked timestamp.
 *
 * Usage: tsx scripts/run-pipeline.ts [OPTIONS]
 */

import { createAlertingServiceFromEnv } from '@tube-to-pod/alerting';
import { loadShowConfig } from '@tube-to-pod/config';
import { describeError } from '@tube-to-pod/errors';
import {
  EpisodeTransformer,
  checkBinaryAvailability,
  createFfmpegTagger,
  createFfprobeProber,
  createYtDlpFetcher,
  runPipeline,
} from '@tube-to-pod/publish-episodes';
import type { PipelineRunSummary } from '@tube-to-pod/publish-episodes';
import { createObjectStorage } from '@tube-to-pod/s3';
import { EXIT_CODES, UsageError, exitCodeForOutcome, parsePipelineArguments } from './utils/cli-args.js';
import type { PipelineCliOptions } from './utils/cli-args.js';
import { logError, logHeader, logInfo, logSuccess, logWarning } from './utils/logging.js';
import { createPipelineContext } from './utils/pipeline-context.js';
import { PipelineResultLogger } from './utils/pipeline-result-logger.js';

function displayHelp(): void {
  console.log(`
🎙️  Run Pipeline - Channel to Podcast Sync

Usage: tsx scripts/run-pipeline.ts [OPTIONS]

OPTIONS:
  --help, -h              Show this help message
  --dry-run               Report what would be processed; change nothing
  --skip-detection        Only work through uploads already recorded as seen
  --max-episodes=N        Process at most N uploads this run

ENVIRONMENT (.env is read when present):
  YOUTUBE_API_KEY, YOUTUBE_CHANNEL_ID   Required
  FILE_STORAGE_ENV                      s3 (default) or local
  S3_BUCKET, PUBLIC_BASE_URL            Where episodes are uploaded and served from
  SHOW_CONFIG_PATH                      Show metadata (default ./show.config.json)
  RUN_HISTORY_PATH                      Markdown run history, optional
  SLACK_BOT_TOKEN, SLACK_CHANNEL_ID     Failure alerts, optional

EXIT CODES:
  0  Every candidate published (or nothing to do)
  1  Run aborted: configuration, quota, corrupt state or duplicate episode
  2  Partial failure: some candidates failed
  3  Total failure: every candidate failed
`);
}

function printFailures(summary: PipelineRunSummary): void {
  for (const failure of summary.failures) {
    const parked = failure.parked ? ' - no further retries' : '';
    logWarning(`${failure.identity} "${failure.title}": ${failure.message} (attempt ${failure.attempts}${parked})`);
  }
}

function writeHistory(historyPath: string | undefined, write: (logger: PipelineResultLogger) => void): void {
  if (!historyPath) {
    return;
  }
  const resultLogger = new PipelineResultLogger(historyPath);
  try {
    write(resultLogger);
    logInfo(`Run history updated: ${resultLogger.getLogFilePath()}`);
  } catch (error) {
    logWarning(`Could not update run history at ${historyPath}: ${describeError(error)}`);
  }
}

async function main(): Promise<void> {
  const startTime = new Date();

  let options: PipelineCliOptions;
  try {
    options = parsePipelineArguments(process.argv.slice(2));
  } catch (error) {
    if (error instanceof UsageError) {
      logError(error.message);
      console.log('Use --help for usage information');
      process.exit(EXIT_CODES.runLevelFailure);
    }
    throw error;
  }

  if (options.help) {
    displayHelp();
    process.exit(EXIT_CODES.success);
  }

  logHeader(`🎙️  Pipeline run${options.dryRun ? ' (dry run)' : ''} - started ${startTime.toISOString()}`);

  const alerting = createAlertingServiceFromEnv('run-pipeline');
  let historyPath: string | undefined;

  try {
    const { config, paths, listing } = createPipelineContext();
    historyPath = config.runHistoryPath;
    const show = loadShowConfig(config.showConfigPath);

    if (!options.dryRun) {
      await checkBinaryAvailability(config.ytDlpPath, ['--version']);
      await checkBinaryAvailability(config.ffmpegPath);
      await checkBinaryAvailability(config.ffprobePath);
    }

    const storage = createObjectStorage({ uploadTimeoutMs: config.uploadTimeoutMs });
    const transformer = new EpisodeTransformer({
      fetcher: createYtDlpFetcher({
        ytDlpPath: config.ytDlpPath,
        ffmpegPath: config.ffmpegPath,
        audioChannels: config.audioChannels,
        timeoutMs: config.fetchTimeoutMs,
      }),
      prober: createFfprobeProber({ ffprobePath: config.ffprobePath, timeoutMs: config.probeTimeoutMs }),
      tagger: createFfmpegTagger({ ffmpegPath: config.ffmpegPath, timeoutMs: config.tagTimeoutMs }),
      storage,
      show,
      targetBitrateKbps: config.targetBitrateKbps,
    });

    const summary = await runPipeline(
      { listing, transformer, show, paths, storage },
      {
        channelId: config.channelId,
        lookbackDays: config.lookbackDays,
        maxListedItems: config.maxListedItems,
        maxAttempts: config.maxAttempts,
        missingStatePolicy: config.missingStatePolicy,
        publishFeedToStorage: config.publishFeedToStorage,
        dryRun: options.dryRun,
        skipDetection: options.skipDetection,
        maxEpisodes: options.maxEpisodes,
      }
    );

    if (summary.dryRun) {
      logInfo(`Dry run: ${summary.wouldProcess.length} upload(s) would be processed.`);
      summary.wouldProcess.forEach(identity => console.log(`  - ${identity}`));
    } else if (summary.outcome === 'success') {
      logSuccess(`Published ${summary.published} episode(s).`);
    } else {
      logError(`${summary.failed} upload(s) failed, ${summary.published} published.`);
      printFailures(summary);
    }

    writeHistory(historyPath, resultLogger => resultLogger.logRun(summary, startTime));

    if (summary.outcome === 'total-failure') {
      await alerting.sendError(`Pipeline run failed for all ${summary.failed} candidate(s)`, undefined, {
        metadata: {
          failed: summary.failed,
          failures: summary.failures.map(failure => `${failure.identity}: ${failure.message}`).join('\n'),
        },
      });
    }

    process.exit(exitCodeForOutcome(summary.outcome));
  } catch (error) {
    logError(`Pipeline aborted: ${describeError(error)}`);
    writeHistory(historyPath, resultLogger => resultLogger.logAbortedRun(error, startTime));
    await alerting.sendCritical(
      'Pipeline run aborted',
      error instanceof Error ? error : new Error(describeError(error))
    );
    process.exit(EXIT_CODES.runLevelFailure);
  }
}

process.on('SIGINT', () => {
  console.log('\n\n⚠️  Operation cancelled by user');
  process.exit(130);
});

main().catch(error => {
  console.error('\n❌ Unexpected error:', describeError(error));
  process.exit(EXIT_CODES.runLevelFailure);
});
