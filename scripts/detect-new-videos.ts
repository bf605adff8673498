#!/usr/bin/env tsx

/**
 * Change detection entry point.
 *
 * Default mode records every upload not yet in the state file as `seen` and prints it.
 * `--list N` prints the N most recent uploads without touching state.
 * `--init` marks everything currently listed as processed, so a new installation
 * does not publish the channel's back catalog. `--backfill` does the opposite: every
 * listed upload without a catalog record is queued for the next pipeline run.
 *
 * Usage: tsx scripts/detect-new-videos.ts [OPTIONS]
 */

import prompts from 'prompts';
import { createAlertingServiceFromEnv } from '@tube-to-pod/alerting';
import { backfillState, detectNewItems, initializeState, listRecent } from '@tube-to-pod/detect-new-videos';
import { describeError } from '@tube-to-pod/errors';
import { setLogLevel } from '@tube-to-pod/logging';
import { EpisodeCatalog } from '@tube-to-pod/state';
import type { RemoteItem } from '@tube-to-pod/types';
import { formatDuration } from '@tube-to-pod/utils';
import { EXIT_CODES, UsageError, parseDetectArguments } from './utils/cli-args.js';
import type { DetectCliOptions } from './utils/cli-args.js';
import { logError, logInfo, logSuccess, logWarning } from './utils/logging.js';
import { createPipelineContext, loadStateForMode } from './utils/pipeline-context.js';

function displayHelp(): void {
  console.log(`
🔎 Detect New Videos

Usage: tsx scripts/detect-new-videos.ts [OPTIONS]

OPTIONS:
  --help, -h       Show this help message
  --list N         Print the N most recent uploads without changing state
  --init           Mark every currently listed upload as processed (bootstrap)
  --backfill       Queue every listed upload missing from the catalog for publishing
  --yes, -y        Skip the --init/--backfill confirmation prompt
  --json           Print machine-readable JSON on stdout

ENVIRONMENT (.env is read when present):
  YOUTUBE_API_KEY, YOUTUBE_CHANNEL_ID   Required
  DATA_DIR                              Where state.json lives (default ./data)
  LOOKBACK_DAYS, MAX_LISTED_ITEMS       Detection window

EXIT CODES:
  0  Success
  1  Invalid usage, configuration, quota or state failure
`);
}

function printItems(items: RemoteItem[], json: boolean, emptyMessage: string): void {
  if (json) {
    console.log(JSON.stringify(items, null, 2));
    return;
  }
  if (items.length === 0) {
    logInfo(emptyMessage);
    return;
  }
  for (const item of items) {
    const duration = item.durationHintSeconds === undefined ? '' : ` [${formatDuration(item.durationHintSeconds)}]`;
    console.log(`${item.publishedAt}  ${item.identity}  ${item.title}${duration}`);
  }
}

async function confirm(options: DetectCliOptions, message: string): Promise<boolean> {
  if (options.yes) {
    return true;
  }
  const response = await prompts({
    type: 'confirm',
    name: 'confirmed',
    message,
    initial: false,
  });
  return response.confirmed === true;
}

async function main(): Promise<void> {
  let options: DetectCliOptions;
  try {
    options = parseDetectArguments(process.argv.slice(2));
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

  // Keep stdout parseable
  if (options.json) {
    setLogLevel('warn');
  }

  const alerting = createAlertingServiceFromEnv('detect-new-videos');

  try {
    const { config, paths, listing } = createPipelineContext();

    if (options.listCount !== undefined) {
      const items = await listRecent(listing, config.channelId, options.listCount);
      printItems(items, options.json, 'The channel has no uploads.');
      return;
    }

    const mode = options.init ? 'init' : options.backfill ? 'backfill' : 'detect';
    const stateStore = await loadStateForMode(paths.statePath, mode, config.missingStatePolicy);

    if (options.backfill) {
      if (!(await confirm(options, 'Queue every listed upload missing from the catalog? The next pipeline runs will publish them.'))) {
        logWarning('Backfill cancelled, state left unchanged.');
        return;
      }
      const catalog = await EpisodeCatalog.load(paths.catalogPath);
      const queued = await backfillState(stateStore, catalog, listing, {
        channelId: config.channelId,
        lookbackDays: 0,
        maxItems: config.maxListedItems,
      });
      if (options.json) {
        console.log(JSON.stringify({ queued }));
      } else {
        logSuccess(`Queued ${queued} upload(s) in ${paths.statePath}; run the pipeline to publish them.`);
      }
      return;
    }

    if (options.init) {
      if (!(await confirm(options, 'Mark every currently listed upload as processed? Nothing listed now will be published.'))) {
        logWarning('Initialization cancelled, state left unchanged.');
        return;
      }
      const marked = await initializeState(stateStore, listing, {
        channelId: config.channelId,
        lookbackDays: 0,
        maxItems: config.maxListedItems,
      });
      if (options.json) {
        console.log(JSON.stringify({ marked }));
      } else {
        logSuccess(`Marked ${marked} upload(s) as processed in ${paths.statePath}`);
      }
      return;
    }

    const { newItems } = await detectNewItems(stateStore, listing, {
      channelId: config.channelId,
      lookbackDays: config.lookbackDays,
      maxItems: config.maxListedItems,
    });
    printItems(newItems, options.json, 'No new uploads.');
  } catch (error) {
    logError(`Detection failed: ${describeError(error)}`);
    await alerting.sendCritical(
      'Change detection failed',
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
