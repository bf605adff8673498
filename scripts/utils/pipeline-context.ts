import * as path from 'path';
import { loadEnvFile, loadPipelineConfig } from '@tube-to-pod/config';
import type { PipelineConfig } from '@tube-to-pod/config';
import { getDataFilePaths } from '@tube-to-pod/constants';
import type { DataFilePaths } from '@tube-to-pod/constants';
import { YouTubeListingClient } from '@tube-to-pod/detect-new-videos';
import { getLogger } from '@tube-to-pod/logging';
import { StateStore } from '@tube-to-pod/state';
import type { MissingStatePolicy } from '@tube-to-pod/types';

const log = getLogger('scripts');

export interface PipelineContext {
  config: PipelineConfig;
  paths: DataFilePaths;
  listing: YouTubeListingClient;
}

/**
 * Everything both scripts need before they can touch the channel or the data directory.
 * Values already in the environment win over `.env`.
 */
export function createPipelineContext(envFilePath: string = path.resolve('.env')): PipelineContext {
  const applied = loadEnvFile(envFilePath);
  if (applied.length > 0) {
    log.debug(`Loaded ${applied.length} variable(s) from ${envFilePath}`);
  }

  const config = loadPipelineConfig();
  return {
    config,
    paths: getDataFilePaths(config.dataDir),
    listing: new YouTubeListingClient({
      apiKey: config.youtubeApiKey,
      requestTimeoutMs: config.requestTimeoutMs,
    }),
  };
}

export type DetectMode = 'detect' | 'init' | 'backfill';

/**
 * Init and backfill build the state file, so a missing one is expected there;
 * only plain detection honours MISSING_STATE_POLICY. An unparsable file fails in every mode.
 */
export function loadStateForMode(
  statePath: string,
  mode: DetectMode,
  missingStatePolicy: MissingStatePolicy
): Promise<StateStore> {
  return StateStore.load(statePath, { missingStatePolicy: mode === 'detect' ? missingStatePolicy : 'empty' });
}
