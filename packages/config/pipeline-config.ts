import path from 'path';
import { z } from 'zod';
import { ConfigError } from '@tube-to-pod/errors';
import type { MissingStatePolicy } from '@tube-to-pod/types';

export interface PipelineConfig {
  youtubeApiKey: string;
  channelId: string;
  dataDir: string;
  /** 0 disables the lookback window */
  lookbackDays: number;
  maxListedItems: number;
  targetBitrateKbps: number;
  audioChannels: 1 | 2;
  fetchTimeoutMs: number;
  probeTimeoutMs: number;
  tagTimeoutMs: number;
  requestTimeoutMs: number;
  uploadTimeoutMs: number;
  /** 0 retries forever */
  maxAttempts: number;
  missingStatePolicy: MissingStatePolicy;
  publishFeedToStorage: boolean;
  ytDlpPath: string;
  ffmpegPath: string;
  ffprobePath: string;
  showConfigPath: string;
  runHistoryPath?: string;
}

const integer = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const timeoutMs = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const booleanFlag = z
  .preprocess(
    value => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.enum(['true', 'false', '1', '0', 'yes', 'no']).default('false')
  )
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform(value => (value ? value : undefined));

const EnvSchema = z.object({
  YOUTUBE_API_KEY: z.string().trim().min(1, 'YOUTUBE_API_KEY is required'),
  YOUTUBE_CHANNEL_ID: z
    .string()
    .trim()
    .regex(/^UC[\w-]+$/, 'YOUTUBE_CHANNEL_ID must be a channel id starting with "UC"'),
  DATA_DIR: z.string().trim().min(1).default('./data'),
  LOOKBACK_DAYS: integer(30),
  MAX_LISTED_ITEMS: z.coerce.number().int().positive().default(50),
  TARGET_BITRATE_KBPS: z.coerce.number().int().min(32).max(320).default(128),
  AUDIO_CHANNELS: z.enum(['1', '2']).default('1'),
  FETCH_TIMEOUT_MS: timeoutMs(30 * 60 * 1000),
  PROBE_TIMEOUT_MS: timeoutMs(10_000),
  TAG_TIMEOUT_MS: timeoutMs(60_000),
  REQUEST_TIMEOUT_MS: timeoutMs(30_000),
  UPLOAD_TIMEOUT_MS: timeoutMs(15 * 60 * 1000),
  MAX_ATTEMPTS: integer(5),
  MISSING_STATE_POLICY: z.enum(['empty', 'abort']).default('empty'),
  PUBLISH_FEED_TO_STORAGE: booleanFlag,
  YT_DLP_PATH: z.string().trim().min(1).default('yt-dlp'),
  FFMPEG_PATH: z.string().trim().min(1).default('ffmpeg'),
  FFPROBE_PATH: z.string().trim().min(1).default('ffprobe'),
  SHOW_CONFIG_PATH: z.string().trim().min(1).default('./show.config.json'),
  RUN_HISTORY_PATH: optionalString,
});

/** Empty strings in the environment count as unset */
function withoutEmptyValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value;
    }
  }
  return cleaned;
}

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const where = issue.path.join('.');
    return where ? `${where}: ${issue.message}` : issue.message;
  });
}

/**
 * Read the pipeline configuration from environment variables.
 * Throws a ConfigError listing every invalid or missing variable at once.
 */
export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const parsed = EnvSchema.safeParse(withoutEmptyValues(env));
  if (!parsed.success) {
    throw new ConfigError(formatZodIssues(parsed.error));
  }
  const values = parsed.data;

  return {
    youtubeApiKey: values.YOUTUBE_API_KEY,
    channelId: values.YOUTUBE_CHANNEL_ID,
    dataDir: path.resolve(values.DATA_DIR),
    lookbackDays: values.LOOKBACK_DAYS,
    maxListedItems: values.MAX_LISTED_ITEMS,
    targetBitrateKbps: values.TARGET_BITRATE_KBPS,
    audioChannels: values.AUDIO_CHANNELS === '2' ? 2 : 1,
    fetchTimeoutMs: values.FETCH_TIMEOUT_MS,
    probeTimeoutMs: values.PROBE_TIMEOUT_MS,
    tagTimeoutMs: values.TAG_TIMEOUT_MS,
    requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
    uploadTimeoutMs: values.UPLOAD_TIMEOUT_MS,
    maxAttempts: values.MAX_ATTEMPTS,
    missingStatePolicy: values.MISSING_STATE_POLICY,
    publishFeedToStorage: values.PUBLISH_FEED_TO_STORAGE,
    ytDlpPath: values.YT_DLP_PATH,
    ffmpegPath: values.FFMPEG_PATH,
    ffprobePath: values.FFPROBE_PATH,
    showConfigPath: path.resolve(values.SHOW_CONFIG_PATH),
    runHistoryPath: values.RUN_HISTORY_PATH ? path.resolve(values.RUN_HISTORY_PATH) : undefined,
  };
}
