import type { PipelineOutcome } from '@tube-to-pod/publish-episodes';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const EXIT_CODES = {
  success: 0,
  runLevelFailure: 1,
  partialFailure: 2,
  totalFailure: 3,
} as const;

export function exitCodeForOutcome(outcome: PipelineOutcome): number {
  switch (outcome) {
    case 'success':
      return EXIT_CODES.success;
    case 'partial-failure':
      return EXIT_CODES.partialFailure;
    case 'total-failure':
      return EXIT_CODES.totalFailure;
  }
}

function parsePositiveInteger(flag: string, value: string | undefined): number {
  const parsed = value !== undefined && /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (isNaN(parsed) || parsed <= 0) {
    throw new UsageError(`Invalid ${flag} value: ${value ?? '(missing)'}. Must be a positive integer.`);
  }
  return parsed;
}

/** Supports both `--flag=value` and `--flag value`; returns the value and how many args were consumed */
function readFlagValue(args: string[], index: number, flag: string): { value: string | undefined; consumed: number } {
  const arg = args[index];
  if (arg.startsWith(`${flag}=`)) {
    return { value: arg.slice(flag.length + 1), consumed: 1 };
  }
  return { value: args[index + 1], consumed: 2 };
}

export interface DetectCliOptions {
  help: boolean;
  init: boolean;
  /** Queue listed uploads missing from the catalog for publishing */
  backfill: boolean;
  /** Set by `--list N` */
  listCount?: number;
  json: boolean;
  yes: boolean;
}

export function parseDetectArguments(args: string[]): DetectCliOptions {
  const options: DetectCliOptions = { help: false, init: false, backfill: false, json: false, yes: false };

  for (let index = 0; index < args.length; ) {
    const arg = args[index];
    if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === '--init') {
      options.init = true;
    } else if (arg === '--backfill') {
      options.backfill = true;
    } else if (arg === '--json') {
      options.json = true;
    } else if (arg === '--yes' || arg === '-y') {
      options.yes = true;
    } else if (arg === '--list' || arg.startsWith('--list=')) {
      const { value, consumed } = readFlagValue(args, index, '--list');
      options.listCount = parsePositiveInteger('--list', value);
      index += consumed;
      continue;
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
    index++;
  }

  const modes = [options.init && '--init', options.backfill && '--backfill', options.listCount !== undefined && '--list']
    .filter(mode => typeof mode === 'string');
  if (modes.length > 1) {
    throw new UsageError(`${modes.join(' and ')} cannot be combined.`);
  }
  return options;
}

export interface PipelineCliOptions {
  help: boolean;
  dryRun: boolean;
  skipDetection: boolean;
  maxEpisodes?: number;
}

export function parsePipelineArguments(args: string[]): PipelineCliOptions {
  const options: PipelineCliOptions = { help: false, dryRun: false, skipDetection: false };

  for (let index = 0; index < args.length; ) {
    const arg = args[index];
    if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === '--dry-run') {
      options.dryRun = true;
    } else if (arg === '--skip-detection') {
      options.skipDetection = true;
    } else if (arg === '--max-episodes' || arg.startsWith('--max-episodes=')) {
      const { value, consumed } = readFlagValue(args, index, '--max-episodes');
      options.maxEpisodes = parsePositiveInteger('--max-episodes', value);
      index += consumed;
      continue;
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
    index++;
  }

  return options;
}
