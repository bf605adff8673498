/**
 * Typed failures raised by the sync pipeline.
 * `kind` is the discriminator the driver switches on; `name` mirrors the class for logs.
 */

export type PipelineErrorKind =
  | 'quota-exceeded'
  | 'transient-io'
  | 'tagging-failure'
  | 'duplicate-identity'
  | 'corrupt-state'
  | 'invalid-transition'
  | 'config';

export type TransientIOStage = 'list' | 'fetch' | 'probe' | 'upload' | 'feed';

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The remote listing refused further calls for this run. */
export class QuotaExceededError extends PipelineError {
  readonly kind = 'quota-exceeded';

  constructor(public readonly reason: string, options?: { cause?: unknown }) {
    super(`Remote listing quota exceeded (${reason})`, options);
  }
}

/** Network failure, timeout or non-zero exit of an external tool. */
export class TransientIOError extends PipelineError {
  readonly kind = 'transient-io';

  constructor(
    public readonly stage: TransientIOStage,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`[${stage}] ${message}`, options);
  }
}

export class TaggingFailureError extends PipelineError {
  readonly kind = 'tagging-failure';

  constructor(public readonly filePath: string, options?: { cause?: unknown }) {
    super(`Failed to tag audio file ${filePath}`, options);
  }
}

export class DuplicateIdentityError extends PipelineError {
  readonly kind = 'duplicate-identity';

  constructor(public readonly identity: string) {
    super(`Episode catalog already contains an episode for ${identity}`);
  }
}

export class CorruptStateError extends PipelineError {
  readonly kind = 'corrupt-state';

  constructor(public readonly filePath: string, detail: string, options?: { cause?: unknown }) {
    super(`Persisted state at ${filePath} is unusable: ${detail}`, options);
  }
}

export class InvalidTransitionError extends PipelineError {
  readonly kind = 'invalid-transition';

  constructor(public readonly identity: string, detail: string) {
    super(`Cannot mark ${identity} as processed: ${detail}`);
  }
}

export class ConfigError extends PipelineError {
  readonly kind = 'config';

  constructor(public readonly problems: string[]) {
    super(`Invalid configuration:\n${problems.map(problem => `  - ${problem}`).join('\n')}`);
  }
}

/**
 * Errors that abort the whole invocation rather than a single candidate.
 * Listing and feed failures are transient IO but still end the run.
 */
export function isRunLevelError(error: unknown): boolean {
  if (!(error instanceof PipelineError)) {
    return true;
  }
  switch (error.kind) {
    case 'tagging-failure':
      return false;
    case 'transient-io':
      return error instanceof TransientIOError && (error.stage === 'list' || error.stage === 'feed');
    default:
      return true;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
