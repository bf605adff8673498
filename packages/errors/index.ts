export {
  PipelineError,
  QuotaExceededError,
  TransientIOError,
  TaggingFailureError,
  DuplicateIdentityError,
  CorruptStateError,
  InvalidTransitionError,
  ConfigError,
  isRunLevelError,
  describeError,
} from './errors.js';

export type { PipelineErrorKind, TransientIOStage } from './errors.js';
