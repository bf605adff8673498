export { EpisodeTransformer } from './episode-transformer.js';
export type { EpisodeTransformerOptions, ItemTransformer, TransformOptions } from './episode-transformer.js';
export { runPipeline, reconcileStateWithCatalog, determineOutcome } from './pipeline-driver.js';
export type {
  CandidateFailure,
  PipelineDependencies,
  PipelineOptions,
  PipelineOutcome,
  PipelineRunSummary,
} from './pipeline-driver.js';
export {
  runProcess,
  checkBinaryAvailability,
  createYtDlpFetcher,
  createFfprobeProber,
  createFfmpegTagger,
  buildMetadataArgs,
  getVideoUrl,
} from './utils/audio-utils.js';
