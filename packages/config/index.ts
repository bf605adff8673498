export { loadPipelineConfig, formatZodIssues } from './pipeline-config.js';
export type { PipelineConfig } from './pipeline-config.js';
export { loadShowConfig, parseShowConfig } from './show-config.js';
export { loadEnvFile, parseEnvFile } from './env-file.js';
