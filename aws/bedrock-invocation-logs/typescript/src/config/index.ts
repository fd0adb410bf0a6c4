/**
 * Pipeline Configuration
 */

export type { PipelineConfig, PipelineConfigInput } from './config.js';
export { PipelineConfigBuilder } from './config.js';

export {
  DEFAULT_LOG_GROUP_NAME,
  DEFAULT_REGION,
  DEFAULT_LOOKBACK_HOURS,
  LOOKBACK_PRESETS_HOURS,
  DEFAULT_FILTER_PATTERN,
  DEFAULT_STREAM_SELECTION,
  DEFAULT_REORDER_WINDOW_MS,
  DEFAULT_LOG_LEVEL,
} from './defaults.js';

export { loadConfigFromEnv } from './environment.js';
export { validatePipelineConfig, resolvePipelineConfig, windowFromLookback } from './validation.js';
