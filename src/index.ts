/**
 * bench-recorder - programmatic API
 *
 * Aggregates "Total time taken:" timings from benchmark result files into
 * per-size CSV summaries of average execution time.
 */

export * from './types/index.js';
export * from './core/index.js';
export {
  DEFAULT_RECORDER_CONFIG,
  ConfigLoader,
  resolveConfig,
  configFromEnv,
  type ConfigOverrides,
} from './config/index.js';
export { RecorderError, ExtractionError, ConfigurationError } from './errors/index.js';
export { logger, createLogger } from './utils/index.js';
