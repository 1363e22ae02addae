/**
 * Utility functions and helpers
 */

export { logger, createLogger } from './logger.js';

export { getEnvWithDefault, getEnvOptional } from './env.js';
