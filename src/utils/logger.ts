/**
 * Structured logging system using Pino
 *
 * Logs go to stderr; stdout is reserved for the printed summary tables.
 */

import pino from 'pino';
import { createRequire } from 'module';
import { getEnvOptional, getEnvWithDefault } from './env.js';

// Create require for ESM compatibility
const require = createRequire(import.meta.url);

const STDERR_FD = 2;

/**
 * Determine if pretty printing should be used
 * Disabled in test environment and production
 */
function shouldUsePrettyPrint(): boolean {
  const env = getEnvWithDefault('NODE_ENV', '');
  return env !== 'production' && env !== 'test' && !getEnvOptional('CI');
}

/**
 * Check if pino-pretty is available
 * It is a dev dependency and may be missing from production installs
 */
function isPinoPrettyAvailable(): boolean {
  try {
    require.resolve('pino-pretty');
    return true;
  } catch {
    return false;
  }
}

function resolveLevel(): string {
  return getEnvWithDefault(
    'LOG_LEVEL',
    getEnvOptional('NODE_ENV') === 'test' ? 'silent' : 'info'
  );
}

const options: pino.LoggerOptions = {
  level: resolveLevel(),
  base: { service: 'bench-recorder' },
};

/**
 * Main logger instance
 */
export const logger: pino.Logger =
  shouldUsePrettyPrint() && isPinoPrettyAvailable()
    ? pino({
        ...options,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            destination: STDERR_FD,
          },
        },
      })
    : pino(options, pino.destination(STDERR_FD));

/**
 * Create a child logger with specific context
 *
 * @param context - Context identifier (e.g., 'Recorder', 'ReportEmitter')
 *
 * @example
 * const log = createLogger('Recorder');
 * log.info({ mode: 'serial' }, 'Recording mode');
 */
export function createLogger(context: string): pino.Logger {
  return logger.child({ context });
}
