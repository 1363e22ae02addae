/**
 * Aggregator
 *
 * Averages the trial durations of one configuration.
 */

import type { ConfigurationAverage, Mode, RecorderConfig } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { configurationStem, resolveRunPath } from './file-locator.js';
import { readTime } from './time-extractor.js';

const log = createLogger('Aggregator');

/**
 * Arithmetic mean over exactly `runs` durations
 */
export function averageDurations(durations: readonly number[], runs: number): number {
  if (durations.length !== runs) {
    throw new RangeError(`Expected ${runs} durations, got ${durations.length}`);
  }
  let total = 0;
  for (const duration of durations) {
    total += duration;
  }
  return total / runs;
}

/**
 * Read trials 1..config.runs of one configuration and average them.
 * The first unreadable or unparseable file aborts with ExtractionError.
 */
export function aggregateConfiguration(
  config: RecorderConfig,
  mode: Mode,
  sequenceLength: number,
  degree?: number
): ConfigurationAverage {
  const durations: number[] = [];
  for (let run = 1; run <= config.runs; run++) {
    const path = resolveRunPath(config.inputRoot, { mode, sequenceLength, degree, run });
    durations.push(readTime(path));
  }

  const avgExecutionTime = averageDurations(durations, config.runs);
  log.debug(
    { configuration: configurationStem(mode, sequenceLength), degree, avgExecutionTime },
    'Configuration averaged'
  );

  return Object.freeze(
    degree === undefined ? { sequenceLength, avgExecutionTime } : { sequenceLength, degree, avgExecutionTime }
  );
}
