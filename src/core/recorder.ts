/**
 * Recorder
 *
 * Drives locate -> extract -> average -> emit for each mode of the benchmark matrix.
 */

import type { Mode, RecorderConfig, SummaryTable } from '../types/index.js';
import { MODES } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { aggregateConfiguration } from './aggregator.js';
import { degreesFor } from './file-locator.js';
import { buildSummaryTable, emitSummary } from './report-emitter.js';

const log = createLogger('Recorder');

export interface RecordedSummary {
  table: SummaryTable;
  path: string;
}

export interface RecordAllOptions {
  /**
   * Modes to record, in order. Defaults to every mode enabled in the config.
   * Listed modes run even when disabled there.
   */
  modes?: readonly Mode[];
}

/**
 * Record every size of one mode. Sizes are emitted as they complete; the first
 * extraction failure propagates and leaves the failing size without a summary.
 */
export function recordMode(config: RecorderConfig, mode: Mode): RecordedSummary[] {
  log.info({ mode, sequenceLengths: config.sequenceLengths, runs: config.runs }, 'Recording mode');

  const summaries: RecordedSummary[] = [];
  for (const sequenceLength of config.sequenceLengths) {
    const averages = degreesFor(config, mode).map((degree) =>
      aggregateConfiguration(config, mode, sequenceLength, degree)
    );
    const table = buildSummaryTable(mode, sequenceLength, averages);
    summaries.push({ table, path: emitSummary(table, config.outputRoot) });
  }
  return summaries;
}

/**
 * Modes `recordAll` runs when none are named
 */
export function enabledModes(config: RecorderConfig): Mode[] {
  return MODES.filter((mode) => config.modes[mode].enabled);
}

/**
 * Record each selected mode in turn. Errors are not caught: one failing mode
 * stops the modes after it.
 */
export function recordAll(
  config: RecorderConfig,
  options: RecordAllOptions = {}
): Map<Mode, RecordedSummary[]> {
  const modes = options.modes ?? enabledModes(config);
  const skipped = MODES.filter((mode) => !modes.includes(mode));
  if (skipped.length > 0) {
    log.debug({ skipped }, 'Modes not recorded');
  }

  const results = new Map<Mode, RecordedSummary[]>();
  for (const mode of modes) {
    results.set(mode, recordMode(config, mode));
  }
  return results;
}
