/**
 * Core recording pipeline
 */

export {
  DEGREE_MARKERS,
  hasDegree,
  configurationStem,
  configurationDir,
  runFileName,
  resolveRunPath,
  summaryPath,
  degreesFor,
  enumerateRuns,
} from './file-locator.js';
export { TIME_MARKER, matchTime, extractTime, readTime } from './time-extractor.js';
export { averageDurations, aggregateConfiguration } from './aggregator.js';
export {
  SUMMARY_COLUMNS,
  buildSummaryTable,
  formatFloat,
  formatCsv,
  formatTable,
  emitSummary,
} from './report-emitter.js';
export {
  recordMode,
  recordAll,
  enabledModes,
  type RecordedSummary,
  type RecordAllOptions,
} from './recorder.js';
