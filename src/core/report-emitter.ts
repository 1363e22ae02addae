/**
 * Report Emitter
 *
 * Builds per-size summary tables, prints them and persists them as CSV.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type {
  ConfigurationAverage,
  Mode,
  SummaryColumns,
  SummaryRow,
  SummaryTable,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { hasDegree, summaryPath } from './file-locator.js';

const log = createLogger('ReportEmitter');

export const SUMMARY_COLUMNS = {
  serial: ['avg_execution_time'],
  parallel: ['n_threads', 'avg_execution_time'],
  distributed: ['n_processes', 'avg_execution_time'],
} as const satisfies Record<Mode, SummaryColumns>;

/**
 * Assemble the summary of one (mode, size) from its configuration averages,
 * keeping their order
 */
export function buildSummaryTable(
  mode: Mode,
  sequenceLength: number,
  averages: readonly ConfigurationAverage[]
): SummaryTable {
  if (!hasDegree(mode) && averages.length !== 1) {
    throw new RangeError(`serial summary takes exactly one average, got ${averages.length}`);
  }

  const rows: SummaryRow[] = averages.map((average) => {
    if (average.sequenceLength !== sequenceLength) {
      throw new RangeError(
        `Average for L${average.sequenceLength} does not belong to the L${sequenceLength} summary`
      );
    }
    if (!hasDegree(mode)) {
      return Object.freeze({ avgExecutionTime: average.avgExecutionTime });
    }
    if (average.degree === undefined) {
      throw new RangeError(`${mode} averages require a degree`);
    }
    return Object.freeze({ degree: average.degree, avgExecutionTime: average.avgExecutionTime });
  });

  return Object.freeze({
    mode,
    sequenceLength,
    columns: SUMMARY_COLUMNS[mode],
    rows: Object.freeze(rows),
  });
}

/**
 * Float rendering matching pandas: whole numbers keep a `.0` suffix, and magnitudes
 * below 1e-4 or from 1e16 up use exponent form with at least two exponent digits
 */
export function formatFloat(value: number): string {
  const magnitude = Math.abs(value);
  if (magnitude !== 0 && Number.isFinite(value) && (magnitude < 1e-4 || magnitude >= 1e16)) {
    return value
      .toExponential()
      .replace(
        /e([+-])(\d+)$/,
        (_match, sign: string, digits: string) => `e${sign}${digits.padStart(2, '0')}`
      );
  }
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

function cells(row: SummaryRow): string[] {
  const time = formatFloat(row.avgExecutionTime);
  return row.degree === undefined ? [time] : [String(row.degree), time];
}

/**
 * CSV with a header row, no index column, `\n` line endings and a trailing newline
 */
export function formatCsv(table: SummaryTable): string {
  const lines = [table.columns.join(','), ...table.rows.map((row) => cells(row).join(','))];
  return `${lines.join('\n')}\n`;
}

/**
 * Aligned text rendering with a row index, for the console
 */
export function formatTable(table: SummaryTable): string {
  const columns: readonly string[] = table.columns;
  const body = table.rows.map(cells);
  const indexWidth = String(Math.max(body.length - 1, 0)).length;
  const widths = columns.map((column, i) =>
    Math.max(column.length, ...body.map((row) => (row[i] ?? '').length))
  );

  const header =
    ' '.repeat(indexWidth) + columns.map((c, i) => `  ${c.padStart(widths[i] ?? 0)}`).join('');
  const lines = body.map(
    (row, rowIndex) =>
      String(rowIndex).padEnd(indexWidth) +
      row.map((cell, i) => `  ${cell.padStart(widths[i] ?? 0)}`).join('')
  );
  return [header, ...lines].join('\n');
}

/**
 * Print the table, then write it to `<outputRoot>/<mode>/L<size>/<mode>-L<size>.csv`,
 * overwriting any previous summary. Returns the written path.
 */
export function emitSummary(table: SummaryTable, outputRoot: string): string {
  console.log(formatTable(table));

  const path = summaryPath(outputRoot, table.mode, table.sequenceLength);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, formatCsv(table));

  log.info({ mode: table.mode, sequenceLength: table.sequenceLength, path }, 'Summary written');
  return path;
}
