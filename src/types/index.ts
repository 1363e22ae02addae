/**
 * Core type definitions for the benchmark recorder
 */

// ============================================
// Mode Types
// ============================================

/**
 * Execution strategy of the benchmarked program
 */
export type Mode = 'serial' | 'parallel' | 'distributed';

export const MODES: readonly Mode[] = ['serial', 'parallel', 'distributed'];

/**
 * Modes that sweep a parallelism degree (thread or process count)
 */
export type DegreeMode = Exclude<Mode, 'serial'>;

// ============================================
// Run Types
// ============================================

/**
 * Identifies one result file. Derived from loop position only.
 */
export interface RunIdentifier {
  mode: Mode;
  sequenceLength: number;
  /** Thread count (parallel) or process count (distributed); absent for serial */
  degree?: number;
  /** 1-based trial index */
  run: number;
}

/**
 * Averaged duration of one (size, degree) configuration
 */
export type ConfigurationAverage = Readonly<{
  sequenceLength: number;
  degree?: number;
  avgExecutionTime: number;
}>;

// ============================================
// Summary Types
// ============================================

export type SerialColumns = readonly ['avg_execution_time'];
export type ParallelColumns = readonly ['n_threads', 'avg_execution_time'];
export type DistributedColumns = readonly ['n_processes', 'avg_execution_time'];

export type SummaryColumns = SerialColumns | ParallelColumns | DistributedColumns;

/**
 * One row of a summary table; `degree` is set for every mode except serial
 */
export type SummaryRow = Readonly<{
  degree?: number;
  avgExecutionTime: number;
}>;

export type SummaryTable = Readonly<{
  mode: Mode;
  sequenceLength: number;
  columns: SummaryColumns;
  rows: readonly SummaryRow[];
}>;

// ============================================
// Configuration Types
// ============================================

export interface ModeSettings {
  /** Whether `recordAll` runs this mode */
  enabled: boolean;
  /** Parallelism degrees swept; ignored for serial */
  degrees: readonly number[];
}

export interface RecorderConfig {
  /** Directory holding `<mode>/L<size>/*.out` result files */
  inputRoot: string;
  /** Directory receiving `<mode>/L<size>/*.csv` summaries */
  outputRoot: string;
  sequenceLengths: readonly number[];
  /** Trials per configuration */
  runs: number;
  modes: Readonly<Record<Mode, ModeSettings>>;
}
