/**
 * Recorder CLI
 *
 * With no arguments, records every enabled mode from `output/` into `data/`.
 */

import { Command, Option } from 'commander';
import { ConfigLoader, configFromEnv, resolveConfig } from '../config/index.js';
import { enabledModes, enumerateRuns, recordAll, resolveRunPath } from '../core/index.js';
import { RecorderError } from '../errors/index.js';
import { MODES, type Mode, type RecorderConfig } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('CLI');

export interface CommonOptions {
  config?: string;
  input?: string;
  output?: string;
  /** Restricted to MODES by commander's `choices` */
  mode?: Mode;
}

/**
 * Defaults, then env, then the config file, then flags
 */
export function buildConfig(options: CommonOptions): RecorderConfig {
  const base = configFromEnv();
  const fromFile = options.config ? new ConfigLoader().load(options.config, base) : base;
  return resolveConfig({ inputRoot: options.input, outputRoot: options.output }, fromFile);
}

function selectModes(config: RecorderConfig, options: CommonOptions): Mode[] {
  return options.mode === undefined ? enabledModes(config) : [options.mode];
}

function fail(error: unknown): never {
  if (error instanceof RecorderError) {
    log.error({ err: error.toJSON() }, 'Recording aborted');
  }
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
}

function withCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'YAML file overriding the benchmark matrix')
    .option('-i, --input <dir>', 'Root directory of the result files')
    .option('-o, --output <dir>', 'Root directory for the CSV summaries')
    .addOption(
      new Option('-m, --mode <mode>', 'Only this mode, even if disabled in the config').choices(
        MODES
      )
    );
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('bench-recorder')
    .description('Average benchmark timings from result files into CSV summaries')
    .version('0.1.0');

  withCommonOptions(
    program.command('record', { isDefault: true }).description('Record summaries for each mode')
  ).action((options: CommonOptions) => {
    try {
      const config = buildConfig(options);
      const modes = selectModes(config, options);
      recordAll(config, { modes });
    } catch (error) {
      fail(error);
    }
  });

  withCommonOptions(
    program.command('matrix').description('List the result files each mode expects')
  ).action((options: CommonOptions) => {
    try {
      const config = buildConfig(options);
      for (const mode of selectModes(config, options)) {
        for (const id of enumerateRuns(config, mode)) {
          console.log(resolveRunPath(config.inputRoot, id));
        }
      }
    } catch (error) {
      fail(error);
    }
  });

  return program;
}
