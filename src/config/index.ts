/**
 * Recorder Configuration
 *
 * Resolution order (highest to lowest priority):
 * 1. CLI flags
 * 2. YAML config file
 * 3. Environment variables (BENCH_INPUT_ROOT, BENCH_OUTPUT_ROOT)
 * 4. Default values
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigurationError, toError } from '../errors/index.js';
import { RecorderConfigFileSchema, type RecorderConfigFile } from '../types/schemas.js';
import { MODES, type Mode, type ModeSettings, type RecorderConfig } from '../types/index.js';
import { getEnvOptional } from '../utils/env.js';

const DEGREES = Object.freeze([1, 2, 4, 8]);

/**
 * Benchmark matrix the result files are produced for.
 * Parallel results are not recorded by default.
 */
export const DEFAULT_RECORDER_CONFIG: RecorderConfig = Object.freeze({
  inputRoot: 'output',
  outputRoot: 'data',
  sequenceLengths: Object.freeze([100, 1000, 10000]),
  runs: 8,
  modes: Object.freeze({
    serial: Object.freeze({ enabled: true, degrees: Object.freeze([]) }),
    parallel: Object.freeze({ enabled: false, degrees: DEGREES }),
    distributed: Object.freeze({ enabled: true, degrees: DEGREES }),
  }),
});

/**
 * Overrides accepted by `resolveConfig`; shaped like the YAML file
 */
export type ConfigOverrides = RecorderConfigFile;

function mergeModes(
  base: RecorderConfig['modes'],
  overrides: ConfigOverrides['modes']
): RecorderConfig['modes'] {
  const merged: Record<Mode, ModeSettings> = { ...base };
  for (const mode of MODES) {
    const override = overrides?.[mode];
    if (!override) continue;
    merged[mode] = Object.freeze({
      enabled: override.enabled ?? base[mode].enabled,
      degrees:
        override.degrees !== undefined ? Object.freeze([...override.degrees]) : base[mode].degrees,
    });
  }
  return Object.freeze(merged);
}

/**
 * Layer overrides on top of a base configuration. Returns a new frozen value.
 */
export function resolveConfig(
  overrides: ConfigOverrides = {},
  base: RecorderConfig = DEFAULT_RECORDER_CONFIG
): RecorderConfig {
  return Object.freeze({
    inputRoot: overrides.inputRoot ?? base.inputRoot,
    outputRoot: overrides.outputRoot ?? base.outputRoot,
    sequenceLengths:
      overrides.sequenceLengths !== undefined
        ? Object.freeze([...overrides.sequenceLengths])
        : base.sequenceLengths,
    runs: overrides.runs ?? base.runs,
    modes: mergeModes(base.modes, overrides.modes),
  });
}

/**
 * Defaults with BENCH_INPUT_ROOT / BENCH_OUTPUT_ROOT applied
 */
export function configFromEnv(base: RecorderConfig = DEFAULT_RECORDER_CONFIG): RecorderConfig {
  return resolveConfig(
    {
      inputRoot: getEnvOptional('BENCH_INPUT_ROOT'),
      outputRoot: getEnvOptional('BENCH_OUTPUT_ROOT'),
    },
    base
  );
}

export class ConfigLoader {
  /**
   * Load and validate a YAML config file, merged over `base`
   */
  load(configPath: string, base: RecorderConfig = DEFAULT_RECORDER_CONFIG): RecorderConfig {
    const absolutePath = resolve(process.cwd(), configPath);

    if (!existsSync(absolutePath)) {
      throw new ConfigurationError(`Config file not found: ${absolutePath}`);
    }

    const content = readFileSync(absolutePath, 'utf-8');
    return resolveConfig(this.parse(content, absolutePath), base);
  }

  /**
   * Parse YAML text into validated overrides. An empty document means no overrides.
   */
  parse(content: string, source: string = '<inline>'): ConfigOverrides {
    let raw: unknown;
    try {
      raw = parseYaml(content);
    } catch (error) {
      throw new ConfigurationError(`Invalid YAML in ${source}`, { cause: toError(error) });
    }

    const result = RecorderConfigFileSchema.safeParse(raw ?? {});
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Invalid config in ${source}: ${issues}`, {
        cause: result.error,
      });
    }
    return result.data;
  }
}
