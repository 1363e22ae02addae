/**
 * Result-file fixtures for recorder tests
 *
 * Each helper writes benchmark output into a temporary input root laid out as
 * `<root>/<mode>/L<size>/<file>.out`.
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { resolveConfig } from '../../src/config/index.js';
import { resolveRunPath } from '../../src/core/file-locator.js';
import type { Mode, RecorderConfig, RunIdentifier } from '../../src/types/index.js';

export interface Workspace {
  root: string;
  inputRoot: string;
  outputRoot: string;
  cleanup: () => void;
}

export function createWorkspace(): Workspace {
  const root = mkdtempSync(join(tmpdir(), 'bench-recorder-'));
  return {
    root,
    inputRoot: join(root, 'output'),
    outputRoot: join(root, 'data'),
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  };
}

/**
 * Program output as the benchmark binaries print it
 */
export function resultText(seconds: string): string {
  return [
    '-------------------- LCS Serial --------------------',
    'Sequence A: ACGTTGCA',
    'Sequence B: TGCAACGT',
    'LCS length: 4',
    `Total time taken: ${seconds}`,
    '',
  ].join('\n');
}

export function writeRun(inputRoot: string, id: RunIdentifier, content: string): string {
  const path = resolveRunPath(inputRoot, id);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
  return path;
}

/**
 * Write every trial of one configuration with the same content
 */
export function writeConfiguration(
  config: RecorderConfig,
  mode: Mode,
  sequenceLength: number,
  degree: number | undefined,
  content: (run: number) => string
): void {
  for (let run = 1; run <= config.runs; run++) {
    writeRun(config.inputRoot, { mode, sequenceLength, degree, run }, content(run));
  }
}

/**
 * Small matrix rooted in a workspace: sizes 100 and 1000, degrees 1 and 4, 8 runs
 */
export function smallConfig(workspace: Workspace): RecorderConfig {
  return resolveConfig({
    inputRoot: workspace.inputRoot,
    outputRoot: workspace.outputRoot,
    sequenceLengths: [100, 1000],
    runs: 8,
    modes: {
      parallel: { degrees: [1, 4] },
      distributed: { degrees: [1, 4] },
    },
  });
}
