/**
 * File Locator
 *
 * Maps a run identifier to the path of its result file. Pure string construction;
 * nothing here touches the filesystem.
 */

import type { DegreeMode, Mode, RecorderConfig, RunIdentifier } from '../types/index.js';

/**
 * Prefix of the degree segment in result file names
 */
export const DEGREE_MARKERS: Readonly<Record<DegreeMode, string>> = {
  parallel: 'T',
  distributed: 'P',
};

export function hasDegree(mode: Mode): mode is DegreeMode {
  return mode !== 'serial';
}

/**
 * `<mode>-L<size>`, shared by result files and summaries
 */
export function configurationStem(mode: Mode, sequenceLength: number): string {
  return `${mode}-L${sequenceLength}`;
}

/**
 * `<mode>/L<size>`, relative to the input or output root
 */
export function configurationDir(mode: Mode, sequenceLength: number): string {
  return `${mode}/L${sequenceLength}`;
}

/**
 * File name of one trial, e.g. `distributed-L1000-P4-R3.out`
 */
export function runFileName(id: RunIdentifier): string {
  let degreeSegment = '';
  if (hasDegree(id.mode)) {
    if (id.degree === undefined) {
      throw new TypeError(`${id.mode} runs require a degree`);
    }
    degreeSegment = `-${DEGREE_MARKERS[id.mode]}${id.degree}`;
  }
  return `${configurationStem(id.mode, id.sequenceLength)}${degreeSegment}-R${id.run}.out`;
}

/**
 * `<inputRoot>/<mode>/L<size>/<file name>`
 */
export function resolveRunPath(inputRoot: string, id: RunIdentifier): string {
  return `${inputRoot}/${configurationDir(id.mode, id.sequenceLength)}/${runFileName(id)}`;
}

/**
 * `<outputRoot>/<mode>/L<size>/<mode>-L<size>.csv`
 */
export function summaryPath(outputRoot: string, mode: Mode, sequenceLength: number): string {
  const stem = configurationStem(mode, sequenceLength);
  return `${outputRoot}/${configurationDir(mode, sequenceLength)}/${stem}.csv`;
}

/**
 * Degrees swept for a mode; serial yields a single `undefined` slot
 */
export function degreesFor(config: RecorderConfig, mode: Mode): ReadonlyArray<number | undefined> {
  return hasDegree(mode) ? config.modes[mode].degrees : [undefined];
}

/**
 * Every run of one mode in processing order: size, then degree, then trial
 */
export function enumerateRuns(config: RecorderConfig, mode: Mode): RunIdentifier[] {
  const ids: RunIdentifier[] = [];
  for (const sequenceLength of config.sequenceLengths) {
    for (const degree of degreesFor(config, mode)) {
      for (let run = 1; run <= config.runs; run++) {
        ids.push(
          degree === undefined ? { mode, sequenceLength, run } : { mode, sequenceLength, degree, run }
        );
      }
    }
  }
  return ids;
}
