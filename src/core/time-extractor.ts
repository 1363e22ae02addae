/**
 * Time Extractor
 *
 * Pulls the reported duration out of a benchmark program's free-form output.
 */

import { readFileSync } from 'node:fs';
import { basename } from 'node:path';
import { ExtractionError, toError } from '../errors/index.js';

export const TIME_MARKER = 'Total time taken:';

/**
 * Marker, optional whitespace, then a numeric token. The token may be empty.
 */
const TIME_PATTERN = /Total time taken:\s*(\d*\.?\d*)/;

/**
 * Raw numeric capture following the first marker, or null when the marker is absent.
 * A marker with no digits after it yields `''`.
 */
export function matchTime(text: string): string | null {
  const match = TIME_PATTERN.exec(text);
  return match ? (match[1] ?? '') : null;
}

/**
 * Parse the duration following the first marker in `text`.
 *
 * @param fileName - Reported in the error when nothing usable is found
 * @throws ExtractionError when the marker is missing or carries no digits
 */
export function extractTime(text: string, fileName: string): number {
  const token = matchTime(text);
  if (token === null) {
    throw new ExtractionError(fileName);
  }
  if (!/\d/.test(token)) {
    throw new ExtractionError(fileName, {
      message: `Could not extract execution time for ${fileName}: no numeric value after "${TIME_MARKER}"`,
    });
  }
  return parseFloat(token);
}

/**
 * Read one result file and extract its duration
 *
 * @throws ExtractionError when the file cannot be read or holds no usable duration
 */
export function readTime(path: string): number {
  const fileName = basename(path);
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ExtractionError(fileName, {
      message: `Could not extract execution time for ${fileName}: file not readable at ${path}`,
      cause: toError(error),
    });
  }
  return extractTime(text, fileName);
}
