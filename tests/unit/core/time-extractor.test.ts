import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { matchTime, extractTime, readTime } from '../../../src/core/time-extractor.js';
import { ExtractionError } from '../../../src/errors/index.js';
import { createWorkspace, resultText, type Workspace } from '../../utils/fixtures.js';

describe('Time Extractor', () => {
  describe('matchTime', () => {
    it('should capture the token after the marker', () => {
      expect(matchTime('Total time taken: 12.5')).toBe('12.5');
    });

    it('should capture an empty token when the marker has no digits', () => {
      expect(matchTime('Total time taken:')).toBe('');
      expect(matchTime('Total time taken:   \nDone')).toBe('');
    });

    it('should return null without the marker', () => {
      expect(matchTime('LCS length: 4')).toBeNull();
    });

    it('should use the first marker only', () => {
      expect(matchTime('Total time taken: 1.5\nTotal time taken: 9.0')).toBe('1.5');
    });

    it('should stop at the first non-numeric character', () => {
      expect(matchTime('Total time taken: 0.004213 seconds')).toBe('0.004213');
    });
  });

  describe('extractTime', () => {
    it('should parse the duration', () => {
      expect(extractTime('Total time taken: 12.5', 'a.out')).toBe(12.5);
    });

    it('should find the marker inside program output', () => {
      expect(extractTime(resultText('0.125000'), 'serial-L100-R1.out')).toBe(0.125);
    });

    it('should accept a marker without whitespace before the number', () => {
      expect(extractTime('Total time taken:3', 'a.out')).toBe(3);
    });

    it('should accept integer and trailing-dot tokens', () => {
      expect(extractTime('Total time taken: 7', 'a.out')).toBe(7);
      expect(extractTime('Total time taken: 7.', 'a.out')).toBe(7);
      expect(extractTime('Total time taken: .5', 'a.out')).toBe(0.5);
    });

    it('should throw ExtractionError naming the file without the marker', () => {
      expect(() => extractTime('nothing here', 'serial-L100-R3.out')).toThrow(ExtractionError);
      expect(() => extractTime('nothing here', 'serial-L100-R3.out')).toThrow(
        'Could not extract execution time for serial-L100-R3.out'
      );
    });

    it('should throw rather than read an empty token as zero', () => {
      expect(() => extractTime('Total time taken:\n', 'serial-L100-R4.out')).toThrow(
        'Could not extract execution time for serial-L100-R4.out: no numeric value after "Total time taken:"'
      );
    });

    it('should throw on a lone decimal point', () => {
      expect(() => extractTime('Total time taken: .', 'a.out')).toThrow(ExtractionError);
    });

    it('should carry the file name on the error', () => {
      expect(() => extractTime('', 'distributed-L1000-P2-R1.out')).toThrow(
        expect.objectContaining({ fileName: 'distributed-L1000-P2-R1.out' })
      );
    });
  });

  describe('readTime', () => {
    let workspace: Workspace;

    beforeEach(() => {
      workspace = createWorkspace();
    });

    afterEach(() => {
      workspace.cleanup();
    });

    it('should read and extract from a file', () => {
      const path = join(workspace.root, 'serial-L100-R1.out');
      writeFileSync(path, resultText('2.0'));

      expect(readTime(path)).toBe(2);
    });

    it('should raise ExtractionError for a missing file', () => {
      const path = join(workspace.root, 'serial-L100-R9.out');

      expect(() => readTime(path)).toThrow(ExtractionError);
      expect(() => readTime(path)).toThrow(
        expect.objectContaining({
          fileName: 'serial-L100-R9.out',
          code: 'EXTRACTION_ERROR',
          message: `Could not extract execution time for serial-L100-R9.out: file not readable at ${path}`,
          cause: expect.any(Error),
        })
      );
    });

    it('should raise ExtractionError for a file without the marker', () => {
      const path = join(workspace.root, 'serial-L100-R2.out');
      writeFileSync(path, 'Segmentation fault\n');

      expect(() => readTime(path)).toThrow('Could not extract execution time for serial-L100-R2.out');
    });
  });
});
