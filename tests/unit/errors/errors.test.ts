import { describe, it, expect } from 'vitest';
import {
  RecorderError,
  ExtractionError,
  ConfigurationError,
  toError,
} from '../../../src/errors/index.js';

describe('Error Classes', () => {
  describe('RecorderError', () => {
    it('should create basic error with required fields', () => {
      const error = new RecorderError('Test error', { code: 'TEST_ERROR' });

      expect(error).toBeInstanceOf(Error);
      expect(error.message).toBe('Test error');
      expect(error.code).toBe('TEST_ERROR');
      expect(error.name).toBe('RecorderError');
      expect(error.cause).toBeUndefined();
    });

    it('should have proper stack trace', () => {
      const error = new RecorderError('Test error', { code: 'TEST_ERROR' });

      expect(error.stack).toBeDefined();
      expect(error.stack).toContain('RecorderError');
    });

    it('should serialize to JSON', () => {
      const error = new RecorderError('Test error', {
        code: 'TEST_ERROR',
        cause: new Error('Original error'),
      });

      const json = error.toJSON();
      expect(json.name).toBe('RecorderError');
      expect(json.message).toBe('Test error');
      expect(json.code).toBe('TEST_ERROR');
      expect(json.cause).toBe('Original error');
    });
  });

  describe('ExtractionError', () => {
    it('should name the file in the default message', () => {
      const error = new ExtractionError('serial-L100-R1.out');

      expect(error).toBeInstanceOf(RecorderError);
      expect(error.name).toBe('ExtractionError');
      expect(error.code).toBe('EXTRACTION_ERROR');
      expect(error.fileName).toBe('serial-L100-R1.out');
      expect(error.message).toBe('Could not extract execution time for serial-L100-R1.out');
    });

    it('should accept a custom message and cause', () => {
      const cause = new Error('ENOENT');
      const error = new ExtractionError('a.out', { message: 'a.out is gone', cause });

      expect(error.message).toBe('a.out is gone');
      expect(error.cause).toBe(cause);
    });

    it('should include the file name in JSON', () => {
      expect(new ExtractionError('a.out').toJSON().fileName).toBe('a.out');
    });
  });

  describe('ConfigurationError', () => {
    it('should default its code', () => {
      const error = new ConfigurationError('bad config');

      expect(error).toBeInstanceOf(RecorderError);
      expect(error.code).toBe('CONFIGURATION_ERROR');
      expect(error.name).toBe('ConfigurationError');
    });
  });

  describe('toError', () => {
    it('should pass errors through and wrap other values', () => {
      const error = new Error('x');
      expect(toError(error)).toBe(error);
      expect(toError('boom').message).toBe('boom');
    });
  });
});
