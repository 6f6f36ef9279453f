import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  ConnectionError,
  DatasetNotFoundError,
  ExtractionError,
  LoadError,
  PipelineError,
  classifyError,
  describeCause,
  errorCode,
  formatError,
} from '../error-handler';

describe('Error Handler', () => {
  describe('PipelineError subclasses', () => {
    it('should carry kind, name, context and cause', () => {
      const cause = new Error('socket hang up');
      const error = new ExtractionError('Failed to extract', { table: 'Alumni' }, { cause });

      expect(error).toBeInstanceOf(PipelineError);
      expect(error).toBeInstanceOf(Error);
      expect(error.kind).toBe('extraction');
      expect(error.name).toBe('ExtractionError');
      expect(error.context).toEqual({ table: 'Alumni' });
      expect(error.cause).toBe(cause);
    });

    it('should default to an empty context', () => {
      expect(new ConnectionError('no client').context).toEqual({});
    });
  });

  describe('classifyError', () => {
    it('should mark pre-flight and extraction errors as fatal', () => {
      expect(classifyError(new ConfigurationError('missing')).isFatal).toBe(true);
      expect(classifyError(new ConnectionError('no client')).isFatal).toBe(true);
      expect(classifyError(new ExtractionError('no records')).isFatal).toBe(true);
    });

    it('should mark per-table load errors as recoverable', () => {
      expect(classifyError(new LoadError('quota')).kind).toBe('load');
      expect(classifyError(new LoadError('quota')).isFatal).toBe(false);
      expect(classifyError(new DatasetNotFoundError('gone')).kind).toBe('dataset-not-found');
      expect(classifyError(new DatasetNotFoundError('gone')).isFatal).toBe(false);
    });

    it('should classify foreign errors as unknown and fatal', () => {
      expect(classifyError(new TypeError('bad'))).toEqual({
        kind: 'unknown',
        isFatal: true,
        message: 'bad',
        suggestion: 'Review error details and logs',
      });
    });
  });

  describe('formatError', () => {
    it('should include context entries and the cause', () => {
      const error = new LoadError(
        'test-project.alumni_stats.stats_major failed to load.',
        { table: 'test-project.alumni_stats.stats_major' },
        { cause: new Error('quota exceeded') }
      );

      const formatted = formatError(error);

      expect(formatted).toContain('  Category:    load\n');
      expect(formatted).toContain('  Fatal:       No\n');
      expect(formatted).toContain('  table:       test-project.alumni_stats.stats_major\n');
      expect(formatted).toContain('  Cause:       quota exceeded\n');
    });
  });

  describe('describeCause', () => {
    it('should read messages from errors, strings and other values', () => {
      expect(describeCause(new Error('boom'))).toBe('boom');
      expect(describeCause('plain text')).toBe('plain text');
      expect(describeCause(42)).toBe('42');
    });
  });

  describe('errorCode', () => {
    it('should read a numeric or string code', () => {
      expect(errorCode({ code: 404 })).toBe(404);
      expect(errorCode({ code: 'ECONNRESET' })).toBe('ECONNRESET');
    });

    it('should return undefined when there is no usable code', () => {
      expect(errorCode({})).toBeUndefined();
      expect(errorCode(null)).toBeUndefined();
      expect(errorCode({ code: { nested: true } })).toBeUndefined();
    });
  });
});
