import { describe, it, expect } from 'vitest';
import { jobId, isJobId, slugify } from '../identifiers';

describe('@simbatch/core - identifiers', () => {
  describe('jobId', () => {
    it('should accept letters, digits, dots, underscores and dashes', () => {
      expect(jobId('___.c_cse101-fall_vs_cse101-spring_part0')).toBe('___.c_cse101-fall_vs_cse101-spring_part0');
    });

    it('should reject path separators and whitespace', () => {
      expect(() => jobId('a/b')).toThrow(TypeError);
      expect(() => jobId('a b')).toThrow(TypeError);
      expect(() => jobId('')).toThrow(TypeError);
    });

    it('should reject the relative directory names', () => {
      expect(isJobId('.')).toBe(false);
      expect(isJobId('..')).toBe(false);
    });

    it('should reject ids that JSON objects would reorder or hide', () => {
      expect(isJobId('10')).toBe(false);
      expect(isJobId('2')).toBe(false);
      expect(isJobId('__proto__')).toBe(false);
      expect(() => jobId('10')).toThrow(TypeError);
    });

    it('should accept ids that mix digits with other characters', () => {
      expect(isJobId('10a')).toBe(true);
      expect(isJobId('2.c')).toBe(true);
      expect(isJobId('_proto_')).toBe(true);
    });
  });

  describe('slugify', () => {
    it('should replace glob and path characters with underscores', () => {
      expect(slugify('*/*.c')).toBe('___.c');
      expect(slugify('*/*.cc')).toBe('___.cc');
    });

    it('should keep safe characters untouched', () => {
      expect(slugify('cse101-fall_2023')).toBe('cse101-fall_2023');
    });

    it('should never produce an empty or relative segment', () => {
      expect(slugify('')).toBe('_');
      expect(slugify('..')).toBe('__');
    });

    it('should produce valid job ids', () => {
      for (const text of ['*/*.py', 'team 1', '..', '', 'ünïcode']) {
        expect(isJobId(slugify(text))).toBe(true);
      }
    });
  });
});
