import { describe, it, expect, vi, afterEach } from 'vitest';
import { Quadrant, ValidationError } from '@eisen/core';
import {
  parseQuadrantArg,
  parseNotesArg,
  $try,
  forEachId,
} from '../src/helpers.js';

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

describe('parseQuadrantArg', () => {
  it('accepts ids, names and aliases', () => {
    expect(parseQuadrantArg('q1')).toBe(Quadrant.DoFirst);
    expect(parseQuadrantArg('Schedule')).toBe(Quadrant.Schedule);
    expect(parseQuadrantArg('3')).toBe(Quadrant.Delegate);
    expect(parseQuadrantArg('eliminate')).toBe(Quadrant.Eliminate);
  });

  it('throws ValidationError for unknown input', () => {
    expect(() => parseQuadrantArg('q5')).toThrow(ValidationError);
  });
});

describe('parseNotesArg', () => {
  it('keeps text and maps clear to null', () => {
    expect(parseNotesArg('bring ID')).toBe('bring ID');
    expect(parseNotesArg('CLEAR')).toBeNull();
  });
});

describe('$try', () => {
  it('calls the wrapped function', () => {
    const fn = vi.fn();
    $try(fn);
    expect(fn).toHaveBeenCalledOnce();
    expect(process.exitCode).toBeUndefined();
  });

  it('prints the error message and sets the exit code', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    $try(() => {
      throw new ValidationError('bad input');
    });
    expect(consoleSpy).toHaveBeenCalledOnce();
    expect(String(consoleSpy.mock.calls[0]?.[0])).toContain('bad input');
    expect(process.exitCode).toBe(1);
  });
});

describe('forEachId', () => {
  it('continues past failures and counts successes', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const seen: string[] = [];

    const done = forEachId(['a', 'b', 'c'], (id) => {
      if (id === 'b') throw new ValidationError('no b');
      seen.push(id);
    });

    expect(done).toBe(2);
    expect(seen).toEqual(['a', 'c']);
    expect(process.exitCode).toBe(1);
  });
});
