import { describe, it, expect } from 'vitest';
import { classify, quadrantFlags, quadrantOf, parseQuadrant } from '../../src/classifier/quadrant-classifier.js';
import { Quadrant, QUADRANT_ORDER } from '../../src/types/quadrant.js';

describe('classify', () => {
  it('covers all four flag combinations', () => {
    expect(classify(true, true)).toBe(Quadrant.DoFirst);
    expect(classify(false, true)).toBe(Quadrant.Schedule);
    expect(classify(true, false)).toBe(Quadrant.Delegate);
    expect(classify(false, false)).toBe(Quadrant.Eliminate);
  });

  it('reads flags off a task-shaped object', () => {
    expect(quadrantOf({ urgent: false, important: true })).toBe(Quadrant.Schedule);
  });
});

describe('quadrantFlags', () => {
  it('is the inverse of classify', () => {
    for (const q of QUADRANT_ORDER) {
      const { urgent, important } = quadrantFlags(q);
      expect(classify(urgent, important)).toBe(q);
    }
  });
});

describe('parseQuadrant', () => {
  it('accepts ids and display names', () => {
    expect(parseQuadrant('do-first')).toBe(Quadrant.DoFirst);
    expect(parseQuadrant('Do First')).toBe(Quadrant.DoFirst);
    expect(parseQuadrant('  SCHEDULE ')).toBe(Quadrant.Schedule);
  });

  it('accepts numeric aliases', () => {
    expect(parseQuadrant('q3')).toBe(Quadrant.Delegate);
    expect(parseQuadrant('4')).toBe(Quadrant.Eliminate);
  });

  it('returns null for unknown input', () => {
    expect(parseQuadrant('later')).toBeNull();
    expect(parseQuadrant('')).toBeNull();
  });
});
