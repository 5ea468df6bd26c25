/**
 * CLI helpers: argument parsing and error handling.
 */

import type { Quadrant } from '@eisen/core';
import { ValidationError, parseQuadrant } from '@eisen/core';
import * as out from './output.js';

/**
 * Parse a quadrant argument (q1-q4, 1-4, do-first, "Do First", ...).
 */
export function parseQuadrantArg(input: string): Quadrant {
  const quadrant = parseQuadrant(input);
  if (!quadrant) {
    throw new ValidationError(`Unknown quadrant '${input}'. Use q1-q4, do-first, schedule, delegate or eliminate`);
  }
  return quadrant;
}

/** Notes argument; "clear" removes them */
export function parseNotesArg(input: string): string | null {
  return input.trim().toLowerCase() === 'clear' ? null : input;
}

/**
 * Wrap a command action with error handling: print the message and
 * exit non-zero.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}

/** Apply fn to each id, reporting failures per id. Returns how many succeeded. */
export function forEachId(ids: string[], fn: (id: string) => void): number {
  let done = 0;
  for (const id of ids) {
    $try(() => {
      fn(id);
      done++;
    });
  }
  return done;
}
