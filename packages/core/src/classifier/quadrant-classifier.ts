import { Quadrant, QuadrantName, QUADRANT_ORDER } from '../types/quadrant.js';
import type { Task } from '../types/task.js';

export interface QuadrantFlags {
  readonly urgent: boolean;
  readonly important: boolean;
}

/** Map (urgent, important) to its Eisenhower quadrant */
export function classify(urgent: boolean, important: boolean): Quadrant {
  if (important) return urgent ? Quadrant.DoFirst : Quadrant.Schedule;
  return urgent ? Quadrant.Delegate : Quadrant.Eliminate;
}

export function quadrantOf(task: Pick<Task, 'urgent' | 'important'>): Quadrant {
  return classify(task.urgent, task.important);
}

/** Inverse of classify */
export function quadrantFlags(quadrant: Quadrant): QuadrantFlags {
  switch (quadrant) {
    case Quadrant.DoFirst: return { urgent: true, important: true };
    case Quadrant.Schedule: return { urgent: false, important: true };
    case Quadrant.Delegate: return { urgent: true, important: false };
    case Quadrant.Eliminate: return { urgent: false, important: false };
  }
}

const ALIASES: Record<string, Quadrant> = {
  q1: Quadrant.DoFirst, '1': Quadrant.DoFirst, dofirst: Quadrant.DoFirst, do: Quadrant.DoFirst,
  q2: Quadrant.Schedule, '2': Quadrant.Schedule,
  q3: Quadrant.Delegate, '3': Quadrant.Delegate,
  q4: Quadrant.Eliminate, '4': Quadrant.Eliminate,
};

/**
 * Parse a quadrant from its id ("do-first"), display name ("Do First")
 * or short alias ("q1", "1"). Case-insensitive; null when unknown.
 */
export function parseQuadrant(input: string): Quadrant | null {
  const normalized = input.trim().toLowerCase().replace(/\s+/g, ' ');
  if (!normalized) return null;

  for (const q of QUADRANT_ORDER) {
    if (normalized === q || normalized === QuadrantName[q].toLowerCase()) return q;
  }
  return ALIASES[normalized] ?? null;
}
