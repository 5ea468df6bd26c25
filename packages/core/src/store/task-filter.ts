/**
 * Evaluates parsed search filters against in-memory tasks.
 */

import type { Task } from '../types/task.js';
import type { DueFilter, HasFilter, SearchFilters } from '../parsers/search-filter-parser.js';
import { HAS_VALUES } from '../parsers/search-filter-parser.js';
import { quadrantOf } from '../classifier/quadrant-classifier.js';
import { addDays, formatDate } from '../parsers/date-parser.js';

function matchesDue(task: Task, filter: DueFilter, today: Date): boolean {
  if (task.dueDate === null) return false;
  const todayStr = formatDate(today);

  switch (filter) {
    case 'today': return task.dueDate === todayStr;
    case 'overdue': return task.dueDate < todayStr;
    case 'week': return task.dueDate >= todayStr && task.dueDate <= formatDate(addDays(today, 7));
    case 'month': return task.dueDate >= todayStr && task.dueDate <= formatDate(addDays(today, 30));
  }
}

function hasField(task: Task, field: HasFilter): boolean {
  switch (field) {
    case 'due': return task.dueDate !== null;
    case 'tags': return task.tags.length > 0;
    case 'notes': return task.notes !== null;
  }
}

function hasEvery(task: Task, fields: SearchFilters['has'], expected: boolean): boolean {
  return HAS_VALUES.every(field => !fields[field] || hasField(task, field) === expected);
}

/** True when the task satisfies every filter (AND semantics) */
export function matchesFilters(task: Task, filters: SearchFilters, today: Date = new Date()): boolean {
  if (filters.idPrefix && !task.id.startsWith(filters.idPrefix)) return false;

  const quadrant = quadrantOf(task);
  if (filters.quadrant && quadrant !== filters.quadrant) return false;
  if (filters.notQuadrant && quadrant === filters.notQuadrant) return false;

  const status = task.completed ? 'done' : 'pending';
  if (filters.status && status !== filters.status) return false;
  if (filters.notStatus && status === filters.notStatus) return false;

  const lowerTags = task.tags.map(t => t.toLowerCase());
  if (!filters.tags.every(t => lowerTags.includes(t))) return false;
  if (filters.notTags.some(t => lowerTags.includes(t))) return false;

  if (filters.dueFilter && !matchesDue(task, filters.dueFilter, today)) return false;
  if (filters.notDueFilter && matchesDue(task, filters.notDueFilter, today)) return false;

  if (!hasEvery(task, filters.has, true)) return false;
  if (!hasEvery(task, filters.notHas, false)) return false;

  if (filters.textQuery) {
    const needle = filters.textQuery.toLowerCase();
    const haystack = `${task.title}\n${task.notes ?? ''}`.toLowerCase();
    if (!haystack.includes(needle)) return false;
  }

  return true;
}
