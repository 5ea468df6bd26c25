/**
 * Parses GitHub-style search filter strings into structured filters.
 * Tokens like `tag:ui quadrant:q1 status:done due:today` are extracted;
 * remaining text becomes the free-text query matched against title and notes.
 *
 * Negation: prefix the value with `!` (e.g. `status:!done`, `tag:!ui`).
 * ID filter: `id:ab` matches task IDs by prefix.
 */

import type { Quadrant } from '../types/quadrant.js';
import { parseQuadrant } from '../classifier/quadrant-classifier.js';

export type StatusFilter = 'done' | 'pending';
export type DueFilter = 'today' | 'overdue' | 'week' | 'month';
export type HasFilter = 'due' | 'tags' | 'notes';

export interface SearchFilters {
  tags: string[];
  quadrant: Quadrant | null;
  status: StatusFilter | null;
  dueFilter: DueFilter | null;
  has: Partial<Record<HasFilter, true>>;
  textQuery: string;

  // Negation filters
  notTags: string[];
  notQuadrant: Quadrant | null;
  notStatus: StatusFilter | null;
  notDueFilter: DueFilter | null;
  notHas: Partial<Record<HasFilter, true>>;

  // ID prefix filter
  idPrefix: string | null;
}

const STATUS_MAP: Record<string, StatusFilter> = {
  done: 'done',
  completed: 'done',
  pending: 'pending',
  open: 'pending',
};

const DUE_VALUES: readonly DueFilter[] = ['today', 'overdue', 'week', 'month'];
export const HAS_VALUES: readonly HasFilter[] = ['due', 'tags', 'notes'];

// prefix:value tokens; the value may be quoted
const TOKEN_RE = /\b(tag|quadrant|q|status|due|has|id):("[^"]*"|[^\s]+)/gi;

export function parseSearchFilters(query: string): SearchFilters {
  const filters: SearchFilters = {
    tags: [],
    quadrant: null,
    status: null,
    dueFilter: null,
    has: {},
    textQuery: '',
    notTags: [],
    notQuadrant: null,
    notStatus: null,
    notDueFilter: null,
    notHas: {},
    idPrefix: null,
  };

  const remaining = query.replace(TOKEN_RE, (token: string, prefix: string, rawValue: string) => {
    const unquoted = rawValue.replace(/^"|"$/g, '');
    const key = prefix.toLowerCase();

    // ID filter takes no negation
    if (key === 'id') {
      filters.idPrefix = unquoted.toLowerCase();
      return '';
    }

    const negated = unquoted.startsWith('!');
    const value = (negated ? unquoted.slice(1) : unquoted).toLowerCase();

    switch (key) {
      case 'tag':
        (negated ? filters.notTags : filters.tags).push(value.replace(/^#/, ''));
        return '';
      case 'q':
      case 'quadrant': {
        const quadrant = parseQuadrant(value);
        if (!quadrant) return token; // Unknown quadrant stays as text
        if (negated) filters.notQuadrant = quadrant;
        else filters.quadrant = quadrant;
        return '';
      }
      case 'status': {
        const status = STATUS_MAP[value];
        if (!status) return token;
        if (negated) filters.notStatus = status;
        else filters.status = status;
        return '';
      }
      case 'due': {
        const due = DUE_VALUES.find(d => d === value);
        if (!due) return token;
        if (negated) filters.notDueFilter = due;
        else filters.dueFilter = due;
        return '';
      }
      case 'has': {
        const has = HAS_VALUES.find(h => h === value);
        if (!has) return token;
        (negated ? filters.notHas : filters.has)[has] = true;
        return '';
      }
      default:
        return token;
    }
  });

  filters.textQuery = remaining.replace(/\s+/g, ' ').trim();
  return filters;
}
