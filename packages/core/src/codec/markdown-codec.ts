/**
 * Converts task collections to and from a human-editable Markdown checklist.
 *
 *   # Tasks
 *
 *   ## Do First (1)
 *
 *   - [ ] Ship release (due: 2024-01-01) #work
 *     > notes line
 *
 *   ## Schedule (0)
 *   ...
 *
 * Encoding is deterministic. Decoding is tolerant: unknown lines are
 * skipped, items outside a known section land in Eliminate, and bad due
 * dates are dropped. Only bytes that are not UTF-8 are rejected.
 *
 * The legacy Chinese export is read too: section titles such as
 * "重要且紧急 (共2项)", ✓/□ check marks, and the 描述/标签/截止 detail
 * bullets under each item.
 */

import type { Task, TaskId } from '../types/task.js';
import { Quadrant, QuadrantName, QUADRANT_ORDER } from '../types/quadrant.js';
import { FormatError } from '../errors.js';
import { classify, quadrantFlags, quadrantOf } from '../classifier/quadrant-classifier.js';
import { isIsoDate } from '../parsers/date-parser.js';
import { getLogger, type Logger } from '../logging/logger.js';
import { isValidTag, normalizeTags, normalizeNotes, sortForDisplay } from '../store/task-helpers.js';
import { IdRegistry, generateId, processIds } from '../store/id-registry.js';

const DOCUMENT_TITLE = '# Tasks';

const HEADER_RE = /^\s{0,3}#{1,6}\s+(.*?)\s*#*\s*$/;
const ITEM_RE = /^\s*[-*+]\s+\[([ xX✓□])\](?:\s+(.*))?$/;
const NOTES_RE = /^\s+>\s?(.*)$/;
const TRAILING_TAG_RE = /\s#([\p{L}\p{N}_-]+)$/u;
const TRAILING_DUE_RE = /(?:^|\s)\(due:\s*([^()]*?)\s*\)$/;
/** Trailing "(3)" item count, or any other parenthesized suffix */
const SECTION_COUNT_RE = /\s*\([^()]*\)$/;

/** Legacy item detail line: "  - 描述: ...", "  - 标签: a, b", "  - 截止: yyyy-MM-dd" */
const LEGACY_FIELD_RE = /^\s+[-*+]\s+(描述|标签|截止)\s*[:：]\s*(.*)$/;
const LEGACY_TAG_SEPARATOR_RE = /[,，、]/;

export interface DecodeOptions {
  logger?: Logger;
  /** Timestamp source for createdAt/updatedAt of decoded tasks */
  clock?: () => Date;
  idFactory?: () => TaskId;
  /** Ids already handed out; defaults to the process-wide registry */
  ids?: IdRegistry;
}

// ---------------------------------------------------------------------------
// Encode
// ---------------------------------------------------------------------------

/** Escape characters that would otherwise be read back as markup */
function escapeTitle(title: string): string {
  return title
    .replace(/\\/g, '\\\\')
    .replace(/(^|\s)#/g, '$1\\#')
    .replace(/\(due:/g, '\\(due:');
}

function unescapeTitle(title: string): string {
  return title.replace(/\\([\\#(])/g, '$1');
}

function encodeTask(task: Task): string[] {
  const checkbox = task.completed ? '[x]' : '[ ]';
  const due = task.dueDate ? ` (due: ${task.dueDate})` : '';
  const tags = task.tags.map(t => ` #${t}`).join('');
  const lines = [`- ${checkbox} ${escapeTitle(task.title)}${due}${tags}`];

  if (task.notes) {
    for (const line of task.notes.split('\n')) {
      lines.push(line ? `  > ${line}` : '  >');
    }
  }
  return lines;
}

export function encode(tasks: readonly Task[]): string {
  const blocks = [DOCUMENT_TITLE];

  for (const quadrant of QUADRANT_ORDER) {
    const section = sortForDisplay(tasks.filter(t => quadrantOf(t) === quadrant));
    blocks.push(`## ${QuadrantName[quadrant]} (${section.length})`);
    if (section.length > 0) {
      blocks.push(section.flatMap(encodeTask).join('\n'));
    }
  }

  return blocks.join('\n\n') + '\n';
}

// ---------------------------------------------------------------------------
// Decode
// ---------------------------------------------------------------------------

interface DraftTask {
  title: string;
  quadrant: Quadrant;
  completed: boolean;
  tags: string[];
  dueDate: string | null;
  notes: string[];
}

function toText(input: string | Uint8Array): string {
  if (typeof input === 'string') return input.replace(/^\uFEFF/, '');

  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(input);
  } catch (err: unknown) {
    throw new FormatError('Input is not valid UTF-8 text', { cause: err });
  }
}

/** Legacy titles name the axes by keyword: 重要/不重要 and 紧急/不紧急 */
function legacyHeaderQuadrant(name: string): Quadrant | null {
  if (!name.includes('重要') && !name.includes('紧急')) return null;
  const important = name.includes('重要') && !name.includes('不重要');
  const urgent = name.includes('紧急') && !name.includes('不紧急');
  return classify(urgent, important);
}

/** Section header text to quadrant; null for any other header */
function headerQuadrant(text: string): Quadrant | null {
  const name = text.replace(SECTION_COUNT_RE, '').trim().toLowerCase();
  for (const q of QUADRANT_ORDER) {
    if (name === q || name === QuadrantName[q].toLowerCase()) return q;
  }
  return legacyHeaderQuadrant(name);
}

function applyLegacyField(draft: DraftTask, field: string, value: string, logger: Logger): void {
  switch (field) {
    case '描述':
      if (value) draft.notes.push(value);
      break;
    case '标签':
      for (const raw of value.split(LEGACY_TAG_SEPARATOR_RE)) {
        const tag = raw.trim().replace(/^#/, '');
        if (!tag) continue;
        if (isValidTag(tag)) {
          draft.tags.push(tag);
        } else {
          logger.debug({ tag: raw }, 'dropping invalid tag');
        }
      }
      break;
    case '截止':
      if (isIsoDate(value)) {
        draft.dueDate = value;
      } else {
        logger.debug({ dueDate: value }, 'dropping malformed due date');
      }
      break;
  }
}

function stripTrailingTags(rest: string, tags: string[]): string {
  let remaining = rest;
  let m: RegExpExecArray | null;
  while ((m = TRAILING_TAG_RE.exec(remaining)) !== null) {
    tags.unshift(m[1] ?? '');
    remaining = remaining.slice(0, m.index).trimEnd();
  }
  return remaining;
}

/** Parse the text after the checkbox: title, optional due suffix, trailing tags */
function parseItemText(raw: string, logger: Logger): Pick<DraftTask, 'title' | 'tags' | 'dueDate'> {
  const tags: string[] = [];
  let rest = stripTrailingTags(raw.trimEnd(), tags);
  let dueDate: string | null = null;

  const due = TRAILING_DUE_RE.exec(rest);
  if (due) {
    const candidate = due[1] ?? '';
    if (isIsoDate(candidate)) {
      dueDate = candidate;
    } else {
      logger.debug({ dueDate: candidate }, 'dropping malformed due date');
    }
    rest = stripTrailingTags(rest.slice(0, due.index).trimEnd(), tags);
  }

  return { title: unescapeTitle(rest.trim()), tags, dueDate };
}

function parseLines(text: string, logger: Logger): DraftTask[] {
  const drafts: DraftTask[] = [];
  let quadrant: Quadrant | null = null;
  let last: DraftTask | null = null;

  for (const line of text.split(/\r?\n/)) {
    const notes = last ? NOTES_RE.exec(line) : null;
    if (last && notes) {
      last.notes.push(notes[1] ?? '');
      continue;
    }
    const field = last ? LEGACY_FIELD_RE.exec(line) : null;
    if (last && field) {
      applyLegacyField(last, field[1] ?? '', (field[2] ?? '').trim(), logger);
      continue;
    }
    last = null;

    const header = HEADER_RE.exec(line);
    if (header) {
      quadrant = headerQuadrant(header[1] ?? '');
      continue;
    }

    const item = ITEM_RE.exec(line);
    if (!item) continue;

    const parsed = parseItemText(item[2] ?? '', logger);
    if (!parsed.title) continue;

    last = {
      ...parsed,
      quadrant: quadrant ?? Quadrant.Eliminate,
      completed: item[1] === 'x' || item[1] === 'X' || item[1] === '✓',
      notes: [],
    };
    drafts.push(last);
  }

  return drafts;
}

/**
 * Parse a Markdown document into tasks with fresh ids and timestamps.
 * Throws FormatError only when bytes are not valid UTF-8.
 */
export function decode(input: string | Uint8Array, options: DecodeOptions = {}): Task[] {
  const logger = options.logger ?? getLogger('markdown-codec');
  const text = toText(input);
  const now = (options.clock ?? (() => new Date()))().toISOString();
  const ids = options.ids ?? processIds;

  return parseLines(text, logger).map((draft) => {
    return Object.freeze({
      id: ids.issue(options.idFactory ?? generateId),
      title: draft.title,
      ...quadrantFlags(draft.quadrant),
      tags: normalizeTags(draft.tags),
      dueDate: draft.dueDate,
      notes: normalizeNotes(draft.notes.join('\n')),
      completed: draft.completed,
      createdAt: now,
      updatedAt: now,
    });
  });
}
