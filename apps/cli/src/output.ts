/**
 * chalk-based output formatting.
 */

import chalk from 'chalk';
import type { Task } from '@eisen/core';
import { Quadrant, QuadrantName } from '@eisen/core';

// --- Tag colors (deterministic from tag name) ---

const TAG_COLORS = [
  chalk.cyan, chalk.magenta, chalk.blue, chalk.yellow,
  chalk.green, chalk.red, chalk.white, chalk.gray,
];

export function tagColor(tag: string): (s: string) => string {
  let hash = 0;
  for (let i = 0; i < tag.length; i++) {
    hash = ((hash << 5) - hash + tag.charCodeAt(i)) | 0;
  }
  return TAG_COLORS[Math.abs(hash) % TAG_COLORS.length] ?? chalk.white;
}

const QUADRANT_COLORS: Record<Quadrant, (s: string) => string> = {
  [Quadrant.DoFirst]: chalk.red.bold,
  [Quadrant.Schedule]: chalk.blue.bold,
  [Quadrant.Delegate]: chalk.yellow.bold,
  [Quadrant.Eliminate]: chalk.gray.bold,
};

// --- Formatting functions ---

export function formatCheckbox(completed: boolean): string {
  return completed ? chalk.green('[x]') : chalk.gray('[ ]');
}

export function formatQuadrantHeader(quadrant: Quadrant, count: number): string {
  return QUADRANT_COLORS[quadrant](`${QuadrantName[quadrant]} (${count})`);
}

/** Due label relative to today, e.g. "  OVERDUE (2d)" or "  Due: Tomorrow" */
export function formatDueDate(dueDate: string | null, completed: boolean, today: Date): string {
  if (!dueDate) return '';

  const [y = 0, m = 1, d = 1] = dueDate.split('-').map(Number);
  const dueD = new Date(y, m - 1, d);

  if (completed) return chalk.dim(`  Due: ${formatMonthDay(dueD)}`);

  const todayD = new Date(today.getFullYear(), today.getMonth(), today.getDate());
  const diff = Math.round((dueD.getTime() - todayD.getTime()) / 86400000);

  if (diff < 0) return chalk.red(`  OVERDUE (${-diff}d)`);
  if (diff === 0) return chalk.yellow('  Due: Today');
  if (diff === 1) return chalk.dim('  Due: Tomorrow');
  if (diff < 7) return chalk.dim(`  Due: ${dueD.toLocaleDateString('en-US', { weekday: 'long' })}`);
  return chalk.dim(`  Due: ${formatMonthDay(dueD)}`);
}

function formatMonthDay(d: Date): string {
  return d.toLocaleDateString('en-US', { month: 'short', day: 'numeric' });
}

export function formatTags(tags: readonly string[]): string {
  if (tags.length === 0) return '';
  return '  ' + tags.map(t => tagColor(t)(`#${t}`)).join(' ');
}

/** One task: id, checkbox, title, due label, tags; notes on indented lines */
export function formatTask(task: Task, today: Date): string {
  const indent = '       '; // id(4) + parens + space
  const taskId = chalk.dim(`(${task.id})`);
  const title = task.completed ? chalk.strikethrough.dim(task.title) : chalk.bold(task.title);
  const due = formatDueDate(task.dueDate, task.completed, today);
  const notes = task.notes
    ? task.notes.split('\n').map(l => `\n${indent}${chalk.dim(l)}`).join('')
    : '';

  return `${taskId} ${formatCheckbox(task.completed)} ${title}${due}${formatTags(task.tags)}${notes}`;
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}
