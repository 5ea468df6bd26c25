/**
 * Key-value config storage operations.
 */

import { eq } from 'drizzle-orm';
import type { TodoDb } from '../db.js';
import { config } from '../schema/index.js';

export const CONFIG_KEYS = {
  exportPath: 'export_path',
  hideCompleted: 'hide_completed',
} as const;

export type ConfigKey = (typeof CONFIG_KEYS)[keyof typeof CONFIG_KEYS];

const DEFAULT_EXPORT_PATH = 'tasks.md';

export function isConfigKey(key: string): key is ConfigKey {
  return Object.values(CONFIG_KEYS).some(k => k === key);
}

/** Get a config value by key */
export function getConfig(db: TodoDb, key: string): string | null {
  const row = db.select({ value: config.value }).from(config).where(eq(config.key, key)).get();
  return row?.value ?? null;
}

/** Set a config value */
export function setConfig(db: TodoDb, key: string, value: string): void {
  db.insert(config).values({ key, value }).onConflictDoUpdate({ target: config.key, set: { value } }).run();
}

/** Markdown export target when none is given */
export function getExportPath(db: TodoDb): string {
  return getConfig(db, CONFIG_KEYS.exportPath) ?? DEFAULT_EXPORT_PATH;
}

export function setExportPath(db: TodoDb, path: string): void {
  setConfig(db, CONFIG_KEYS.exportPath, path);
}

/** Whether `list` hides completed tasks by default */
export function getHideCompleted(db: TodoDb): boolean {
  const value = getConfig(db, CONFIG_KEYS.hideCompleted);
  return value === 'true' || value === '1';
}

export function setHideCompleted(db: TodoDb, hide: boolean): void {
  setConfig(db, CONFIG_KEYS.hideCompleted, hide ? 'true' : 'false');
}
