import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTestDb, closeDb, type TodoDb } from '../../src/db.js';
import {
  CONFIG_KEYS,
  isConfigKey,
  getConfig,
  setConfig,
  getExportPath,
  setExportPath,
  getHideCompleted,
  setHideCompleted,
} from '../../src/queries/config-queries.js';

let db: TodoDb;

beforeEach(() => {
  db = createTestDb();
});

afterEach(() => {
  closeDb(db);
});

describe('getConfig / setConfig', () => {
  it('returns null for an unset key', () => {
    expect(getConfig(db, 'missing')).toBeNull();
  });

  it('stores and overwrites values', () => {
    setConfig(db, 'theme', 'dark');
    setConfig(db, 'theme', 'light');
    expect(getConfig(db, 'theme')).toBe('light');
  });
});

describe('isConfigKey', () => {
  it('accepts only known keys', () => {
    expect(isConfigKey(CONFIG_KEYS.exportPath)).toBe(true);
    expect(isConfigKey('hide_completed')).toBe(true);
    expect(isConfigKey('exportPath')).toBe(false);
  });
});

describe('export path', () => {
  it('defaults to tasks.md', () => {
    expect(getExportPath(db)).toBe('tasks.md');
  });

  it('reads back what was set', () => {
    setExportPath(db, 'notes/todo.md');
    expect(getExportPath(db)).toBe('notes/todo.md');
  });
});

describe('hide completed', () => {
  it('defaults to false', () => {
    expect(getHideCompleted(db)).toBe(false);
  });

  it('round-trips the flag', () => {
    setHideCompleted(db, true);
    expect(getHideCompleted(db)).toBe(true);
    setHideCompleted(db, false);
    expect(getHideCompleted(db)).toBe(false);
  });

  it('accepts 1 as true', () => {
    setConfig(db, CONFIG_KEYS.hideCompleted, '1');
    expect(getHideCompleted(db)).toBe(true);
  });
});
