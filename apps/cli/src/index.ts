#!/usr/bin/env node

import { createDb, closeDb, getDefaultDbPath } from '@eisen/core';
import { createContext } from './context.js';
import { createProgram } from './program.js';

const db = createDb(getDefaultDbPath());

try {
  createProgram(createContext(db)).parse();
} finally {
  closeDb(db);
}
