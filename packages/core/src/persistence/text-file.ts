/**
 * File side of Markdown import/export. The codec only works on text;
 * reading and writing happen here.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

/** Raw bytes, so the codec can reject content that is not UTF-8 */
export function readTextFile(path: string): Uint8Array {
  return readFileSync(path);
}

export function writeTextFile(path: string, text: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, text, 'utf8');
}
