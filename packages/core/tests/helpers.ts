import { pino, type Logger } from 'pino';
import type { TaskId } from '../src/types/task.js';

/** Logger that keeps parsed JSON lines in memory */
export function captureLogger(): { logger: Logger; lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino({ level: 'debug' }, {
    write: (msg: string) => { lines.push(JSON.parse(msg)); },
  });
  return { logger, lines };
}

/** Clock that advances one second per call, starting at the given UTC instant */
export function tickingClock(startIso = '2024-01-10T12:00:00.000Z'): () => Date {
  let t = Date.parse(startIso);
  return () => {
    const d = new Date(t);
    t += 1000;
    return d;
  };
}

/** Ids t1, t2, t3, ... */
export function sequentialIds(prefix = 't'): () => TaskId {
  let n = 0;
  return () => `${prefix}${++n}`;
}
