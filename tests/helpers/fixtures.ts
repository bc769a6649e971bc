/**
 * Shared test fixtures
 */

import type { Logger } from '../../src/logging/logger';
import type { Memo } from '../../src/memos/types';

export const DAY = 24 * 60 * 60 * 1000;

export function makeMemo(id: string, content: string, updatedAt: string, deletedAt?: string): Memo {
  const memo: Memo = {
    id,
    content,
    createdAt: new Date(updatedAt),
    updatedAt: new Date(updatedAt),
  };
  if (deletedAt) {
    memo.deletedAt = new Date(deletedAt);
  }
  return memo;
}

export interface LogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  fields?: Record<string, unknown>;
}

/**
 * Logger that keeps every entry for assertions.
 */
export function recordingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    debug(message, fields) {
      entries.push({ level: 'debug', message, fields });
    },
    info(message, fields) {
      entries.push({ level: 'info', message, fields });
    },
    warn(message, fields) {
      entries.push({ level: 'warn', message, fields });
    },
    error(message, fields) {
      entries.push({ level: 'error', message, fields });
    },
  };
}
