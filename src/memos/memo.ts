/**
 * Memo helpers: identity, derived display fields and ordering.
 */

import type { Memo, MemoData } from './types';

// ============================================================================
// Constants
// ============================================================================

export const TITLE_MAX_LENGTH = 50;
export const EMPTY_MEMO_TITLE = '(empty memo)';

// ============================================================================
// Identity
// ============================================================================

let lastIssuedId = 0n;

/**
 * Generate a memo ID from the wall clock in nanoseconds.
 *
 * Millisecond time is widened with the sub-millisecond part of the
 * high-resolution timer. IDs issued by this process never repeat: a value
 * at or below the previous one is bumped past it.
 */
export function generateMemoId(now: Date = new Date()): string {
  let id = BigInt(now.getTime()) * 1_000_000n + (process.hrtime.bigint() % 1_000_000n);
  if (id <= lastIssuedId) {
    id = lastIssuedId + 1n;
  }
  lastIssuedId = id;
  return id.toString();
}

// ============================================================================
// Display Fields
// ============================================================================

/**
 * Cut a string to `max` characters, appending an ellipsis when shortened.
 */
export function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  if (chars.length <= max) return text;
  return `${chars.slice(0, max).join('')}...`;
}

/**
 * First line of the content, truncated, or a placeholder for empty memos.
 */
export function memoTitle(memo: Pick<Memo, 'content'>): string {
  if (memo.content.length === 0) return EMPTY_MEMO_TITLE;
  const newline = memo.content.indexOf('\n');
  const firstLine = newline === -1 ? memo.content : memo.content.slice(0, newline);
  return truncate(firstLine, TITLE_MAX_LENGTH);
}

export function memoDescription(memo: Pick<Memo, 'updatedAt'>): string {
  return formatTimestamp(memo.updatedAt);
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as `YYYY-MM-DD HH:mm:ss`.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

// ============================================================================
// Ordering & Copies
// ============================================================================

/**
 * Sort in place by last update, newest first.
 */
export function sortNewestFirst(memos: Memo[]): Memo[] {
  return memos.sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime());
}

/**
 * Detached copy; Date fields are cloned so the copy shares nothing.
 */
export function cloneMemo(memo: Memo): Memo {
  const copy: Memo = {
    id: memo.id,
    content: memo.content,
    createdAt: new Date(memo.createdAt.getTime()),
    updatedAt: new Date(memo.updatedAt.getTime()),
  };
  if (memo.deletedAt) {
    copy.deletedAt = new Date(memo.deletedAt.getTime());
  }
  return copy;
}

export function cloneMemoData(data: MemoData): MemoData {
  return {
    active: data.active.map(cloneMemo),
    deleted: data.deleted.map(cloneMemo),
  };
}
