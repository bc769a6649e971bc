/**
 * Backing File Codec
 *
 * Converts between in-memory memos and the JSON records on disk.
 *
 * Two layouts are accepted when reading:
 * - current: { "active": [...], "deleted": [...] }
 * - legacy:  a bare array of memos, all of them active
 *
 * Decoding follows the lenient rules the file has always had: a missing
 * content field reads as empty, a missing timestamp as the Unix epoch and a
 * missing collection as an empty one. Values of the wrong type reject the
 * whole layout.
 */

import type { Memo, MemoData, MemoFile, MemoRecord } from './types';

export type DecodedLayout = 'current' | 'legacy';

export interface DecodeResult {
  data: MemoData;
  layout: DecodedLayout;
}

// ============================================================================
// Encoding
// ============================================================================

export function encodeMemo(memo: Memo): MemoRecord {
  const record: MemoRecord = {
    id: memo.id,
    content: memo.content,
    created_at: memo.createdAt.toISOString(),
    updated_at: memo.updatedAt.toISOString(),
  };
  if (memo.deletedAt) {
    record.deleted_at = memo.deletedAt.toISOString();
  }
  return record;
}

export function encodeMemoFile(data: MemoData): MemoFile {
  return {
    active: data.active.map(encodeMemo),
    deleted: data.deleted.map(encodeMemo),
  };
}

/**
 * Serialize to the indented JSON written to disk.
 */
export function serializeMemoData(data: MemoData): string {
  return `${JSON.stringify(encodeMemoFile(data), null, 2)}\n`;
}

// ============================================================================
// Decoding
// ============================================================================

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeTimestamp(value: unknown): Date | null {
  if (value === undefined || value === null) return new Date(0);
  if (typeof value !== 'string') return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

export function decodeMemo(value: unknown): Memo | null {
  if (!isObject(value) || typeof value.id !== 'string') return null;

  const content = value.content ?? '';
  if (typeof content !== 'string') return null;

  const createdAt = decodeTimestamp(value.created_at);
  const updatedAt = decodeTimestamp(value.updated_at);
  if (!createdAt || !updatedAt) return null;

  const memo: Memo = { id: value.id, content, createdAt, updatedAt };

  if (value.deleted_at !== undefined && value.deleted_at !== null) {
    const deletedAt = decodeTimestamp(value.deleted_at);
    if (!deletedAt) return null;
    memo.deletedAt = deletedAt;
  }

  return memo;
}

function decodeMemoList(value: unknown): Memo[] | null {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) return null;

  const memos: Memo[] = [];
  for (const entry of value) {
    const memo = decodeMemo(entry);
    if (!memo) return null;
    memos.push(memo);
  }
  return memos;
}

function decodeCurrent(value: unknown): MemoData | null {
  if (!isObject(value)) return null;
  const active = decodeMemoList(value.active);
  const deleted = decodeMemoList(value.deleted);
  if (!active || !deleted) return null;

  // Active memos never carry a deletion stamp
  for (const memo of active) {
    delete memo.deletedAt;
  }
  return { active, deleted };
}

function decodeLegacy(value: unknown): MemoData | null {
  if (!Array.isArray(value)) return null;
  const active = decodeMemoList(value);
  if (!active) return null;

  for (const memo of active) {
    delete memo.deletedAt;
  }
  return { active, deleted: [] };
}

/**
 * Decode parsed JSON, trying the current layout before the legacy one.
 * Returns null when neither matches.
 */
export function decodeMemoFile(value: unknown): DecodeResult | null {
  const current = decodeCurrent(value);
  if (current) return { data: current, layout: 'current' };

  const legacy = decodeLegacy(value);
  if (legacy) return { data: legacy, layout: 'legacy' };

  return null;
}
