/**
 * Memo Types
 *
 * In-memory memo entities use Date timestamps; the on-disk records use
 * snake_case keys with ISO-8601 strings.
 */

// ============================================================================
// Core Types
// ============================================================================

/**
 * A single free-text note.
 */
export interface Memo {
  /** Opaque unique ID derived from the wall clock at creation */
  id: string;
  /** Free text, may be empty or span several lines */
  content: string;
  createdAt: Date;
  updatedAt: Date;
  /** Present only while the memo sits in the deleted collection */
  deletedAt?: Date;
}

/**
 * The full collection as loaded from and saved to disk.
 */
export interface MemoData {
  /** Visible memos, newest first */
  active: Memo[];
  /** Soft-deleted memos awaiting the retention sweep */
  deleted: Memo[];
}

// ============================================================================
// Wire Types
// ============================================================================

/**
 * A memo as written to the backing file.
 */
export interface MemoRecord {
  id: string;
  content: string;
  created_at: string;
  updated_at: string;
  deleted_at?: string;
}

/**
 * Current backing file layout.
 */
export interface MemoFile {
  active: MemoRecord[];
  deleted: MemoRecord[];
}

// ============================================================================
// Configuration
// ============================================================================

export interface MemoStoreConfig {
  /** Path of the backing JSON file */
  storagePath: string;
  /** How long a deleted memo survives before the load-time sweep purges it */
  retentionMs?: number;
  /** Clock override for tests */
  now?: () => Date;
}

export const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_RETENTION_MS = 7 * DAY_MS;
