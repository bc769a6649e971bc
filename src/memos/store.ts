/**
 * Memo Store
 *
 * File-backed storage for the memo collection.
 *
 * Key design decisions:
 * - The whole collection is written on every save, never a diff
 * - Writes go to a temp file that is renamed over the target
 * - A missing file is an empty collection, not an error
 * - Deleted memos past the retention window are purged on load, and the
 *   cleaned collection is re-saved in the background
 */

import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { type Logger, describeError, silentLogger } from '../logging/logger';
import { decodeMemoFile, serializeMemoData } from './codec';
import { MemoFileFormatError, MemoStoreError } from './errors';
import { cloneMemoData } from './memo';
import { DEFAULT_RETENTION_MS, type Memo, type MemoData, type MemoStoreConfig } from './types';

// ============================================================================
// Retention
// ============================================================================

/**
 * Whether a deleted memo is still inside the retention window.
 * Memos without a deletion stamp are never retained.
 */
export function isRetained(memo: Memo, now: Date, retentionMs: number): boolean {
  if (!memo.deletedAt) return false;
  return now.getTime() - memo.deletedAt.getTime() <= retentionMs;
}

/**
 * Drop expired entries from `data.deleted` in place.
 *
 * @returns Number of memos purged
 */
export function purgeExpired(data: MemoData, now: Date, retentionMs: number): number {
  const before = data.deleted.length;
  data.deleted = data.deleted.filter((memo) => isRetained(memo, now, retentionMs));
  return before - data.deleted.length;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// ============================================================================
// Memo Store
// ============================================================================

export class MemoStore {
  private readonly storagePath: string;
  private readonly retentionMs: number;
  private readonly now: () => Date;
  private readonly log: Logger;
  private cleanup: Promise<void> | null = null;
  private writeCounter = 0;

  constructor(config: MemoStoreConfig, log: Logger = silentLogger) {
    this.storagePath = config.storagePath;
    this.retentionMs = config.retentionMs ?? DEFAULT_RETENTION_MS;
    this.now = config.now ?? (() => new Date());
    this.log = log;
  }

  get path(): string {
    return this.storagePath;
  }

  /**
   * Read the collection from disk.
   *
   * @throws MemoFileFormatError if the file matches neither layout
   * @throws MemoStoreError if the file exists but cannot be read
   */
  async load(): Promise<MemoData> {
    let content: string;
    try {
      content = await readFile(this.storagePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        this.log.debug('No memo file yet', { path: this.storagePath });
        return { active: [], deleted: [] };
      }
      throw new MemoStoreError(
        `Failed to read memos from ${this.storagePath}: ${describeError(error)}`,
        this.storagePath,
        { cause: error }
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new MemoFileFormatError(this.storagePath, describeError(error), { cause: error });
    }

    const decoded = decodeMemoFile(parsed);
    if (!decoded) {
      throw new MemoFileFormatError(
        this.storagePath,
        'expected {"active": [...], "deleted": [...]} or an array of memos'
      );
    }

    const { data } = decoded;
    if (decoded.layout === 'legacy') {
      this.log.info('Read legacy memo file', { path: this.storagePath, active: data.active.length });
      return data;
    }

    const purged = purgeExpired(data, this.now(), this.retentionMs);
    if (purged > 0) {
      this.scheduleCleanup(data, purged);
    }

    this.log.debug('Loaded memos', {
      active: data.active.length,
      deleted: data.deleted.length,
      purged,
    });
    return data;
  }

  /**
   * Write the full collection. The data is serialized before this returns,
   * so later mutations by the caller do not leak into the write.
   *
   * @throws MemoStoreError on any I/O failure
   */
  async save(data: MemoData): Promise<void> {
    const body = serializeMemoData(data);
    // Unique per write: two saves may be in flight at once
    this.writeCounter += 1;
    const tempPath = `${this.storagePath}.${process.pid}.${this.writeCounter}.tmp`;

    try {
      await mkdir(dirname(this.storagePath), { recursive: true });
      await writeFile(tempPath, body, 'utf-8');
      await rename(tempPath, this.storagePath);
    } catch (error) {
      await unlink(tempPath).catch((cleanupError: unknown) => {
        this.log.debug('Temp file not removed', { tempPath, error: describeError(cleanupError) });
      });
      throw new MemoStoreError(
        `Failed to save memos to ${this.storagePath}: ${describeError(error)}`,
        this.storagePath,
        { cause: error }
      );
    }
  }

  /**
   * Resolves once the background cleanup save, if any, has finished.
   */
  async settled(): Promise<void> {
    if (this.cleanup) {
      await this.cleanup;
    }
  }

  /**
   * Re-save the purged collection without blocking the load. The outcome is
   * only logged; the in-memory purge stands either way.
   */
  private scheduleCleanup(data: MemoData, purged: number): void {
    const snapshot = cloneMemoData(data);
    this.cleanup = this.save(snapshot).then(
      () => {
        this.log.info('Purged expired deleted memos', { purged });
      },
      (error: unknown) => {
        this.log.warn('Failed to save cleaned deleted memos', {
          purged,
          error: describeError(error),
        });
      }
    );
  }
}
