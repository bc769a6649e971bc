/**
 * Memos Module
 *
 * Memo entities, the in-memory collection and file-backed storage with
 * soft delete and a load-time retention sweep.
 *
 * @example
 * ```typescript
 * import { MemoCollection, MemoStore } from 'yellow';
 *
 * const store = new MemoStore({ storagePath: '.yellow.json' });
 * const memos = new MemoCollection(await store.load());
 * memos.commitNew(memos.createDraft(), 'Buy milk');
 * await store.save(memos.snapshot());
 * ```
 */

export { MemoCollection, type MemoCollectionOptions } from './collection';
export { decodeMemo, decodeMemoFile, encodeMemo, encodeMemoFile, serializeMemoData } from './codec';
export { MemoFileFormatError, MemoStoreError } from './errors';
export {
  EMPTY_MEMO_TITLE,
  TITLE_MAX_LENGTH,
  cloneMemo,
  cloneMemoData,
  formatTimestamp,
  generateMemoId,
  memoDescription,
  memoTitle,
  sortNewestFirst,
  truncate,
} from './memo';
export { MemoStore, isRetained, purgeExpired } from './store';
export * from './types';
