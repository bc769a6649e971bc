/**
 * Memo Collection
 *
 * The in-memory active and deleted sets and the operations that move a memo
 * through its lifecycle: draft → active → deleted. Purging happens only in
 * the store's load-time sweep.
 *
 * Every mutation re-sorts the active set newest first. Unknown IDs are
 * no-ops rather than errors: an edit can outlive the memo it was opened on.
 */

import { cloneMemoData, generateMemoId, sortNewestFirst } from './memo';
import type { Memo, MemoData } from './types';

export interface MemoCollectionOptions {
  now?: () => Date;
  generateId?: (now: Date) => string;
}

export class MemoCollection {
  private active: Memo[] = [];
  private deleted: Memo[] = [];
  private readonly now: () => Date;
  private readonly generateId: (now: Date) => string;

  constructor(data?: MemoData, options: MemoCollectionOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? generateMemoId;
    if (data) {
      this.replace(data);
    }
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  /** Active memos, newest first */
  get activeMemos(): readonly Memo[] {
    return this.active;
  }

  get deletedMemos(): readonly Memo[] {
    return this.deleted;
  }

  /** Number of active memos */
  get size(): number {
    return this.active.length;
  }

  find(id: string): Memo | undefined {
    return this.active.find((memo) => memo.id === id);
  }

  /**
   * Deep copy for handing to background I/O.
   */
  snapshot(): MemoData {
    return cloneMemoData({ active: this.active, deleted: this.deleted });
  }

  /**
   * Swap in a freshly loaded collection.
   */
  replace(data: MemoData): void {
    this.active = [...data.active];
    this.deleted = [...data.deleted];
    sortNewestFirst(this.active);
  }

  // ==========================================================================
  // Lifecycle Operations
  // ==========================================================================

  /**
   * A new, empty memo that is not yet part of the collection.
   */
  createDraft(): Memo {
    const now = this.now();
    return {
      id: this.generateId(now),
      content: '',
      createdAt: now,
      updatedAt: new Date(now.getTime()),
    };
  }

  /**
   * Add a draft with its final content. Blank content discards the draft.
   *
   * @returns The committed memo, or undefined when discarded
   */
  commitNew(draft: Memo, content: string): Memo | undefined {
    if (content.trim() === '') return undefined;

    const memo: Memo = {
      id: draft.id,
      content,
      createdAt: draft.createdAt,
      updatedAt: this.now(),
    };
    this.active.push(memo);
    sortNewestFirst(this.active);
    return memo;
  }

  /**
   * Replace the content of an active memo.
   *
   * @returns The updated memo, or undefined when the ID is unknown
   */
  commitEdit(id: string, content: string): Memo | undefined {
    const memo = this.find(id);
    if (memo) {
      memo.content = content;
      memo.updatedAt = this.now();
    }
    sortNewestFirst(this.active);
    return memo;
  }

  /**
   * Soft-delete: stamp the memo and move it to the deleted set.
   *
   * @returns The deleted memo, or undefined when the ID is unknown
   */
  delete(id: string): Memo | undefined {
    const index = this.active.findIndex((memo) => memo.id === id);
    if (index === -1) return undefined;

    const [memo] = this.active.splice(index, 1);
    if (memo) {
      memo.deletedAt = this.now();
      this.deleted.push(memo);
    }
    sortNewestFirst(this.active);
    return memo;
  }
}
