/**
 * Memo Controller
 *
 * Two-mode state machine driving the memo session.
 *
 * Browsing: the list has the keyboard. What a key means depends on the
 * list's filter state, which is consulted before anything else:
 * - filtering: every key goes to the list; escape drops the filter
 * - applied: escape drops the filter, enter edits the selected match
 * - unfiltered: q/C-c quit, tab starts a draft, delete/backspace soft-delete
 *   the selection, enter edits it
 * Keys not claimed here go to the list for navigation.
 *
 * Editing: the editor has the keyboard. Escape commits and returns to the
 * list, re-applying any filter that was active when editing began. C-c quits
 * on the spot and the edit is lost.
 *
 * Loads and saves run in the background and come back as events on the same
 * queue, so state only ever changes inside the queue's handler. Saves carry
 * a snapshot taken at dispatch time.
 */

import { type Logger, silentLogger } from '../logging/logger';
import { MemoCollection } from '../memos/collection';
import { cloneMemo } from '../memos/memo';
import type { MemoData } from '../memos/types';
import { type MemoListItem, memosToItems } from '../ui/items';
import type { KeyInput } from '../ui/keys';
import { computeLayout } from '../ui/layout';
import type { ListDisplay, TextEditor } from '../ui/types';
import { type AppEvent, type LoadResult, type SaveResult, toError } from './events';
import { EventQueue } from './queue';
import { type Session, type SessionMode, createSession } from './session';

// ============================================================================
// Types
// ============================================================================

/**
 * The storage operations the controller needs.
 */
export interface MemoPersistence {
  load(): Promise<MemoData>;
  save(data: MemoData): Promise<void>;
}

export interface MemoControllerOptions {
  store: MemoPersistence;
  list: ListDisplay<MemoListItem>;
  editor: TextEditor;
  collection?: MemoCollection;
  log?: Logger;
  /** Called once when the user quits */
  onQuit: (code: number) => void;
  /** Called after every handled event, for redrawing */
  onUpdate?: () => void;
  /** Called if handling an event throws; the controller stops afterwards */
  onFatal?: (error: unknown) => void;
}

// ============================================================================
// Help Text
// ============================================================================

export const HELP_FILTERING = 'Esc: cancel filter';
export const HELP_FILTER_APPLIED = 'Enter: edit • Esc: return to list view';
export const HELP_BROWSING =
  'Tab: new • Enter: edit • Delete: delete • ↑/k up • ↓/j down • / filter • q quit';
export const HELP_BROWSING_EMPTY = 'Tab: new • q quit';
export const HELP_EDITING = 'Esc: save changes';

const QUIT_KEYS = new Set(['q', 'C-c']);
const DELETE_KEYS = new Set(['delete', 'backspace']);

// ============================================================================
// Memo Controller
// ============================================================================

export class MemoController {
  private readonly store: MemoPersistence;
  private readonly list: ListDisplay<MemoListItem>;
  private readonly editor: TextEditor;
  private readonly memos: MemoCollection;
  private readonly log: Logger;
  private readonly onQuit: (code: number) => void;
  private readonly onUpdate: () => void;
  private readonly queue: EventQueue<AppEvent>;
  private readonly session: Session = createSession();
  private readonly inflight = new Set<Promise<void>>();

  constructor(options: MemoControllerOptions) {
    this.store = options.store;
    this.list = options.list;
    this.editor = options.editor;
    this.memos = options.collection ?? new MemoCollection();
    this.log = options.log ?? silentLogger;
    this.onQuit = options.onQuit;
    this.onUpdate = options.onUpdate ?? (() => {});

    const onFatal = options.onFatal;
    this.queue = new EventQueue<AppEvent>((event) => this.handle(event), {
      onError: (error, event) => {
        this.log.error('Event handler failed', {
          event: event.type,
          error: toError(error).message,
        });
        if (onFatal) {
          onFatal(error);
        } else {
          throw error;
        }
      },
    });
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Kick off the initial load. The list stays empty until it completes.
   */
  start(): void {
    this.runInBackground(() =>
      this.store.load().then(
        (data): AppEvent => ({ type: 'load-complete', result: { ok: true, data } }),
        (error: unknown): AppEvent => ({
          type: 'load-complete',
          result: { ok: false, error: toError(error) },
        })
      )
    );
  }

  dispatch(event: AppEvent): void {
    this.queue.push(event);
  }

  /**
   * Resolves once every load and save dispatched so far has been handled.
   */
  async settled(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  // ==========================================================================
  // View State
  // ==========================================================================

  get mode(): SessionMode {
    return this.session.edit.mode;
  }

  get isNewMemo(): boolean {
    return this.session.edit.mode === 'editing' && this.session.edit.isNew;
  }

  get collection(): MemoCollection {
    return this.memos;
  }

  get startupError(): Error | null {
    return this.session.startupError;
  }

  get savedFilter(): Readonly<Session['savedFilter']> {
    return this.session.savedFilter;
  }

  get stopped(): boolean {
    return this.queue.closed;
  }

  get title(): string {
    return this.isNewMemo ? 'New Memo' : 'Edit Memo';
  }

  get helpText(): string {
    if (this.session.edit.mode === 'editing') return HELP_EDITING;

    switch (this.list.filterState) {
      case 'filtering':
        return HELP_FILTERING;
      case 'applied':
        return HELP_FILTER_APPLIED;
      default:
        return this.memos.size > 0 ? HELP_BROWSING : HELP_BROWSING_EMPTY;
    }
  }

  // ==========================================================================
  // Event Handling
  // ==========================================================================

  private handle(event: AppEvent): void {
    switch (event.type) {
      case 'load-complete':
        this.handleLoadComplete(event.result);
        break;
      case 'save-complete':
        this.handleSaveComplete(event.result);
        break;
      case 'resize':
        this.session.viewport = { width: event.width, height: event.height };
        this.resizeComponents();
        break;
      case 'key':
        if (this.session.edit.mode === 'browsing') {
          this.handleListKey(event.key);
        } else {
          this.handleEditKey(event.key);
        }
        break;
    }

    if (!this.queue.closed) {
      this.onUpdate();
    }
  }

  private handleLoadComplete(result: LoadResult): void {
    this.session.loaded = true;

    if (result.ok) {
      this.memos.replace(this.mergeEarlyChanges(result.data));
      this.refreshList();
      this.log.info('Loaded memos', {
        active: this.memos.size,
        deleted: this.memos.deletedMemos.length,
      });
    } else {
      this.session.startupError = result.error;
      this.log.error('Error loading memos', { error: result.error.message });
    }

    if (this.session.saveDeferred) {
      this.session.saveDeferred = false;
      this.persist();
    }
  }

  private handleSaveComplete(result: SaveResult): void {
    if (result.ok) {
      this.log.debug('Saved memos');
    } else {
      this.log.error('Error saving memos', { error: result.error.message });
    }
  }

  private handleListKey(key: KeyInput): void {
    switch (this.list.filterState) {
      case 'filtering':
        if (key.name === 'escape') {
          this.list.resetFilter();
        } else {
          this.list.handleKey(key);
        }
        return;

      case 'applied':
        if (key.name === 'escape') {
          this.list.resetFilter();
        } else if (key.name === 'enter' && this.memos.size > 0) {
          this.editSelected();
        } else {
          this.list.handleKey(key);
        }
        return;

      case 'unfiltered':
        break;
    }

    if (QUIT_KEYS.has(key.name)) {
      this.quit();
      return;
    }
    if (key.name === 'tab') {
      this.createNew();
      return;
    }
    if (DELETE_KEYS.has(key.name) && this.memos.size > 0) {
      this.deleteSelected();
      return;
    }
    if (key.name === 'enter' && this.memos.size > 0) {
      this.editSelected();
      return;
    }

    this.list.handleKey(key);
  }

  private handleEditKey(key: KeyInput): void {
    switch (key.name) {
      case 'escape':
        this.saveAndExit();
        return;
      case 'C-c':
        this.quit();
        return;
      default:
        this.editor.handleKey(key);
    }
  }

  // ==========================================================================
  // Transitions
  // ==========================================================================

  private createNew(): void {
    this.saveFilterState();
    this.session.edit = { mode: 'editing', memo: this.memos.createDraft(), isNew: true };
    this.openEditor('');
  }

  private editSelected(): void {
    const item = this.list.selectedItem();
    if (!item) return;

    this.saveFilterState();
    const memo = cloneMemo(item.memo);
    this.session.edit = { mode: 'editing', memo, isNew: false };
    this.openEditor(memo.content);
  }

  private deleteSelected(): void {
    const item = this.list.selectedItem();
    if (!item) return;

    this.memos.delete(item.memo.id);
    this.refreshList();
    this.persist();
  }

  private saveAndExit(): void {
    const edit = this.session.edit;
    if (edit.mode !== 'editing') return;

    const content = this.editor.getValue();
    if (edit.isNew) {
      this.memos.commitNew(edit.memo, content);
    } else {
      this.memos.commitEdit(edit.memo.id, content);
    }

    this.refreshList();
    this.restoreFilterState();

    this.session.edit = { mode: 'browsing' };
    this.editor.blur();
    this.resizeComponents();
    this.persist();
  }

  private quit(): void {
    this.queue.close();
    this.onQuit(0);
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private openEditor(content: string): void {
    this.editor.setValue(content);
    this.editor.focus();
    this.resizeComponents();
  }

  private saveFilterState(): void {
    if (this.list.filterState === 'applied') {
      this.session.savedFilter = { wasFiltered: true, text: this.list.filterText };
    }
  }

  private restoreFilterState(): void {
    const { wasFiltered, text } = this.session.savedFilter;
    if (wasFiltered && text !== '') {
      this.list.setFilterText(text);
    }
    this.session.savedFilter = { wasFiltered: false, text: '' };
  }

  private refreshList(): void {
    this.list.setItems(memosToItems(this.memos.activeMemos));
  }

  private resizeComponents(): void {
    const layout = computeLayout(this.session.viewport.width, this.session.viewport.height);
    if (!layout) return;

    this.list.setSize(layout.list.width, layout.list.height);
    this.editor.setSize(layout.editor.width, layout.editor.height);
  }

  /**
   * Memos committed before the initial load finished are kept alongside the
   * loaded ones instead of being replaced by them.
   */
  private mergeEarlyChanges(data: MemoData): MemoData {
    if (this.memos.size === 0 && this.memos.deletedMemos.length === 0) {
      return data;
    }

    const early = this.memos.snapshot();
    const known = new Set([...data.active, ...data.deleted].map((memo) => memo.id));
    return {
      active: [...data.active, ...early.active.filter((memo) => !known.has(memo.id))],
      deleted: [...data.deleted, ...early.deleted.filter((memo) => !known.has(memo.id))],
    };
  }

  /**
   * Save the whole collection in the background. Before the initial load has
   * finished the save waits, so it cannot overwrite memos not yet read.
   */
  private persist(): void {
    if (!this.session.loaded) {
      this.session.saveDeferred = true;
      return;
    }

    const snapshot = this.memos.snapshot();
    this.runInBackground(() =>
      this.store.save(snapshot).then(
        (): AppEvent => ({ type: 'save-complete', result: { ok: true } }),
        (error: unknown): AppEvent => ({
          type: 'save-complete',
          result: { ok: false, error: toError(error) },
        })
      )
    );
  }

  /**
   * Run storage work off the event loop and feed its result back in as an
   * event. The task must resolve to an event rather than reject.
   */
  private runInBackground(task: () => Promise<AppEvent>): void {
    const pending: Promise<void> = task()
      .then((event) => {
        this.dispatch(event);
      })
      .finally(() => {
        this.inflight.delete(pending);
      });
    this.inflight.add(pending);
  }
}
