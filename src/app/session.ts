/**
 * Interaction Session State
 *
 * Not persisted. The open memo exists only in editing mode and is a
 * detached copy: nothing reaches the collection until it is committed.
 */

import type { Memo } from '../memos/types';

export type SessionMode = 'browsing' | 'editing';

export type EditState =
  | { mode: 'browsing' }
  | {
      mode: 'editing';
      /** Detached copy of the memo being edited, or the draft */
      memo: Memo;
      /** The memo is a draft not yet in the collection */
      isNew: boolean;
    };

/**
 * Filter to put back when returning from the editor.
 */
export interface SavedFilter {
  wasFiltered: boolean;
  text: string;
}

export interface Session {
  edit: EditState;
  savedFilter: SavedFilter;
  viewport: { width: number; height: number };
  /** Load failure shown to the user; the session runs on an empty collection */
  startupError: Error | null;
  /** Whether the initial load has finished, successfully or not */
  loaded: boolean;
  /** A mutation happened before the load finished and still needs saving */
  saveDeferred: boolean;
}

export function createSession(): Session {
  return {
    edit: { mode: 'browsing' },
    savedFilter: { wasFiltered: false, text: '' },
    viewport: { width: 0, height: 0 },
    startupError: null,
    loaded: false,
    saveDeferred: false,
  };
}
