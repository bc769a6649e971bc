/**
 * Display Collaborator Types
 *
 * The session controller talks to the screen through these two narrow
 * interfaces, so it can be driven without a terminal.
 */

import type { KeyInput } from './keys';

export type { KeyInput };

// ============================================================================
// List Display
// ============================================================================

/**
 * Anything the list can present.
 */
export interface ListItem {
  title: string;
  description: string;
  /** Text matched against the filter */
  filterValue: string;
}

/**
 * - unfiltered: every item shown
 * - filtering: the user is typing filter text
 * - applied: a filter is set and navigation happens within its matches
 */
export type FilterState = 'unfiltered' | 'filtering' | 'applied';

export interface ListDisplay<T extends ListItem> {
  readonly filterState: FilterState;
  readonly filterText: string;
  setItems(items: T[]): void;
  /** The highlighted item among the visible ones */
  selectedItem(): T | undefined;
  handleKey(key: KeyInput): void;
  /** Set and apply a filter */
  setFilterText(text: string): void;
  resetFilter(): void;
  setSize(width: number, height: number): void;
}

// ============================================================================
// Text Editor
// ============================================================================

export interface TextEditor {
  getValue(): string;
  setValue(value: string): void;
  focus(): void;
  blur(): void;
  readonly focused: boolean;
  handleKey(key: KeyInput): void;
  setSize(width: number, height: number): void;
}
