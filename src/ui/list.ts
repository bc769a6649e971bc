/**
 * Filterable List
 *
 * Selection, paging and substring filtering for the memo list, kept apart
 * from blessed so it can be driven directly.
 *
 * Filter states:
 * - unfiltered: all items; '/' starts typing a filter
 * - filtering: keystrokes edit the filter, matches update as you type;
 *   enter applies it, escape drops it
 * - applied: navigation within the matches; '/' resumes editing the filter
 */

import { type KeyInput, printableChar } from './keys';
import type { FilterState, ListDisplay, ListItem } from './types';

export class FilterableList<T extends ListItem> implements ListDisplay<T> {
  private items: T[] = [];
  private state: FilterState = 'unfiltered';
  private filter = '';
  private cursor = 0;
  private size = { width: 0, height: 0 };

  constructor(items: T[] = []) {
    this.items = [...items];
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  get filterState(): FilterState {
    return this.state;
  }

  get filterText(): string {
    return this.filter;
  }

  /** Index of the selection within visibleItems() */
  get index(): number {
    return this.cursor;
  }

  get width(): number {
    return this.size.width;
  }

  get height(): number {
    return this.size.height;
  }

  /** Rows moved by pageup/pagedown */
  get pageSize(): number {
    return Math.max(1, this.size.height);
  }

  allItems(): readonly T[] {
    return this.items;
  }

  /**
   * Items matching the filter, in list order. Matching is a
   * case-insensitive substring test on each item's filterValue.
   */
  visibleItems(): T[] {
    if (this.state === 'unfiltered' || this.filter === '') {
      return this.items;
    }
    const needle = this.filter.toLowerCase();
    return this.items.filter((item) => item.filterValue.toLowerCase().includes(needle));
  }

  selectedItem(): T | undefined {
    return this.visibleItems()[this.cursor];
  }

  // ==========================================================================
  // Mutations
  // ==========================================================================

  /**
   * Replace the items. Any filter stays in force.
   */
  setItems(items: T[]): void {
    this.items = [...items];
    this.clampCursor();
  }

  setFilterText(text: string): void {
    if (text === '') {
      this.resetFilter();
      return;
    }
    this.filter = text;
    this.state = 'applied';
    this.cursor = 0;
  }

  /**
   * Drop the filter, keeping the selected item selected where possible.
   */
  resetFilter(): void {
    const selected = this.selectedItem();
    this.filter = '';
    this.state = 'unfiltered';
    const index = selected ? this.items.indexOf(selected) : -1;
    this.cursor = index === -1 ? 0 : index;
    this.clampCursor();
  }

  setSize(width: number, height: number): void {
    this.size = { width: Math.max(0, width), height: Math.max(0, height) };
  }

  select(index: number): void {
    this.cursor = index;
    this.clampCursor();
  }

  // ==========================================================================
  // Key Handling
  // ==========================================================================

  handleKey(key: KeyInput): void {
    if (this.state === 'filtering') {
      this.handleFilterKey(key);
      return;
    }

    if (this.moveForKey(key.name)) return;

    if (key.name === '/') {
      this.state = 'filtering';
      this.cursor = 0;
      return;
    }

    if (key.name === 'escape' && this.state === 'applied') {
      this.resetFilter();
    }
  }

  private handleFilterKey(key: KeyInput): void {
    switch (key.name) {
      case 'escape':
        this.resetFilter();
        return;
      case 'enter':
        if (this.filter === '') {
          this.resetFilter();
        } else {
          this.state = 'applied';
          this.clampCursor();
        }
        return;
      case 'backspace':
        this.filter = Array.from(this.filter).slice(0, -1).join('');
        this.cursor = 0;
        return;
      case 'up':
      case 'down':
        this.moveForKey(key.name);
        return;
    }

    const ch = printableChar(key);
    if (ch !== undefined) {
      this.filter += ch;
      this.cursor = 0;
    }
  }

  /**
   * @returns true when the key was a navigation key
   */
  private moveForKey(name: string): boolean {
    switch (name) {
      case 'up':
      case 'k':
        this.moveBy(-1);
        return true;
      case 'down':
      case 'j':
        this.moveBy(1);
        return true;
      case 'pageup':
        this.moveBy(-this.pageSize);
        return true;
      case 'pagedown':
        this.moveBy(this.pageSize);
        return true;
      case 'home':
      case 'g':
        this.cursor = 0;
        return true;
      case 'end':
      case 'G':
        this.cursor = this.visibleItems().length - 1;
        this.clampCursor();
        return true;
      default:
        return false;
    }
  }

  private moveBy(delta: number): void {
    this.cursor += delta;
    this.clampCursor();
  }

  private clampCursor(): void {
    const last = this.visibleItems().length - 1;
    this.cursor = Math.max(0, Math.min(this.cursor, last));
  }
}
