/**
 * Yellow
 *
 * Keyboard-driven memo manager: a file-backed memo store with soft delete
 * and retention, and the two-mode session controller behind the terminal UI.
 */

export * from './memos';
export * from './config';
export { MemoController, type MemoControllerOptions, type MemoPersistence } from './app/controller';
export type { AppEvent, LoadResult, SaveResult } from './app/events';
export { EventQueue } from './app/queue';
export { createLogger, openLogFile, type LogLevel, type Logger } from './logging/logger';
export { EditorBuffer } from './ui/editor';
export { FilterableList } from './ui/list';
export { memoToItem, memosToItems, type MemoListItem } from './ui/items';
export type { FilterState, ListDisplay, ListItem, TextEditor } from './ui/types';
