/**
 * Session Events
 *
 * Everything the controller reacts to arrives as one of these: terminal
 * input, viewport changes and the results of background storage work.
 */

import type { MemoData } from '../memos/types';
import type { KeyInput } from '../ui/keys';

export type LoadResult = { ok: true; data: MemoData } | { ok: false; error: Error };

export type SaveResult = { ok: true } | { ok: false; error: Error };

export type AppEvent =
  | { type: 'key'; key: KeyInput }
  | { type: 'resize'; width: number; height: number }
  | { type: 'load-complete'; result: LoadResult }
  | { type: 'save-complete'; result: SaveResult };

export type AppEventType = AppEvent['type'];

/**
 * Coerce a rejection value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
