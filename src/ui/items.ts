import { memoDescription, memoTitle } from '../memos/memo';
import type { Memo } from '../memos/types';
import type { ListItem } from './types';

/**
 * A memo as the list presents it.
 */
export interface MemoListItem extends ListItem {
  memo: Memo;
}

export function memoToItem(memo: Memo): MemoListItem {
  return {
    memo,
    title: memoTitle(memo),
    description: memoDescription(memo),
    filterValue: memo.content,
  };
}

export function memosToItems(memos: readonly Memo[]): MemoListItem[] {
  return memos.map(memoToItem);
}
