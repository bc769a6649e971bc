/**
 * Rendering helper tests. These build markup strings only; no screen is
 * created.
 */

import { describe, expect, it } from 'vitest';
import { escapeBlessedMarkup, formatListRow, renderEditorLines } from '../../src/ui/blessed-view';
import { EditorBuffer } from '../../src/ui/editor';
import type { MemoListItem } from '../../src/ui/items';
import { makeMemo } from '../helpers/fixtures';

describe('escapeBlessedMarkup', () => {
  it('escapes both braces without touching the replacements', () => {
    expect(escapeBlessedMarkup('a{b}c')).toBe('a{open}b{close}c');
    expect(escapeBlessedMarkup('}{')).toBe('{close}{open}');
  });
});

describe('formatListRow', () => {
  const item: MemoListItem = {
    memo: makeMemo('1', 'Hi', '2026-01-01T00:00:00Z'),
    title: 'Hi',
    description: '2026-01-01 00:00:00',
    filterValue: 'Hi',
  };

  it('right-aligns the timestamp', () => {
    expect(formatListRow(item, 30)).toBe(
      `Hi${' '.repeat(9)}{gray-fg}2026-01-01 00:00:00{/gray-fg}`
    );
  });

  it('cuts the title when the row is narrow', () => {
    const row = formatListRow({ ...item, title: 'A long title here' }, 27);
    expect(row).toBe(`A long  {gray-fg}2026-01-01 00:00:00{/gray-fg}`);
  });
});

describe('renderEditorLines', () => {
  it('numbers lines and marks the cursor when focused', () => {
    const editor = new EditorBuffer();
    editor.setSize(20, 5);
    editor.setValue('ab\n{c}');
    editor.focus();

    expect(renderEditorLines(editor)).toBe(
      '{gray-fg}  1{/gray-fg} ab\n' +
        '{#FCB53B-fg}  2{/#FCB53B-fg} {open}c{close}{inverse} {/inverse}'
    );
  });

  it('shows no cursor when blurred', () => {
    const editor = new EditorBuffer();
    editor.setSize(20, 5);
    editor.setValue('x');

    expect(renderEditorLines(editor)).toBe('{#FCB53B-fg}  1{/#FCB53B-fg} x');
  });
});
