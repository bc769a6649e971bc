/**
 * Blessed View
 *
 * Draws the controller's state with blessed and turns terminal input into
 * queue events. Holds no state of its own beyond the widgets: everything
 * shown is read back from the list model, the editor buffer and the
 * controller on each render.
 *
 * Layout (browsing):            Layout (editing):
 *   ┌ padding 1/2 ────────┐       ┌ padding 1/2 ────────┐
 *   │ Yellow              │       │ New Memo / Edit Memo│
 *   │ Filter: foo         │       │                     │
 *   │ > title   timestamp │       │  1 text...          │
 *   │   title   timestamp │       │  2                  │
 *   │                     │       │                     │
 *   │ help                │       │ help                │
 *   └─────────────────────┘       └─────────────────────┘
 */

import blessed, { type Widgets } from 'blessed';
import type { MemoController } from '../app/controller';
import type { EditorBuffer } from './editor';
import type { MemoListItem } from './items';
import { normalizeKey } from './keys';
import {
  EDITOR_GUTTER,
  FRAME_HEIGHT,
  FRAME_WIDTH,
  HELP_HEIGHT,
  TITLE_HEIGHT,
} from './layout';
import type { FilterableList } from './list';

// ============================================================================
// Constants
// ============================================================================

const APP_TITLE = 'Yellow';
const PRIMARY = '#FCB53B';
const MUTED = 'gray';
/** Rows above the list items: the app title and the filter line */
const LIST_HEADER_HEIGHT = 2;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Escape curly braces for blessed markup
 * In blessed, {open} = { and {close} = }
 */
export function escapeBlessedMarkup(text: string): string {
  return text.replace(/[{}]/g, (brace) => (brace === '{' ? '{open}' : '{close}'));
}

/**
 * One list row: title on the left, timestamp on the right.
 */
export function formatListRow(item: MemoListItem, width: number): string {
  const gap = 2;
  const titleWidth = Math.max(0, width - item.description.length - gap);
  const title = Array.from(item.title).slice(0, titleWidth).join('');
  const padding = ' '.repeat(Math.max(gap, width - Array.from(title).length - item.description.length));
  return `${escapeBlessedMarkup(title)}${padding}{${MUTED}-fg}${item.description}{/${MUTED}-fg}`;
}

/**
 * Editor lines with a line-number gutter and the cursor shown inverse.
 */
export function renderEditorLines(editor: EditorBuffer): string {
  const rows: string[] = [];
  const first = editor.firstVisibleLine;
  const visible = Math.max(1, editor.height);
  const last = Math.min(editor.lineCount(), first + visible);
  const { row: cursorRow, col: cursorCol } = editor.cursor;

  for (let row = first; row < last; row++) {
    const number = String(row + 1).padStart(EDITOR_GUTTER - 1, ' ');
    const gutterColor = row === cursorRow ? PRIMARY : MUTED;
    const chars = Array.from(editor.lineAt(row));
    let text: string;

    if (row === cursorRow && editor.focused) {
      const before = escapeBlessedMarkup(chars.slice(0, cursorCol).join(''));
      const at = escapeBlessedMarkup(chars[cursorCol] ?? ' ');
      const after = escapeBlessedMarkup(chars.slice(cursorCol + 1).join(''));
      text = `${before}{inverse}${at}{/inverse}${after}`;
    } else {
      text = escapeBlessedMarkup(chars.join(''));
    }

    rows.push(`{${gutterColor}-fg}${number}{/${gutterColor}-fg} ${text}`);
  }

  return rows.join('\n');
}

// ============================================================================
// Blessed View
// ============================================================================

export interface BlessedViewOptions {
  list: FilterableList<MemoListItem>;
  editor: EditorBuffer;
  screen?: Widgets.Screen;
}

export class BlessedView {
  readonly screen: Widgets.Screen;
  private readonly list: FilterableList<MemoListItem>;
  private readonly editor: EditorBuffer;
  private readonly header: Widgets.BoxElement;
  private readonly filterLine: Widgets.BoxElement;
  private readonly listBox: Widgets.ListElement;
  private readonly editorTitle: Widgets.BoxElement;
  private readonly editorBox: Widgets.BoxElement;
  private readonly footer: Widgets.BoxElement;

  constructor(options: BlessedViewOptions) {
    this.list = options.list;
    this.editor = options.editor;
    this.screen =
      options.screen ??
      blessed.screen({
        smartCSR: true,
        title: APP_TITLE,
        fullUnicode: true,
      });

    const left = FRAME_WIDTH / 2;
    const top = FRAME_HEIGHT / 2;

    this.header = blessed.box({
      parent: this.screen,
      top,
      left,
      right: left,
      height: 1,
      tags: true,
      content: `{bold}{${PRIMARY}-fg}${APP_TITLE}{/${PRIMARY}-fg}{/bold}`,
    });

    this.filterLine = blessed.box({
      parent: this.screen,
      top: top + 1,
      left,
      right: left,
      height: 1,
      tags: true,
      content: '',
    });

    this.listBox = blessed.list({
      parent: this.screen,
      top: top + LIST_HEADER_HEIGHT,
      left,
      right: left,
      bottom: top + HELP_HEIGHT,
      tags: true,
      style: {
        selected: { fg: PRIMARY, bold: true },
        item: { fg: 'white' },
      },
      keys: false, // Disabled - the controller handles navigation
      vi: false,
      mouse: false,
      items: [],
    });

    this.editorTitle = blessed.box({
      parent: this.screen,
      top,
      left: left + 2,
      right: left,
      height: 1,
      tags: true,
      hidden: true,
      content: '',
    });

    this.editorBox = blessed.box({
      parent: this.screen,
      top: top + TITLE_HEIGHT,
      left,
      right: left,
      bottom: top + HELP_HEIGHT,
      tags: true,
      hidden: true,
      content: '',
    });

    this.footer = blessed.box({
      parent: this.screen,
      bottom: top,
      left,
      right: left,
      height: 1,
      tags: true,
      style: { fg: MUTED },
      content: '',
    });
  }

  /**
   * Forward keypresses and resizes to the controller.
   */
  attach(controller: MemoController): void {
    this.screen.on('keypress', (ch: string | undefined, key: Widgets.Events.IKeyEventArg) => {
      const input = normalizeKey(ch, key);
      if (input) {
        controller.dispatch({ type: 'key', key: input });
      }
    });

    this.screen.on('resize', () => {
      controller.dispatch({ type: 'resize', ...this.viewport() });
    });

    controller.dispatch({ type: 'resize', ...this.viewport() });
  }

  viewport(): { width: number; height: number } {
    const { width, height } = this.screen;
    return {
      width: typeof width === 'number' ? width : 0,
      height: typeof height === 'number' ? height : 0,
    };
  }

  render(controller: MemoController): void {
    if (controller.mode === 'editing') {
      this.renderEditing(controller);
    } else {
      this.renderBrowsing(controller);
    }

    const error = controller.startupError;
    const status = error ? `{red-fg}${escapeBlessedMarkup(error.message)}{/red-fg}  ` : '';
    this.footer.setContent(`${status}${controller.helpText}`);
    this.screen.render();
  }

  destroy(): void {
    this.screen.destroy();
  }

  private renderBrowsing(controller: MemoController): void {
    this.editorTitle.hide();
    this.editorBox.hide();
    this.header.show();
    this.filterLine.show();
    this.listBox.show();

    const width = this.list.width;
    const items = this.list.visibleItems();
    this.listBox.setItems(items.map((item) => formatListRow(item, width)));
    this.listBox.select(this.list.index);

    switch (this.list.filterState) {
      case 'filtering':
        this.filterLine.setContent(
          `{${PRIMARY}-fg}Filter:{/${PRIMARY}-fg} ${escapeBlessedMarkup(this.list.filterText)}{inverse} {/inverse}`
        );
        break;
      case 'applied':
        this.filterLine.setContent(
          `{${MUTED}-fg}Filter: ${escapeBlessedMarkup(this.list.filterText)} (${items.length} of ${controller.collection.size}){/${MUTED}-fg}`
        );
        break;
      default:
        this.filterLine.setContent(
          items.length === 0 ? `{${MUTED}-fg}No memos{/${MUTED}-fg}` : ''
        );
    }
  }

  private renderEditing(controller: MemoController): void {
    this.header.hide();
    this.filterLine.hide();
    this.listBox.hide();
    this.editorTitle.show();
    this.editorBox.show();

    this.editorTitle.setContent(`{bold}{${PRIMARY}-fg}${controller.title}{/${PRIMARY}-fg}{/bold}`);
    const body = renderEditorLines(this.editor);
    this.editorBox.setContent(
      this.editor.getValue() === '' ? `${body}  {${MUTED}-fg}Start typing ...{/${MUTED}-fg}` : body
    );
  }
}
