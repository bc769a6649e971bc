/**
 * Editor Buffer
 *
 * Multi-line text with a cursor. Keys are applied only while focused.
 */

import { type KeyInput, printableChar } from './keys';
import type { TextEditor } from './types';

export interface CursorPosition {
  row: number;
  col: number;
}

export class EditorBuffer implements TextEditor {
  private lines: string[][] = [[]];
  private row = 0;
  private col = 0;
  private hasFocus = false;
  private size = { width: 80, height: 0 };
  private scrollTop = 0;

  // ==========================================================================
  // TextEditor
  // ==========================================================================

  getValue(): string {
    return this.lines.map((line) => line.join('')).join('\n');
  }

  /**
   * Replace the text and put the cursor at its end.
   */
  setValue(value: string): void {
    this.lines = value.split('\n').map((line) => Array.from(line));
    this.row = this.lines.length - 1;
    this.col = this.currentLine().length;
    this.scrollTop = 0;
    this.scrollToCursor();
  }

  focus(): void {
    this.hasFocus = true;
  }

  blur(): void {
    this.hasFocus = false;
  }

  get focused(): boolean {
    return this.hasFocus;
  }

  setSize(width: number, height: number): void {
    this.size = { width: Math.max(0, width), height: Math.max(0, height) };
    this.scrollToCursor();
  }

  handleKey(key: KeyInput): void {
    if (!this.hasFocus) return;

    switch (key.name) {
      case 'enter':
      case 'linefeed':
      case 'C-j':
        this.insertNewline();
        break;
      case 'backspace':
        this.deleteBackward();
        break;
      case 'delete':
        this.deleteForward();
        break;
      case 'left':
        this.moveLeft();
        break;
      case 'right':
        this.moveRight();
        break;
      case 'up':
        this.moveVertical(-1);
        break;
      case 'down':
        this.moveVertical(1);
        break;
      case 'home':
      case 'C-a':
        this.col = 0;
        break;
      case 'end':
      case 'C-e':
        this.col = this.currentLine().length;
        break;
      default: {
        const ch = printableChar(key);
        if (ch !== undefined) {
          this.currentLine().splice(this.col, 0, ch);
          this.col += 1;
        }
      }
    }

    this.scrollToCursor();
  }

  // ==========================================================================
  // Rendering Support
  // ==========================================================================

  get cursor(): CursorPosition {
    return { row: this.row, col: this.col };
  }

  get width(): number {
    return this.size.width;
  }

  get height(): number {
    return this.size.height;
  }

  /** First line shown when the buffer is taller than the editor */
  get firstVisibleLine(): number {
    return this.scrollTop;
  }

  lineCount(): number {
    return this.lines.length;
  }

  lineAt(row: number): string {
    return (this.lines[row] ?? []).join('');
  }

  // ==========================================================================
  // Editing
  // ==========================================================================

  private currentLine(): string[] {
    let line = this.lines[this.row];
    if (!line) {
      line = [];
      this.lines[this.row] = line;
    }
    return line;
  }

  private insertNewline(): void {
    const line = this.currentLine();
    const rest = line.splice(this.col);
    this.lines.splice(this.row + 1, 0, rest);
    this.row += 1;
    this.col = 0;
  }

  private deleteBackward(): void {
    if (this.col > 0) {
      this.currentLine().splice(this.col - 1, 1);
      this.col -= 1;
      return;
    }
    if (this.row === 0) return;

    const line = this.currentLine();
    this.lines.splice(this.row, 1);
    this.row -= 1;
    const previous = this.currentLine();
    this.col = previous.length;
    previous.push(...line);
  }

  private deleteForward(): void {
    const line = this.currentLine();
    if (this.col < line.length) {
      line.splice(this.col, 1);
      return;
    }
    const next = this.lines[this.row + 1];
    if (next) {
      line.push(...next);
      this.lines.splice(this.row + 1, 1);
    }
  }

  private moveLeft(): void {
    if (this.col > 0) {
      this.col -= 1;
    } else if (this.row > 0) {
      this.row -= 1;
      this.col = this.currentLine().length;
    }
  }

  private moveRight(): void {
    if (this.col < this.currentLine().length) {
      this.col += 1;
    } else if (this.row < this.lines.length - 1) {
      this.row += 1;
      this.col = 0;
    }
  }

  private moveVertical(delta: number): void {
    const target = this.row + delta;
    if (target < 0 || target >= this.lines.length) return;
    this.row = target;
    this.col = Math.min(this.col, this.currentLine().length);
  }

  private scrollToCursor(): void {
    const visible = Math.max(1, this.size.height);
    if (this.row < this.scrollTop) {
      this.scrollTop = this.row;
    } else if (this.row >= this.scrollTop + visible) {
      this.scrollTop = this.row - visible + 1;
    }
  }
}
