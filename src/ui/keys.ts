/**
 * Keypress normalization.
 *
 * `name` uses blessed's full key names ('enter', 'escape', 'tab',
 * 'backspace', 'delete', 'up', 'C-c') except for printable keys, which are
 * named by the character they produce ('q', '/', 'G', ' ').
 */

export interface KeyInput {
  name: string;
  /** The character produced, for printable keys */
  ch?: string;
}

/**
 * The subset of blessed's key event that normalization reads.
 */
export interface RawKey {
  name?: string;
  full?: string;
  ctrl?: boolean;
  meta?: boolean;
}

/**
 * Build a KeyInput for a printable character.
 */
export function charKey(ch: string): KeyInput {
  return { name: ch, ch };
}

function isPrintable(ch: string): boolean {
  const first = ch.codePointAt(0);
  return Array.from(ch).length === 1 && first !== undefined && first >= 0x20 && first !== 0x7f;
}

/**
 * The character a key inserts into text, if any.
 */
export function printableChar(key: KeyInput): string | undefined {
  if (key.name === 'space') return ' ';
  if (key.ch === undefined || key.name.startsWith('C-') || key.name.startsWith('M-')) {
    return undefined;
  }
  return isPrintable(key.ch) ? key.ch : undefined;
}

/**
 * Convert a blessed keypress into a KeyInput.
 *
 * blessed reports a carriage return twice, as 'return' and then as 'enter';
 * the 'return' half is dropped so each press is seen once.
 */
export function normalizeKey(ch: string | undefined, key: RawKey | undefined): KeyInput | null {
  if (key?.name === 'return') return null;

  if (ch !== undefined && !key?.ctrl && !key?.meta && isPrintable(ch)) {
    return charKey(ch);
  }

  const name = key?.full ?? key?.name ?? ch;
  if (!name) return null;
  return { name };
}
