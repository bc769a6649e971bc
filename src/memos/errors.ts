/**
 * Memo storage errors.
 */

/**
 * Thrown when the backing file cannot be read or written.
 */
export class MemoStoreError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MemoStoreError';
    this.path = path;
  }
}

/**
 * Thrown when the backing file matches neither the current nor the legacy layout.
 */
export class MemoFileFormatError extends MemoStoreError {
  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super(`Unreadable memo file "${path}": ${reason}`, path, options);
    this.name = 'MemoFileFormatError';
  }
}
