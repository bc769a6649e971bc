/**
 * Structured logger tests
 */

import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createLogger, describeError, isLogLevel, openLogFile } from '../../src/logging/logger';

const FIXED = () => new Date('2026-01-02T03:04:05.000Z');

describe('createLogger', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'yellow-log-'));
    file = join(dir, 'yellow.log');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('writes formatted lines with fields', () => {
    const log = createLogger('store', { file, now: FIXED });
    log.info('Loaded memos', { active: 2, skipped: undefined, missing: null });
    log.error('Save failed');

    expect(readFileSync(file, 'utf-8')).toBe(
      '[03:04:05] [INFO ] [store] Loaded memos {"active":2}\n' +
        '[03:04:05] [ERROR] [store] Save failed\n'
    );
  });

  it('drops lines below the configured level', () => {
    const log = createLogger('session', { file, now: FIXED, level: 'warn' });
    log.debug('noise');
    log.info('noise');
    log.warn('kept');

    expect(readFileSync(file, 'utf-8')).toBe('[03:04:05] [WARN ] [session] kept\n');
  });

  it('includes debug lines at debug level', () => {
    const log = createLogger('session', { file, now: FIXED, level: 'debug' });
    log.debug('detail', { n: 1 });
    expect(readFileSync(file, 'utf-8')).toBe('[03:04:05] [DEBUG] [session] detail {"n":1}\n');
  });

  it('writes nothing without a destination', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    createLogger('session', { file: null }).error('lost');
    expect(write).not.toHaveBeenCalled();
    expect(existsSync(file)).toBe(false);
  });

  it('mirrors to stderr when asked', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    createLogger('session', { stderr: true, now: FIXED }).warn('careful');
    expect(write).toHaveBeenCalledWith('[03:04:05] [WARN ] [session] careful\n');
  });
});

describe('openLogFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'yellow-log-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('creates the file and returns its path', () => {
    const path = join(dir, 'yellow.log');
    const warn = vi.fn();
    expect(openLogFile(path, warn)).toBe(path);
    expect(existsSync(path)).toBe(true);
    expect(warn).not.toHaveBeenCalled();
  });

  it('warns and returns null when the file cannot be opened', () => {
    const path = join(dir, 'missing', 'yellow.log');
    const warn = vi.fn();

    expect(openLogFile(path, warn)).toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);
    const message = String(warn.mock.calls[0]?.[0]);
    expect(message.startsWith(`Warning: could not set up logging at ${path}: `)).toBe(true);
  });
});

describe('helpers', () => {
  it('describes thrown values', () => {
    expect(describeError(new Error('bad'))).toBe('bad');
    expect(describeError(42)).toBe('42');
  });

  it('recognizes log levels', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('WARN')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
