/**
 * Memo store tests
 *
 * Run against a fresh temp directory per test.
 */

import { mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MemoFileFormatError, MemoStoreError } from '../../src/memos/errors';
import { MemoStore, isRetained, purgeExpired } from '../../src/memos/store';
import type { MemoData } from '../../src/memos/types';
import { DAY, makeMemo, recordingLogger } from '../helpers/fixtures';

const NOW = new Date('2026-03-10T12:00:00.000Z');

function daysBefore(days: number): string {
  return new Date(NOW.getTime() - days * DAY).toISOString();
}

describe('retention', () => {
  it('keeps memos deleted within the window, inclusive', () => {
    const week = 7 * DAY;
    expect(isRetained(makeMemo('1', '', daysBefore(9), daysBefore(6)), NOW, week)).toBe(true);
    expect(isRetained(makeMemo('2', '', daysBefore(9), daysBefore(7)), NOW, week)).toBe(true);
    expect(isRetained(makeMemo('3', '', daysBefore(9), daysBefore(8)), NOW, week)).toBe(false);
  });

  it('never retains a deleted memo without a stamp', () => {
    expect(isRetained(makeMemo('1', '', daysBefore(1)), NOW, 7 * DAY)).toBe(false);
  });

  it('purges in place and reports the count', () => {
    const data: MemoData = {
      active: [],
      deleted: [
        makeMemo('old', '', daysBefore(20), daysBefore(10)),
        makeMemo('recent', '', daysBefore(20), daysBefore(1)),
      ],
    };
    expect(purgeExpired(data, NOW, 7 * DAY)).toBe(1);
    expect(data.deleted.map((m) => m.id)).toEqual(['recent']);
  });
});

describe('MemoStore', () => {
  let dir: string;
  let filePath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'yellow-store-'));
    filePath = join(dir, 'memos.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function createStore(): MemoStore {
    return new MemoStore({ storagePath: filePath, now: () => NOW });
  }

  describe('load', () => {
    it('returns an empty collection when the file does not exist', async () => {
      await expect(createStore().load()).resolves.toEqual({ active: [], deleted: [] });
    });

    it('round-trips saved data', async () => {
      const store = createStore();
      const data: MemoData = {
        active: [
          makeMemo('2', 'second\nwith body', '2026-03-09T08:00:00Z'),
          makeMemo('1', 'first', '2026-03-08T08:00:00Z'),
        ],
        deleted: [makeMemo('3', 'gone', '2026-03-07T08:00:00Z', daysBefore(2))],
      };

      await store.save(data);
      await expect(store.load()).resolves.toEqual(data);
    });

    it('round-trips an empty collection', async () => {
      const store = createStore();
      await store.save({ active: [], deleted: [] });
      await expect(store.load()).resolves.toEqual({ active: [], deleted: [] });
    });

    it('purges deleted memos past the retention window and re-saves', async () => {
      const log = recordingLogger();
      const store = new MemoStore({ storagePath: filePath, now: () => NOW }, log);
      await store.save({
        active: [makeMemo('1', 'keep', '2026-03-01T00:00:00Z')],
        deleted: [
          makeMemo('old', 'eight days', '2026-03-01T00:00:00Z', daysBefore(8)),
          makeMemo('recent', 'six days', '2026-03-01T00:00:00Z', daysBefore(6)),
        ],
      });

      const data = await store.load();
      expect(data.deleted.map((m) => m.id)).toEqual(['recent']);

      await store.settled();
      const onDisk = JSON.parse(readFileSync(filePath, 'utf-8'));
      expect(onDisk.deleted.map((m: { id: string }) => m.id)).toEqual(['recent']);
      expect(log.entries).toContainEqual({
        level: 'info',
        message: 'Purged expired deleted memos',
        fields: { purged: 1 },
      });
    });

    it('honours a configured retention window', async () => {
      const store = new MemoStore({ storagePath: filePath, now: () => NOW, retentionMs: DAY });
      await store.save({
        active: [],
        deleted: [makeMemo('x', '', '2026-03-01T00:00:00Z', daysBefore(2))],
      });
      await expect(store.load()).resolves.toEqual({ active: [], deleted: [] });
      await store.settled();
    });

    it('keeps the purge in memory when the cleanup save fails', async () => {
      class FailingStore extends MemoStore {
        override save(): Promise<void> {
          return Promise.reject(new Error('disk full'));
        }
      }
      writeFileSync(
        filePath,
        JSON.stringify({
          active: [],
          deleted: [{ id: 'old', content: '', deleted_at: daysBefore(30) }],
        })
      );

      const log = recordingLogger();
      const store = new FailingStore({ storagePath: filePath, now: () => NOW }, log);
      await expect(store.load()).resolves.toEqual({ active: [], deleted: [] });
      await store.settled();

      expect(log.entries).toContainEqual({
        level: 'warn',
        message: 'Failed to save cleaned deleted memos',
        fields: { purged: 1, error: 'disk full' },
      });
    });

    it('reads the legacy array layout as active memos without purging', async () => {
      writeFileSync(
        filePath,
        '[{"id":"1","content":"x","created_at":"2026-01-01T00:00:00Z","updated_at":"2026-01-01T00:00:00Z"}]'
      );

      const data = await createStore().load();
      expect(data.deleted).toEqual([]);
      expect(data.active).toEqual([makeMemo('1', 'x', '2026-01-01T00:00:00Z')]);
    });

    it('rejects invalid JSON with a format error', async () => {
      writeFileSync(filePath, 'not json');
      await expect(createStore().load()).rejects.toBeInstanceOf(MemoFileFormatError);
    });

    it('rejects JSON of the wrong shape with a format error', async () => {
      writeFileSync(filePath, '{"active": "nope"}');
      const error = await createStore().load().catch((e: unknown) => e);
      expect(error).toBeInstanceOf(MemoFileFormatError);
      expect(error).toMatchObject({ path: filePath });
    });

    it('reports read failures as store errors', async () => {
      mkdirSync(filePath);
      const error = await createStore().load().catch((e: unknown) => e);
      expect(error).toBeInstanceOf(MemoStoreError);
      expect(error).not.toBeInstanceOf(MemoFileFormatError);
    });
  });

  describe('save', () => {
    it('writes the documented JSON layout', async () => {
      await createStore().save({
        active: [makeMemo('1', 'hello', '2026-03-01T09:30:00Z')],
        deleted: [],
      });

      const text = readFileSync(filePath, 'utf-8');
      expect(text.endsWith('}\n')).toBe(true);
      expect(JSON.parse(text)).toEqual({
        active: [
          {
            id: '1',
            content: 'hello',
            created_at: '2026-03-01T09:30:00.000Z',
            updated_at: '2026-03-01T09:30:00.000Z',
          },
        ],
        deleted: [],
      });
    });

    it('creates missing parent directories', async () => {
      filePath = join(dir, 'nested', 'deeper', 'memos.json');
      await createStore().save({ active: [], deleted: [] });
      expect(readdirSync(join(dir, 'nested', 'deeper'))).toEqual(['memos.json']);
    });

    it('leaves no temp files behind after concurrent saves', async () => {
      const store = createStore();
      await Promise.all([
        store.save({ active: [makeMemo('1', 'a', '2026-03-01T00:00:00Z')], deleted: [] }),
        store.save({ active: [makeMemo('2', 'b', '2026-03-01T00:00:00Z')], deleted: [] }),
      ]);
      expect(readdirSync(dir)).toEqual(['memos.json']);
    });

    it('serializes before writing so later mutations are not saved', async () => {
      const store = createStore();
      const data: MemoData = { active: [makeMemo('1', 'before', '2026-03-01T00:00:00Z')], deleted: [] };
      const pending = store.save(data);
      data.active = [];
      await pending;

      const loaded = await store.load();
      expect(loaded.active.map((m) => m.content)).toEqual(['before']);
    });

    it('reports write failures as store errors', async () => {
      // The target path is an existing directory, so the rename fails
      mkdirSync(filePath);
      mkdirSync(join(filePath, 'child'));
      await expect(createStore().save({ active: [], deleted: [] })).rejects.toBeInstanceOf(
        MemoStoreError
      );
      expect(readdirSync(dir)).toEqual(['memos.json']);
    });
  });
});
