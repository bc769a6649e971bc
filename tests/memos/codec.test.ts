/**
 * Backing file codec tests
 */

import { describe, expect, it } from 'vitest';
import { decodeMemo, decodeMemoFile, encodeMemo, serializeMemoData } from '../../src/memos/codec';
import { makeMemo } from '../helpers/fixtures';

describe('encodeMemo', () => {
  it('writes snake_case ISO timestamps and omits deleted_at on active memos', () => {
    expect(encodeMemo(makeMemo('1', 'hi', '2026-01-01T10:00:00Z'))).toEqual({
      id: '1',
      content: 'hi',
      created_at: '2026-01-01T10:00:00.000Z',
      updated_at: '2026-01-01T10:00:00.000Z',
    });
  });

  it('includes deleted_at when set', () => {
    const record = encodeMemo(makeMemo('1', 'hi', '2026-01-01T10:00:00Z', '2026-01-02T10:00:00Z'));
    expect(record.deleted_at).toBe('2026-01-02T10:00:00.000Z');
  });
});

describe('serializeMemoData', () => {
  it('produces indented JSON with both collections', () => {
    const text = serializeMemoData({ active: [], deleted: [] });
    expect(text).toBe('{\n  "active": [],\n  "deleted": []\n}\n');
  });
});

describe('decodeMemo', () => {
  it('reads missing content as empty and missing timestamps as the epoch', () => {
    const memo = decodeMemo({ id: '7' });
    expect(memo?.content).toBe('');
    expect(memo?.createdAt.getTime()).toBe(0);
    expect(memo?.updatedAt.getTime()).toBe(0);
    expect(memo?.deletedAt).toBeUndefined();
  });

  it('rejects values of the wrong type', () => {
    expect(decodeMemo({ id: 7 })).toBeNull();
    expect(decodeMemo({ id: '7', content: 42 })).toBeNull();
    expect(decodeMemo({ id: '7', created_at: 'not a date' })).toBeNull();
    expect(decodeMemo('memo')).toBeNull();
  });
});

describe('decodeMemoFile', () => {
  it('decodes the current layout', () => {
    const result = decodeMemoFile({
      active: [{ id: '1', content: 'a', created_at: '2026-01-01T00:00:00Z', updated_at: '2026-01-01T00:00:00Z' }],
      deleted: [
        {
          id: '2',
          content: 'b',
          created_at: '2026-01-01T00:00:00Z',
          updated_at: '2026-01-01T00:00:00Z',
          deleted_at: '2026-01-02T00:00:00Z',
        },
      ],
    });

    expect(result?.layout).toBe('current');
    expect(result?.data.active.map((m) => m.id)).toEqual(['1']);
    expect(result?.data.deleted[0]?.deletedAt?.toISOString()).toBe('2026-01-02T00:00:00.000Z');
  });

  it('treats missing collections as empty', () => {
    expect(decodeMemoFile({})).toEqual({ data: { active: [], deleted: [] }, layout: 'current' });
  });

  it('strips deletion stamps from active memos', () => {
    const result = decodeMemoFile({
      active: [{ id: '1', content: 'a', deleted_at: '2026-01-02T00:00:00Z' }],
    });
    expect(result?.data.active[0]?.deletedAt).toBeUndefined();
  });

  it('decodes a bare array as the legacy layout', () => {
    const result = decodeMemoFile([{ id: '1', content: 'x' }]);
    expect(result?.layout).toBe('legacy');
    expect(result?.data.active.map((m) => m.content)).toEqual(['x']);
    expect(result?.data.deleted).toEqual([]);
  });

  it('returns null for anything else', () => {
    expect(decodeMemoFile({ active: 'nope' })).toBeNull();
    expect(decodeMemoFile('just a string')).toBeNull();
    expect(decodeMemoFile([{ content: 'no id' }])).toBeNull();
  });
});
