import { describe, it, expect } from '@jest/globals';
import { SCHEMA_STATEMENTS, initializeSchema, readDate, readNumber, readString } from './db.js';
import { FakeDatabase } from './test-utils/fakes.js';

describe('initializeSchema', () => {
  it('runs every statement in order, extension first', async () => {
    const db = new FakeDatabase();
    await initializeSchema(db);
    expect(db.calls.map((c) => c.text)).toEqual([...SCHEMA_STATEMENTS]);
    expect(db.calls[0].text).toBe('CREATE EXTENSION IF NOT EXISTS postgis;');
  });

  it('only uses IF NOT EXISTS statements', () => {
    for (const statement of SCHEMA_STATEMENTS) {
      expect(statement).toContain('IF NOT EXISTS');
    }
  });

  it('stops at the first failing statement', async () => {
    const db = new FakeDatabase((text) => {
      if (text.includes('CREATE TABLE IF NOT EXISTS cap_alerts')) {
        throw new Error('permission denied for schema public');
      }
      return { rows: [] };
    });
    await expect(initializeSchema(db)).rejects.toThrow('permission denied');
    expect(db.calls).toHaveLength(2);
  });
});

describe('row readers', () => {
  const row = {
    name: 'S-1',
    lat: '28.4',
    lon: 77.2,
    bad: 'north',
    at: '2026-02-01T05:00:00Z',
    never: 'yesterday-ish',
  };

  it('narrows strings', () => {
    expect(readString(row, 'name')).toBe('S-1');
    expect(readString(row, 'lon')).toBeNull();
  });

  it('narrows numbers, including numeric strings', () => {
    expect(readNumber(row, 'lat')).toBe(28.4);
    expect(readNumber(row, 'lon')).toBe(77.2);
    expect(readNumber(row, 'bad')).toBeNull();
    expect(readNumber(row, 'missing')).toBeNull();
  });

  it('narrows dates', () => {
    expect(readDate(row, 'at')?.toISOString()).toBe('2026-02-01T05:00:00.000Z');
    expect(readDate(row, 'never')).toBeNull();
  });
});
