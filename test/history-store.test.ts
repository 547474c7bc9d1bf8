import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  getRecentTitles,
  loadHistory,
  pruneHistory,
  saveHistory,
} from '../src/lib/history-store.js';
import type { HistoryRecord } from '../src/types/digest.js';

describe('history store', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'digest-history-'));
    file = join(dir, 'history.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('loadHistory', () => {
    it('returns empty history when the file does not exist', async () => {
      expect(await loadHistory(file)).toEqual({});
    });

    it('returns empty history for invalid JSON', async () => {
      await writeFile(file, '{ not json', 'utf-8');
      expect(await loadHistory(file)).toEqual({});
    });

    it('returns empty history when the top level is not an object', async () => {
      await writeFile(file, '["2026-10-18"]', 'utf-8');
      expect(await loadHistory(file)).toEqual({});
    });

    it('reads a valid file and fills missing fields with empty strings', async () => {
      await writeFile(
        file,
        JSON.stringify({
          '2026-10-17': [{ title: 'Alpha', url: 'https://example.com/a' }],
          '2026-10-18': [{ url: 'https://example.com/b' }],
        }),
        'utf-8'
      );

      expect(await loadHistory(file)).toEqual({
        '2026-10-17': [{ title: 'Alpha', url: 'https://example.com/a' }],
        '2026-10-18': [{ title: '', url: 'https://example.com/b' }],
      });
    });

    it('drops keys that are not dates', async () => {
      await writeFile(
        file,
        JSON.stringify({
          notes: [{ title: 'Stray', url: '' }],
          '2026-10-18': [{ title: 'Beta', url: '' }],
        }),
        'utf-8'
      );

      expect(await loadHistory(file)).toEqual({ '2026-10-18': [{ title: 'Beta', url: '' }] });
    });
  });

  describe('getRecentTitles', () => {
    it('flattens titles across days and skips empty ones', () => {
      const record: HistoryRecord = {
        '2026-10-17': [
          { title: 'Alpha', url: '' },
          { title: '', url: 'https://example.com/x' },
        ],
        '2026-10-18': [{ title: 'Beta', url: 'https://example.com/b' }],
      };

      expect(getRecentTitles(record)).toEqual(['Alpha', 'Beta']);
    });

    it('returns nothing for empty history', () => {
      expect(getRecentTitles({})).toEqual([]);
    });
  });

  describe('pruneHistory', () => {
    it('keeps the cutoff day and everything after it', () => {
      const record: HistoryRecord = {
        '2026-10-15': [{ title: 'Old', url: '' }],
        '2026-10-16': [{ title: 'Edge', url: '' }],
        '2026-10-18': [{ title: 'New', url: '' }],
      };

      expect(Object.keys(pruneHistory(record, '2026-10-16'))).toEqual(['2026-10-16', '2026-10-18']);
    });

    it('drops keys that are not dates even when they sort after the cutoff', () => {
      const record: HistoryRecord = {
        '2026-10-18': [{ title: 'New', url: '' }],
        zzz: [{ title: 'Stray', url: '' }],
      };

      expect(Object.keys(pruneHistory(record, '2026-10-16'))).toEqual(['2026-10-18']);
    });
  });

  describe('saveHistory', () => {
    const now = new Date(2026, 9, 19, 9, 30);

    it('drops days older than the retention window and writes pretty JSON', async () => {
      const record: HistoryRecord = {
        '2026-10-15': [{ title: 'Too old', url: '' }],
        '2026-10-16': [{ title: 'Exactly at cutoff', url: '' }],
        '2026-10-19': [{ title: 'Today', url: 'https://example.com/t' }],
      };

      const saved = await saveHistory(file, record, { retentionDays: 3, now });

      const expected = {
        '2026-10-16': [{ title: 'Exactly at cutoff', url: '' }],
        '2026-10-19': [{ title: 'Today', url: 'https://example.com/t' }],
      };
      expect(saved).toEqual(expected);
      expect(await readFile(file, 'utf-8')).toBe(JSON.stringify(expected, null, 2));
    });

    it('survives a save and load round trip without old entries', async () => {
      await saveHistory(
        file,
        {
          '2026-09-30': [{ title: 'Ancient', url: '' }],
          '2026-10-18': [{ title: 'Yesterday', url: '' }],
        },
        { retentionDays: 3, now }
      );

      expect(await loadHistory(file)).toEqual({
        '2026-10-18': [{ title: 'Yesterday', url: '' }],
      });
    });

    it('keeps only today with a zero-day window', async () => {
      const saved = await saveHistory(
        file,
        {
          '2026-10-18': [{ title: 'Yesterday', url: '' }],
          '2026-10-19': [{ title: 'Today', url: '' }],
        },
        { retentionDays: 0, now }
      );

      expect(Object.keys(saved)).toEqual(['2026-10-19']);
    });

    it('creates the parent directory and leaves no temp file behind', async () => {
      const nested = join(dir, 'data', 'history.json');

      await saveHistory(nested, { '2026-10-19': [{ title: 'Today', url: '' }] }, { retentionDays: 3, now });

      expect(existsSync(nested)).toBe(true);
      expect(existsSync(`${nested}.${process.pid}.tmp`)).toBe(false);
    });
  });
});
