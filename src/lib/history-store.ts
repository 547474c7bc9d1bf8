/**
 * History Store
 *
 * Keeps the titles posted over the last few days in a single JSON file so the
 * next run can tell the model what not to repeat. Nothing else touches the file.
 */
import { readFile, writeFile, mkdir, rename } from 'fs/promises';
import { dirname } from 'path';
import { DATE_KEY_PATTERN, HistoryRecordSchema, type HistoryRecord } from '../types/digest.js';
import { subtractDays, toDateKey } from './dates.js';
import { createLogger } from './logger.js';

const log = createLogger('history');

export interface SaveHistoryOptions {
  /** Days kept before today; an entry dated exactly at the cutoff survives */
  retentionDays: number;
  now?: Date;
}

/**
 * Read the history file. A missing or malformed file reads as empty history.
 */
export async function loadHistory(file: string): Promise<HistoryRecord> {
  let content: string;
  try {
    content = await readFile(file, 'utf-8');
  } catch {
    log.debug(`No history at ${file}, starting empty`);
    return {};
  }

  try {
    const result = HistoryRecordSchema.safeParse(JSON.parse(content));
    if (result.success) {
      return result.data;
    }
    log.warn(`Ignoring malformed history in ${file}`);
  } catch (err) {
    log.warn(`Ignoring unreadable history in ${file}:`, err);
  }
  return {};
}

/**
 * All non-empty titles across retained days, in the record's key order
 */
export function getRecentTitles(record: HistoryRecord): string[] {
  return Object.values(record)
    .flat()
    .map((entry) => entry.title)
    .filter((title) => title.length > 0);
}

/**
 * Drop every day strictly older than `cutoffKey`, and any key that is not a date
 */
export function pruneHistory(record: HistoryRecord, cutoffKey: string): HistoryRecord {
  return Object.fromEntries(
    Object.entries(record).filter(([date]) => DATE_KEY_PATTERN.test(date) && date >= cutoffKey)
  );
}

/**
 * Prune and overwrite the history file. The write goes to a sibling temp file
 * first and is renamed into place.
 */
export async function saveHistory(
  file: string,
  record: HistoryRecord,
  options: SaveHistoryOptions
): Promise<HistoryRecord> {
  const cutoff = toDateKey(subtractDays(options.now ?? new Date(), options.retentionDays));
  const pruned = pruneHistory(record, cutoff);

  await mkdir(dirname(file), { recursive: true });
  const tempFile = `${file}.${process.pid}.tmp`;
  await writeFile(tempFile, JSON.stringify(pruned, null, 2), 'utf-8');
  await rename(tempFile, file);

  return pruned;
}
