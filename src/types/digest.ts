/**
 * Digest Types
 *
 * Shapes passed between the history store, the parser and the message builder.
 */
import { z } from 'zod';

/** Marks the start of one story in the model's answer. */
export const STORY_START = '===STORY===';
/** Marks the end of one story; segments without it are ignored. */
export const STORY_END = '===END===';

export type StoryCategory = 'industry' | 'company';

/**
 * One curated news item.
 * `category` is kept as the model wrote it; see `resolveCategory`.
 */
export interface Story {
  title: string;
  url?: string;
  category?: string;
  summary?: string;
  whyItMatters?: string;
}

/**
 * A title already reported on a given day.
 */
export const HistoryEntrySchema = z.object({
  title: z.string().catch(''),
  url: z.string().catch(''),
});

export const DATE_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Durable history: `YYYY-MM-DD` date key to the stories posted that day.
 * Keys that are not dates are dropped.
 */
export const HistoryRecordSchema = z
  .record(z.string(), z.array(HistoryEntrySchema))
  .transform((record) =>
    Object.fromEntries(Object.entries(record).filter(([date]) => DATE_KEY_PATTERN.test(date)))
  );

export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;
export type HistoryRecord = z.infer<typeof HistoryRecordSchema>;

export type DigestRunResult =
  | { outcome: 'published'; date: string; storyCount: number }
  | { outcome: 'fallback'; date: string; rawLength: number };
