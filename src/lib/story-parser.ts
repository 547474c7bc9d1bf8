/**
 * Story Parser
 *
 * Pulls structured stories out of the model's free-text answer. Blocks that are
 * incomplete are dropped one by one; the parser itself never fails.
 */
import { STORY_END, STORY_START, type Story } from '../types/digest.js';

export const MAX_STORIES = 15;

/** Line prefixes, checked in this order; the first match wins. */
const FIELD_PREFIXES: Array<[prefix: string, field: keyof Story]> = [
  ['TITLE:', 'title'],
  ['URL:', 'url'],
  ['CATEGORY:', 'category'],
  ['SUMMARY:', 'summary'],
  ['WHY_IT_MATTERS:', 'whyItMatters'],
];

/**
 * Read the field lines of one block. Returns null when there is no title.
 */
export function parseStoryBlock(block: string): Story | null {
  const fields: Partial<Story> = {};

  for (const rawLine of block.split('\n')) {
    const line = rawLine.trim();
    if (!line) continue;

    const match = FIELD_PREFIXES.find(([prefix]) => line.startsWith(prefix));
    if (match) {
      const [prefix, field] = match;
      fields[field] = line.slice(prefix.length).trim();
    }
  }

  const { title, ...rest } = fields;
  if (!title) {
    return null;
  }
  return { title, ...rest };
}

export function parseStories(raw: string, maxStories: number = MAX_STORIES): Story[] {
  const stories: Story[] = [];

  for (const segment of raw.split(STORY_START)) {
    const end = segment.indexOf(STORY_END);
    if (end === -1) continue;

    const story = parseStoryBlock(segment.slice(0, end));
    if (story) {
      stories.push(story);
    }
  }

  return stories.slice(0, maxStories);
}
