/**
 * Message Builder
 *
 * Turns parsed stories into a Slack Block Kit message. Pure: the date comes in
 * as an argument, so equal inputs give byte-identical payloads.
 */
import type { Story, StoryCategory } from '../types/digest.js';
import type { ChatBlock, ChatMessage, SectionBlock } from '../types/slack.js';
import { formatLongDate } from './dates.js';

export const DEFAULT_FALLBACK_LIMIT = 3000;

const CATEGORY_ICONS: Record<StoryCategory, string> = {
  industry: '📰',
  company: '🏢',
};

export interface DigestMessageOptions {
  date: Date;
  /**
   * Count named in the intro line. This is the requested story count, not the
   * number actually parsed.
   */
  headlineCount?: number;
}

/**
 * Known category for a raw model value; anything else counts as industry news
 */
export function resolveCategory(category: string | undefined): StoryCategory {
  return category?.trim().toLowerCase() === 'company' ? 'company' : 'industry';
}

function section(text: string): SectionBlock {
  return { type: 'section', text: { type: 'mrkdwn', text } };
}

export function formatStoryText(story: Story, index: number): string {
  const icon = CATEGORY_ICONS[resolveCategory(story.category)];
  const title = story.url ? `<${story.url}|${story.title}>` : story.title;
  const summary = story.summary ?? 'No summary available.';

  let text = `${icon} *#${index} — ${title}*\n\n${summary}`;
  if (story.whyItMatters) {
    text += `\n\n💡 *Why it matters:* ${story.whyItMatters}`;
  }
  return text;
}

export function buildDigestMessage(stories: Story[], options: DigestMessageOptions): ChatMessage {
  const headlineCount = options.headlineCount ?? 15;

  const blocks: ChatBlock[] = [
    {
      type: 'header',
      text: {
        type: 'plain_text',
        text: `🤖 AI Daily Digest — ${formatLongDate(options.date)}`,
        emoji: true,
      },
    },
    section(
      `Here are today's *${headlineCount} coolest AI stories* — industry news + how top tech companies are using AI 👇`
    ),
    { type: 'divider' },
  ];

  stories.forEach((story, i) => {
    blocks.push(section(formatStoryText(story, i + 1)));
    blocks.push({ type: 'divider' });
  });

  blocks.push({
    type: 'context',
    elements: [
      {
        type: 'mrkdwn',
        text: '🛠️ Powered by Claude AI | Industry news 📰 + Company engineering blogs 🏢',
      },
    ],
  });

  return { blocks };
}

/**
 * Single-section message carrying the first `limit` characters of the raw
 * answer, posted when no story could be parsed
 */
export function buildFallbackMessage(raw: string, limit: number = DEFAULT_FALLBACK_LIMIT): ChatMessage {
  // Cut by code point so an emoji is never split
  const head = Array.from(raw).slice(0, limit).join('');
  return { blocks: [section(`*AI Daily Digest*\n\n${head}`)] };
}
