/**
 * Digest Prompt
 *
 * Builds the single instruction sent to the model: what to search, how to pick,
 * what to avoid repeating, and the exact block format the parser expects.
 */
import { aiDigest, type DigestCatalog } from '../catalog/ai-digest.js';
import { STORY_END, STORY_START } from '../types/digest.js';
import { formatMonthDayYear } from './dates.js';

export const DEDUP_HEADING = 'DO NOT REPEAT THESE STORIES. They were already covered in previous days:';

export interface DigestPromptInput {
  today: Date;
  recentTitles: string[];
  /** Number of stories requested */
  storyCount?: number;
  catalog?: DigestCatalog;
}

const bullets = (items: string[]) => items.map((item) => `- ${item}`).join('\n');

/**
 * The "already covered" block, or an empty string when there is nothing to avoid
 */
export function buildDedupBlock(recentTitles: string[]): string {
  if (recentTitles.length === 0) {
    return '';
  }

  return `
${DEDUP_HEADING}
${bullets(recentTitles)}

A story may come back only as an UPDATE or a significant new development on one of these
topics, and it must say so up front (e.g. "Update: ..." or "New development: ...").
Never include the same announcement, launch, or event just reworded.
`;
}

export function buildDigestPrompt(input: DigestPromptInput): string {
  const catalog = input.catalog ?? aiDigest;
  const storyCount = input.storyCount ?? 15;
  const criteria = catalog.criteria
    .map((c, i) => `${i + 1}. **${c.name}**: ${c.question}`)
    .join('\n');

  return `Today is ${formatMonthDayYear(input.today)}. Search the web thoroughly for the most interesting and
impactful AI news from the last 24-48 hours. Cover BOTH major industry news AND how leading
tech companies are applying AI in practice.

Run at least 8-10 different searches for broad coverage, including:

INDUSTRY NEWS:
${bullets(catalog.industryQueries)}

TECH COMPANY AI BLOGS (recent posts from these sources):
${bullets(catalog.companyQueries)}

From the company blogs, prefer posts describing REAL implementations, lessons learned,
architectures, or case studies over marketing announcements.

Then select the TOP ${storyCount} stories, ranked by:
${criteria}

DIVERSITY RULES:
- NEVER include more than 2 stories about the same event, conference, or summit. Fold related
  announcements from one event into a single story.
- NEVER include more than 2 stories about the same company.
- Spread the picks across model releases, company use cases, research, regulation,
  infrastructure, funding, open source, and practical applications.
${buildDedupBlock(input.recentTitles)}
Aim for a MIX: roughly 8-9 industry news stories and 6-7 company engineering blog posts.

For each of the ${storyCount} stories, use EXACTLY this format (it is parsed by a program):

${STORY_START}
TITLE: [Headline]
URL: [Source URL]
CATEGORY: [Industry or Company]
SUMMARY: [2-3 sentence summary of what happened]
WHY_IT_MATTERS: [1-2 sentences on why a practitioner should care]
${STORY_END}

Be specific. Use real URLs from your search results. Do not invent stories.`;
}
