import { describe, expect, it } from 'vitest';
import { parseStories, parseStoryBlock } from '../src/lib/story-parser.js';

const block = (...lines: string[]) => `===STORY===\n${lines.join('\n')}\n===END===\n`;

describe('parseStories', () => {
  it('reads every field of a complete block', () => {
    const raw = block(
      'TITLE: Open model tops leaderboard',
      'URL: https://example.com/model',
      'CATEGORY: Industry',
      'SUMMARY: A new open model was released.',
      'WHY_IT_MATTERS: Teams can self-host it.'
    );

    expect(parseStories(raw)).toEqual([
      {
        title: 'Open model tops leaderboard',
        url: 'https://example.com/model',
        category: 'Industry',
        summary: 'A new open model was released.',
        whyItMatters: 'Teams can self-host it.',
      },
    ]);
  });

  it('ignores preamble text before the first story', () => {
    const raw = `I searched 10 queries. Here are the stories:\n\n${block('TITLE: Only one')}`;

    expect(parseStories(raw)).toEqual([{ title: 'Only one' }]);
  });

  it('drops a block that never reaches the end marker', () => {
    const raw =
      'Intro text\n' +
      block('TITLE: First', 'URL: https://example.com/1') +
      block('TITLE: Second', 'CATEGORY: Company') +
      '===STORY===\nTITLE: Cut off\nSUMMARY: The answer ran out of tokens';

    const stories = parseStories(raw);

    expect(stories.map((s) => s.title)).toEqual(['First', 'Second']);
  });

  it('drops a block without a title', () => {
    const raw = block('URL: https://example.com/no-title', 'SUMMARY: Missing headline') + block('TITLE: Kept');

    expect(parseStories(raw)).toEqual([{ title: 'Kept' }]);
  });

  it('keeps a block with a title and only some other fields', () => {
    const raw = block('TITLE: Partial', 'WHY_IT_MATTERS: Still useful');

    expect(parseStories(raw)).toEqual([{ title: 'Partial', whyItMatters: 'Still useful' }]);
  });

  it('truncates to the first 15 stories in order', () => {
    const raw = Array.from({ length: 20 }, (_, i) => block(`TITLE: Story ${i + 1}`)).join('');

    const stories = parseStories(raw);

    expect(stories).toHaveLength(15);
    expect(stories.map((s) => s.title)).toEqual(
      Array.from({ length: 15 }, (_, i) => `Story ${i + 1}`)
    );
  });

  it('honours a smaller limit', () => {
    const raw = block('TITLE: A') + block('TITLE: B') + block('TITLE: C');

    expect(parseStories(raw, 2).map((s) => s.title)).toEqual(['A', 'B']);
  });

  it('returns nothing for text without markers', () => {
    expect(parseStories('The model answered in prose only.')).toEqual([]);
  });

  it('ignores anything after the end marker inside a segment', () => {
    const raw = '===STORY===\nTITLE: Inside\n===END===\nTITLE: Outside\n';

    expect(parseStories(raw)).toEqual([{ title: 'Inside' }]);
  });
});

describe('parseStoryBlock', () => {
  it('trims lines and values', () => {
    expect(parseStoryBlock('   TITLE:    Spaced out   \n\n  URL:https://example.com  ')).toEqual({
      title: 'Spaced out',
      url: 'https://example.com',
    });
  });

  it('matches field prefixes case-sensitively', () => {
    expect(parseStoryBlock('title: lower case\nUrl: https://example.com')).toBeNull();
  });

  it('uses the first matching field for a line', () => {
    expect(parseStoryBlock('TITLE: URL: not a link')).toEqual({ title: 'URL: not a link' });
  });

  it('ignores unknown lines', () => {
    expect(parseStoryBlock('SOURCE: Somewhere\nTITLE: Known')).toEqual({ title: 'Known' });
  });

  it('lets a repeated field overwrite the earlier value', () => {
    expect(parseStoryBlock('TITLE: Draft\nTITLE: Final')).toEqual({ title: 'Final' });
  });
});
