import { describe, expect, it } from 'vitest';
import { buildDedupBlock, buildDigestPrompt, DEDUP_HEADING } from '../src/lib/digest-prompt.js';
import { aiDigest } from '../src/catalog/ai-digest.js';

const today = new Date(2026, 9, 5, 7, 0);

describe('buildDigestPrompt', () => {
  it('states the date', () => {
    const prompt = buildDigestPrompt({ today, recentTitles: [] });

    expect(prompt.startsWith('Today is October 05, 2026.')).toBe(true);
  });

  it('lists every recent title verbatim on its own line', () => {
    const recentTitles = ['Lab ships a reasoning model', 'Startup raises $40M for agents'];

    const lines = buildDigestPrompt({ today, recentTitles }).split('\n');

    expect(lines).toContain(DEDUP_HEADING);
    expect(lines).toContain('- Lab ships a reasoning model');
    expect(lines).toContain('- Startup raises $40M for agents');
  });

  it('omits the dedup block when there is no history', () => {
    const prompt = buildDigestPrompt({ today, recentTitles: [] });

    expect(prompt).not.toContain(DEDUP_HEADING);
    expect(prompt).not.toContain('New development:');
  });

  it('asks for every catalog search', () => {
    const lines = buildDigestPrompt({ today, recentTitles: [] }).split('\n');

    for (const query of [...aiDigest.industryQueries, ...aiDigest.companyQueries]) {
      expect(lines).toContain(`- ${query}`);
    }
  });

  it('spells out the story template with both markers', () => {
    const prompt = buildDigestPrompt({ today, recentTitles: [] });

    expect(prompt).toContain(
      [
        '===STORY===',
        'TITLE: [Headline]',
        'URL: [Source URL]',
        'CATEGORY: [Industry or Company]',
        'SUMMARY: [2-3 sentence summary of what happened]',
        'WHY_IT_MATTERS: [1-2 sentences on why a practitioner should care]',
        '===END===',
      ].join('\n')
    );
  });

  it('uses the requested story count', () => {
    const prompt = buildDigestPrompt({ today, recentTitles: [], storyCount: 10 });

    expect(prompt).toContain('select the TOP 10 stories');
    expect(prompt).toContain('For each of the 10 stories');
  });

  it('includes the diversity limits and ranking criteria', () => {
    const prompt = buildDigestPrompt({ today, recentTitles: [] });

    expect(prompt).toContain('NEVER include more than 2 stories about the same company.');
    expect(prompt).toContain('1. **Novelty**: Is this genuinely new or surprising?');
    expect(prompt).toContain('4. **Buzz**: Is the community talking about it?');
  });
});

describe('buildDedupBlock', () => {
  it('is empty for no titles', () => {
    expect(buildDedupBlock([])).toBe('');
  });
});
