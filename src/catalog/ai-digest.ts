/**
 * Digest: AI Daily
 *
 * What the model is asked to search for and how it should rank what it finds.
 */

export interface DigestCatalog {
  /** Searches for general industry news */
  industryQueries: string[];
  /** Company engineering blogs worth checking for real AI work */
  companyQueries: string[];
  /** Ranking criteria, most important first */
  criteria: Array<{ name: string; question: string }>;
}

export const aiDigest: DigestCatalog = {
  industryQueries: [
    'Latest AI news today',
    'AI breakthroughs announcements this week',
    'AI tools and product launches',
    'LLM and generative AI updates',
    'AI startup funding news',
    'AI regulation policy news',
  ],

  companyQueries: [
    'Stripe engineering blog AI',
    'Spotify engineering blog AI machine learning',
    'Netflix tech blog AI',
    'Airbnb engineering AI',
    'Uber engineering blog AI ML',
    'Shopify engineering AI',
    'LinkedIn engineering blog AI',
    'Duolingo AI blog',
    'Figma AI blog',
    'Notion AI blog',
    'GitHub blog AI',
    'Vercel AI blog',
    'Datadog engineering AI',
    'Cloudflare blog AI',
    'Slack engineering blog AI',
    'Monzo engineering blog AI',
    'Klarna AI blog',
    'Meta engineering AI blog',
    'Google DeepMind blog',
    'OpenAI blog',
  ],

  criteria: [
    { name: 'Novelty', question: 'Is this genuinely new or surprising?' },
    { name: 'Impact', question: 'Will this affect practitioners, businesses, or the industry?' },
    { name: 'Practical relevance', question: 'Can someone act on or learn from this?' },
    { name: 'Buzz', question: 'Is the community talking about it?' },
  ],
};
