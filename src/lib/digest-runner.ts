/**
 * Digest Runner
 *
 * Runs one digest end to end:
 *   load history -> fetch -> parse -> (fallback | save history -> build) -> publish
 *
 * The first failure from the model or the webhook aborts the run. When nothing
 * parses, the raw answer is posted as-is and history is left alone.
 */
import type { Config, DigestSecrets } from './config.js';
import { ConfigError } from './errors.js';
import type { DigestRunResult } from '../types/digest.js';
import type { ChatMessage } from '../types/slack.js';
import { toDateKey } from './dates.js';
import { buildDigestPrompt } from './digest-prompt.js';
import { createAnthropicModelClient, fetchDigest, type ModelClient } from './digest-fetcher.js';
import { getRecentTitles, loadHistory, saveHistory } from './history-store.js';
import { buildDigestMessage, buildFallbackMessage } from './message-builder.js';
import { postToSlack } from './publisher.js';
import { parseStories } from './story-parser.js';
import { createLogger } from './logger.js';

const log = createLogger('digest');

export interface DigestSettings {
  historyFile: string;
  historyDays: number;
  maxStories: number;
  fallbackLimit: number;
  model: string;
  maxTokens: number;
  webSearchMaxUses?: number;
  /** Write today's titles back to the history file (off for dry runs) */
  persistHistory: boolean;
}

export interface DigestDependencies {
  model: ModelClient;
  publish: (message: ChatMessage) => Promise<void>;
  now?: () => Date;
}

export function settingsFromConfig(config: Config): DigestSettings {
  return {
    historyFile: config.digest.historyFile,
    historyDays: config.digest.historyDays,
    maxStories: config.digest.maxStories,
    fallbackLimit: config.digest.fallbackLimit,
    model: config.anthropic.model,
    maxTokens: config.anthropic.maxTokens,
    webSearchMaxUses: config.anthropic.webSearchMaxUses,
    persistHistory: !config.digest.dryRun,
  };
}

/**
 * Config with dry-run switched on when requested; unchanged otherwise
 */
export function withDryRun(config: Config, dryRun: boolean | undefined): Config {
  if (!dryRun) return config;
  return { ...config, digest: { ...config.digest, dryRun: true } };
}

export async function runDigest(
  settings: DigestSettings,
  deps: DigestDependencies
): Promise<DigestRunResult> {
  const now = deps.now?.() ?? new Date();
  const today = toDateKey(now);

  log.info('Loading story history...');
  const history = await loadHistory(settings.historyFile);
  const recentTitles = getRecentTitles(history);
  log.info(`Found ${recentTitles.length} stories from the last ${settings.historyDays} days`);

  const prompt = buildDigestPrompt({
    today: now,
    recentTitles,
    storyCount: settings.maxStories,
  });
  const raw = await fetchDigest(deps.model, {
    model: settings.model,
    maxTokens: settings.maxTokens,
    webSearchMaxUses: settings.webSearchMaxUses,
    prompt,
  });

  const stories = parseStories(raw, settings.maxStories);
  log.info(`Parsed ${stories.length} stories`);

  if (stories.length === 0) {
    log.warn('No stories parsed, posting raw digest as fallback');
    await deps.publish(buildFallbackMessage(raw, settings.fallbackLimit));
    return { outcome: 'fallback', date: today, rawLength: raw.length };
  }

  history[today] = stories.map((story) => ({ title: story.title, url: story.url ?? '' }));
  if (settings.persistHistory) {
    await saveHistory(settings.historyFile, history, {
      retentionDays: settings.historyDays,
      now,
    });
    log.info(`Saved ${stories.length} stories to history`);
  }

  const message = buildDigestMessage(stories, { date: now, headlineCount: settings.maxStories });
  await deps.publish(message);

  return { outcome: 'published', date: today, storyCount: stories.length };
}

/**
 * Wire a runner from config: the Anthropic client, and either the Slack
 * publisher or, in dry-run mode, a publisher that prints the payload.
 */
export function createDigestRunner(
  config: Config,
  secrets: DigestSecrets,
  overrides: Pick<DigestDependencies, 'now'> & { model?: ModelClient } = {}
): () => Promise<DigestRunResult> {
  const settings = settingsFromConfig(config);
  const webhookUrl = secrets.slackWebhookUrl;
  if (!config.digest.dryRun && !webhookUrl) {
    throw new ConfigError('Missing required environment: SLACK_WEBHOOK_URL');
  }
  const model = overrides.model ?? createAnthropicModelClient(secrets.anthropicApiKey);

  const publish = async (message: ChatMessage): Promise<void> => {
    if (config.digest.dryRun) {
      log.info('Dry run, not posting. Payload:');
      console.log(JSON.stringify(message, null, 2));
      return;
    }
    if (!webhookUrl) {
      throw new ConfigError('Missing required environment: SLACK_WEBHOOK_URL');
    }
    await postToSlack(webhookUrl, message);
  };

  return () => runDigest(settings, { model, publish, now: overrides.now });
}
