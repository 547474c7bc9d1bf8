/**
 * Publisher
 *
 * Posts a message to a Slack incoming webhook. Only HTTP 200 counts as delivered.
 */
import type { ChatMessage } from '../types/slack.js';
import { HttpResponseError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('publisher');

export type FetchLike = typeof fetch;

export async function postToSlack(
  webhookUrl: string,
  message: ChatMessage,
  fetchImpl: FetchLike = fetch
): Promise<void> {
  log.info(`Posting ${message.blocks.length} blocks to Slack`);

  const response = await fetchImpl(webhookUrl, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(message),
  });

  if (response.status !== 200) {
    const body = await response.text();
    throw new HttpResponseError('Slack webhook', response.status, response.statusText, body);
  }

  log.info('Posted digest to Slack');
}
