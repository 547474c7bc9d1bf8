/**
 * Digest Fetcher
 *
 * Sends the digest prompt to a model that can search the web and returns the
 * text of its answer. The model may run several searches before it answers;
 * only the text segments of the final message are kept.
 *
 * Errors from the API are not retried: a failed fetch fails the run.
 */
import Anthropic from '@anthropic-ai/sdk';
import { createLogger } from './logger.js';

const log = createLogger('digest-fetcher');

export interface ModelRequest {
  model: string;
  maxTokens: number;
  prompt: string;
  /** Cap on searches the model may run; unbounded when omitted */
  webSearchMaxUses?: number;
}

/**
 * One piece of the model's answer. Text segments carry `text`; tool use and
 * search result segments are passed through untouched.
 */
export interface ModelContentSegment {
  type: string;
  text?: string;
}

export interface ModelClient {
  createMessage(request: ModelRequest): Promise<ModelContentSegment[]>;
}

/**
 * Model client backed by the Anthropic Messages API with the server-side web
 * search tool enabled.
 */
export function createAnthropicModelClient(
  apiKey: string,
  anthropic: Anthropic = new Anthropic({ apiKey, maxRetries: 0 })
): ModelClient {
  return {
    async createMessage(request) {
      const message = await anthropic.messages.create({
        model: request.model,
        max_tokens: request.maxTokens,
        tools: [
          {
            type: 'web_search_20250305',
            name: 'web_search',
            max_uses: request.webSearchMaxUses,
          },
        ],
        messages: [{ role: 'user', content: request.prompt }],
      });

      log.debug(
        `stop_reason=${message.stop_reason} input_tokens=${message.usage.input_tokens} output_tokens=${message.usage.output_tokens}`
      );
      return message.content;
    },
  };
}

/**
 * Join every text segment in the order returned
 */
export function collectText(segments: ModelContentSegment[]): string {
  const texts: string[] = [];
  for (const segment of segments) {
    if (segment.type === 'text' && typeof segment.text === 'string') {
      texts.push(segment.text);
    }
  }
  return texts.join('\n');
}

export async function fetchDigest(client: ModelClient, request: ModelRequest): Promise<string> {
  log.info(`Requesting digest from ${request.model}`);
  const segments = await client.createMessage(request);
  const text = collectText(segments);
  log.info(`Received ${segments.length} segments, ${text.length} characters of text`);
  return text;
}
