/**
 * Inngest Client Configuration for Self-Hosted Server
 */
import { Inngest } from 'inngest';
import type { InngestConfig } from '../lib/config.js';

export function createInngestClient(config: InngestConfig) {
  return new Inngest({
    id: 'ai-daily-digest',
    // Self-hosted dev servers accept any key
    eventKey: config.eventKey ?? 'local-event-key',
    baseUrl: config.baseUrl,
  });
}

export type DigestInngest = ReturnType<typeof createInngestClient>;
