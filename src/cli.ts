#!/usr/bin/env node
/**
 * Run one digest now and exit.
 *
 *   ai-daily-digest [--dry-run]
 *
 * Exits 0 once a digest (full or fallback) is posted, 1 on any failure.
 */
import { parseArgs } from 'node:util';
import { loadConfig, requireSecrets } from './lib/config.js';
import { configureLogger, createLogger } from './lib/logger.js';
import { createDigestRunner, withDryRun } from './lib/digest-runner.js';
import { errorMessage } from './lib/errors.js';

const log = createLogger('cli');

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      'dry-run': { type: 'boolean', default: false },
    },
  });

  const config = withDryRun(loadConfig(), values['dry-run']);
  configureLogger(config.logging);

  const run = createDigestRunner(config, requireSecrets(config));
  const result = await run();

  if (result.outcome === 'published') {
    log.info(`Posted ${result.storyCount} stories for ${result.date}`);
  } else {
    log.warn(`Posted fallback digest for ${result.date}`);
  }
}

main().catch((err: unknown) => {
  log.error(errorMessage(err));
  process.exitCode = 1;
});
