/**
 * Digest Worker
 *
 * Two Inngest functions:
 * - a cron scanner that requests a digest on the configured schedule
 * - the worker that runs it
 *
 * The worker never retries and runs one digest at a time, since runs share the
 * history file.
 */
import type { Config } from '../lib/config.js';
import { requireSecrets } from '../lib/config.js';
import { createDigestRunner, withDryRun } from '../lib/digest-runner.js';
import type { DigestInngest } from '../inngest/client.js';
import { DigestRequestedSchema, EVENTS } from '../inngest/events.js';

export function createDigestScheduler(inngest: DigestInngest, config: Config) {
  return inngest.createFunction(
    {
      id: 'digest-scheduler',
      name: 'Digest Schedule',
    },
    { cron: config.digest.schedule },
    async ({ step, logger }) => {
      logger.info(`Schedule ${config.digest.schedule} fired, requesting digest`);
      await step.sendEvent('request-digest', {
        name: EVENTS.DIGEST_REQUESTED,
        data: { trigger: 'schedule' },
      });
      return { requested: true };
    }
  );
}

export function createDigestWorker(inngest: DigestInngest, config: Config) {
  return inngest.createFunction(
    {
      id: 'digest-worker',
      name: 'AI Daily Digest',
      concurrency: { limit: 1 },
      retries: 0,
    },
    { event: EVENTS.DIGEST_REQUESTED },
    async ({ event, step, logger }) => {
      const { trigger, dryRun } = DigestRequestedSchema.parse(event.data);
      logger.info(`Running digest (trigger: ${trigger}${dryRun ? ', dry run' : ''})`);

      const result = await step.run('run-digest', () => {
        const runConfig = withDryRun(config, dryRun);
        return createDigestRunner(runConfig, requireSecrets(runConfig))();
      });

      logger.info(`Digest finished: ${result.outcome}`);
      return result;
    }
  );
}
