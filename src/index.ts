/**
 * AI Daily Digest - scheduled runner
 *
 * Hosts the digest's Inngest functions via Express, with a few endpoints for
 * checking on the job and triggering a run by hand.
 */
import express from 'express';
import { serve } from 'inngest/express';
import chalk from 'chalk';
import boxen from 'boxen';
import { loadConfig, nextScheduledRun } from './lib/config.js';
import { configureLogger, createLogger } from './lib/logger.js';
import { errorMessage } from './lib/errors.js';
import { getRecentTitles, loadHistory } from './lib/history-store.js';
import { createInngestClient } from './inngest/client.js';
import { DigestRequestedSchema, EVENTS } from './inngest/events.js';
import { createDigestScheduler, createDigestWorker } from './workers/digest-worker.js';

const config = loadConfig();
configureLogger(config.logging);
const log = createLogger('server');

const inngest = createInngestClient(config.inngest);
const app = express();
const port = config.server.port;

// Parse JSON bodies
app.use(express.json());

// Health check
app.get('/health', (_req, res) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

// Retained history, as the next run will see it
app.get('/history', async (_req, res) => {
  try {
    const history = await loadHistory(config.digest.historyFile);
    res.json({
      retentionDays: config.digest.historyDays,
      recentTitles: getRecentTitles(history).length,
      history,
    });
  } catch (error) {
    res.status(500).json({ error: 'Failed to read history', details: errorMessage(error) });
  }
});

// Request a digest run now
app.post('/run', async (req, res) => {
  const parsed = DigestRequestedSchema.omit({ trigger: true }).safeParse(req.body ?? {});
  if (!parsed.success) {
    res.status(400).json({ success: false, error: parsed.error.issues.map((i) => i.message).join('; ') });
    return;
  }

  try {
    const { ids } = await inngest.send({
      name: EVENTS.DIGEST_REQUESTED,
      data: { trigger: 'api', dryRun: parsed.data.dryRun },
    });
    res.json({ success: true, eventIds: ids, message: 'Digest run requested' });
  } catch (error) {
    log.error('Failed to request digest run:', error);
    res.status(502).json({ success: false, error: errorMessage(error) });
  }
});

// Serve Inngest functions
app.use(
  '/api/inngest',
  serve({
    client: inngest,
    functions: [createDigestScheduler(inngest, config), createDigestWorker(inngest, config)],
    signingKey: config.inngest.signingKey,
  })
);

// Start server
app.listen(port, () => {
  const inngestUrl = config.inngest.baseUrl;
  const nextRun = nextScheduledRun(config.digest.schedule);

  console.log(
    boxen(
      `${chalk.bold.cyan('ai-daily-digest')} ${chalk.gray('v0.1.0')}\n\n` +
        `${chalk.green('▸')} Server:   ${chalk.yellow(`http://localhost:${port}`)}\n` +
        `${chalk.green('▸')} Inngest:  ${chalk.yellow(`http://localhost:${port}/api/inngest`)}\n` +
        `${chalk.green('▸')} Schedule: ${chalk.yellow(config.digest.schedule)} ${chalk.dim(`(next ${nextRun.toISOString()})`)}\n` +
        `${chalk.green('▸')} Model:    ${chalk.yellow(config.anthropic.model)}\n\n` +
        `${chalk.dim('Dashboard:')} ${chalk.blue(inngestUrl)}`,
      {
        padding: 1,
        margin: 1,
        borderStyle: 'round',
        borderColor: 'cyan',
      }
    )
  );
});
