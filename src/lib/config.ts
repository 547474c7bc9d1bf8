/**
 * Configuration System for the AI daily digest
 *
 * Provides centralized, type-safe configuration with:
 * - YAML file-based configuration (config.yaml)
 * - Environment-specific overrides (config.{env}.yaml)
 * - Environment variable overrides (highest priority)
 *
 * Priority (highest to lowest):
 * 1. Environment variables
 * 2. Environment-specific config file (config.dev.yaml, config.prod.yaml)
 * 3. Default config file (config.yaml)
 * 4. Built-in defaults
 */

import { z } from 'zod';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import YAML from 'yaml';
import { CronExpressionParser } from 'cron-parser';
import { ConfigError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('config');

// ============ Configuration Schema ============

function isValidCron(expression: string): boolean {
  try {
    CronExpressionParser.parse(expression);
    return true;
  } catch {
    return false;
  }
}

/**
 * Next occurrence of a cron schedule. Schedules are read in UTC, the way the
 * Inngest cron trigger reads them.
 */
export function nextScheduledRun(schedule: string, from: Date = new Date()): Date {
  return CronExpressionParser.parse(schedule, { tz: 'UTC', currentDate: from }).next().toDate();
}

const ServerConfigSchema = z.object({
  /** HTTP server port */
  port: z.number().int().positive().default(2900),
});

const InngestConfigSchema = z.object({
  /** Inngest dashboard/API URL */
  baseUrl: z.string().default('http://localhost:2901'),
  /** Event key for authentication */
  eventKey: z.string().optional(),
  /** Signing key for webhooks */
  signingKey: z.string().optional(),
});

const AnthropicConfigSchema = z.object({
  /** Messages API key */
  apiKey: z.string().min(1).optional(),
  /** Model with access to the web search tool */
  model: z.string().default('claude-sonnet-4-20250514'),
  /** Output token budget for the digest answer */
  maxTokens: z.number().int().positive().default(6144),
  /** Upper bound on web searches per request (unbounded when unset) */
  webSearchMaxUses: z.number().int().positive().optional(),
});

const SlackConfigSchema = z.object({
  /** Incoming webhook URL */
  webhookUrl: z.string().url().optional(),
});

const DigestConfigSchema = z.object({
  historyFile: z.string().default('./data/history.json'),
  /** Days of history kept for dedup */
  historyDays: z.number().int().min(0).default(3),
  maxStories: z.number().int().positive().default(15),
  /** Characters of raw model output posted when nothing parses */
  fallbackLimit: z.number().int().positive().default(3000),
  schedule: z
    .string()
    .refine(isValidCron, { message: 'schedule must be a valid cron expression' })
    .default('0 13 * * 1-5'),
  /** Print the payload instead of posting it */
  dryRun: z.boolean().default(false),
});

const LoggingConfigSchema = z.object({
  /** Log level: debug, info, warn, error */
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  /** Include timestamps in logs */
  timestamps: z.boolean().default(true),
  /** Use colors in console output */
  colors: z.boolean().default(true),
});

const ConfigSchema = z.object({
  /** Environment name */
  env: z.enum(['development', 'staging', 'production']).default('development'),
  server: ServerConfigSchema.default({}),
  inngest: InngestConfigSchema.default({}),
  anthropic: AnthropicConfigSchema.default({}),
  slack: SlackConfigSchema.default({}),
  digest: DigestConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type InngestConfig = z.infer<typeof InngestConfigSchema>;
export type AnthropicConfig = z.infer<typeof AnthropicConfigSchema>;
export type SlackConfig = z.infer<typeof SlackConfigSchema>;
export type DigestConfig = z.infer<typeof DigestConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export interface LoadConfigOptions {
  /** Directory holding config.yaml; defaults to the nearest package.json */
  root?: string;
  /** Environment to read overrides from; defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

// ============ Configuration Loading ============

let cachedConfig: Config | null = null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Find the project root by looking for package.json
 */
function findProjectRoot(): string {
  let dir = process.cwd();
  while (dir !== '/') {
    if (existsSync(join(dir, 'package.json'))) {
      return dir;
    }
    const parent = join(dir, '..');
    if (parent === dir) break;
    dir = parent;
  }
  return process.cwd();
}

/**
 * Load and parse a YAML config file
 */
function loadYamlFile(filePath: string): Record<string, unknown> | null {
  if (!existsSync(filePath)) {
    return null;
  }
  try {
    const parsed: unknown = YAML.parse(readFileSync(filePath, 'utf-8'));
    return isRecord(parsed) ? parsed : null;
  } catch (err) {
    log.error(`Error loading ${filePath}:`, err);
    return null;
  }
}

function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];
    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

const toInt = (v: string) => parseInt(v, 10);
const toBool = (v: string) => v === 'true' || v === '1';

/**
 * Environment variable to config path mappings
 */
const ENV_MAPPINGS: Array<[string, string[], (v: string) => unknown]> = [
  ['NODE_ENV', ['env'], (v) => (v === 'production' ? 'production' : v === 'staging' ? 'staging' : 'development')],
  ['DIGEST_ENV', ['env'], (v) => v],

  ['PORT', ['server', 'port'], toInt],

  ['INNGEST_BASE_URL', ['inngest', 'baseUrl'], (v) => v],
  ['INNGEST_EVENT_KEY', ['inngest', 'eventKey'], (v) => v],
  ['INNGEST_SIGNING_KEY', ['inngest', 'signingKey'], (v) => v],

  ['ANTHROPIC_API_KEY', ['anthropic', 'apiKey'], (v) => v],
  ['ANTHROPIC_MODEL', ['anthropic', 'model'], (v) => v],
  ['ANTHROPIC_MAX_TOKENS', ['anthropic', 'maxTokens'], toInt],
  ['WEB_SEARCH_MAX_USES', ['anthropic', 'webSearchMaxUses'], toInt],

  ['SLACK_WEBHOOK_URL', ['slack', 'webhookUrl'], (v) => v],

  ['HISTORY_FILE', ['digest', 'historyFile'], (v) => v],
  ['HISTORY_DAYS', ['digest', 'historyDays'], toInt],
  ['MAX_STORIES', ['digest', 'maxStories'], toInt],
  ['DIGEST_SCHEDULE', ['digest', 'schedule'], (v) => v],
  ['DIGEST_DRY_RUN', ['digest', 'dryRun'], toBool],

  ['LOG_LEVEL', ['logging', 'level'], (v) => v],
];

/**
 * Apply environment variable overrides
 */
function applyEnvOverrides(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv
): Record<string, unknown> {
  for (const [envKey, path, transform] of ENV_MAPPINGS) {
    const envValue = env[envKey];
    if (envValue === undefined || envValue === '') continue;

    let current = config;
    for (const key of path.slice(0, -1)) {
      const next = current[key];
      if (isRecord(next)) {
        current = next;
      } else {
        const created: Record<string, unknown> = {};
        current[key] = created;
        current = created;
      }
    }
    current[path[path.length - 1]] = transform(envValue);
  }

  return config;
}

/**
 * Load configuration with proper layering
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const projectRoot = options.root ?? findProjectRoot();

  let config: Record<string, unknown> = {};

  const baseConfig = loadYamlFile(join(projectRoot, 'config.yaml'));
  if (baseConfig) {
    config = deepMerge(config, baseConfig);
    log.debug('Loaded config.yaml');
  }

  const envName = env.NODE_ENV || env.DIGEST_ENV || 'development';
  const envShort = envName === 'production' ? 'prod' : envName === 'staging' ? 'staging' : 'dev';
  const envConfig = loadYamlFile(join(projectRoot, `config.${envShort}.yaml`));
  if (envConfig) {
    config = deepMerge(config, envConfig);
    log.debug(`Loaded config.${envShort}.yaml`);
  }

  config = applyEnvOverrides(config, env);

  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  cachedConfig = result.data;
  return cachedConfig;
}

/**
 * Get the current configuration
 */
export function getConfig(): Config {
  return cachedConfig ?? loadConfig();
}

/**
 * Reset configuration cache (for testing)
 */
export function resetConfig(): void {
  cachedConfig = null;
}

// ============ Secrets ============

export interface DigestSecrets {
  anthropicApiKey: string;
  slackWebhookUrl?: string;
}

/**
 * Pull the secrets a run needs out of the config.
 * The webhook URL may be absent only in dry-run mode.
 */
export function requireSecrets(config: Config): DigestSecrets {
  const missing: string[] = [];
  const anthropicApiKey = config.anthropic.apiKey;
  const slackWebhookUrl = config.slack.webhookUrl;

  if (!anthropicApiKey) missing.push('ANTHROPIC_API_KEY');
  if (!slackWebhookUrl && !config.digest.dryRun) missing.push('SLACK_WEBHOOK_URL');

  if (!anthropicApiKey || missing.length > 0) {
    throw new ConfigError(`Missing required environment: ${missing.join(', ')}`);
  }

  return { anthropicApiKey, slackWebhookUrl };
}
