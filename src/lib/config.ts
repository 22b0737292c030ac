/**
 * Newsbrief — Configuration
 *
 * Reads settings from the environment (`.env` is loaded by the entry scripts
 * through dotenv) and topics from `config/topics.json`. Both are validated
 * with zod; every problem is reported at once through ConfigError.
 */

import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { TopicListSchema, type TopicConfig } from '../types';
import { ConfigError, errorMessage } from './errors';

// ============================================================
// ENVIRONMENT
// ============================================================

// Template values such as "YOUR_NEWSAPI_KEY" count as unset
const optionalSecret = z
  .string()
  .trim()
  .optional()
  .transform(value => (value && !value.includes('YOUR_') ? value : undefined));

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: optionalSecret,
  ANTHROPIC_MODEL: z.string().min(1).default('claude-3-5-haiku-20241022'),
  NEWS_API_KEY: optionalSecret,
  GNEWS_API_KEY: optionalSecret,
  WHATSAPP_TOKEN: optionalSecret,
  WHATSAPP_PHONE_NUMBER_ID: optionalSecret,
  WHATSAPP_RECIPIENT: z
    .string()
    .trim()
    .regex(/^\+?[1-9]\d{9,14}$/, 'must be an international phone number')
    .optional()
    .or(z.literal('').transform(() => undefined)),
  CACHE_DIR: z.string().min(1).default('cache'),
  CACHE_TTL_MINUTES: z.coerce.number().int().min(0).default(60),
  MAX_ARTICLES_PER_TOPIC: z.coerce.number().int().min(1).default(5),
  SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.65),
  SCRAPER_CONCURRENCY: z.coerce.number().int().min(1).default(5),
  SCRAPER_TIMEOUT_MS: z.coerce.number().int().min(100).default(5000),
  HEALTH_PORT: z.coerce.number().int().min(1).max(65535).default(3001),
});

export interface WhatsAppSettings {
  token: string;
  phoneNumberId: string;
  recipient: string;
}

export interface AppConfig {
  anthropic: { apiKey?: string; model: string };
  newsApiKey?: string;
  gnewsApiKey?: string;
  /** Present only when all three WhatsApp settings are configured */
  whatsapp?: WhatsAppSettings;
  cache: { directory: string; ttlMinutes: number };
  maxArticlesPerTopic: number;
  similarityThreshold: number;
  scraper: { concurrency: number; timeoutMs: number };
  healthPort: number;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Build the application config from environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }

  const e = parsed.data;
  const whatsapp =
    e.WHATSAPP_TOKEN && e.WHATSAPP_PHONE_NUMBER_ID && e.WHATSAPP_RECIPIENT
      ? {
          token: e.WHATSAPP_TOKEN,
          phoneNumberId: e.WHATSAPP_PHONE_NUMBER_ID,
          recipient: e.WHATSAPP_RECIPIENT.replace(/^\+/, ''),
        }
      : undefined;

  return {
    anthropic: { apiKey: e.ANTHROPIC_API_KEY, model: e.ANTHROPIC_MODEL },
    newsApiKey: e.NEWS_API_KEY,
    gnewsApiKey: e.GNEWS_API_KEY,
    whatsapp,
    cache: { directory: e.CACHE_DIR, ttlMinutes: e.CACHE_TTL_MINUTES },
    maxArticlesPerTopic: e.MAX_ARTICLES_PER_TOPIC,
    similarityThreshold: e.SIMILARITY_THRESHOLD,
    scraper: { concurrency: e.SCRAPER_CONCURRENCY, timeoutMs: e.SCRAPER_TIMEOUT_MS },
    healthPort: e.HEALTH_PORT,
  };
}

// ============================================================
// TOPICS
// ============================================================

export const DEFAULT_TOPICS_PATH = fileURLToPath(
  new URL('../../config/topics.json', import.meta.url)
);

/**
 * Validate a parsed topics document.
 */
export function parseTopics(raw: unknown): TopicConfig[] {
  const parsed = TopicListSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Read and validate the topics file.
 */
export async function loadTopics(path: string = DEFAULT_TOPICS_PATH): Promise<TopicConfig[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError([`${path}: ${errorMessage(error)}`]);
  }
  return parseTopics(raw);
}
