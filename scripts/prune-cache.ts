/**
 * Newsbrief — Cache Prune Script
 *
 * Deletes cache entries older than the given age.
 *
 * Usage:
 *   npm run cache:prune                      # older than 1 day
 *   npm run cache:prune -- --max-age 120     # older than 2 hours
 */

import 'dotenv/config';
import { ArticleListSchema } from '../src/types';
import { loadConfig } from '../src/lib/config';
import { errorMessage } from '../src/lib/errors';
import { logger } from '../src/lib/logger';
import { TtlCache } from '../src/resilience';

const DEFAULT_MAX_AGE_MINUTES = 1440;

function parseMaxAge(): number {
  const args = process.argv.slice(2);
  const index = args.indexOf('--max-age');
  if (index === -1 || !args[index + 1]) return DEFAULT_MAX_AGE_MINUTES;

  const value = Number(args[index + 1]);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`--max-age must be a non-negative number of minutes, got "${args[index + 1]}"`);
  }
  return value;
}

async function main(): Promise<void> {
  const maxAge = parseMaxAge();
  const config = loadConfig();
  const cache = new TtlCache(config.cache.directory, ArticleListSchema);

  const removed = await cache.prune(maxAge);
  const stats = await cache.stats();
  console.log(`Removed ${removed} entries; ${stats.entries} remain (${stats.bytes} bytes).`);
}

main().catch((error: unknown) => {
  logger.error('Cache prune failed', { error: errorMessage(error) });
  process.exitCode = 1;
});
