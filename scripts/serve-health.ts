/**
 * Newsbrief — Health Server Script
 *
 * Usage:
 *   npm run health          # listens on HEALTH_PORT (default 3001)
 */

import 'dotenv/config';
import { createApp } from '../src/app';
import { loadConfig, loadTopics } from '../src/lib/config';
import { errorMessage } from '../src/lib/errors';
import { logger } from '../src/lib/logger';
import { startHealthServer } from '../src/server/health';

async function main(): Promise<void> {
  const app = createApp(loadConfig(), await loadTopics());
  startHealthServer(app, app.config.healthPort);
}

main().catch((error: unknown) => {
  logger.error('Health server failed to start', { error: errorMessage(error) });
  process.exitCode = 1;
});
