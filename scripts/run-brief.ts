/**
 * Newsbrief — Daily Brief Script
 *
 * Fetches, summarizes and delivers today's brief.
 *
 * Usage:
 *   npm run brief                        # Full run, delivered via WhatsApp
 *   npm run brief -- --dry-run           # Print the report instead of sending
 *   npm run brief -- --fetch-only        # Fetch and dedupe only
 *   npm run brief -- --test              # Send a test message
 *   npm run brief -- --health            # Print the health report
 *   npm run brief -- --json-output       # Machine-readable result on stdout
 */

import 'dotenv/config';
import { createApp } from '../src/app';
import { loadConfig, loadTopics } from '../src/lib/config';
import { errorMessage } from '../src/lib/errors';
import { logger } from '../src/lib/logger';
import { formatHealthReport } from '../src/delivery';
import { runDailyBrief, type RunMode } from '../src/pipeline';
import { runHealthChecks } from '../src/server/health';

// ============================================================
// CONFIGURATION
// ============================================================

interface BriefOptions {
  mode: RunMode;
  health: boolean;
  jsonOutput: boolean;
}

function parseArgs(): BriefOptions {
  const args = process.argv.slice(2);
  const options: BriefOptions = {
    mode: 'normal',
    health: false,
    jsonOutput: false,
  };

  for (const arg of args) {
    if (arg === '--dry-run') {
      options.mode = 'dryRun';
    } else if (arg === '--fetch-only') {
      options.mode = 'fetchOnly';
    } else if (arg === '--test') {
      options.mode = 'test';
    } else if (arg === '--health') {
      options.health = true;
    } else if (arg === '--json-output') {
      options.jsonOutput = true;
    }
  }

  return options;
}

// ============================================================
// MAIN
// ============================================================

async function main(): Promise<number> {
  const options = parseArgs();
  const app = createApp(loadConfig(), await loadTopics());

  if (options.health) {
    const report = await runHealthChecks(app);
    console.log(options.jsonOutput ? JSON.stringify(report, null, 2) : formatHealthReport(report));
    return report.allOk ? 0 : 1;
  }

  const result = await runDailyBrief(app, options.mode);

  if (options.jsonOutput) {
    console.log(JSON.stringify({
      status: result.status === 'failed' ? 'error' : 'success',
      runId: result.runId,
      count: result.articles,
      report: result.report ?? null,
      ...(result.error ? { message: result.error } : {}),
    }));
  } else if (result.mode === 'dryRun' && result.report) {
    console.log(`--- REPORT PREVIEW ---\n${result.report}`);
  } else if (result.mode === 'fetchOnly') {
    console.log(`Fetched ${result.articles} articles.`);
    for (const topic of result.topics) {
      const sources = topic.sources.map(s => `${s.source}:${s.status}`).join(', ');
      console.log(`  ${topic.topicId}: ${topic.articles}${topic.fromCache ? ' (cached)' : ''} ${sources}`);
    }
  }

  return result.status === 'failed' ? 1 : 0;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('Daily brief crashed', { error: errorMessage(error) });
    console.error('\nDaily brief failed:', errorMessage(error));
    process.exitCode = 1;
  });
