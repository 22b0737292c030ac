/**
 * Newsbrief — Health Server
 *
 * Health checks and a small Express app exposing them.
 *
 * Endpoints:
 * - GET /health            — overall status (503 when any check fails)
 * - GET /health/circuits   — circuit breaker registry status
 * - GET /stats             — run statistics for this process
 */

import express, { type Request, type Response } from 'express';
import type { Server } from 'http';
import { mkdir, unlink, writeFile } from 'fs/promises';
import { join } from 'path';
import type { Article, CacheStats, CircuitSnapshot } from '../types';
import { systemClock, type Clock } from '../lib/clock';
import type { AppConfig } from '../lib/config';
import { errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';
import type { CircuitBreakerRegistry, TtlCache } from '../resilience';
import type { RunStats } from '../pipeline/stats';

const log = logger.child({ module: 'health' });

// ============================================================
// CHECKS
// ============================================================

export interface HealthDeps {
  config: AppConfig;
  cache: TtlCache<Article[]>;
  breakers: CircuitBreakerRegistry;
  clock?: Clock;
}

export interface HealthReport {
  allOk: boolean;
  checkedAt: string;
  checks: {
    apiKeys: {
      ok: boolean;
      anthropic: boolean;
      newsApi: boolean;
      gnews: boolean;
      whatsapp: boolean;
    };
    cacheDirectory: { ok: boolean; path: string; error?: string };
    /** `recovering`: open, but the next call will be let through as a trial */
    circuits: { ok: boolean; open: string[]; recovering: string[] };
  };
  cache: CacheStats;
  circuits: CircuitSnapshot[];
}

async function probeWritable(directory: string): Promise<string | undefined> {
  const probe = join(directory, `.health-${process.pid}`);
  try {
    await mkdir(directory, { recursive: true });
    await writeFile(probe, 'ok', 'utf-8');
    await unlink(probe);
    return undefined;
  } catch (error) {
    return errorMessage(error);
  }
}

function recoveryDue(circuit: CircuitSnapshot, now: number): boolean {
  if (circuit.lastFailureAt === null) return false;
  return now - Date.parse(circuit.lastFailureAt) > circuit.recoveryTimeoutSeconds * 1000;
}

/**
 * The summarizer and delivery keys are required for a normal run; news API
 * keys are optional since the RSS sources need none.
 */
export async function runHealthChecks(deps: HealthDeps): Promise<HealthReport> {
  const { config, cache, breakers } = deps;

  const apiKeys = {
    anthropic: Boolean(config.anthropic.apiKey),
    newsApi: Boolean(config.newsApiKey),
    gnews: Boolean(config.gnewsApiKey),
    whatsapp: Boolean(config.whatsapp),
  };

  const writeError = await probeWritable(cache.directory);
  const circuits = breakers.status();
  const now = (deps.clock ?? systemClock).now();
  const open: string[] = [];
  const recovering: string[] = [];
  for (const circuit of circuits) {
    if (circuit.state !== 'open') continue;
    (recoveryDue(circuit, now) ? recovering : open).push(circuit.name);
  }

  const checks: HealthReport['checks'] = {
    apiKeys: { ok: apiKeys.anthropic && apiKeys.whatsapp, ...apiKeys },
    cacheDirectory: {
      ok: writeError === undefined,
      path: cache.directory,
      ...(writeError ? { error: writeError } : {}),
    },
    circuits: { ok: open.length === 0, open, recovering },
  };

  const allOk = Object.values(checks).every(check => check.ok);
  if (!allOk) {
    log.warn('Health check found issues', {
      failing: Object.entries(checks).filter(([, c]) => !c.ok).map(([name]) => name),
    });
  }

  return {
    allOk,
    checkedAt: new Date().toISOString(),
    checks,
    cache: await cache.stats(),
    circuits,
  };
}

// ============================================================
// HTTP
// ============================================================

export interface HealthAppDeps extends HealthDeps {
  stats: RunStats;
}

export function createHealthApp(deps: HealthAppDeps): express.Express {
  const app = express();

  app.get('/health', async (_req: Request, res: Response) => {
    try {
      const report = await runHealthChecks(deps);
      res.status(report.allOk ? 200 : 503).json({
        status: report.allOk ? 'ok' : 'degraded',
        ...report,
      });
    } catch (error) {
      log.error('Health check crashed', { error: errorMessage(error) });
      res.status(500).json({ status: 'error', error: errorMessage(error) });
    }
  });

  app.get('/health/circuits', (_req: Request, res: Response) => {
    res.json({ circuits: deps.breakers.status() });
  });

  app.get('/stats', (_req: Request, res: Response) => {
    res.json(deps.stats.summary());
  });

  return app;
}

export function startHealthServer(deps: HealthAppDeps, port: number): Server {
  const app = createHealthApp(deps);
  return app.listen(port, () => {
    log.info('Health server listening', { port });
  });
}
