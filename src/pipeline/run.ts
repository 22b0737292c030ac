/**
 * Newsbrief — Daily Brief Pipeline
 *
 * fetch → summarize → deliver, with run statistics.
 *
 * Modes:
 * - normal:    full run, report delivered
 * - dryRun:    full run, report returned but not delivered
 * - fetchOnly: stop after fetching
 * - test:      deliver a single test message, nothing fetched
 */

import { nanoid } from 'nanoid';
import type { TopicConfig } from '../types';
import type { Delivery } from '../delivery/whatsapp';
import { formatError } from '../delivery/formatter';
import { DeliveryError, errorMessage } from '../lib/errors';
import { logger, type Logger } from '../lib/logger';
import type { NewsFetcher, SourceOutcome } from '../news/fetcher';
import type { Summarizer } from '../summarize/summarizer';
import type { RunStats, RunStatus } from './stats';

export type RunMode = 'normal' | 'dryRun' | 'fetchOnly' | 'test';

export const TEST_MESSAGE = '*Newsbrief test message*\nDelivery is configured correctly.';

export interface PipelineDeps {
  topics: TopicConfig[];
  fetcher: Pick<NewsFetcher, 'fetchAllNews'>;
  summarizer: Summarizer;
  delivery: Delivery;
  stats: RunStats;
  now?: () => Date;
}

export interface TopicRunSummary {
  topicId: string;
  articles: number;
  fromCache: boolean;
  duplicatesRemoved: number;
  sources: SourceOutcome[];
}

export interface RunResult {
  runId: string;
  mode: RunMode;
  status: RunStatus;
  articles: number;
  topics: TopicRunSummary[];
  report?: string;
  delivered: boolean;
  durationMs: number;
  error?: string;
}

const STATUS_BY_MODE: Record<RunMode, RunStatus> = {
  normal: 'success',
  dryRun: 'dry_run',
  fetchOnly: 'fetch_only',
  test: 'test',
};

export async function runDailyBrief(deps: PipelineDeps, mode: RunMode = 'normal'): Promise<RunResult> {
  const now = deps.now ?? (() => new Date());
  const runId = nanoid(10);
  const startedAt = now();
  const startMs = Date.now();
  const log = logger.child({ runId, mode });

  log.info('Daily brief started', { topics: deps.topics.length });

  const result: RunResult = {
    runId,
    mode,
    status: STATUS_BY_MODE[mode],
    articles: 0,
    topics: [],
    delivered: false,
    durationMs: 0,
  };

  try {
    if (mode === 'test') {
      result.delivered = await deliverOrThrow(deps.delivery, TEST_MESSAGE);
    } else {
      const fetched = await deps.fetcher.fetchAllNews(deps.topics);
      result.articles = fetched.totalArticles;
      result.topics = fetched.topics.map(t => ({
        topicId: t.topicId,
        articles: t.articles.length,
        fromCache: t.fromCache,
        duplicatesRemoved: t.duplicatesRemoved,
        sources: t.sourceOutcomes,
      }));

      if (mode !== 'fetchOnly') {
        result.report = await deps.summarizer.summarize(fetched.news);

        if (mode === 'normal') {
          result.delivered = await deliverOrThrow(deps.delivery, result.report);
        }
      }
    }
  } catch (error) {
    result.status = 'failed';
    result.error = errorMessage(error);
    log.error('Daily brief failed', { error: result.error });

    if (mode !== 'dryRun') {
      await notifyFailure(deps.delivery, result.error, now(), log);
    }
  }

  result.durationMs = Date.now() - startMs;

  deps.stats.recordRun({
    runId,
    status: result.status,
    startedAt: startedAt.toISOString(),
    durationMs: result.durationMs,
    articles: result.articles,
    messagesSent: result.delivered ? 1 : 0,
    ...(result.error ? { error: result.error } : {}),
  });

  log.info('Daily brief finished', {
    status: result.status,
    articles: result.articles,
    delivered: result.delivered,
    durationMs: result.durationMs,
  });

  return result;
}

async function deliverOrThrow(delivery: Delivery, text: string): Promise<boolean> {
  const ok = await delivery.deliver(text);
  if (!ok) {
    throw new DeliveryError(`Delivery via ${delivery.name} failed`);
  }
  return true;
}

async function notifyFailure(
  delivery: Delivery,
  message: string,
  date: Date,
  log: Logger
): Promise<void> {
  try {
    const sent = await delivery.deliver(formatError(message, date));
    if (!sent) log.warn('Failure notice was not delivered');
  } catch (error) {
    log.warn('Failure notice could not be sent', { error: errorMessage(error) });
  }
}
