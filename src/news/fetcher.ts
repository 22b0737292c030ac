/**
 * Newsbrief — News Fetcher
 *
 * Per-topic fetch pipeline:
 * 1. Serve from the TTL cache when a fresh entry exists
 * 2. Otherwise call every applicable source through its circuit breaker
 * 3. Merge, drop exact repeats, then cluster near-duplicates
 * 4. Write the result back to the cache
 *
 * A failing source contributes zero articles. An open circuit is reported
 * separately so callers can tell "skipped" from "returned nothing".
 */

import type { Article, TopicConfig, TopicNews } from '../types';
import type { CircuitBreakerRegistry, TtlCache } from '../resilience';
import { CircuitOpenError, errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';
import type { NewsClusterer } from './clusterer';
import type { NewsSource } from './sources';

const log = logger.child({ module: 'fetcher' });

// ============================================================
// TYPES
// ============================================================

export interface NewsFetcherConfig {
  /** Max age of a cached topic before sources are called again */
  cacheTtlMinutes?: number;
  maxArticlesPerTopic?: number;
  /** Characters of the lower-cased title compared by the exact-repeat pass */
  titlePrefixLength?: number;
}

export interface NewsFetcherDeps {
  sources: NewsSource[];
  cache: TtlCache<Article[]>;
  breakers: CircuitBreakerRegistry;
  clusterer: NewsClusterer;
}

export type SourceOutcomeStatus = 'ok' | 'failed' | 'circuit_open';

export interface SourceOutcome {
  source: string;
  status: SourceOutcomeStatus;
  articles: number;
  durationMs: number;
  error?: string;
}

export interface TopicFetchResult {
  topicId: string;
  articles: Article[];
  fromCache: boolean;
  /** Empty when served from cache */
  sourceOutcomes: SourceOutcome[];
  duplicatesRemoved: number;
}

export interface FetchAllResult {
  news: TopicNews;
  topics: TopicFetchResult[];
  totalArticles: number;
}

const DEFAULT_CONFIG: Required<NewsFetcherConfig> = {
  cacheTtlMinutes: 60,
  maxArticlesPerTopic: 5,
  titlePrefixLength: 50,
};

// ============================================================
// HELPERS
// ============================================================

export function cacheKeyForTopic(topicId: string): string {
  return `news_${topicId}`;
}

/**
 * Drop articles whose title starts exactly like an earlier one.
 */
export function dropExactRepeats(articles: Article[], prefixLength: number): Article[] {
  const seen = new Set<string>();
  return articles.filter(article => {
    const key = article.title.toLowerCase().slice(0, prefixLength);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

// ============================================================
// FETCHER
// ============================================================

export class NewsFetcher {
  private readonly config: Required<NewsFetcherConfig>;

  constructor(
    private readonly deps: NewsFetcherDeps,
    config: NewsFetcherConfig = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Fetch every topic. Topics are independent; one topic's failures never
   * affect another's.
   */
  async fetchAllNews(topics: TopicConfig[]): Promise<FetchAllResult> {
    const results: TopicFetchResult[] = [];
    const news: TopicNews = {};

    for (const topic of topics) {
      log.info('Fetching topic', { topic: topic.id, name: topic.name });
      const result = await this.fetchTopic(topic);
      results.push(result);
      news[topic.id] = result.articles;
    }

    const totalArticles = results.reduce((sum, r) => sum + r.articles.length, 0);
    log.info('Fetch completed', {
      topics: results.length,
      totalArticles,
      fromCache: results.filter(r => r.fromCache).length,
    });

    return { news, topics: results, totalArticles };
  }

  async fetchTopic(topic: TopicConfig): Promise<TopicFetchResult> {
    const key = cacheKeyForTopic(topic.id);
    const cached = await this.deps.cache.get(key, this.config.cacheTtlMinutes);

    if (cached && cached.length > 0) {
      return {
        topicId: topic.id,
        articles: cached.slice(0, this.config.maxArticlesPerTopic),
        fromCache: true,
        sourceOutcomes: [],
        duplicatesRemoved: 0,
      };
    }

    const merged: Article[] = [];
    const sourceOutcomes: SourceOutcome[] = [];

    for (const source of this.deps.sources) {
      if (!source.isConfigured() || !source.appliesTo(topic)) continue;

      const { outcome, articles } = await this.fetchFromSource(source, topic);
      sourceOutcomes.push(outcome);
      merged.push(...articles);
    }

    const repeatsDropped = dropExactRepeats(merged, this.config.titlePrefixLength);
    const { kept, removed } = this.deps.clusterer.dedupeTopic(repeatsDropped);
    const duplicatesRemoved = merged.length - repeatsDropped.length + removed;

    if (kept.length > 0) {
      await this.deps.cache.set(key, kept);
    }

    log.info('Topic fetched', {
      topic: topic.id,
      merged: merged.length,
      unique: kept.length,
      duplicatesRemoved,
    });

    return {
      topicId: topic.id,
      articles: kept.slice(0, this.config.maxArticlesPerTopic),
      fromCache: false,
      sourceOutcomes,
      duplicatesRemoved,
    };
  }

  private async fetchFromSource(
    source: NewsSource,
    topic: TopicConfig
  ): Promise<{ outcome: SourceOutcome; articles: Article[] }> {
    const startTime = Date.now();
    const breaker = this.deps.breakers.get(source.name, source.circuit);

    try {
      const articles = await breaker.execute(() => source.fetchRaw(topic.keywords, topic));
      return {
        outcome: {
          source: source.name,
          status: 'ok',
          articles: articles.length,
          durationMs: Date.now() - startTime,
        },
        articles,
      };
    } catch (error) {
      const status: SourceOutcomeStatus = error instanceof CircuitOpenError ? 'circuit_open' : 'failed';
      const message = errorMessage(error);

      log.warn('Source fetch failed', { source: source.name, topic: topic.id, status, error: message });

      return {
        outcome: {
          source: source.name,
          status,
          articles: 0,
          durationMs: Date.now() - startTime,
          error: message,
        },
        articles: [],
      };
    }
  }
}
