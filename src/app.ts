/**
 * Newsbrief — Application Wiring
 *
 * Builds every long-lived collaborator from the validated config. One
 * instance per process: the breaker registry and limiters live here so all
 * callers share them.
 */

import { ArticleListSchema, type Article, type TopicConfig } from './types';
import type { AppConfig } from './lib/config';
import { systemClock, type Clock } from './lib/clock';
import { logger } from './lib/logger';
import {
  CircuitBreakerRegistry,
  TtlCache,
  createDefaultLimiters,
  type DefaultLimiters,
} from './resilience';
import {
  GNewsSource,
  GoogleNewsSource,
  LocalRssSource,
  NewsApiSource,
  NewsClusterer,
  NewsFetcher,
  createFeedReader,
  type FeedReader,
} from './news';
import { ContentScraper } from './content/scraper';
import {
  BasicSummarizer,
  LlmSummarizer,
  createAnthropicCompletion,
  topicNameMap,
  type CompletionFn,
  type Summarizer,
} from './summarize';
import { ConsoleDelivery, WhatsAppDelivery, type Delivery } from './delivery';
import { RunStats } from './pipeline/stats';

export interface AppOverrides {
  clock?: Clock;
  fetchImpl?: typeof fetch;
  feedReader?: FeedReader;
  completion?: CompletionFn;
  delivery?: Delivery;
}

export interface App {
  config: AppConfig;
  topics: TopicConfig[];
  cache: TtlCache<Article[]>;
  breakers: CircuitBreakerRegistry;
  clock: Clock;
  limiters: DefaultLimiters;
  fetcher: NewsFetcher;
  summarizer: Summarizer;
  delivery: Delivery;
  stats: RunStats;
}

export function createApp(
  config: AppConfig,
  topics: TopicConfig[],
  overrides: AppOverrides = {}
): App {
  const clock = overrides.clock ?? systemClock;
  const reader = overrides.feedReader ?? createFeedReader();
  const limiters = createDefaultLimiters(clock);
  const breakers = new CircuitBreakerRegistry(clock);
  const cache = new TtlCache(config.cache.directory, ArticleListSchema, { clock });
  const topicNames = topicNameMap(topics);

  const fetcher = new NewsFetcher(
    {
      sources: [
        new NewsApiSource({ apiKey: config.newsApiKey, limiter: limiters.newsApi, fetchImpl: overrides.fetchImpl }),
        new GNewsSource({ apiKey: config.gnewsApiKey, limiter: limiters.gnews, fetchImpl: overrides.fetchImpl }),
        new GoogleNewsSource({ reader }),
        new LocalRssSource({ reader }),
      ],
      cache,
      breakers,
      clusterer: new NewsClusterer(config.similarityThreshold),
    },
    {
      cacheTtlMinutes: config.cache.ttlMinutes,
      maxArticlesPerTopic: config.maxArticlesPerTopic,
    }
  );

  const completion =
    overrides.completion ??
    (config.anthropic.apiKey
      ? createAnthropicCompletion({ apiKey: config.anthropic.apiKey, model: config.anthropic.model })
      : undefined);

  let summarizer: Summarizer;
  if (completion) {
    summarizer = new LlmSummarizer({
      complete: completion,
      topicNames,
      limiter: limiters.llm,
      scraper: new ContentScraper({ ...config.scraper, fetchImpl: overrides.fetchImpl }),
      retry: { clock },
    });
  } else {
    logger.warn('ANTHROPIC_API_KEY not set, using headline-only reports');
    summarizer = new BasicSummarizer(topicNames);
  }

  let delivery: Delivery;
  if (overrides.delivery) {
    delivery = overrides.delivery;
  } else if (config.whatsapp) {
    delivery = new WhatsAppDelivery(config.whatsapp, {
      fetchImpl: overrides.fetchImpl,
      retry: { clock },
    });
  } else {
    logger.warn('WhatsApp not configured, reports will be printed');
    delivery = new ConsoleDelivery();
  }

  return {
    config,
    topics,
    cache,
    breakers,
    clock,
    limiters,
    fetcher,
    summarizer,
    delivery,
    stats: new RunStats(),
  };
}
