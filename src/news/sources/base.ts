/**
 * Newsbrief — News Source Base
 *
 * Abstract base class for upstream news sources. A source turns a topic's
 * keywords into articles and is free to throw; the fetcher runs every call
 * through the source's own circuit breaker and treats errors as zero
 * results.
 */

import type { Article, TopicConfig } from '../../types';
import type { CircuitBreakerOptions } from '../../resilience';
import { logger, type Logger } from '../../lib/logger';

export type SourceKind = 'api' | 'rss';

export abstract class NewsSource {
  /** Also the circuit breaker name */
  abstract readonly name: string;
  abstract readonly kind: SourceKind;

  /**
   * Breaker settings registered the first time this source's circuit is
   * created.
   */
  readonly circuit: CircuitBreakerOptions = { failureThreshold: 3, recoveryTimeoutSeconds: 300 };

  protected readonly logger: Logger = logger.child({ source: this.constructor.name });

  /**
   * False when the source lacks credentials; unconfigured sources are skipped.
   */
  isConfigured(): boolean {
    return true;
  }

  /**
   * Whether this source has anything to offer for the topic.
   */
  appliesTo(_topic: TopicConfig): boolean {
    return true;
  }

  abstract fetchRaw(keywords: string[], topic: TopicConfig): Promise<Article[]>;
}

/**
 * Map loosely-typed upstream entries to articles, dropping any without a title.
 */
export function toArticles<T>(
  entries: readonly T[],
  map: (entry: T) => { title?: string | null; source?: string | null; url?: string | null; description?: string | null }
): Article[] {
  const articles: Article[] = [];

  for (const entry of entries) {
    const { title, source, url, description } = map(entry);
    const cleanTitle = title?.trim();
    if (!cleanTitle) continue;

    articles.push({
      title: cleanTitle,
      source: source?.trim() || 'Unknown',
      url: url ?? '',
      ...(description ? { description: description.trim() } : {}),
    });
  }

  return articles;
}
