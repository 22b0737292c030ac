/**
 * Newsbrief — Local RSS Source
 *
 * Reads the fixed feed list configured on a topic (`localFeeds`). When the
 * topic lists cities, only entries mentioning one of them in the title or
 * summary are kept. A broken feed is logged and skipped; the call only
 * fails when every feed fails.
 */

import type { Article, TopicConfig } from '../../types';
import { errorMessage } from '../../lib/errors';
import { NewsSource, toArticles } from './base';
import { createFeedReader, type FeedEntry, type FeedReader } from './feed-reader';

export interface LocalRssSourceOptions {
  reader?: FeedReader;
  entriesPerFeed?: number;
}

export class LocalRssSource extends NewsSource {
  readonly name = 'local_rss';
  readonly kind = 'rss' as const;

  private readonly reader: FeedReader;
  private readonly entriesPerFeed: number;

  constructor(options: LocalRssSourceOptions = {}) {
    super();
    this.reader = options.reader ?? createFeedReader();
    this.entriesPerFeed = options.entriesPerFeed ?? 5;
  }

  appliesTo(topic: TopicConfig): boolean {
    return topic.localFeeds.length > 0;
  }

  async fetchRaw(_keywords: string[], topic: TopicConfig): Promise<Article[]> {
    const cities = topic.cities.map(c => c.toLowerCase());
    const articles: Article[] = [];
    const failures: string[] = [];

    for (const url of topic.localFeeds) {
      try {
        const feed = await this.reader(url);
        const publisher = feed.title || 'Local News';
        const entries = feed.items
          .slice(0, this.entriesPerFeed)
          .filter(entry => mentionsAny(entry, cities));

        articles.push(
          ...toArticles(entries, entry => ({
            title: entry.title,
            source: publisher,
            url: entry.link,
            description: entry.contentSnippet,
          }))
        );
      } catch (error) {
        failures.push(url);
        this.logger.warn('Local feed failed', { url, error: errorMessage(error) });
      }
    }

    if (topic.localFeeds.length > 0 && failures.length === topic.localFeeds.length) {
      throw new Error(`All ${failures.length} local feeds failed`);
    }

    return articles;
  }
}

function mentionsAny(entry: FeedEntry, cities: string[]): boolean {
  if (cities.length === 0) return true;
  const text = `${entry.title ?? ''} ${entry.summary ?? entry.contentSnippet ?? ''}`.toLowerCase();
  return cities.some(city => text.includes(city));
}
