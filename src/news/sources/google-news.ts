/**
 * Newsbrief — Google News RSS Source
 *
 * Keyword search feeds from news.google.com. Needs no credentials, so it is
 * always available. A keyword whose feed fails is logged and skipped; the
 * call only fails when every keyword fails.
 */

import type { Article } from '../../types';
import { errorMessage } from '../../lib/errors';
import { NewsSource, toArticles } from './base';
import { createFeedReader, readSourceName, type FeedReader } from './feed-reader';

const GOOGLE_NEWS_RSS = 'https://news.google.com/rss/search';

export interface GoogleNewsSourceOptions {
  reader?: FeedReader;
  /** Keywords searched per topic */
  maxKeywords?: number;
  /** Entries taken from each keyword's feed */
  entriesPerKeyword?: number;
  /** Interface language, region and edition, e.g. en-PK / PK / PK:en */
  locale?: { hl: string; gl: string; ceid: string };
}

export class GoogleNewsSource extends NewsSource {
  readonly name = 'google_rss';
  readonly kind = 'rss' as const;

  private readonly reader: FeedReader;
  private readonly maxKeywords: number;
  private readonly entriesPerKeyword: number;
  private readonly locale: { hl: string; gl: string; ceid: string };

  constructor(options: GoogleNewsSourceOptions = {}) {
    super();
    this.reader = options.reader ?? createFeedReader();
    this.maxKeywords = options.maxKeywords ?? 3;
    this.entriesPerKeyword = options.entriesPerKeyword ?? 5;
    this.locale = options.locale ?? { hl: 'en-PK', gl: 'PK', ceid: 'PK:en' };
  }

  static searchUrl(keyword: string, locale: { hl: string; gl: string; ceid: string }): string {
    const params = new URLSearchParams({ q: keyword, ...locale });
    return `${GOOGLE_NEWS_RSS}?${params.toString()}`;
  }

  async fetchRaw(keywords: string[]): Promise<Article[]> {
    const searched = keywords.slice(0, this.maxKeywords);
    const articles: Article[] = [];
    const failures: string[] = [];

    for (const keyword of searched) {
      try {
        const feed = await this.reader(GoogleNewsSource.searchUrl(keyword, this.locale));
        articles.push(
          ...toArticles(feed.items.slice(0, this.entriesPerKeyword), entry => ({
            title: entry.title,
            source: readSourceName(entry.source) ?? 'Google News',
            url: entry.link,
            description: entry.contentSnippet,
          }))
        );
      } catch (error) {
        failures.push(keyword);
        this.logger.warn('Keyword feed failed', { keyword, error: errorMessage(error) });
      }
    }

    if (searched.length > 0 && failures.length === searched.length) {
      throw new Error(`All ${failures.length} keyword feeds failed`);
    }

    return articles;
  }
}
