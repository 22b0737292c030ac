/**
 * Newsbrief — NewsAPI Source
 *
 * https://newsapi.org/v2/everything, newest first. Requires NEWS_API_KEY.
 */

import { z } from 'zod';
import type { Article } from '../../types';
import type { RateLimiter } from '../../resilience';
import { NewsSource, toArticles } from './base';

const NEWS_API_URL = 'https://newsapi.org/v2/everything';
const REQUEST_TIMEOUT_MS = 10_000;

const NewsApiResponseSchema = z.object({
  status: z.string(),
  articles: z
    .array(
      z.object({
        title: z.string().nullish(),
        url: z.string().nullish(),
        description: z.string().nullish(),
        source: z.object({ name: z.string().nullish() }).nullish(),
      })
    )
    .default([]),
});

export interface NewsApiSourceOptions {
  apiKey?: string;
  limiter?: RateLimiter;
  fetchImpl?: typeof fetch;
  language?: string;
  pageSize?: number;
}

export class NewsApiSource extends NewsSource {
  readonly name = 'newsapi';
  readonly kind = 'api' as const;

  private readonly apiKey?: string;
  private readonly limiter?: RateLimiter;
  private readonly fetchImpl: typeof fetch;
  private readonly language: string;
  private readonly pageSize: number;

  constructor(options: NewsApiSourceOptions = {}) {
    super();
    this.apiKey = options.apiKey;
    this.limiter = options.limiter;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.language = options.language ?? 'en';
    this.pageSize = options.pageSize ?? 10;
  }

  isConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  async fetchRaw(keywords: string[]): Promise<Article[]> {
    if (!this.apiKey) {
      throw new Error('NEWS_API_KEY not configured');
    }

    const params = new URLSearchParams({
      q: keywords.slice(0, 3).join(' OR '),
      apiKey: this.apiKey,
      language: this.language,
      sortBy: 'publishedAt',
      pageSize: String(this.pageSize),
    });

    const request = () =>
      this.fetchImpl(`${NEWS_API_URL}?${params.toString()}`, {
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
    const res = this.limiter ? await this.limiter.schedule(request) : await request();

    if (!res.ok) {
      throw new Error(`NewsAPI responded ${res.status}`);
    }

    const body = NewsApiResponseSchema.parse(await res.json());

    return toArticles(body.articles, a => ({
      title: a.title,
      source: a.source?.name,
      url: a.url,
      description: a.description,
    }));
  }
}
