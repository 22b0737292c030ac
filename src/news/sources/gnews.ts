/**
 * Newsbrief — GNews Source
 *
 * https://gnews.io/api/v4/search. Requires GNEWS_API_KEY.
 */

import { z } from 'zod';
import type { Article } from '../../types';
import type { RateLimiter } from '../../resilience';
import { NewsSource, toArticles } from './base';

const GNEWS_URL = 'https://gnews.io/api/v4/search';
const REQUEST_TIMEOUT_MS = 10_000;

const GNewsResponseSchema = z.object({
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

export interface GNewsSourceOptions {
  apiKey?: string;
  limiter?: RateLimiter;
  fetchImpl?: typeof fetch;
  language?: string;
  max?: number;
}

export class GNewsSource extends NewsSource {
  readonly name = 'gnews';
  readonly kind = 'api' as const;

  private readonly apiKey?: string;
  private readonly limiter?: RateLimiter;
  private readonly fetchImpl: typeof fetch;
  private readonly language: string;
  private readonly max: number;

  constructor(options: GNewsSourceOptions = {}) {
    super();
    this.apiKey = options.apiKey;
    this.limiter = options.limiter;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.language = options.language ?? 'en';
    this.max = options.max ?? 10;
  }

  isConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  async fetchRaw(keywords: string[]): Promise<Article[]> {
    if (!this.apiKey) {
      throw new Error('GNEWS_API_KEY not configured');
    }

    const params = new URLSearchParams({
      q: keywords.slice(0, 2).join(' '),
      token: this.apiKey,
      lang: this.language,
      max: String(this.max),
    });

    const request = () =>
      this.fetchImpl(`${GNEWS_URL}?${params.toString()}`, {
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
    const res = this.limiter ? await this.limiter.schedule(request) : await request();

    if (!res.ok) {
      throw new Error(`GNews responded ${res.status}`);
    }

    const body = GNewsResponseSchema.parse(await res.json());

    return toArticles(body.articles, a => ({
      title: a.title,
      source: a.source?.name,
      url: a.url,
      description: a.description,
    }));
  }
}
