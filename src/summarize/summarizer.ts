/**
 * Newsbrief — Summarizer
 *
 * Turns the deduplicated topic news into one WhatsApp-ready report.
 *
 * The LLM is a black box behind `CompletionFn`. Calls go through the LLM rate
 * limiter and are retried with backoff; when no key is configured the
 * BasicSummarizer produces a plain headline report instead.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { Article, TopicConfig, TopicNews } from '../types';
import type { ContentScraper } from '../content/scraper';
import { formatLongDate, formatReport } from '../delivery/formatter';
import { errorMessage } from '../lib/errors';
import { logger, timeOperation } from '../lib/logger';
import { withRetry, type RateLimiter, type RetryOptions } from '../resilience';

const log = logger.child({ module: 'summarizer' });

export const NOTHING_NOTABLE_MESSAGE =
  'Nothing notable in the news today. All quiet across your topics.';

/** Characters of scraped text sent per article */
const CONTENT_PER_ARTICLE = 1500;

const SYSTEM_PROMPT = `You are an expert news analyst. Your job is to:
1. Analyze news articles and extract what's truly important
2. Filter out time-wasting or irrelevant news
3. Present information in a clear, concise manner
4. Highlight actionable insights
5. Focus on what benefits the reader directly

Be extremely selective. Quality over quantity.`;

// ============================================================
// TYPES
// ============================================================

export interface Summarizer {
  readonly name: string;
  summarize(news: TopicNews): Promise<string>;
}

export interface CompletionRequest {
  system: string;
  user: string;
}

/**
 * One prompt in, the model's text out.
 */
export type CompletionFn = (request: CompletionRequest) => Promise<string>;

export interface AnthropicCompletionConfig {
  apiKey: string;
  model: string;
  maxTokens?: number;
  temperature?: number;
}

// ============================================================
// HELPERS
// ============================================================

export function countArticles(news: TopicNews): number {
  return Object.values(news).reduce((sum, articles) => sum + articles.length, 0);
}

export function topicNameMap(topics: TopicConfig[]): Record<string, string> {
  return Object.fromEntries(topics.map(t => [t.id, t.name]));
}

interface PromptArticle extends Article {
  content?: string;
}

export function buildUserPrompt(
  news: Record<string, PromptArticle[]>,
  topicNames: Record<string, string>,
  date: Date
): string {
  const sections = Object.entries(news)
    .filter(([, articles]) => articles.length > 0)
    .map(([topicId, articles]) => ({
      topic: topicNames[topicId] ?? topicId,
      articles,
    }));

  return `Today is ${formatLongDate(date)}.

Today's collected news:
${JSON.stringify(sections, null, 2)}

Create a concise daily intelligence report formatted for WhatsApp:
1. Start with a short greeting and today's date
2. For each topic, use the topic name as a *bold* header and give 2-3 insights as bullet points (•), drawing on the article content rather than repeating headlines
3. Highlight specific numbers or implications
4. End with 2-3 key takeaways

Use WhatsApp formatting only (*bold*, _italic_). No markdown headings, no links.`;
}

/**
 * CompletionFn backed by the Anthropic Messages API.
 */
export function createAnthropicCompletion(config: AnthropicCompletionConfig): CompletionFn {
  const client = new Anthropic({ apiKey: config.apiKey });

  return async ({ system, user }) => {
    const response = await client.messages.create({
      model: config.model,
      max_tokens: config.maxTokens ?? 2048,
      temperature: config.temperature ?? 0.3,
      system,
      messages: [{ role: 'user', content: user }],
    });

    const textContent = response.content.find(c => c.type === 'text');
    if (!textContent || textContent.type !== 'text') {
      throw new Error('No text content in response');
    }

    log.debug('LLM usage', {
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    });

    return textContent.text.trim();
  };
}

// ============================================================
// SUMMARIZERS
// ============================================================

export interface LlmSummarizerDeps {
  complete: CompletionFn;
  topicNames?: Record<string, string>;
  limiter?: RateLimiter;
  /** Enriches articles with page text before prompting */
  scraper?: ContentScraper;
  retry?: RetryOptions;
  now?: () => Date;
}

export class LlmSummarizer implements Summarizer {
  readonly name = 'llm';

  constructor(private readonly deps: LlmSummarizerDeps) {}

  async summarize(news: TopicNews): Promise<string> {
    if (countArticles(news) === 0) {
      log.info('No articles to summarize');
      return NOTHING_NOTABLE_MESSAGE;
    }

    const enriched = await this.enrich(news);
    const request: CompletionRequest = {
      system: SYSTEM_PROMPT,
      user: buildUserPrompt(enriched, this.deps.topicNames ?? {}, this.deps.now?.() ?? new Date()),
    };

    const call = () => {
      const { limiter } = this.deps;
      return limiter ? limiter.schedule(() => this.deps.complete(request)) : this.deps.complete(request);
    };

    const report = await timeOperation('LLM summary', () =>
      withRetry(call, { retries: 2, initialBackoffSeconds: 2, label: 'LLM summary', ...this.deps.retry })
    );

    log.info('Summary generated', { chars: report.length });
    return report;
  }

  private async enrich(news: TopicNews): Promise<Record<string, PromptArticle[]>> {
    const { scraper } = this.deps;
    if (!scraper) return news;

    const urls = Object.values(news).flatMap(articles => articles.map(a => a.url));
    log.info('Reading full articles', { urls: urls.length });

    let pages: Record<string, string> = {};
    try {
      pages = await scraper.fetchParallel(urls);
    } catch (error) {
      log.warn('Article scraping failed, summarizing headlines only', { error: errorMessage(error) });
    }

    const enriched: Record<string, PromptArticle[]> = {};
    for (const [topicId, articles] of Object.entries(news)) {
      enriched[topicId] = articles.map(article => {
        const content = pages[article.url] || article.description;
        return content ? { ...article, content: content.slice(0, CONTENT_PER_ARTICLE) } : article;
      });
    }
    return enriched;
  }
}

/**
 * Headline-only report, no model involved.
 */
export class BasicSummarizer implements Summarizer {
  readonly name = 'basic';

  constructor(
    private readonly topicNames: Record<string, string> = {},
    private readonly now: () => Date = () => new Date()
  ) {}

  async summarize(news: TopicNews): Promise<string> {
    if (countArticles(news) === 0) return NOTHING_NOTABLE_MESSAGE;
    return formatReport(news, { topicNames: this.topicNames, date: this.now() });
  }
}
