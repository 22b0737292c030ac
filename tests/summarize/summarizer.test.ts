/**
 * Tests for report summarizers
 */

import { describe, it, expect, vi } from 'vitest';
import {
  BasicSummarizer,
  LlmSummarizer,
  NOTHING_NOTABLE_MESSAGE,
  buildUserPrompt,
  countArticles,
  topicNameMap,
  type CompletionRequest,
} from '../../src/summarize/summarizer';
import { ContentScraper } from '../../src/content/scraper';
import { RateLimiter } from '../../src/resilience';
import { FakeClock } from '../helpers/fake-clock';
import { makeArticle, makeTopic } from '../helpers/fixtures';

const NOW = new Date('2024-06-01T07:00:00.000Z');

describe('helpers', () => {
  it('should count articles across topics', () => {
    expect(countArticles({ a: [makeArticle('1'), makeArticle('2')], b: [], c: [makeArticle('3')] })).toBe(3);
  });

  it('should map topic ids to names', () => {
    expect(topicNameMap([makeTopic({ id: 'ai', name: 'AI & Tech' })])).toEqual({ ai: 'AI & Tech' });
  });

  it('should build a prompt with the date and non-empty topics only', () => {
    const prompt = buildUserPrompt(
      { ai: [{ ...makeArticle('Model released', 'Wire'), content: 'Body text' }], sports: [] },
      { ai: 'Artificial Intelligence' },
      NOW
    );

    expect(prompt.startsWith('Today is June 1, 2024.')).toBe(true);
    expect(prompt).toContain('"topic": "Artificial Intelligence"');
    expect(prompt).toContain('"content": "Body text"');
    expect(prompt).not.toContain('sports');
  });
});

describe('LlmSummarizer', () => {
  const news = { ai: [makeArticle('Model released', 'Wire', 'https://example.com/model')] };

  it('should skip the model when there is nothing to summarize', async () => {
    const complete = vi.fn(async (_request: CompletionRequest) => 'unused');

    const summary = await new LlmSummarizer({ complete }).summarize({ ai: [], local: [] });

    expect(summary).toBe(NOTHING_NOTABLE_MESSAGE);
    expect(complete).not.toHaveBeenCalled();
  });

  it('should return the model output', async () => {
    const complete = vi.fn(async (_request: CompletionRequest) => '*Daily brief*');

    const summary = await new LlmSummarizer({ complete, now: () => NOW }).summarize(news);

    expect(summary).toBe('*Daily brief*');
    expect(complete).toHaveBeenCalledTimes(1);
    expect(complete.mock.calls[0][0].system).toContain('expert news analyst');
  });

  it('should retry failed completions', async () => {
    const clock = new FakeClock();
    const complete = vi.fn(async (_request: CompletionRequest) => '*Recovered*');
    complete.mockRejectedValueOnce(new Error('overloaded'));

    const summary = await new LlmSummarizer({ complete, retry: { clock } }).summarize(news);

    expect(summary).toBe('*Recovered*');
    expect(complete).toHaveBeenCalledTimes(2);
    expect(clock.sleeps).toEqual([2000]);
  });

  it('should propagate the error when every attempt fails', async () => {
    const complete = vi.fn(async (_request: CompletionRequest): Promise<string> => {
      throw new Error('quota exceeded');
    });

    await expect(
      new LlmSummarizer({ complete, retry: { retries: 1, clock: new FakeClock() } }).summarize(news)
    ).rejects.toThrow('quota exceeded');
    expect(complete).toHaveBeenCalledTimes(2);
  });

  it('should take a limiter slot per completion', async () => {
    const limiter = new RateLimiter({ maxCalls: 60, windowSeconds: 60, clock: new FakeClock() });

    await new LlmSummarizer({ complete: async () => 'ok', limiter }).summarize(news);

    expect(limiter.status().inWindow).toBe(1);
  });

  it('should include scraped page text in the prompt', async () => {
    const fetchImpl = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      new Response('<p>Full story text</p>', { status: 200 })
    );
    const complete = vi.fn(async (_request: CompletionRequest) => 'ok');

    await new LlmSummarizer({ complete, scraper: new ContentScraper({ fetchImpl }) }).summarize(news);

    expect(String(fetchImpl.mock.calls[0][0])).toBe('https://example.com/model');
    expect(complete.mock.calls[0][0].user).toContain('"content": "Full story text"');
  });
});

describe('BasicSummarizer', () => {
  it('should produce a headline report', async () => {
    const summary = await new BasicSummarizer({ ai: 'AI' }, () => NOW).summarize({ ai: [makeArticle('Model released', 'Wire')] });

    expect(summary).toContain('*AI*\n  1. Model released\n     _via Wire_');
  });

  it('should report a quiet day', async () => {
    expect(await new BasicSummarizer().summarize({})).toBe(NOTHING_NOTABLE_MESSAGE);
  });
});
