/**
 * End-to-end wiring test: config -> sources -> cache -> summary -> delivery
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { createApp } from '../src/app';
import { loadConfig } from '../src/lib/config';
import { runDailyBrief } from '../src/pipeline/run';
import { BasicSummarizer, LlmSummarizer, type CompletionRequest } from '../src/summarize/summarizer';
import { ConsoleDelivery } from '../src/delivery/whatsapp';
import type { FeedDocument } from '../src/news/sources';
import { FakeClock } from './helpers/fake-clock';
import { makeTopic } from './helpers/fixtures';

describe('createApp', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'newsbrief-app-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const topics = [
    makeTopic({ id: 'ai', name: 'Artificial Intelligence', keywords: ['llm'] }),
    makeTopic({ id: 'local', name: 'Local', keywords: ['city'], localFeeds: ['https://feeds.example.com/local'], cities: ['Lahore'] }),
  ];

  const feeds = async (url: string): Promise<FeedDocument> => {
    if (url === 'https://feeds.example.com/local') {
      return { title: 'City Daily', items: [{ title: 'Lahore canal cleanup starts', link: 'https://example.com/lahore' }] };
    }
    const keyword = new URL(url).searchParams.get('q') ?? '';
    return {
      items: [
        { title: `${keyword} startup raises funding`, link: `https://example.com/${keyword}/1`, source: 'Wire' },
        { title: `${keyword} startup raises funding round`, link: `https://example.com/${keyword}/2`, source: 'Wire' },
      ],
    };
  };

  it('should fall back to headline reports and console delivery without keys', () => {
    const app = createApp(loadConfig({ CACHE_DIR: dir }), topics, { feedReader: feeds });

    expect(app.summarizer).toBeInstanceOf(BasicSummarizer);
    expect(app.delivery).toBeInstanceOf(ConsoleDelivery);
  });

  it('should run a full brief through the shared resources', async () => {
    const deliver = vi.fn(async (_text: string) => true);
    const complete = vi.fn(async (_request: CompletionRequest) => '*Today in brief*');
    const fetchImpl = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      new Response('<p>Article body</p>', { status: 200 })
    );
    const app = createApp(loadConfig({ CACHE_DIR: dir }), topics, {
      clock: new FakeClock(Date.parse('2024-06-01T06:00:00.000Z')),
      feedReader: feeds,
      completion: complete,
      delivery: { name: 'capture', deliver },
      fetchImpl,
    });

    expect(app.summarizer).toBeInstanceOf(LlmSummarizer);

    const result = await runDailyBrief(app);

    expect(result.status).toBe('success');
    expect(result.articles).toBe(3);
    // Google News serves every topic; the local feed adds to the local topic only
    expect(result.topics.map(t => [t.topicId, t.articles, t.duplicatesRemoved])).toEqual([
      ['ai', 1, 1],
      ['local', 2, 1],
    ]);
    expect(deliver).toHaveBeenCalledWith('*Today in brief*');
    expect(app.limiters.llm.status().inWindow).toBe(1);
    expect(app.breakers.status().map(c => c.name)).toEqual(['google_rss', 'local_rss']);
    expect((await app.cache.stats()).entries).toBe(2);

    const again = await runDailyBrief(app, 'fetchOnly');
    expect(again.topics.every(t => t.fromCache)).toBe(true);
  });
});
