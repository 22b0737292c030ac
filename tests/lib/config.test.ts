/**
 * Tests for configuration loading
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig, loadTopics, parseTopics, DEFAULT_TOPICS_PATH } from '../../src/lib/config';
import { ConfigError } from '../../src/lib/errors';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      anthropic: { apiKey: undefined, model: 'claude-3-5-haiku-20241022' },
      newsApiKey: undefined,
      gnewsApiKey: undefined,
      whatsapp: undefined,
      cache: { directory: 'cache', ttlMinutes: 60 },
      maxArticlesPerTopic: 5,
      similarityThreshold: 0.65,
      scraper: { concurrency: 5, timeoutMs: 5000 },
      healthPort: 3001,
    });
  });

  it('should coerce numeric settings', () => {
    const config = loadConfig({ CACHE_TTL_MINUTES: '15', SIMILARITY_THRESHOLD: '0.8', HEALTH_PORT: '8080' });

    expect(config.cache.ttlMinutes).toBe(15);
    expect(config.similarityThreshold).toBe(0.8);
    expect(config.healthPort).toBe(8080);
  });

  it('should treat template placeholders as unset', () => {
    const config = loadConfig({ NEWS_API_KEY: 'YOUR_NEWSAPI_KEY', GNEWS_API_KEY: '  test-gnews-key  ' });

    expect(config.newsApiKey).toBeUndefined();
    expect(config.gnewsApiKey).toBe('test-gnews-key');
  });

  it('should enable WhatsApp only when fully configured', () => {
    expect(loadConfig({ WHATSAPP_TOKEN: 'test-token' }).whatsapp).toBeUndefined();

    expect(
      loadConfig({
        WHATSAPP_TOKEN: 'test-token',
        WHATSAPP_PHONE_NUMBER_ID: '12345',
        WHATSAPP_RECIPIENT: '+923001234567',
      }).whatsapp
    ).toEqual({ token: 'test-token', phoneNumberId: '12345', recipient: '923001234567' });
  });

  it('should report every invalid setting at once', () => {
    try {
      loadConfig({ SIMILARITY_THRESHOLD: '2', WHATSAPP_RECIPIENT: 'not-a-number' });
      expect.fail('expected ConfigError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (!(error instanceof ConfigError)) return;
      expect(error.issues).toHaveLength(2);
      expect(error.issues.some(i => i.startsWith('SIMILARITY_THRESHOLD:'))).toBe(true);
      expect(error.issues.some(i => i.startsWith('WHATSAPP_RECIPIENT:'))).toBe(true);
    }
  });
});

describe('parseTopics', () => {
  it('should fill topic defaults', () => {
    expect(parseTopics([{ id: 'ai', name: 'AI', keywords: ['llm'] }])).toEqual([
      { id: 'ai', name: 'AI', keywords: ['llm'], priority: 'medium', localFeeds: [], cities: [] },
    ]);
  });

  it('should reject duplicate ids', () => {
    const topic = { id: 'ai', name: 'AI', keywords: ['llm'] };

    expect(() => parseTopics([topic, topic])).toThrow(ConfigError);
  });

  it('should reject topics without keywords', () => {
    expect(() => parseTopics([{ id: 'ai', name: 'AI', keywords: [] }])).toThrow(ConfigError);
  });

  it('should reject an empty list', () => {
    expect(() => parseTopics([])).toThrow(ConfigError);
  });
});

describe('loadTopics', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'newsbrief-topics-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load the bundled topics file', async () => {
    const topics = await loadTopics(DEFAULT_TOPICS_PATH);

    expect(topics.map(t => t.id)).toEqual(['ai', 'technology', 'local', 'business', 'science', 'sports']);
    expect(topics.find(t => t.id === 'local')?.localFeeds.length).toBeGreaterThan(0);
  });

  it('should wrap unreadable files in ConfigError', async () => {
    await expect(loadTopics(join(dir, 'missing.json'))).rejects.toBeInstanceOf(ConfigError);
  });

  it('should name the file and the read error in the issue', async () => {
    const path = join(dir, 'missing.json');

    await expect(loadTopics(path)).rejects.toMatchObject({
      issues: [`${path}: ENOENT: no such file or directory, open '${path}'`],
    });
  });

  it('should wrap malformed JSON in ConfigError', async () => {
    const path = join(dir, 'topics.json');
    await writeFile(path, '{ nope', 'utf-8');

    await expect(loadTopics(path)).rejects.toBeInstanceOf(ConfigError);
  });
});
