/**
 * Shared test builders
 */

import { TopicConfigSchema, type Article, type TopicConfig, type TopicConfigInput } from '../../src/types';

export function makeTopic(input: Partial<TopicConfigInput> & { id: string }): TopicConfig {
  return TopicConfigSchema.parse({
    name: input.id.toUpperCase(),
    keywords: [input.id],
    ...input,
  });
}

export function makeArticle(title: string, source = 'Wire', url = `https://example.com/${encodeURIComponent(title)}`): Article {
  return { title, source, url };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
