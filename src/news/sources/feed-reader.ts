/**
 * Newsbrief — RSS Feed Reader
 *
 * Thin wrapper over rss-parser so RSS sources can be tested with a stub.
 */

import Parser from 'rss-parser';

const FEED_TIMEOUT_MS = 10_000;

export interface FeedEntry {
  title?: string;
  link?: string;
  contentSnippet?: string;
  summary?: string;
  /** Google News puts the publisher here, as text or as { _: text } */
  source?: unknown;
}

export interface FeedDocument {
  title?: string;
  items: FeedEntry[];
}

export type FeedReader = (url: string) => Promise<FeedDocument>;

export function createFeedReader(): FeedReader {
  const parser = new Parser<Record<string, unknown>, { source?: unknown }>({
    timeout: FEED_TIMEOUT_MS,
    headers: {
      'User-Agent': 'newsbrief/1.0 (+rss reader)',
      Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*',
    },
    customFields: {
      item: ['source'],
    },
  });

  return async (url) => {
    const feed = await parser.parseURL(url);
    return { title: feed.title, items: feed.items };
  };
}

/**
 * Publisher name from an entry's `source` field, if it carries one.
 */
export function readSourceName(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'object' && value !== null && '_' in value && typeof value._ === 'string') {
    return value._;
  }
  return undefined;
}
