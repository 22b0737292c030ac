/**
 * Newsbrief — Content Scraper
 *
 * Pulls readable article text out of a news page using generic heuristics
 * (no per-site parsers):
 * 1. the <article> element, if it holds more than 200 characters of text
 * 2. a div whose class looks like an article body
 * 3. every <p> on the page
 *
 * The page is parsed with linkedom and junk elements (scripts, navigation,
 * forms and the like) are dropped first. Every failure (HTTP error, timeout,
 * network error) yields an empty string.
 */

import { parseHTML } from 'linkedom';
import { errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';
import { runPool } from '../lib/pool';

const log = logger.child({ module: 'scraper' });

const MAX_CONTENT_LENGTH = 5000;
const MIN_BLOCK_LENGTH = 200;

const TEXT_NODE = 3;
const ELEMENT_NODE = 1;

const JUNK_SELECTOR = ['script', 'style', 'nav', 'header', 'footer', 'aside', 'iframe', 'form', 'noscript', 'svg'].join(', ');

const BODY_CLASS_HINTS = [
  'article-body',
  'story-body',
  'content-body',
  'post-content',
  'entry-content',
  'main-content',
  'article-content',
  'story-content',
  'news-body',
];

/** The slice of the linkedom document the heuristics read. */
interface PageNode {
  readonly nodeType: number;
  readonly textContent: string | null;
  readonly childNodes: ArrayLike<PageNode>;
}

interface PageElement extends PageNode {
  getAttribute(name: string): string | null;
  remove(): void;
}

interface PageDocument {
  querySelector(selector: string): PageElement | null;
  querySelectorAll(selector: string): ArrayLike<PageElement>;
}

// ============================================================
// EXTRACTION
// ============================================================

/**
 * Text of every descendant text node, joined with blank lines. Comments
 * are skipped.
 */
function textOf(root: PageNode): string {
  const parts: string[] = [];
  const walk = (node: PageNode): void => {
    for (const child of Array.from(node.childNodes)) {
      if (child.nodeType === TEXT_NODE) parts.push(child.textContent ?? '');
      else if (child.nodeType === ELEMENT_NODE) walk(child);
    }
  };
  walk(root);
  return parts.join('\n\n');
}

function hasBodyClass(element: PageElement, hint: string): boolean {
  const pattern = new RegExp(hint, 'i');
  return (element.getAttribute('class') ?? '').split(/\s+/).some(name => pattern.test(name));
}

function parsePage(html: string): PageDocument {
  // linkedom only builds <html>/<body> for full documents
  const page = /<html[\s>]/i.test(html) ? html : `<!DOCTYPE html><html><body>${html}</body></html>`;
  const { document }: { document: PageDocument } = parseHTML(page);
  for (const junk of Array.from(document.querySelectorAll(JUNK_SELECTOR))) junk.remove();
  return document;
}

/**
 * Collapse whitespace and cap the length.
 */
export function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').slice(0, MAX_CONTENT_LENGTH).trim();
}

export function extractArticleText(html: string): string {
  const document = parsePage(html);

  const article = document.querySelector('article');
  if (article) {
    const text = textOf(article);
    if (text.length > MIN_BLOCK_LENGTH) return cleanText(text);
  }

  const divs = Array.from(document.querySelectorAll('div'));
  for (const hint of BODY_CLASS_HINTS) {
    const body = divs.find(div => hasBodyClass(div, hint));
    if (body) {
      const text = textOf(body);
      if (text.length > MIN_BLOCK_LENGTH) return cleanText(text);
    }
  }

  const paragraphs = Array.from(document.querySelectorAll('p'), p => p.textContent ?? '');
  return cleanText(paragraphs.join('\n\n'));
}

// ============================================================
// SCRAPER
// ============================================================

export interface ContentScraperOptions {
  /** Pages fetched at once (default 5) */
  concurrency?: number;
  /** Per-page timeout (default 5000 ms) */
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export class ContentScraper {
  private readonly concurrency: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ContentScraperOptions = {}) {
    this.concurrency = options.concurrency ?? 5;
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchContent(url: string): Promise<string> {
    if (!url) return '';

    try {
      const res = await this.fetchImpl(url, {
        headers: { 'User-Agent': 'Mozilla/5.0 (compatible; newsbrief/1.0)' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!res.ok) {
        log.warn('Page fetch failed', { url, status: res.status });
        return '';
      }

      return extractArticleText(await res.text());
    } catch (error) {
      log.warn('Scraping error', { url, error: errorMessage(error) });
      return '';
    }
  }

  /**
   * Fetch many pages with a bounded pool. Every non-empty URL gets an entry;
   * pages that failed or timed out map to ''.
   */
  async fetchParallel(urls: readonly string[]): Promise<Record<string, string>> {
    const results: Record<string, string> = {};
    const unique = Array.from(new Set(urls.filter(Boolean)));

    await runPool(unique, this.concurrency, async (url) => {
      results[url] = await this.fetchContent(url);
    });

    return results;
  }
}
