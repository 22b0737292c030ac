/**
 * Tests for article text extraction and parallel scraping
 */

import { describe, it, expect, vi } from 'vitest';
import { ContentScraper, cleanText, extractArticleText } from '../../src/content/scraper';

const LONG = 'word '.repeat(50);

describe('cleanText', () => {
  it('should collapse whitespace and trim', () => {
    expect(cleanText('  a \n\n b\t c  ')).toBe('a b c');
  });

  it('should cap the text at 5000 characters', () => {
    expect(cleanText('a'.repeat(6000))).toHaveLength(5000);
  });
});

describe('extractArticleText', () => {
  it('should prefer a substantial <article> element', () => {
    const html = `<html><body><nav>Menu</nav><article><h1>Title</h1><p>${LONG}</p></article><p>Outside</p></body></html>`;

    expect(extractArticleText(html)).toBe(`Title ${LONG.trim()}`);
  });

  it('should use an article-body div when there is no usable <article>', () => {
    const html = `<article>Tiny</article><div class="story-body wide">${LONG}</div><p>Footer text</p>`;

    expect(extractArticleText(html)).toBe(LONG.trim());
  });

  it('should keep the whole article-body div when it holds nested divs', () => {
    const lead = 'Lead paragraph text. '.repeat(12);
    const body = 'Body sentence. '.repeat(20);
    const html = `<div class="article-body"><div class="lead">${lead}</div><div class="text">${body}</div></div>`;

    expect(extractArticleText(html)).toBe(`${lead.trim()} ${body.trim()}`);
  });

  it('should drop junk elements inside the article', () => {
    const html = `<article><form>Subscribe now</form><aside>Related</aside><p>${LONG}</p></article>`;

    expect(extractArticleText(html)).toBe(LONG.trim());
  });

  it('should fall back to all paragraphs', () => {
    const html = '<article><p>Short</p></article><p>One &amp; two</p>';

    expect(extractArticleText(html)).toBe('Short One & two');
  });

  it('should ignore scripts, styles and comments', () => {
    const html = '<script>var x = "<p>bad</p>";</script><style>p{}</style><!-- <p>hidden</p> --><p>Good</p>';

    expect(extractArticleText(html)).toBe('Good');
  });

  it('should decode numeric entities', () => {
    expect(extractArticleText('<p>caf&#233; &#x2014; open</p>')).toBe('café — open');
  });

  it('should return an empty string when nothing matches', () => {
    expect(extractArticleText('<div>no paragraphs</div>')).toBe('');
  });
});

describe('ContentScraper', () => {
  const page = (body: string, status = 200) => new Response(body, { status, headers: { 'Content-Type': 'text/html' } });

  it('should return page text', async () => {
    const fetchImpl = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => page('<p>Hello</p>'));
    const scraper = new ContentScraper({ fetchImpl });

    expect(await scraper.fetchContent('https://example.com/a')).toBe('Hello');
  });

  it('should return an empty string on HTTP errors', async () => {
    const fetchImpl = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => page('<p>Gone</p>', 404));

    expect(await new ContentScraper({ fetchImpl }).fetchContent('https://example.com/a')).toBe('');
  });

  it('should return an empty string on network errors', async () => {
    const fetchImpl = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
      throw new Error('ECONNREFUSED');
    });

    expect(await new ContentScraper({ fetchImpl }).fetchContent('https://example.com/a')).toBe('');
  });

  it('should skip empty URLs without fetching', async () => {
    const fetchImpl = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => page('<p>x</p>'));

    expect(await new ContentScraper({ fetchImpl }).fetchContent('')).toBe('');
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('should give up on a slow URL without holding back the batch', async () => {
    const fetchImpl = vi.fn((input: string | URL | Request, init?: RequestInit): Promise<Response> => {
      if (String(input).endsWith('/fast')) return Promise.resolve(page('<p>Fast page</p>'));
      return new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });
    });
    const scraper = new ContentScraper({ fetchImpl, timeoutMs: 20 });

    const results = await scraper.fetchParallel(['https://example.com/slow', 'https://example.com/fast']);

    expect(results).toEqual({
      'https://example.com/slow': '',
      'https://example.com/fast': 'Fast page',
    });
  });

  it('should fetch each distinct URL once in parallel', async () => {
    const fetchImpl = vi.fn(async (input: string | URL | Request, _init?: RequestInit) =>
      String(input).endsWith('/bad') ? page('', 500) : page(`<p>Text of ${String(input)}</p>`)
    );
    const scraper = new ContentScraper({ fetchImpl, concurrency: 2 });

    const results = await scraper.fetchParallel([
      'https://example.com/1',
      'https://example.com/1',
      '',
      'https://example.com/bad',
    ]);

    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(results).toEqual({
      'https://example.com/1': 'Text of https://example.com/1',
      'https://example.com/bad': '',
    });
  });
});
