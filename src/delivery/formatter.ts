/**
 * Newsbrief — WhatsApp Formatter
 *
 * Plain-text layouts for WhatsApp: *bold*, _italic_, no HTML.
 */

import type { TopicNews } from '../types';

export const WHATSAPP_MESSAGE_LIMIT = 4000;

const RULE_WIDTH = 35;
const HEADLINES_PER_TOPIC = 3;
const MAX_TITLE_LENGTH = 70;

// Longest patterns first: mis-decoded UTF-8 shares prefixes
const TEXT_FIXES: Array<[string, string]> = [
  ['â€™', "'"],
  ['â€˜', "'"],
  ['â€œ', '"'],
  ['â€¦', '...'],
  ['â€', '"'],
  ['Â', ''],
  ['‘', "'"],
  ['’', "'"],
  ['“', '"'],
  ['”', '"'],
  ['–', '-'],
  ['—', '-'],
  ['…', '...'],
];

/**
 * Map typographic punctuation to ASCII and drop anything else non-ASCII.
 */
export function sanitize(text: string): string {
  let result = text;
  for (const [bad, good] of TEXT_FIXES) {
    result = result.split(bad).join(good);
  }
  return result.replace(/[^\x00-\x7F]/g, '');
}

export function truncate(text: string, maxLength: number, suffix = '...'): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength - suffix.length) + suffix;
}

export function formatLongDate(date: Date, timeZone = 'UTC'): string {
  return date.toLocaleDateString('en-US', {
    year: 'numeric',
    month: 'long',
    day: 'numeric',
    timeZone,
  });
}

function humanize(topicId: string): string {
  return topicId
    .split('_')
    .filter(Boolean)
    .map(word => word[0].toUpperCase() + word.slice(1))
    .join(' ');
}

export interface FormatReportOptions {
  /** Topic id -> display name */
  topicNames?: Record<string, string>;
  date?: Date;
  timeZone?: string;
}

/**
 * Headline report: up to three titles per topic with their source.
 * Topics without articles are left out.
 */
export function formatReport(news: TopicNews, options: FormatReportOptions = {}): string {
  const { topicNames = {}, date = new Date(), timeZone } = options;
  const lines: string[] = [
    '='.repeat(RULE_WIDTH),
    '  DAILY NEWS INTELLIGENCE REPORT',
    `  ${formatLongDate(date, timeZone)}`,
    '='.repeat(RULE_WIDTH),
    '',
  ];

  for (const [topicId, articles] of Object.entries(news)) {
    if (articles.length === 0) continue;

    lines.push(`*${topicNames[topicId] ?? humanize(topicId)}*`);

    articles.slice(0, HEADLINES_PER_TOPIC).forEach((article, index) => {
      const title = truncate(sanitize(article.title), MAX_TITLE_LENGTH);
      lines.push(`  ${index + 1}. ${title}`);
      lines.push(`     _via ${sanitize(article.source)}_`);
    });

    lines.push('');
  }

  lines.push('-'.repeat(RULE_WIDTH));
  lines.push('_Powered by Newsbrief_');

  return lines.join('\n');
}

export function formatError(message: string, date: Date = new Date()): string {
  return [
    '*[!] Daily News Report Failed*',
    '',
    `Error: ${message.slice(0, 200)}`,
    '',
    'Please check logs for details.',
    `_Error time: ${date.toISOString().replace('T', ' ').slice(0, 19)}_`,
  ].join('\n');
}

export interface HealthSummary {
  checks: Record<string, { ok: boolean }>;
  allOk: boolean;
}

export function formatHealthReport(report: HealthSummary): string {
  const lines = ['*System Health Report*', ''];

  for (const [name, check] of Object.entries(report.checks)) {
    lines.push(`${check.ok ? '[OK]' : '[!]'} ${humanize(name.replace(/([a-z])([A-Z])/g, '$1_$2').toLowerCase())}`);
  }

  lines.push('');
  lines.push(report.allOk ? '_All systems operational_' : '_Some issues detected - check logs_');
  return lines.join('\n');
}

/**
 * Split on line boundaries into chunks of at most `limit` characters.
 * Lines longer than the limit are cut.
 */
export function splitMessage(text: string, limit: number = WHATSAPP_MESSAGE_LIMIT): string[] {
  if (text.length <= limit) return [text];

  const chunks: string[] = [];
  let current: string | null = null;

  for (const line of text.split('\n')) {
    const pieces: string[] = [];
    for (let start = 0; start < line.length; start += limit) {
      pieces.push(line.slice(start, start + limit));
    }
    if (pieces.length === 0) pieces.push('');

    for (const piece of pieces) {
      if (current === null) {
        current = piece;
      } else if (current.length + 1 + piece.length <= limit) {
        current += `\n${piece}`;
      } else {
        chunks.push(current);
        current = piece;
      }
    }
  }

  if (current !== null) chunks.push(current);
  return chunks;
}
