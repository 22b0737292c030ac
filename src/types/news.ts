/**
 * Newsbrief — News Types
 *
 * Articles travel from the sources through the clusterer to the summarizer.
 * Topic configuration is the one structured record the fetcher reads.
 */

import { z } from 'zod';

// ============================================================
// ARTICLE
// ============================================================

export const ArticleSchema = z.object({
  title: z.string(),
  source: z.string(),
  url: z.string(),
  description: z.string().optional(),
});
export type Article = z.infer<typeof ArticleSchema>;

export const ArticleListSchema = z.array(ArticleSchema);

/**
 * Topic id -> articles, in upstream ranking order.
 */
export type TopicNews = Record<string, Article[]>;

// ============================================================
// TOPIC CONFIG
// ============================================================

export const TopicPrioritySchema = z.enum(['high', 'medium', 'low']);
export type TopicPriority = z.infer<typeof TopicPrioritySchema>;

export const TopicConfigSchema = z.object({
  id: z.string().regex(/^[a-z0-9_]+$/, 'topic id must be lower-case snake_case'),
  name: z.string().min(1),
  keywords: z.array(z.string().min(1)).min(1),
  priority: TopicPrioritySchema.default('medium'),
  /** RSS feeds read only for this topic */
  localFeeds: z.array(z.string().url()).default([]),
  /** When set, local feed entries must mention one of these */
  cities: z.array(z.string().min(1)).default([]),
});
export type TopicConfig = z.infer<typeof TopicConfigSchema>;
export type TopicConfigInput = z.input<typeof TopicConfigSchema>;

export const TopicListSchema = z
  .array(TopicConfigSchema)
  .min(1)
  .refine(
    topics => new Set(topics.map(t => t.id)).size === topics.length,
    'topic ids must be unique'
  );
