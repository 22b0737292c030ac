/**
 * Newsbrief — Type Exports
 */

export type {
  Article,
  TopicNews,
  TopicPriority,
  TopicConfig,
  TopicConfigInput,
} from './news';
export {
  ArticleSchema,
  ArticleListSchema,
  TopicConfigSchema,
  TopicListSchema,
  TopicPrioritySchema,
} from './news';

export type {
  CircuitStateName,
  CircuitSnapshot,
  RateLimiterStatus,
  CacheStats,
} from './resilience';
