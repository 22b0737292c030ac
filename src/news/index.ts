/**
 * Newsbrief — News Module
 *
 * Sources, near-duplicate clustering and the cached per-topic fetcher.
 */

export * from './sources';

export { similarityRatio, titleSimilarity } from './similarity';

export {
  NewsClusterer,
  DEFAULT_SIMILARITY_THRESHOLD,
  type Titled,
  type TopicDedupResult,
  type ClusterResult,
} from './clusterer';

export {
  NewsFetcher,
  cacheKeyForTopic,
  dropExactRepeats,
  type NewsFetcherConfig,
  type NewsFetcherDeps,
  type SourceOutcome,
  type SourceOutcomeStatus,
  type TopicFetchResult,
  type FetchAllResult,
} from './fetcher';
