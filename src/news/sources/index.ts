/**
 * Newsbrief — News Sources
 */

export { NewsSource, toArticles, type SourceKind } from './base';
export { NewsApiSource, type NewsApiSourceOptions } from './news-api';
export { GNewsSource, type GNewsSourceOptions } from './gnews';
export { GoogleNewsSource, type GoogleNewsSourceOptions } from './google-news';
export { LocalRssSource, type LocalRssSourceOptions } from './local-rss';
export {
  createFeedReader,
  readSourceName,
  type FeedReader,
  type FeedDocument,
  type FeedEntry,
} from './feed-reader';
