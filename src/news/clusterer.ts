/**
 * Newsbrief — Duplicate Clusterer
 *
 * Drops near-duplicate headlines within each topic. Articles are visited in
 * upstream order and one is kept unless its title is more similar than
 * `threshold` to a title already kept for the same topic, so the first
 * article of every cluster survives.
 *
 * Comparisons are pairwise, O(n²) per topic; outputs are exact for a given
 * threshold and input order.
 *
 * TODO: first-seen wins even when a later duplicate has a working URL or a
 * fuller description; a quality tie-break is a possible enhancement.
 */

import { logger } from '../lib/logger';
import { titleSimilarity } from './similarity';

const log = logger.child({ module: 'clusterer' });

export const DEFAULT_SIMILARITY_THRESHOLD = 0.65;

export interface Titled {
  title: string;
}

export interface TopicDedupResult<T extends Titled> {
  kept: T[];
  removed: number;
}

export interface ClusterResult<T extends Titled> {
  topics: Record<string, T[]>;
  /** Articles dropped across all topics */
  removed: number;
  removedByTopic: Record<string, number>;
}

export class NewsClusterer {
  readonly threshold: number;

  constructor(threshold: number = DEFAULT_SIMILARITY_THRESHOLD) {
    if (!(threshold >= 0 && threshold <= 1)) {
      throw new RangeError(`similarity threshold must be within [0, 1], got ${threshold}`);
    }
    this.threshold = threshold;
  }

  /**
   * True when the two titles count as the same story (strictly above threshold).
   */
  isDuplicate(a: string, b: string): boolean {
    return titleSimilarity(a, b) > this.threshold;
  }

  dedupeTopic<T extends Titled>(articles: readonly T[]): TopicDedupResult<T> {
    const kept: T[] = [];
    let removed = 0;

    for (const article of articles) {
      const duplicateOf = kept.find(existing => this.isDuplicate(article.title, existing.title));

      if (duplicateOf) {
        removed++;
        log.debug('Duplicate found', { title: article.title, keptTitle: duplicateOf.title });
      } else {
        kept.push(article);
      }
    }

    return { kept, removed };
  }

  clusterNews<T extends Titled>(allNews: Record<string, readonly T[]>): ClusterResult<T> {
    const topics: Record<string, T[]> = {};
    const removedByTopic: Record<string, number> = {};
    let removed = 0;

    for (const [topicId, articles] of Object.entries(allNews)) {
      const result = this.dedupeTopic(articles);
      topics[topicId] = result.kept;
      removedByTopic[topicId] = result.removed;
      removed += result.removed;
    }

    log.info('Deduplication removed redundant articles', { removed });

    return { topics, removed, removedByTopic };
  }
}
