/**
 * Tests for near-duplicate clustering
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_SIMILARITY_THRESHOLD, NewsClusterer } from '../../src/news/clusterer';

const titled = (...titles: string[]) => titles.map(title => ({ title }));

describe('NewsClusterer', () => {
  it('should default to a 0.65 threshold', () => {
    expect(new NewsClusterer().threshold).toBe(DEFAULT_SIMILARITY_THRESHOLD);
    expect(DEFAULT_SIMILARITY_THRESHOLD).toBe(0.65);
  });

  it('should reject thresholds outside [0, 1]', () => {
    expect(() => new NewsClusterer(-0.1)).toThrow(RangeError);
    expect(() => new NewsClusterer(1.5)).toThrow(RangeError);
    expect(() => new NewsClusterer(Number.NaN)).toThrow(RangeError);
  });

  describe('isDuplicate', () => {
    it('should require similarity strictly above the threshold', () => {
      const clusterer = new NewsClusterer(0.75);

      expect(clusterer.isDuplicate('abcd', 'abce')).toBe(false);
      expect(new NewsClusterer(0.74).isDuplicate('abcd', 'abce')).toBe(true);
    });

    it('should not treat reworded headlines about the same event as duplicates', () => {
      expect(new NewsClusterer().isDuplicate('iPhone 16 Released Today', 'Apple releases new iPhone 16')).toBe(false);
    });
  });

  describe('dedupeTopic', () => {
    it('should keep the first of an exact pair at 0.7', () => {
      const input = titled('Breaking: Test News Story', 'Breaking: Test News Story', 'Completely Different Story');

      const { kept, removed } = new NewsClusterer(0.7).dedupeTopic(input);

      expect(kept).toHaveLength(2);
      expect(kept[0]).toBe(input[0]);
      expect(kept[1]).toBe(input[2]);
      expect(removed).toBe(1);
    });

    it('should drop near-duplicates regardless of case', () => {
      const input = titled(
        'Stocks rally as inflation cools',
        'STOCKS RALLY AS INFLATION EASES',
        'Central bank holds rates steady'
      );

      const { kept } = new NewsClusterer().dedupeTopic(input);

      expect(kept.map(a => a.title)).toEqual([
        'Stocks rally as inflation cools',
        'Central bank holds rates steady',
      ]);
    });

    it('should compare against kept articles only', () => {
      // B is a duplicate of A; C resembles B but not A, so C survives
      const input = titled('abcdefgh', 'abcdefxy', 'abcdwxyz');
      const clusterer = new NewsClusterer(0.7);

      expect(clusterer.dedupeTopic(input).kept.map(a => a.title)).toEqual(['abcdefgh', 'abcdwxyz']);
    });

    it('should be idempotent', () => {
      const input = titled(
        'New AI model released',
        'New AI model released today',
        'Chip maker reports record profit',
        'Breaking: Test News Story',
        'Breaking: Test News Story'
      );
      const clusterer = new NewsClusterer();

      const once = clusterer.dedupeTopic(input).kept;
      const twice = clusterer.dedupeTopic(once);

      expect(twice.kept).toEqual(once);
      expect(twice.removed).toBe(0);
    });

    it('should keep everything at threshold 1', () => {
      const input = titled('same', 'same');

      expect(new NewsClusterer(1).dedupeTopic(input).kept).toHaveLength(2);
    });

    it('should handle an empty list', () => {
      expect(new NewsClusterer().dedupeTopic([])).toEqual({ kept: [], removed: 0 });
    });

    it('should preserve extra fields on kept articles', () => {
      const input = [{ title: 'One', url: 'https://example.com/1' }];

      expect(new NewsClusterer().dedupeTopic(input).kept).toEqual(input);
    });
  });

  describe('clusterNews', () => {
    it('should dedupe each topic independently', () => {
      const result = new NewsClusterer(0.7).clusterNews({
        ai: titled('Breaking: Test News Story', 'Breaking: Test News Story'),
        business: titled('Breaking: Test News Story'),
        empty: [],
      });

      expect(result.topics.ai).toHaveLength(1);
      expect(result.topics.business).toHaveLength(1);
      expect(result.topics.empty).toEqual([]);
      expect(result.removedByTopic).toEqual({ ai: 1, business: 0, empty: 0 });
      expect(result.removed).toBe(1);
    });
  });
});
