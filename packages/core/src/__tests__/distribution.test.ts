import { describe, it, expect } from 'vitest';
import { aPuzzle } from '@tactica/test-utils';

import {
  ConfigurationError,
  ThemeCollection,
  applyPopularityPercentile,
  assignBands,
  bandSizes,
  finalizeTheme,
  percentileKeepCount,
  type ScoredRecord,
} from '../index.js';

/**
 * Ten entries p0..p9: rating 1000 + 100i, popularity 10i
 */
function tenEntries(): ScoredRecord[] {
  return Array.from({ length: 10 }, (_, i) => ({
    record: aPuzzle(`p${i}`)
      .withRating(1000 + 100 * i)
      .withPopularity(10 * i)
      .build(),
    score: i,
  }));
}

describe('bandSizes', () => {
  it('should split ten puzzles 3/4/3', () => {
    expect(bandSizes(10)).toEqual({ Easy: 3, Medium: 4, Hard: 3 });
  });

  it('should round the outer bands down', () => {
    expect(bandSizes(7)).toEqual({ Easy: 2, Medium: 3, Hard: 2 });
    expect(bandSizes(3)).toEqual({ Easy: 0, Medium: 3, Hard: 0 });
  });

  it('should put a single puzzle in the medium band', () => {
    expect(bandSizes(1)).toEqual({ Easy: 0, Medium: 1, Hard: 0 });
    expect(bandSizes(0)).toEqual({ Easy: 0, Medium: 0, Hard: 0 });
  });
});

describe('percentileKeepCount', () => {
  it('should keep the top share, rounded up', () => {
    expect(percentileKeepCount(10, 50)).toBe(5);
    expect(percentileKeepCount(10, 75)).toBe(3);
  });

  it('should keep at least one puzzle from a non-empty theme', () => {
    expect(percentileKeepCount(3, 99)).toBe(1);
    expect(percentileKeepCount(10, 100)).toBe(1);
  });

  it('should keep everything at percentile zero', () => {
    expect(percentileKeepCount(10, 0)).toBe(10);
    expect(percentileKeepCount(0, 50)).toBe(0);
  });
});

describe('applyPopularityPercentile', () => {
  it('should keep the most popular entries', () => {
    const kept = applyPopularityPercentile(tenEntries(), 70);
    expect(kept.map((entry) => entry.record.id)).toEqual(['p9', 'p8', 'p7']);
  });

  it('should break popularity ties by quality', () => {
    const entries: ScoredRecord[] = [
      { record: aPuzzle('low').withPopularity(50).build(), score: 1 },
      { record: aPuzzle('high').withPopularity(50).build(), score: 2 },
    ];
    const kept = applyPopularityPercentile(entries, 50);
    expect(kept.map((entry) => entry.record.id)).toEqual(['high']);
  });

  it('should reject a percentile outside [0, 100]', () => {
    expect(() => applyPopularityPercentile(tenEntries(), 101)).toThrow(ConfigurationError);
    expect(() => applyPopularityPercentile(tenEntries(), -1)).toThrow(ConfigurationError);
  });
});

describe('assignBands', () => {
  it('should order by rating and label 3/4/3', () => {
    const shuffled = [...tenEntries()].reverse();
    const banded = assignBands('fork', shuffled);

    expect(banded.map((puzzle) => puzzle.record.id)).toEqual([
      'p0',
      'p1',
      'p2',
      'p3',
      'p4',
      'p5',
      'p6',
      'p7',
      'p8',
      'p9',
    ]);
    expect(banded.map((puzzle) => puzzle.band)).toEqual([
      'Easy',
      'Easy',
      'Easy',
      'Medium',
      'Medium',
      'Medium',
      'Medium',
      'Hard',
      'Hard',
      'Hard',
    ]);
    expect(banded.map((puzzle) => puzzle.rank)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(banded[0]?.theme).toBe('fork');
    expect(banded[9]?.qualityScore).toBe(9);
  });

  it('should break rating ties by id', () => {
    const entries: ScoredRecord[] = [
      { record: aPuzzle('b').withRating(700).build(), score: 0 },
      { record: aPuzzle('a').withRating(700).build(), score: 0 },
    ];
    expect(assignBands('pin', entries).map((puzzle) => puzzle.record.id)).toEqual(['a', 'b']);
  });
});

describe('finalizeTheme', () => {
  function sealedCollection(): ThemeCollection {
    const collection = new ThemeCollection('fork');
    for (const entry of tenEntries()) {
      collection.offer(entry);
    }
    collection.seal();
    return collection;
  }

  it('should band the whole collection without a percentile', () => {
    const finalized = finalizeTheme('fork', sealedCollection());
    expect(finalized.bandCounts).toEqual({ Easy: 3, Medium: 4, Hard: 3 });
    expect(finalized.percentileDropped).toBe(0);
  });

  it('should apply the percentile before banding', () => {
    const finalized = finalizeTheme('fork', sealedCollection(), { minPopularityPercentile: 50 });

    expect(finalized.percentileDropped).toBe(5);
    expect(finalized.puzzles.map((puzzle) => [puzzle.record.id, puzzle.band])).toEqual([
      ['p5', 'Easy'],
      ['p6', 'Medium'],
      ['p7', 'Medium'],
      ['p8', 'Medium'],
      ['p9', 'Hard'],
    ]);
    expect(finalized.bandCounts).toEqual({ Easy: 1, Medium: 3, Hard: 1 });
  });

  it('should consume the collection', () => {
    const collection = sealedCollection();
    finalizeTheme('fork', collection);
    expect(() => finalizeTheme('fork', collection)).toThrow('was already consumed');
  });
});
