import { describe, it, expect } from 'vitest';
import { clusterKeywords, identifyContentOpportunities } from '../clustering.js';
import type { Keyword, SearchIntent } from '../types.js';

function kw(term: string, searchVolume: number, intent: SearchIntent, difficulty: number = 30): Keyword {
  return { term, searchVolume, difficulty, cpc: null, intent, relevanceScore: 0.5 };
}

describe('identifyContentOpportunities', () => {
  it('suggests formats for each intent present', () => {
    expect(identifyContentOpportunities('chef knife', [kw('buy chef knife', 1500, 'transactional')])).toEqual([
      'Product page optimization for chef knife',
      'Landing page: Buy chef knife',
    ]);
  });

  it('suggests nothing for navigational-only groups', () => {
    expect(identifyContentOpportunities('acme kitchen', [kw('acme kitchen', 3000, 'navigational')])).toEqual([]);
  });
});

describe('clusterKeywords', () => {
  it('groups by the first two words and drops singletons', () => {
    const clusters = clusterKeywords([
      kw('chef knife set', 1500, 'commercial', 30),
      kw('chef knife sharpening', 1500, 'informational', 30),
      kw('chef knife', 3000, 'informational', 40),
      kw('paring knife', 3000, 'informational', 40),
    ]);

    expect(clusters).toHaveLength(1);
    const [cluster] = clusters;
    expect(cluster?.topic).toBe('chef knife');
    expect(cluster?.primaryKeyword.term).toBe('chef knife');
    expect(cluster?.secondaryKeywords.map((k) => k.term)).toEqual(['chef knife set', 'chef knife sharpening']);
    expect(cluster?.totalVolume).toBe(6000);
    expect(cluster?.avgDifficulty).toBeCloseTo(33.333, 3);
    expect(cluster?.contentOpportunities).toEqual([
      'Blog post: Complete guide to chef knife',
      'How-to article: chef knife for beginners',
      'Comparison guide: Best chef knife',
      "Buyer's guide: Choosing chef knife",
    ]);
  });

  it('orders clusters by total volume and honours maxClusters', () => {
    const keywords = [
      kw('knife block small', 800, 'informational'),
      kw('knife block wooden', 800, 'informational'),
      kw('chef knife', 3000, 'informational'),
      kw('chef knife set', 1500, 'commercial'),
      kw('paring knife', 3000, 'informational'),
      kw('paring knife set', 1500, 'commercial'),
      kw('paring knife uses', 1500, 'informational'),
    ];

    expect(clusterKeywords(keywords).map((c) => [c.topic, c.totalVolume])).toEqual([
      ['paring knife', 6000],
      ['chef knife', 4500],
      ['knife block', 1600],
    ]);
    expect(clusterKeywords(keywords, 2).map((c) => c.topic)).toEqual(['paring knife', 'chef knife']);
  });

  it('returns nothing for no keywords', () => {
    expect(clusterKeywords([])).toEqual([]);
  });
});
