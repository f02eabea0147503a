/**
 * Topic clustering of researched keywords.
 */

import { logger } from '../shared/logger.js';
import type { Keyword, KeywordCluster } from './types.js';

/** Content formats worth producing for a cluster, by the intents it contains. */
export function identifyContentOpportunities(topic: string, keywords: readonly Keyword[]): string[] {
  const intents = new Set(keywords.map((kw) => kw.intent));
  const opportunities: string[] = [];

  if (intents.has('informational')) {
    opportunities.push(`Blog post: Complete guide to ${topic}`);
    opportunities.push(`How-to article: ${topic} for beginners`);
  }
  if (intents.has('commercial')) {
    opportunities.push(`Comparison guide: Best ${topic}`);
    opportunities.push(`Buyer's guide: Choosing ${topic}`);
  }
  if (intents.has('transactional')) {
    opportunities.push(`Product page optimization for ${topic}`);
    opportunities.push(`Landing page: Buy ${topic}`);
  }

  return opportunities;
}

/** Cluster key: the first two words of the term, or the whole term if shorter. */
function topicOf(term: string): string {
  const words = term.trim().split(/\s+/);
  return words.length >= 2 ? words.slice(0, 2).join(' ') : term.trim();
}

/**
 * Group keywords sharing their first two words. Groups of one are dropped;
 * the highest-volume member becomes the primary keyword. Clusters are ordered
 * by total volume and truncated to `maxClusters`.
 */
export function clusterKeywords(keywords: readonly Keyword[], maxClusters: number = 20): KeywordCluster[] {
  const groups = new Map<string, Keyword[]>();
  for (const kw of keywords) {
    const topic = topicOf(kw.term);
    const group = groups.get(topic);
    if (group) {
      group.push(kw);
    } else {
      groups.set(topic, [kw]);
    }
  }

  const clusters: KeywordCluster[] = [];
  for (const [topic, members] of groups) {
    const [primary, ...secondary] = [...members].sort((a, b) => b.searchVolume - a.searchVolume);
    if (primary === undefined || secondary.length === 0) continue;

    clusters.push({
      topic,
      primaryKeyword: primary,
      secondaryKeywords: secondary,
      totalVolume: members.reduce((sum, kw) => sum + kw.searchVolume, 0),
      avgDifficulty: members.reduce((sum, kw) => sum + kw.difficulty, 0) / members.length,
      contentOpportunities: identifyContentOpportunities(topic, members),
    });
  }

  clusters.sort((a, b) => b.totalVolume - a.totalVolume);
  const limited = clusters.slice(0, maxClusters);

  logger.info({ keywords: keywords.length, clusters: limited.length }, 'Clustered keywords');
  return limited;
}
