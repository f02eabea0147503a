/**
 * Keyword metric heuristics. Volume, difficulty and CPC are estimates
 * derived from the query text; no paid keyword tool is consulted.
 */

import type { BrandConfig } from '../config/types.js';
import { loadSeoTerms } from './terms.js';
import type { Keyword, SearchIntent } from './types.js';

const CPC_BY_INTENT: Record<SearchIntent, number> = {
  transactional: 2.5,
  commercial: 1.8,
  navigational: 1.2,
  informational: 0.5,
};

function wordCount(query: string): number {
  return query.trim().split(/\s+/).filter(Boolean).length;
}

function containsAny(text: string, terms: readonly string[]): boolean {
  return terms.some((term) => text.includes(term.toLowerCase()));
}

/**
 * Transactional beats commercial beats navigational; anything else is
 * informational. Matching is by substring on the lowercased query.
 */
export function classifyIntent(query: string, brand: BrandConfig): SearchIntent {
  const q = query.toLowerCase();
  const { intent } = loadSeoTerms();

  if (containsAny(q, intent.transactional)) return 'transactional';
  if (containsAny(q, intent.commercial)) return 'commercial';
  if (containsAny(q, [brand.name, ...brand.mainCategories])) return 'navigational';
  return 'informational';
}

/** 0.3 per brand category, 0.1 per kitchen term, 0.05 per quality term; capped at 1. */
export function calculateRelevance(query: string, brand: BrandConfig): number {
  const q = query.toLowerCase();
  const { relevance } = loadSeoTerms();
  let score = 0;

  for (const category of brand.mainCategories) {
    if (q.includes(category.toLowerCase())) score += 0.3;
  }
  for (const term of relevance.kitchen) {
    if (q.includes(term)) score += 0.1;
  }
  for (const term of relevance.quality) {
    if (q.includes(term)) score += 0.05;
  }

  return Math.min(Math.round(score * 100) / 100, 1);
}

/** Shorter queries are assumed to be searched more. */
export function estimateVolume(query: string): number {
  const words = wordCount(query);
  if (words <= 2) return 3000;
  if (words <= 4) return 1500;
  return 800;
}

/** Long-tail queries are assumed easier to rank for. */
export function estimateDifficulty(query: string): number {
  const words = wordCount(query);
  return words >= 4 ? 25 + 10 * (words - 4) : 60 - 10 * words;
}

export function estimateCpc(intent: SearchIntent): number {
  return CPC_BY_INTENT[intent];
}

/** Build a keyword with estimated metrics from a raw search query. */
export function keywordFromQuery(query: string, brand: BrandConfig): Keyword {
  const intent = classifyIntent(query, brand);
  return {
    term: query,
    searchVolume: estimateVolume(query),
    difficulty: estimateDifficulty(query),
    cpc: estimateCpc(intent),
    intent,
    relevanceScore: calculateRelevance(query, brand),
  };
}
