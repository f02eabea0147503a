/**
 * Term lists used for intent classification, relevance scoring and tag
 * suggestions. Loaded once from data/seo-terms.json.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

const TermsSchema = z.object({
  intent: z.object({
    transactional: z.array(z.string()),
    commercial: z.array(z.string()),
  }),
  relevance: z.object({
    kitchen: z.array(z.string()),
    quality: z.array(z.string()),
  }),
  tags: z.object({
    useCases: z.array(z.string()),
    benefits: z.array(z.string()),
  }),
});

export type SeoTerms = z.infer<typeof TermsSchema>;

const TERMS_URL = new URL('../../data/seo-terms.json', import.meta.url);

let cached: SeoTerms | undefined;

export function loadSeoTerms(): SeoTerms {
  if (cached === undefined) {
    cached = TermsSchema.parse(JSON.parse(readFileSync(TERMS_URL, 'utf-8')));
  }
  return cached;
}
