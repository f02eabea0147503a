/**
 * Prompt builders for content generation. Every prompt asks for a single
 * JSON object so the answer can be validated field by field.
 */

import type { BrandConfig, SocialPlatform } from '../config/types.js';
import type { ProductDetails } from './types.js';

/** Typical best-performing caption length per platform, in characters. */
export const OPTIMAL_CAPTION_LENGTH: Record<SocialPlatform, number> = {
  instagram: 125,
  tiktok: 100,
  pinterest: 200,
  facebook: 40,
};

const PLATFORM_NOTES: Record<SocialPlatform, string> = {
  instagram: 'The first line shows before "more"; make it count.',
  tiktok: 'Keep it to one quick, practical tip.',
  pinterest: 'Write a searchable description; Pinterest is a search engine.',
  facebook: 'Invite comments with a question.',
};

export function buildSystemPrompt(brand: BrandConfig): string {
  const tagline = brand.tagline ? `\nTagline: ${brand.tagline}` : '';
  return `You write marketing content for ${brand.name}.${tagline}
Voice: ${brand.voice}
Audience: ${brand.targetAudience}
Product categories: ${brand.mainCategories.join(', ')}

Be specific and practical. Prefer short paragraphs. Mention products only where they help the reader.
Answer with one JSON object and nothing else.`;
}

export function buildBlogPrompt(topic: string, keywords: readonly string[], wordCount: number, brand: BrandConfig): string {
  return `Write a blog post about: ${topic}

Target length: about ${wordCount} words
Keywords to use naturally: ${keywords.join(', ')}
Audience: ${brand.targetAudience}

Use a title under 60 characters containing the main keyword, markdown H2/H3 sections,
and a closing call to action. Mark internal link ideas as [INTERNAL LINK: topic].

Return JSON:
{
  "title": "...",
  "content": "markdown body",
  "meta_description": "at most 155 characters",
  "secondary_keywords": ["..."]
}`;
}

export function buildProductDescriptionPrompt(
  productName: string,
  keywords: readonly string[],
  details: ProductDetails,
): string {
  return `Write a product description for: ${productName}

Known product facts:
${JSON.stringify(details, null, 2)}

Keywords: ${keywords.join(', ')}
Lead with benefits, then features. About 300 words.

Return JSON:
{
  "headline": "...",
  "short_description": "two or three sentences",
  "long_description": "...",
  "features_and_benefits": ["feature: benefit"],
  "meta_description": "at most 155 characters",
  "suggested_tags": ["..."]
}`;
}

export function buildSocialPrompt(topic: string, keywords: readonly string[], platform: SocialPlatform, voice: string): string {
  return `Write a ${platform} post about: ${topic}

Aim for about ${OPTIMAL_CAPTION_LENGTH[platform]} characters.
Keywords: ${keywords.join(', ')}
Voice: ${voice}
${PLATFORM_NOTES[platform]}

Return JSON:
{
  "caption": "...",
  "hashtags": ["..."],
  "call_to_action": "...",
  "image_suggestion": "...",
  "posting_tips": "..."
}`;
}
