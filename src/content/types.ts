/**
 * Content generation types.
 */

import type { SocialPlatform } from '../config/types.js';

export type ContentType = 'blog_post' | 'product_description';

/** A long-form piece produced by the generator. */
export interface GeneratedContent {
  contentType: ContentType;
  title: string;
  /** Markdown body. */
  content: string;
  metaDescription: string;
  keywords: string[];
  /** Whitespace-separated words in `content`. */
  wordCount: number;
  createdAt: Date;
}

export interface SocialPost {
  platform: SocialPlatform;
  caption: string;
  hashtags: string[];
  callToAction: string;
  imageSuggestion: string;
  postingTips: string;
  createdAt: Date;
}

/** Free-form facts about a product passed through to the prompt. */
export type ProductDetails = Record<string, unknown>;
