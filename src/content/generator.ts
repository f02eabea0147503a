/**
 * Content generator: blog posts, product descriptions and social posts
 * written by the LLM in the brand's voice.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { dateStamp, slugify } from '../shared/slug.js';
import { validateInput } from '../resilience/guards.js';
import { SocialPlatformSchema } from '../config/schema.js';
import type { BrandConfig, ContentConfig, SocialPlatform } from '../config/types.js';
import type { LlmClient } from '../llm/client.js';
import {
  buildBlogPrompt,
  buildProductDescriptionPrompt,
  buildSocialPrompt,
  buildSystemPrompt,
} from './prompts.js';
import type { GeneratedContent, ProductDetails, SocialPost } from './types.js';

const BlogResponseSchema = z.object({
  title: z.string().min(1),
  content: z.string().min(1),
  meta_description: z.string(),
  secondary_keywords: z.array(z.string()).optional(),
});

const ProductResponseSchema = z.object({
  headline: z.string().min(1),
  short_description: z.string(),
  long_description: z.string(),
  features_and_benefits: z.array(z.string()).default([]),
  meta_description: z.string(),
});

const SocialResponseSchema = z.object({
  caption: z.string().min(1),
  hashtags: z.array(z.string()).default([]),
  call_to_action: z.string().default(''),
  image_suggestion: z.string().default(''),
  posting_tips: z.string().default(''),
});

const PRODUCT_MAX_TOKENS = 2000;
const SOCIAL_MAX_TOKENS = 1000;

export interface ContentGeneratorOptions {
  brand: BrandConfig;
  content: ContentConfig;
  /** Default directory for {@link ContentGenerator.saveContent}. */
  outputDir: string;
  now?: () => Date;
}

/** Whitespace-separated word count. */
export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export class ContentGenerator {
  private readonly llm: Pick<LlmClient, 'completeJson'>;
  private readonly options: ContentGeneratorOptions;
  private readonly systemPrompt: string;

  constructor(llm: Pick<LlmClient, 'completeJson'>, options: ContentGeneratorOptions) {
    this.llm = llm;
    this.options = options;
    this.systemPrompt = buildSystemPrompt(options.brand);
  }

  private now(): Date {
    return this.options.now?.() ?? new Date();
  }

  /**
   * @param wordCount - Target length; defaults to `content.minWordCount`.
   * @throws ValidationError on an empty topic, no keywords or a non-positive word count.
   */
  async generateBlogPost(topic: string, keywords: readonly string[], wordCount?: number): Promise<GeneratedContent> {
    validateInput(topic.trim().length > 0, 'Topic cannot be empty');
    validateInput(keywords.length > 0, 'At least one keyword is required');
    validateInput(wordCount === undefined || wordCount > 0, 'Word count must be positive');

    const target = wordCount ?? this.options.content.minWordCount;
    logger.info({ topic, wordCount: target }, `Generating blog post about '${topic}'`);

    const response = await this.llm.completeJson(
      buildBlogPrompt(topic, keywords, target, this.options.brand),
      BlogResponseSchema,
      { system: this.systemPrompt, operation: 'content.blog_post' },
    );

    const result: GeneratedContent = {
      contentType: 'blog_post',
      title: response.title,
      content: response.content,
      metaDescription: response.meta_description,
      keywords: response.secondary_keywords ?? [...keywords],
      wordCount: countWords(response.content),
      createdAt: this.now(),
    };

    logger.info({ title: result.title, wordCount: result.wordCount }, 'Generated blog post');
    return result;
  }

  /**
   * Product copy assembled into markdown: headline, summary, body and a
   * features list.
   */
  async generateProductDescription(
    productName: string,
    keywords: readonly string[],
    details: ProductDetails = {},
  ): Promise<GeneratedContent> {
    validateInput(productName.trim().length > 0, 'Product name cannot be empty');
    validateInput(keywords.length > 0, 'At least one keyword is required');

    logger.info({ productName }, `Generating product description for '${productName}'`);

    const response = await this.llm.completeJson(
      buildProductDescriptionPrompt(productName, keywords, details),
      ProductResponseSchema,
      { system: this.systemPrompt, maxTokens: PRODUCT_MAX_TOKENS, operation: 'content.product_description' },
    );

    const features = response.features_and_benefits.map((item) => `- ${item}`).join('\n');
    const content = [
      `# ${response.headline}`,
      response.short_description,
      response.long_description,
      `## Key Features & Benefits\n${features}`,
    ].join('\n\n');

    return {
      contentType: 'product_description',
      title: response.headline,
      content,
      metaDescription: response.meta_description,
      keywords: [...keywords],
      wordCount: countWords(content),
      createdAt: this.now(),
    };
  }

  async generateSocialPost(topic: string, keywords: readonly string[], platform: SocialPlatform): Promise<SocialPost> {
    validateInput(topic.trim().length > 0, 'Topic cannot be empty');
    validateInput(keywords.length > 0, 'At least one keyword is required');
    validateInput(
      SocialPlatformSchema.safeParse(platform).success,
      `Unsupported platform '${String(platform)}'`,
    );

    logger.info({ topic, platform }, `Generating ${platform} post about '${topic}'`);

    const response = await this.llm.completeJson(
      buildSocialPrompt(topic, keywords, platform, this.options.brand.voice),
      SocialResponseSchema,
      { system: this.systemPrompt, maxTokens: SOCIAL_MAX_TOKENS, operation: `content.social.${platform}` },
    );

    return {
      platform,
      caption: response.caption,
      hashtags: response.hashtags.map((tag) => tag.replace(/^#+/, '')).filter(Boolean),
      callToAction: response.call_to_action,
      imageSuggestion: response.image_suggestion,
      postingTips: response.posting_tips,
      createdAt: this.now(),
    };
  }

  /**
   * Write `content` as `YYYYMMDD_<slug>.json`.
   * @returns Path of the written file.
   */
  async saveContent(content: GeneratedContent, outputDir: string = this.options.outputDir): Promise<string> {
    await mkdir(outputDir, { recursive: true });
    const slug = slugify(content.title) || 'untitled';
    const filePath = join(outputDir, `${dateStamp(content.createdAt)}_${slug}.json`);

    const serialized = {
      ...content,
      createdAt: content.createdAt.toISOString(),
    };
    await writeFile(filePath, `${JSON.stringify(serialized, null, 2)}\n`, 'utf-8');

    logger.info({ filePath }, 'Saved content');
    return filePath;
  }

  /** Write a social post as `YYYYMMDD_<platform>_<slug>.json`. */
  async saveSocialPost(post: SocialPost, topic: string, outputDir: string = this.options.outputDir): Promise<string> {
    await mkdir(outputDir, { recursive: true });
    const slug = slugify(topic) || 'post';
    const filePath = join(outputDir, `${dateStamp(post.createdAt)}_${post.platform}_${slug}.json`);

    await writeFile(
      filePath,
      `${JSON.stringify({ ...post, topic, createdAt: post.createdAt.toISOString() }, null, 2)}\n`,
      'utf-8',
    );

    logger.info({ filePath }, 'Saved social post');
    return filePath;
  }
}
