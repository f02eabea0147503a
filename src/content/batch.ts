/**
 * Batch generation from a content plan: a list of blog and social items
 * worked through one at a time, with a summary report at the end.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ValidationError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { dateTimeStamp } from '../shared/slug.js';
import { SocialPlatformSchema } from '../config/schema.js';
import type { ContentGenerator } from './generator.js';
import type { GeneratedContent } from './types.js';

const KeywordsSchema = z.array(z.string().min(1)).min(1);

const PlanItemSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('blog_post'),
    topic: z.string().min(1),
    keywords: KeywordsSchema,
    wordCount: z.number().int().positive().optional(),
  }),
  z.object({
    type: z.literal('social_post'),
    topic: z.string().min(1),
    keywords: KeywordsSchema,
    platform: SocialPlatformSchema.default('instagram'),
  }),
]);

export const ContentPlanSchema = z.array(PlanItemSchema).min(1, { message: 'Content plan must list at least one item' });

export type ContentPlanItem = z.infer<typeof PlanItemSchema>;

export interface BatchItemResult {
  type: ContentPlanItem['type'];
  topic: string;
  status: 'success' | 'error';
  title?: string;
  wordCount?: number;
  platform?: string;
  /** First characters of a social caption. */
  caption?: string;
  filePath?: string;
  error?: string;
}

export interface BatchSummary {
  total: number;
  successful: number;
  failed: number;
  successRate: string;
}

/** Where generated blog posts are recorded. */
export interface BatchContentSink {
  saveContent(content: GeneratedContent, filePath: string | null): number;
}

export interface BatchGeneratorOptions {
  reportsDir: string;
  sink?: BatchContentSink;
  now?: () => Date;
}

type BatchContentGenerator = Pick<
  ContentGenerator,
  'generateBlogPost' | 'generateSocialPost' | 'saveContent' | 'saveSocialPost'
>;

const CAPTION_PREVIEW = 50;

/**
 * Read a content plan. JSON and YAML files are both accepted.
 * @throws ValidationError when the file is unreadable or the plan is invalid.
 */
export async function loadContentPlan(path: string): Promise<ContentPlanItem[]> {
  let document: unknown;
  try {
    document = parseYaml(await readFile(path, 'utf-8'));
  } catch (err: unknown) {
    throw new ValidationError(`Failed to read content plan "${path}": ${errorMessage(err)}`);
  }

  const result = ContentPlanSchema.safeParse(document);
  if (!result.success) {
    throw new ValidationError(`Invalid content plan "${path}":\n${z.prettifyError(result.error)}`);
  }
  return result.data;
}

export function summarizeBatch(results: readonly BatchItemResult[]): BatchSummary {
  const successful = results.filter((r) => r.status === 'success').length;
  return {
    total: results.length,
    successful,
    failed: results.length - successful,
    successRate: results.length === 0 ? '0%' : `${((successful / results.length) * 100).toFixed(1)}%`,
  };
}

export class BatchGenerator {
  private readonly generator: BatchContentGenerator;
  private readonly options: BatchGeneratorOptions;

  constructor(generator: BatchContentGenerator, options: BatchGeneratorOptions) {
    this.generator = generator;
    this.options = options;
  }

  /** Generate and save every plan item in order. A failed item is recorded and skipped. */
  async generateLibrary(plan: readonly ContentPlanItem[]): Promise<BatchItemResult[]> {
    logger.info({ items: plan.length }, `Starting batch generation of ${plan.length} pieces`);
    const results: BatchItemResult[] = [];

    for (const [index, item] of plan.entries()) {
      logger.info(`[${index + 1}/${plan.length}] Generating: ${item.topic}`);
      try {
        results.push(await this.generateItem(item));
      } catch (err: unknown) {
        logger.error({ err, topic: item.topic }, `Batch item '${item.topic}' failed: ${errorMessage(err)}`);
        results.push({ type: item.type, topic: item.topic, status: 'error', error: errorMessage(err) });
      }
    }

    return results;
  }

  /**
   * Write `batch_generation_YYYYMMDD_HHMMSS.json`.
   * @returns Path of the report.
   */
  async writeSummaryReport(results: readonly BatchItemResult[]): Promise<string> {
    const now = this.options.now?.() ?? new Date();
    const successful = results.filter((r) => r.status === 'success');

    const report = {
      generatedAt: now.toISOString(),
      summary: summarizeBatch(results),
      results,
      blogPosts: successful.filter((r) => r.type === 'blog_post'),
      socialPosts: successful.filter((r) => r.type === 'social_post'),
      errors: results.filter((r) => r.status === 'error'),
    };

    await mkdir(this.options.reportsDir, { recursive: true });
    const reportPath = join(this.options.reportsDir, `batch_generation_${dateTimeStamp(now)}.json`);
    await writeFile(reportPath, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');

    logger.info({ reportPath, ...report.summary }, 'Batch generation report written');
    return reportPath;
  }

  private async generateItem(item: ContentPlanItem): Promise<BatchItemResult> {
    if (item.type === 'blog_post') {
      const post = await this.generator.generateBlogPost(item.topic, item.keywords, item.wordCount);
      const filePath = await this.generator.saveContent(post);
      this.options.sink?.saveContent(post, filePath);
      return {
        type: item.type,
        topic: item.topic,
        status: 'success',
        title: post.title,
        wordCount: post.wordCount,
        filePath,
      };
    }

    const post = await this.generator.generateSocialPost(item.topic, item.keywords, item.platform);
    const filePath = await this.generator.saveSocialPost(post, item.topic);
    return {
      type: item.type,
      topic: item.topic,
      status: 'success',
      platform: item.platform,
      caption: post.caption.length > CAPTION_PREVIEW ? `${post.caption.slice(0, CAPTION_PREVIEW)}...` : post.caption,
      filePath,
    };
  }
}
