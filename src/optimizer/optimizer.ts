/**
 * Product listing optimizer: rewrites titles and descriptions through the
 * content generator and suggests tags, then reports the before/after scores.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { generateCsv, parseCsv } from '../shared/csv.js';
import { dateStamp } from '../shared/slug.js';
import type { BrandConfig } from '../config/types.js';
import type { ContentGenerator } from '../content/generator.js';
import { loadSeoTerms } from '../seo/terms.js';
import { markdownToHtml } from './html.js';
import { analyzeProduct, productFromRow } from './product.js';
import type { OptimizationResult, Product } from './types.js';

const MAX_TITLE_LENGTH = 70;
const MAX_TAGS = 15;
const MAX_KEYWORDS = 5;

/** Subset of the content store optimizations are recorded in. */
export interface OptimizationSink {
  saveOptimization(result: OptimizationResult): number;
}

export interface ProductOptimizerOptions {
  brand: BrandConfig;
  reportsDir: string;
  sink?: OptimizationSink;
  now?: () => Date;
}

export interface OptimizationReportFiles {
  reportPath: string;
  csvPath: string;
}

function unique(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

export class ProductOptimizer {
  private readonly generator: Pick<ContentGenerator, 'generateProductDescription'>;
  private readonly options: ProductOptimizerOptions;

  constructor(generator: Pick<ContentGenerator, 'generateProductDescription'>, options: ProductOptimizerOptions) {
    this.generator = generator;
    this.options = options;
  }

  private now(): Date {
    return this.options.now?.() ?? new Date();
  }

  /**
   * Keywords for a listing: product type, brand categories it mentions, the
   * brand name and its first three tags. At most five, always at least one.
   */
  extractKeywords(product: Product): string[] {
    const { brand } = this.options;
    const haystack = `${product.title} ${product.description}`.toLowerCase();

    return unique([
      ...(product.productType ? [product.productType.toLowerCase()] : []),
      ...brand.mainCategories.filter((category) => haystack.includes(category.toLowerCase())),
      brand.name.toLowerCase(),
      ...product.tags.slice(0, 3).map((tag) => tag.toLowerCase()),
    ]).slice(0, MAX_KEYWORDS);
  }

  /** Keywords, product type, brand, then stock use-case and benefit tags; at most fifteen. */
  suggestTags(product: Product, keywords: readonly string[]): string[] {
    const { tags } = loadSeoTerms();
    return unique([
      ...keywords,
      ...(product.productType ? [product.productType.toLowerCase()] : []),
      this.options.brand.name.toLowerCase(),
      ...tags.useCases,
      ...tags.benefits,
    ]).slice(0, MAX_TAGS);
  }

  async optimizeProduct(product: Product, targetKeywords?: readonly string[]): Promise<OptimizationResult> {
    logger.info({ handle: product.handle }, `Optimizing product: ${product.title}`);

    const before = analyzeProduct(product, this.options.brand);
    const keywords = targetKeywords && targetKeywords.length > 0 ? [...targetKeywords] : this.extractKeywords(product);

    const generated = await this.generator.generateProductDescription(product.title, keywords, {
      currentTitle: product.title,
      currentDescription: product.description,
      productType: product.productType,
      price: product.price,
      existingTags: product.tags,
    });

    const optimizedTitle = generated.title.slice(0, MAX_TITLE_LENGTH).trim();
    const suggestedTags = this.suggestTags(product, keywords);
    const after = analyzeProduct(
      { ...product, title: optimizedTitle, description: markdownToHtml(generated.content), tags: suggestedTags },
      this.options.brand,
    );

    const improvementNotes: string[] = [];
    if (after.score > before.score) {
      improvementNotes.push(`SEO score improved from ${before.score} to ${after.score}`);
    }
    if (optimizedTitle.length > before.titleLength) {
      improvementNotes.push('Title lengthened for search results');
    }
    const primary = keywords[0];
    if (primary !== undefined && optimizedTitle.toLowerCase().includes(primary.toLowerCase())) {
      improvementNotes.push('Primary keyword added to title');
    }
    if (suggestedTags.length > product.tags.length) {
      improvementNotes.push(`Tags expanded from ${product.tags.length} to ${suggestedTags.length}`);
    }

    const result: OptimizationResult = {
      handle: product.handle,
      originalTitle: product.title,
      optimizedTitle,
      originalDescription: product.description,
      optimizedDescription: generated.content,
      metaDescription: generated.metaDescription,
      suggestedTags,
      scoreBefore: before.score,
      scoreAfter: after.score,
      issues: before.issues,
      improvementNotes,
      createdAt: this.now(),
    };

    this.options.sink?.saveOptimization(result);
    logger.info({ handle: product.handle, before: before.score, after: after.score }, 'Optimized product');
    return result;
  }

  /**
   * Optimize every product in an export. Variant rows are collapsed by
   * handle; rows without a handle or title are skipped, and a product that
   * fails is logged and left out.
   */
  async optimizeAll(csvPath: string): Promise<OptimizationResult[]> {
    logger.info({ csvPath }, 'Loading products');
    const { rows } = parseCsv(await readFile(csvPath, 'utf-8'));

    const seen = new Set<string>();
    const products: Product[] = [];
    rows.forEach((row, index) => {
      const product = productFromRow(row);
      if (seen.has(product.handle)) return;
      seen.add(product.handle);
      if (!product.handle || !product.title) {
        logger.warn({ row: index + 2 }, 'Skipping product with missing handle or title');
        return;
      }
      products.push(product);
    });

    logger.info({ products: products.length }, `Found ${products.length} unique products`);

    const results: OptimizationResult[] = [];
    for (const product of products) {
      try {
        results.push(await this.optimizeProduct(product));
      } catch (err: unknown) {
        logger.error({ err, handle: product.handle }, `Error optimizing ${product.handle}: ${errorMessage(err)}`);
      }
    }

    logger.info({ optimized: results.length, total: products.length }, 'Product optimization complete');
    return results;
  }

  /** Write `product_optimization_YYYYMMDD.json` and a matching `.csv` summary. */
  async writeReport(
    results: readonly OptimizationResult[],
    outputDir: string = this.options.reportsDir,
  ): Promise<OptimizationReportFiles> {
    const now = this.now();
    await mkdir(outputDir, { recursive: true });
    const base = join(outputDir, `product_optimization_${dateStamp(now)}`);
    const reportPath = `${base}.json`;
    const csvPath = `${base}.csv`;

    const averageAfter =
      results.length === 0 ? 0 : results.reduce((sum, r) => sum + r.scoreAfter, 0) / results.length;
    const averageBefore =
      results.length === 0 ? 0 : results.reduce((sum, r) => sum + r.scoreBefore, 0) / results.length;

    const report = {
      generatedAt: now.toISOString(),
      totalProductsOptimized: results.length,
      summary: {
        averageScoreBefore: Math.round(averageBefore * 10) / 10,
        averageScoreAfter: Math.round(averageAfter * 10) / 10,
        productsWithTitleChanges: results.filter((r) => r.originalTitle !== r.optimizedTitle).length,
      },
      optimizations: results.map((r) => ({
        handle: r.handle,
        originalTitle: r.originalTitle,
        optimizedTitle: r.optimizedTitle,
        metaDescription: r.metaDescription,
        suggestedTags: r.suggestedTags,
        scoreBefore: r.scoreBefore,
        scoreAfter: r.scoreAfter,
        issues: r.issues,
        improvements: r.improvementNotes,
      })),
    };

    await writeFile(reportPath, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');
    await writeFile(
      csvPath,
      generateCsv(
        ['Handle', 'Original Title', 'Optimized Title', 'Meta Description', 'Tags', 'Score Before', 'Score After'],
        results.map((r) => ({
          Handle: r.handle,
          'Original Title': r.originalTitle,
          'Optimized Title': r.optimizedTitle,
          'Meta Description': r.metaDescription,
          Tags: r.suggestedTags.join(', '),
          'Score Before': r.scoreBefore,
          'Score After': r.scoreAfter,
        })),
      ),
      'utf-8',
    );

    logger.info({ reportPath, csvPath }, 'Optimization report written');
    return { reportPath, csvPath };
  }

  /** Write a CSV the commerce platform can import to apply the changes. */
  async writeImportCsv(results: readonly OptimizationResult[], outputPath: string): Promise<string> {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(
      outputPath,
      generateCsv(
        ['Handle', 'Title', 'Body (HTML)', 'SEO Title', 'SEO Description', 'Tags', 'Published'],
        results.map((r) => ({
          Handle: r.handle,
          Title: r.optimizedTitle,
          'Body (HTML)': markdownToHtml(r.optimizedDescription),
          'SEO Title': r.optimizedTitle,
          'SEO Description': r.metaDescription,
          Tags: r.suggestedTags.join(', '),
          Published: 'TRUE',
        })),
      ),
      'utf-8',
    );

    logger.info({ outputPath, products: results.length }, 'Import CSV written');
    return outputPath;
  }
}
