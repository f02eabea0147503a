/**
 * SEO engine: keyword research, clustering and the strategy report.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { dateStamp } from '../shared/slug.js';
import { validateInput } from '../resilience/guards.js';
import type { BrandConfig } from '../config/types.js';
import { calendarToCsv, generateContentCalendar } from './calendar.js';
import { clusterKeywords } from './clustering.js';
import { keywordFromQuery } from './keywords.js';
import { analyzePerformance } from './performance.js';
import type { RelatedSearchSource } from './search-client.js';
import type { Keyword, PerformanceAnalysis, SeoReport, SeoReportFiles } from './types.js';

/** Subset of the content store the engine writes researched keywords to. */
export interface KeywordSink {
  saveKeyword(keyword: Keyword): void;
}

export interface SeoEngineOptions {
  brand: BrandConfig;
  /** Seeds used by {@link SeoEngine.generateReport}. */
  seedKeywords: readonly string[];
  reportsDir: string;
  keywordSink?: KeywordSink;
  now?: () => Date;
}

const FOCUS_AREAS = 10;
const CALENDAR_PREVIEW = 20;

export class SeoEngine {
  private readonly search: RelatedSearchSource;
  private readonly options: SeoEngineOptions;

  constructor(search: RelatedSearchSource, options: SeoEngineOptions) {
    this.search = search;
    this.options = options;
  }

  /**
   * Expand seed terms into scored keywords. A seed whose lookup fails is
   * logged and skipped. Duplicate terms keep their last occurrence; results
   * are ordered by relevance-weighted volume.
   *
   * @throws ValidationError when `seeds` is empty.
   */
  async researchKeywords(seeds: readonly string[]): Promise<Keyword[]> {
    validateInput(seeds.length > 0, 'At least one seed keyword is required');
    logger.info({ seeds: seeds.length }, 'Starting keyword research');

    const byTerm = new Map<string, Keyword>();
    for (const seed of seeds) {
      let related: string[];
      try {
        related = await this.search.relatedSearches(seed);
      } catch (err: unknown) {
        logger.error({ seed, err }, `Error researching keyword '${seed}': ${errorMessage(err)}`);
        continue;
      }

      for (const query of related) {
        byTerm.set(query, keywordFromQuery(query, this.options.brand));
      }
      logger.info({ seed, related: related.length }, `Found ${related.length} related keywords for '${seed}'`);
    }

    const keywords = [...byTerm.values()].sort(
      (a, b) => b.relevanceScore * b.searchVolume - a.relevanceScore * a.searchVolume,
    );
    logger.info({ keywords: keywords.length }, 'Keyword research complete');
    return keywords;
  }

  /**
   * Research the configured seeds, cluster, schedule, and write
   * `seo_strategy_YYYYMMDD.json` plus `content_calendar_YYYYMMDD.csv`.
   */
  async generateReport(outputDir: string = this.options.reportsDir): Promise<SeoReportFiles> {
    const now = this.options.now?.() ?? new Date();
    const seeds = [...this.options.seedKeywords];

    const keywords = await this.researchKeywords(seeds);
    const clusters = clusterKeywords(keywords);
    const calendar = generateContentCalendar(clusters);

    if (this.options.keywordSink) {
      for (const keyword of keywords) {
        this.options.keywordSink.saveKeyword(keyword);
      }
    }

    const report: SeoReport = {
      generatedAt: now.toISOString(),
      seedKeywords: seeds,
      focusAreas: clusters.slice(0, FOCUS_AREAS).map((c) => c.topic),
      keywordResearch: {
        totalKeywords: keywords.length,
        totalClusters: clusters.length,
        totalSearchVolume: clusters.reduce((sum, c) => sum + c.totalVolume, 0),
      },
      topOpportunities: clusters.slice(0, FOCUS_AREAS).map((c) => ({
        topic: c.topic,
        primaryKeyword: c.primaryKeyword.term,
        searchVolume: c.totalVolume,
        difficulty: Math.round(c.avgDifficulty * 10) / 10,
        contentIdeas: c.contentOpportunities,
      })),
      calendarPreview: calendar.slice(0, CALENDAR_PREVIEW),
    };

    await mkdir(outputDir, { recursive: true });
    const stamp = dateStamp(now);
    const reportPath = join(outputDir, `seo_strategy_${stamp}.json`);
    const calendarPath = join(outputDir, `content_calendar_${stamp}.csv`);

    await writeFile(reportPath, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');
    await writeFile(calendarPath, calendarToCsv(calendar), 'utf-8');

    logger.info({ reportPath, calendarPath, entries: calendar.length }, 'SEO strategy report written');
    return { reportPath, calendarPath, report };
  }

  /**
   * Analyse search-console exports and write `seo_audit_YYYYMMDD.json`.
   * @throws ValidationError when an export lacks a required column.
   */
  async auditPerformance(
    pagesCsvPath: string,
    queriesCsvPath: string,
    outputDir: string = this.options.reportsDir,
  ): Promise<{ reportPath: string; analysis: PerformanceAnalysis }> {
    const analysis = await analyzePerformance(pagesCsvPath, queriesCsvPath);

    await mkdir(outputDir, { recursive: true });
    const reportPath = join(outputDir, `seo_audit_${dateStamp(this.options.now?.() ?? new Date())}.json`);
    await writeFile(reportPath, `${JSON.stringify(analysis, null, 2)}\n`, 'utf-8');

    logger.info({ reportPath, avgCtr: analysis.avgCtr }, 'SEO audit report written');
    return { reportPath, analysis };
  }
}
