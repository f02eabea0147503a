/**
 * Search-console export analysis: totals, leaders, and pages or queries
 * worth a quick fix.
 */

import { readFile } from 'node:fs/promises';
import { parseCsv, type CsvRow } from '../shared/csv.js';
import { validateInput } from '../resilience/guards.js';
import { logger } from '../shared/logger.js';
import type { PageStat, PerformanceAnalysis, PerformanceOpportunity, QueryStat } from './types.js';

const TOP_N = 10;
const MAX_OPPORTUNITIES_PER_KIND = 5;
const LOW_CTR_MIN_IMPRESSIONS = 100;
const LOW_CTR_PERCENT = 2;

function requireColumns(headers: readonly string[], required: readonly string[], file: string): void {
  const missing = required.filter((column) => !headers.includes(column));
  validateInput(missing.length === 0, `${file} is missing column(s): ${missing.join(', ')}`);
}

function numberCell(row: CsvRow, column: string, file: string): number {
  const raw = (row[column] ?? '').replace(/[%,]/g, '').trim();
  const value = raw === '' ? 0 : Number(raw);
  validateInput(Number.isFinite(value), `${file}: "${row[column] ?? ''}" in column ${column} is not a number`);
  return value;
}

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Highest clicks first; ties keep file order. */
function topByClicks<T extends { clicks: number }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => b.clicks - a.clicks).slice(0, TOP_N);
}

/** Parse a pages export (`Top pages`, `Clicks`, `Impressions`, `CTR`, `Position`). */
export function parsePages(text: string, file: string = 'pages export'): PageStat[] {
  const { headers, rows } = parseCsv(text);
  requireColumns(headers, ['Top pages', 'Clicks', 'Impressions', 'CTR', 'Position'], file);
  return rows.map((row) => ({
    page: row['Top pages'] ?? '',
    clicks: numberCell(row, 'Clicks', file),
    impressions: numberCell(row, 'Impressions', file),
    ctr: numberCell(row, 'CTR', file),
    position: numberCell(row, 'Position', file),
  }));
}

/** Parse a queries export (`Top queries`, `Clicks`, `Position`; `Impressions` optional). */
export function parseQueries(text: string, file: string = 'queries export'): QueryStat[] {
  const { headers, rows } = parseCsv(text);
  requireColumns(headers, ['Top queries', 'Clicks', 'Position'], file);
  return rows.map((row) => ({
    query: row['Top queries'] ?? '',
    clicks: numberCell(row, 'Clicks', file),
    impressions: numberCell(row, 'Impressions', file),
    position: numberCell(row, 'Position', file),
  }));
}

/** Analyse already-parsed page and query statistics. */
export function analyzeStats(pages: readonly PageStat[], queries: readonly QueryStat[]): PerformanceAnalysis {
  const opportunities: PerformanceOpportunity[] = [];

  for (const page of pages
    .filter((p) => p.impressions > LOW_CTR_MIN_IMPRESSIONS && p.ctr < LOW_CTR_PERCENT)
    .slice(0, MAX_OPPORTUNITIES_PER_KIND)) {
    opportunities.push({
      type: 'improve_ctr',
      page: page.page,
      ctr: page.ctr,
      impressions: page.impressions,
      action: 'Optimize title and meta description',
    });
  }

  for (const query of queries
    .filter((q) => q.position >= 4 && q.position <= 10)
    .slice(0, MAX_OPPORTUNITIES_PER_KIND)) {
    opportunities.push({
      type: 'quick_win',
      query: query.query,
      position: query.position,
      clicks: query.clicks,
      action: 'Add internal links and update content',
    });
  }

  return {
    totalPages: pages.length,
    totalClicks: pages.reduce((sum, p) => sum + p.clicks, 0),
    totalImpressions: pages.reduce((sum, p) => sum + p.impressions, 0),
    avgCtr: mean(pages.map((p) => p.ctr)),
    avgPosition: mean(pages.map((p) => p.position)),
    totalQueries: queries.length,
    topPages: topByClicks(pages),
    topQueries: topByClicks(queries),
    opportunities,
  };
}

/**
 * Analyse a pair of search-console CSV exports on disk.
 * @throws ValidationError when a file lacks a required column or holds a non-numeric metric.
 */
export async function analyzePerformance(pagesCsvPath: string, queriesCsvPath: string): Promise<PerformanceAnalysis> {
  logger.info({ pagesCsvPath, queriesCsvPath }, 'Analyzing search performance');

  const [pagesText, queriesText] = await Promise.all([
    readFile(pagesCsvPath, 'utf-8'),
    readFile(queriesCsvPath, 'utf-8'),
  ]);

  const analysis = analyzeStats(parsePages(pagesText, pagesCsvPath), parseQueries(queriesText, queriesCsvPath));

  logger.info(
    { pages: analysis.totalPages, queries: analysis.totalQueries, opportunities: analysis.opportunities.length },
    'Search performance analysis complete',
  );
  return analysis;
}
