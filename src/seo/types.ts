/**
 * Keyword research and planning types.
 */

export type SearchIntent = 'transactional' | 'commercial' | 'navigational' | 'informational';

export interface Keyword {
  term: string;
  /** Estimated monthly searches. */
  searchVolume: number;
  /** 0-100, higher is harder to rank for. */
  difficulty: number;
  cpc: number | null;
  intent: SearchIntent;
  /** 0-1 relevance to the brand's catalogue. */
  relevanceScore: number;
}

export interface KeywordCluster {
  topic: string;
  primaryKeyword: Keyword;
  secondaryKeywords: Keyword[];
  totalVolume: number;
  avgDifficulty: number;
  contentOpportunities: string[];
}

export type CalendarPriority = 'High' | 'Medium';

export interface CalendarEntry {
  week: number;
  month: number;
  topicCluster: string;
  primaryKeyword: string;
  searchVolume: number;
  difficulty: number;
  contentType: string;
  targetIntent: SearchIntent;
  priority: CalendarPriority;
  estimatedTraffic: number;
}

export interface PageStat {
  page: string;
  clicks: number;
  impressions: number;
  /** Percent, e.g. 3.5 for "3.5%". */
  ctr: number;
  position: number;
}

export interface QueryStat {
  query: string;
  clicks: number;
  impressions: number;
  position: number;
}

export type PerformanceOpportunity =
  | { type: 'improve_ctr'; page: string; ctr: number; impressions: number; action: string }
  | { type: 'quick_win'; query: string; position: number; clicks: number; action: string };

export interface PerformanceAnalysis {
  totalPages: number;
  totalClicks: number;
  totalImpressions: number;
  avgCtr: number;
  avgPosition: number;
  totalQueries: number;
  topPages: PageStat[];
  topQueries: QueryStat[];
  opportunities: PerformanceOpportunity[];
}

export interface SeoReport {
  generatedAt: string;
  seedKeywords: string[];
  focusAreas: string[];
  keywordResearch: {
    totalKeywords: number;
    totalClusters: number;
    totalSearchVolume: number;
  };
  topOpportunities: Array<{
    topic: string;
    primaryKeyword: string;
    searchVolume: number;
    difficulty: number;
    contentIdeas: string[];
  }>;
  calendarPreview: CalendarEntry[];
}

/** Where a generated report landed. */
export interface SeoReportFiles {
  reportPath: string;
  calendarPath: string;
  report: SeoReport;
}
