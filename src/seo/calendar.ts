/**
 * Content calendar built from keyword clusters.
 */

import { generateCsv } from '../shared/csv.js';
import type { CalendarEntry, KeywordCluster } from './types.js';

/** Pieces scheduled per month on average. */
const PIECES_PER_MONTH = 75;
const PIECES_PER_WEEK = 3;
const OPPORTUNITIES_PER_CLUSTER = 3;
const HIGH_PRIORITY_VOLUME = 5000;
const TRAFFIC_CAPTURE_RATE = 0.15;

/**
 * Schedule up to three opportunities per cluster, three pieces a week, in
 * cluster order, capped at `months * 75` pieces.
 */
export function generateContentCalendar(clusters: readonly KeywordCluster[], months: number = 12): CalendarEntry[] {
  const target = months * PIECES_PER_MONTH;
  const entries: CalendarEntry[] = [];

  for (const cluster of clusters) {
    for (const opportunity of cluster.contentOpportunities.slice(0, OPPORTUNITIES_PER_CLUSTER)) {
      if (entries.length >= target) {
        return entries;
      }

      const week = Math.floor(entries.length / PIECES_PER_WEEK) + 1;
      entries.push({
        week,
        month: Math.floor(week / 4) + 1,
        topicCluster: cluster.topic,
        primaryKeyword: cluster.primaryKeyword.term,
        searchVolume: cluster.primaryKeyword.searchVolume,
        difficulty: cluster.primaryKeyword.difficulty,
        contentType: opportunity,
        targetIntent: cluster.primaryKeyword.intent,
        priority: cluster.totalVolume > HIGH_PRIORITY_VOLUME ? 'High' : 'Medium',
        estimatedTraffic: Math.floor(cluster.totalVolume * TRAFFIC_CAPTURE_RATE),
      });
    }
  }

  return entries;
}

const CALENDAR_COLUMNS = [
  'week',
  'month',
  'topic_cluster',
  'primary_keyword',
  'search_volume',
  'difficulty',
  'content_type',
  'target_intent',
  'priority',
  'estimated_traffic',
] as const;

export function calendarToCsv(entries: readonly CalendarEntry[]): string {
  return generateCsv(
    CALENDAR_COLUMNS,
    entries.map((entry) => ({
      week: entry.week,
      month: entry.month,
      topic_cluster: entry.topicCluster,
      primary_keyword: entry.primaryKeyword,
      search_volume: entry.searchVolume,
      difficulty: entry.difficulty,
      content_type: entry.contentType,
      target_intent: entry.targetIntent,
      priority: entry.priority,
      estimated_traffic: entry.estimatedTraffic,
    })),
  );
}
