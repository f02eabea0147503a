/**
 * Outbound API usage log. Every LLM and search call writes one row when it
 * finishes, successful or not.
 */

import type Database from 'better-sqlite3';

export type UsageOutcome = 'success' | 'error';

/**
 * API usage entry data structure.
 */
export interface ApiUsageEntry {
  timestamp: number;
  service: string;
  endpoint: string;
  model?: string;
  inputTokens: number;
  outputTokens: number;
  outcome: UsageOutcome;
  httpStatus?: number;
  latencyMs: number;
  attempts: number;
  errorMessage?: string;
  /** Provider-reported requests left in the current quota window. */
  remainingRequests?: number;
  /** Provider-reported tokens left in the current quota window. */
  remainingTokens?: number;
}

/** Per-service totals over a time window. */
export interface ServiceUsage {
  service: string;
  totalCalls: number;
  failedCalls: number;
  totalInputTokens: number;
  totalOutputTokens: number;
  avgLatencyMs: number;
  lastCallTimestamp: number;
  /** Latest quota the provider reported, null when it never sent one. */
  remainingRequests: number | null;
  remainingTokens: number | null;
}

type UsageRowParams = [
  number,
  string,
  string,
  string | null,
  number,
  number,
  string,
  number | null,
  number,
  number,
  string | null,
  number | null,
  number | null,
];

export class UsageLogger {
  private insertStmt: Database.Statement<UsageRowParams>;
  private summaryStmt: Database.Statement<[number], ServiceUsage>;

  constructor(db: Database.Database) {
    this.insertStmt = db.prepare<UsageRowParams>(`
      INSERT INTO api_usage (
        timestamp,
        service,
        endpoint,
        model,
        input_tokens,
        output_tokens,
        outcome,
        http_status,
        latency_ms,
        attempts,
        error_message,
        remaining_requests,
        remaining_tokens
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    this.summaryStmt = db.prepare<[number], ServiceUsage>(`
      SELECT
        service,
        COUNT(*) as totalCalls,
        SUM(CASE WHEN outcome = 'error' THEN 1 ELSE 0 END) as failedCalls,
        SUM(input_tokens) as totalInputTokens,
        SUM(output_tokens) as totalOutputTokens,
        ROUND(AVG(latency_ms)) as avgLatencyMs,
        MAX(timestamp) as lastCallTimestamp,
        (
          SELECT q.remaining_requests FROM api_usage q
          WHERE q.service = u.service AND q.remaining_requests IS NOT NULL
          ORDER BY q.timestamp DESC, q.id DESC LIMIT 1
        ) as remainingRequests,
        (
          SELECT q.remaining_tokens FROM api_usage q
          WHERE q.service = u.service AND q.remaining_tokens IS NOT NULL
          ORDER BY q.timestamp DESC, q.id DESC LIMIT 1
        ) as remainingTokens
      FROM api_usage u
      WHERE timestamp >= ?
      GROUP BY service
      ORDER BY totalCalls DESC, service ASC
    `);
  }

  log(entry: ApiUsageEntry): void {
    this.insertStmt.run(
      entry.timestamp,
      entry.service,
      entry.endpoint,
      entry.model ?? null,
      entry.inputTokens,
      entry.outputTokens,
      entry.outcome,
      entry.httpStatus ?? null,
      Math.round(entry.latencyMs),
      entry.attempts,
      entry.errorMessage ?? null,
      entry.remainingRequests ?? null,
      entry.remainingTokens ?? null,
    );
  }

  /** Totals per service for calls at or after `sinceMs`. */
  summary(sinceMs: number): ServiceUsage[] {
    return this.summaryStmt.all(sinceMs);
  }
}
