/**
 * Task execution log: one row per task run, opened as 'running' and closed
 * with its outcome and duration.
 */

import type Database from 'better-sqlite3';

export type TaskStatus = 'running' | 'completed' | 'failed';

export interface TaskExecution {
  id: number;
  taskName: string;
  taskType: string;
  status: TaskStatus;
  startedAt: number;
  finishedAt: number | null;
  durationMs: number | null;
  details: Record<string, unknown> | null;
  errorMessage: string | null;
}

interface TaskExecutionRow extends Omit<TaskExecution, 'details'> {
  details: string | null;
}

function parseDetails(json: string | null): Record<string, unknown> | null {
  if (json === null) return null;
  const value: unknown = JSON.parse(json);
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return null;
  }
  return Object.fromEntries(Object.entries(value));
}

export class TaskLog {
  private startStmt: Database.Statement<[string, string, number]>;
  private completeStmt: Database.Statement<[string, number, string | null, string | null, number, number]>;
  private recentStmt: Database.Statement<[number], TaskExecutionRow>;

  constructor(db: Database.Database) {
    this.startStmt = db.prepare<[string, string, number]>(`
      INSERT INTO task_executions (task_name, task_type, status, started_at)
      VALUES (?, ?, 'running', ?)
    `);

    this.completeStmt = db.prepare<[string, number, string | null, string | null, number, number]>(`
      UPDATE task_executions
      SET status = ?,
          finished_at = ?,
          details = ?,
          error_message = ?,
          duration_ms = ? - started_at
      WHERE id = ?
    `);

    this.recentStmt = db.prepare<[number], TaskExecutionRow>(`
      SELECT
        id,
        task_name as taskName,
        task_type as taskType,
        status,
        started_at as startedAt,
        finished_at as finishedAt,
        duration_ms as durationMs,
        details,
        error_message as errorMessage
      FROM task_executions
      ORDER BY started_at DESC, id DESC
      LIMIT ?
    `);
  }

  /** Open an execution record. @returns Its id. */
  start(taskName: string, taskType: string, now: number = Date.now()): number {
    return Number(this.startStmt.run(taskName, taskType, now).lastInsertRowid);
  }

  /** Close an execution record with its outcome. */
  complete(
    id: number,
    status: Exclude<TaskStatus, 'running'>,
    options: { details?: Record<string, unknown>; errorMessage?: string; now?: number } = {},
  ): void {
    const now = options.now ?? Date.now();
    this.completeStmt.run(
      status,
      now,
      options.details === undefined ? null : JSON.stringify(options.details),
      options.errorMessage ?? null,
      now,
      id,
    );
  }

  recent(limit: number = 10): TaskExecution[] {
    return this.recentStmt.all(limit).map((row) => ({ ...row, details: parseDetails(row.details) }));
  }
}
