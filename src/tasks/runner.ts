/**
 * Task runner. Each named task is one unit of pipeline work, recorded in the
 * task log from start to finish.
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { dateStamp } from '../shared/slug.js';
import { safeExecute, validateInput } from '../resilience/guards.js';
import type { ContentConfig, SearchConsoleConfig } from '../config/types.js';
import type { ContentGenerator } from '../content/generator.js';
import { loadContentPlan, summarizeBatch, type BatchGenerator } from '../content/batch.js';
import type { SeoEngine } from '../seo/engine.js';
import type { ProductOptimizer } from '../optimizer/optimizer.js';
import type { ContentStore } from '../persistence/content-store.js';
import type { TaskLog } from '../persistence/task-log.js';
import type { AlertSink } from './alerts.js';

export const TASKS = {
  'daily-content': 'content',
  'weekly-seo': 'audit',
  'monthly-optimization': 'optimization',
  'quarterly-strategy': 'seo',
  'batch-content': 'content',
} as const;

/** Average CTR (percent) below which the weekly audit raises an alert. */
export const CTR_ALERT_THRESHOLD = 2;

export type TaskName = keyof typeof TASKS;

export function isTaskName(value: string): value is TaskName {
  return Object.hasOwn(TASKS, value);
}

export interface TaskRunOptions {
  /** Product export CSV for monthly-optimization, content plan for batch-content. */
  input?: string;
}

export interface TaskOutcome {
  executionId: number;
  task: TaskName;
  details: Record<string, unknown>;
}

export interface TaskRunnerDeps {
  generator: ContentGenerator;
  seo: SeoEngine;
  optimizer: ProductOptimizer;
  batch: BatchGenerator;
  contentStore: ContentStore;
  taskLog: TaskLog;
  alerts: AlertSink;
  content: ContentConfig;
  searchConsole: SearchConsoleConfig;
  reportsDir: string;
  now?: () => Date;
}

export class TaskRunner {
  private readonly deps: TaskRunnerDeps;

  constructor(deps: TaskRunnerDeps) {
    this.deps = deps;
  }

  /**
   * Run a task by name, recording it as running, then completed or failed.
   * @throws ValidationError for an unknown task name; otherwise the task's own error.
   */
  async run(name: string, options: TaskRunOptions = {}): Promise<TaskOutcome> {
    validateInput(isTaskName(name), `Unknown task '${name}'. Expected one of: ${Object.keys(TASKS).join(', ')}`);

    const executionId = this.deps.taskLog.start(name, TASKS[name]);
    const start = performance.now();
    logger.info({ task: name, executionId }, `Starting task ${name}`);

    try {
      const details = await this.execute(name, options);
      this.deps.taskLog.complete(executionId, 'completed', { details });
      logger.info(
        { task: name, executionId, durationMs: Math.round(performance.now() - start) },
        `Task ${name} completed`,
      );
      return { executionId, task: name, details };
    } catch (err: unknown) {
      this.deps.taskLog.complete(executionId, 'failed', { errorMessage: errorMessage(err) });
      logger.error({ task: name, executionId, err }, `Task ${name} failed: ${errorMessage(err)}`);
      throw err;
    }
  }

  private execute(name: TaskName, options: TaskRunOptions): Promise<Record<string, unknown>> {
    switch (name) {
      case 'daily-content':
        return this.dailyContent();
      case 'weekly-seo':
        return this.weeklySeoAudit();
      case 'monthly-optimization':
        return this.monthlyOptimization(options.input);
      case 'quarterly-strategy':
        return this.quarterlyStrategy();
      case 'batch-content':
        return this.batchContent(options.input);
    }
  }

  /**
   * A blog post per configured topic, then one social post per platform on
   * the first topic. Individual failures are logged; the task fails only when
   * nothing at all was produced.
   */
  private async dailyContent(): Promise<Record<string, unknown>> {
    const { generator, contentStore, content } = this.deps;
    validateInput(content.dailyTopics.length > 0, 'No daily topics configured (content.dailyTopics)');

    const posts: Array<{ id: number; title: string; filePath: string }> = [];
    const social: Array<{ platform: string; filePath: string }> = [];
    const failures: unknown[] = [];

    for (const topic of content.dailyTopics) {
      try {
        const post = await generator.generateBlogPost(topic.topic, topic.keywords, topic.wordCount);
        const filePath = await generator.saveContent(post);
        posts.push({ id: contentStore.saveContent(post, filePath), title: post.title, filePath });
      } catch (err: unknown) {
        failures.push(err);
        logger.error({ err, topic: topic.topic }, `Blog post for '${topic.topic}' failed: ${errorMessage(err)}`);
      }
    }

    const [lead] = content.dailyTopics;
    if (lead !== undefined) {
      for (const platform of content.socialPlatforms) {
        try {
          const post = await generator.generateSocialPost(lead.topic, lead.keywords, platform);
          social.push({ platform, filePath: await generator.saveSocialPost(post, lead.topic) });
        } catch (err: unknown) {
          failures.push(err);
          logger.error({ err, platform }, `${platform} post failed: ${errorMessage(err)}`);
        }
      }
    }

    if (posts.length === 0 && social.length === 0 && failures.length > 0) {
      throw failures[0];
    }

    return { posts, social, failed: failures.length };
  }

  /**
   * Analyse the search-console exports when both are present; a missing
   * export skips the audit without failing the task.
   */
  private async weeklySeoAudit(): Promise<Record<string, unknown>> {
    const { pagesCsv, queriesCsv } = this.deps.searchConsole;
    if (!existsSync(pagesCsv) || !existsSync(queriesCsv)) {
      logger.warn({ pagesCsv, queriesCsv }, 'Search console exports not found - skipping audit');
      return { skipped: true, pagesCsv, queriesCsv };
    }

    const { reportPath, analysis } = await this.deps.seo.auditPerformance(pagesCsv, queriesCsv);
    const alerted =
      analysis.avgCtr < CTR_ALERT_THRESHOLD && (await this.alert(`CTR below ${CTR_ALERT_THRESHOLD}% - optimization needed`));

    return {
      reportPath,
      totalClicks: analysis.totalClicks,
      avgCtr: analysis.avgCtr,
      opportunities: analysis.opportunities.length,
      alerted,
    };
  }

  private async quarterlyStrategy(): Promise<Record<string, unknown>> {
    const { reportPath, calendarPath, report } = await this.deps.seo.generateReport();
    return {
      reportPath,
      calendarPath,
      keywords: report.keywordResearch.totalKeywords,
      clusters: report.keywordResearch.totalClusters,
    };
  }

  private async batchContent(input: string | undefined): Promise<Record<string, unknown>> {
    validateInput(input !== undefined && input.length > 0, 'batch-content requires --input <plan.json>');

    const plan = await loadContentPlan(input);
    const results = await this.deps.batch.generateLibrary(plan);
    const reportPath = await this.deps.batch.writeSummaryReport(results);

    return { reportPath, ...summarizeBatch(results) };
  }

  private async monthlyOptimization(input: string | undefined): Promise<Record<string, unknown>> {
    validateInput(input !== undefined && input.length > 0, 'monthly-optimization requires --input <products.csv>');

    const { optimizer, reportsDir } = this.deps;
    const results = await optimizer.optimizeAll(input);
    const { reportPath, csvPath } = await optimizer.writeReport(results);
    const stamp = dateStamp(this.deps.now?.() ?? new Date());
    const importPath = await optimizer.writeImportCsv(results, join(reportsDir, `product_import_${stamp}.csv`));

    await this.alert(`Monthly optimization complete: ${results.length} products updated`);
    return { optimized: results.length, reportPath, csvPath, importPath };
  }

  /** Send an alert; a failed delivery is logged and never fails the task. */
  private alert(message: string): Promise<boolean> {
    return safeExecute(
      async () => {
        await this.deps.alerts.send(message);
        return true;
      },
      false,
      { label: 'alert' },
    );
  }
}
