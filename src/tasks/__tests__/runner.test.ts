import { describe, it, expect, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createServices, type Services } from '../../bootstrap.js';
import { isTaskName } from '../runner.js';
import { ValidationError } from '../../shared/errors.js';
import { FakeAdapter, FakeClock, makeConfig } from '../../__tests__/fakes.js';

const NOW = new Date(2026, 0, 15, 9, 30);

const BLOG_JSON = JSON.stringify({
  title: 'Keep Your Chef Knife Sharp',
  content: 'Hone often.',
  meta_description: 'Knife care.',
});

const SOCIAL_JSON = JSON.stringify({ caption: 'Sharp knives, happy cooks.', hashtags: ['#knifeskills'] });

const PRODUCT_JSON = JSON.stringify({
  headline: 'Forged Chef Knife from Acme Kitchen Knives',
  short_description: 'Sharp.',
  long_description: 'Forged steel.',
  features_and_benefits: ['Full tang: balance'],
  meta_description: 'A forged chef knife.',
});

const tempDirs: string[] = [];
const open: Services[] = [];

afterEach(() => {
  for (const services of open.splice(0)) {
    services.close();
  }
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
});

function writeSearchConsoleExports(dir: string, ctrs: [string, string]): void {
  writeFileSync(
    join(dir, 'gsc_pages.csv'),
    `Top pages,Clicks,Impressions,CTR,Position\n/knives,10,1000,${ctrs[0]},5\n/care,30,1000,${ctrs[1]},8\n`,
    'utf-8',
  );
  writeFileSync(join(dir, 'gsc_queries.csv'), 'Top queries,Clicks,Position\nchef knife,12,6\n', 'utf-8');
}

function setup(script: Array<string | Error> = []) {
  const dir = mkdtempSync(join(tmpdir(), 'autopilot-tasks-'));
  tempDirs.push(dir);
  const adapter = new FakeAdapter(script);
  const services = createServices(makeConfig(dir), { adapter, clock: new FakeClock(), now: () => NOW });
  open.push(services);
  return { dir, adapter, services };
}

describe('isTaskName', () => {
  it('recognizes the scheduled tasks', () => {
    expect(isTaskName('daily-content')).toBe(true);
    expect(isTaskName('weekly-seo')).toBe(true);
    expect(isTaskName('monthly-optimization')).toBe(true);
    expect(isTaskName('quarterly-strategy')).toBe(true);
    expect(isTaskName('batch-content')).toBe(true);
    expect(isTaskName('toString')).toBe(false);
  });
});

describe('TaskRunner', () => {
  it('rejects unknown tasks before logging an execution', async () => {
    const { services } = setup();

    await expect(services.runner.run('nightly')).rejects.toThrow(
      new ValidationError("Unknown task 'nightly'. Expected one of: daily-content, weekly-seo, monthly-optimization, quarterly-strategy, batch-content"),
    );
    expect(services.taskLog.recent()).toEqual([]);
  });

  it('daily-content writes a blog post and a social post per platform', async () => {
    const { dir, services } = setup([BLOG_JSON, SOCIAL_JSON]);

    const outcome = await services.runner.run('daily-content');

    expect(outcome.task).toBe('daily-content');
    expect(outcome.details).toEqual({
      posts: [
        {
          id: 1,
          title: 'Keep Your Chef Knife Sharp',
          filePath: join(dir, 'content', '20260115_keep-your-chef-knife-sharp.json'),
        },
      ],
      social: [{ platform: 'instagram', filePath: join(dir, 'content', '20260115_instagram_keeping-a-chef-knife-sharp.json') }],
      failed: 0,
    });
    expect(existsSync(join(dir, 'content', '20260115_keep-your-chef-knife-sharp.json'))).toBe(true);
    expect(services.contentStore.listRecentContent().map((c) => c.title)).toEqual(['Keep Your Chef Knife Sharp']);
    expect(services.taskLog.recent()[0]).toMatchObject({
      id: outcome.executionId,
      taskName: 'daily-content',
      taskType: 'content',
      status: 'completed',
    });
  });

  it('daily-content fails only when nothing was produced', async () => {
    const { services } = setup([new Error('boom')]);

    await expect(services.runner.run('daily-content')).rejects.toThrow('boom');
    expect(services.taskLog.recent()[0]).toMatchObject({ status: 'failed', errorMessage: 'boom' });
  });

  it('weekly-seo skips the audit when the search console exports are missing', async () => {
    const { dir, services } = setup();

    const outcome = await services.runner.run('weekly-seo');

    expect(outcome.details).toEqual({
      skipped: true,
      pagesCsv: `${dir}/gsc_pages.csv`,
      queriesCsv: `${dir}/gsc_queries.csv`,
    });
    expect(services.taskLog.recent()[0]).toMatchObject({ taskName: 'weekly-seo', taskType: 'audit', status: 'completed' });
  });

  it('weekly-seo writes the audit and raises an alert when CTR is low', async () => {
    const { dir, services } = setup();
    writeSearchConsoleExports(dir, ['1%', '2.5%']);

    const outcome = await services.runner.run('weekly-seo');

    expect(outcome.details).toEqual({
      reportPath: join(dir, 'reports', 'seo_audit_20260115.json'),
      totalClicks: 40,
      avgCtr: 1.75,
      opportunities: 2,
      alerted: true,
    });
    expect(JSON.parse(readFileSync(join(dir, 'reports', 'seo_audit_20260115.json'), 'utf-8'))).toMatchObject({
      totalPages: 2,
      totalQueries: 1,
    });
    expect(readFileSync(join(dir, 'reports', 'alerts.log'), 'utf-8')).toBe(
      `${NOW.toISOString()} CTR below 2% - optimization needed\n`,
    );
  });

  it('weekly-seo stays quiet when CTR is healthy', async () => {
    const { dir, services } = setup();
    writeSearchConsoleExports(dir, ['3%', '4%']);

    const outcome = await services.runner.run('weekly-seo');

    expect(outcome.details).toMatchObject({ avgCtr: 3.5, alerted: false });
    expect(existsSync(join(dir, 'reports', 'alerts.log'))).toBe(false);
  });

  it('weekly-seo completes even when the alert cannot be delivered', async () => {
    const { dir, services } = setup();
    writeSearchConsoleExports(dir, ['1%', '2.5%']);
    mkdirSync(join(dir, 'reports', 'alerts.log'), { recursive: true });

    const outcome = await services.runner.run('weekly-seo');

    expect(outcome.details).toMatchObject({ alerted: false });
    expect(services.taskLog.recent()[0]).toMatchObject({ taskName: 'weekly-seo', status: 'completed' });
  });

  it('quarterly-strategy completes with an empty report when every lookup fails', async () => {
    const { dir, services } = setup();

    const outcome = await services.runner.run('quarterly-strategy');

    expect(outcome.details).toEqual({
      reportPath: join(dir, 'reports', 'seo_strategy_20260115.json'),
      calendarPath: join(dir, 'reports', 'content_calendar_20260115.csv'),
      keywords: 0,
      clusters: 0,
    });
    expect(existsSync(join(dir, 'reports', 'seo_strategy_20260115.json'))).toBe(true);
  });

  it('monthly-optimization requires an input file and records the failure', async () => {
    const { services } = setup();

    await expect(services.runner.run('monthly-optimization')).rejects.toThrow(
      'monthly-optimization requires --input <products.csv>',
    );
    expect(services.taskLog.recent()[0]).toMatchObject({
      taskName: 'monthly-optimization',
      status: 'failed',
      errorMessage: 'monthly-optimization requires --input <products.csv>',
    });
  });

  it('monthly-optimization writes the report and import files', async () => {
    const { dir, services } = setup([PRODUCT_JSON]);
    const input = join(dir, 'products.csv');
    writeFileSync(
      input,
      'Handle,Title,Body (HTML),Type,Tags,Variant Price,Image Src\nchef-knife,Chef Knife,<p>A knife.</p>,Knives,steel,25.00,a.jpg\n',
      'utf-8',
    );

    const outcome = await services.runner.run('monthly-optimization', { input });

    expect(outcome.details).toEqual({
      optimized: 1,
      reportPath: join(dir, 'reports', 'product_optimization_20260115.json'),
      csvPath: join(dir, 'reports', 'product_optimization_20260115.csv'),
      importPath: join(dir, 'reports', 'product_import_20260115.csv'),
    });
    expect(existsSync(join(dir, 'reports', 'product_import_20260115.csv'))).toBe(true);
    expect(readFileSync(join(dir, 'reports', 'alerts.log'), 'utf-8')).toBe(
      `${NOW.toISOString()} Monthly optimization complete: 1 products updated\n`,
    );
  });

  it('batch-content requires a plan file', async () => {
    const { services } = setup();

    await expect(services.runner.run('batch-content')).rejects.toThrow('batch-content requires --input <plan.json>');
  });

  it('batch-content rejects an invalid plan before calling the model', async () => {
    const { dir, adapter, services } = setup(['unused']);
    const input = join(dir, 'plan.json');
    writeFileSync(input, JSON.stringify([{ type: 'video', topic: 'Knife care' }]), 'utf-8');

    await expect(services.runner.run('batch-content', { input })).rejects.toBeInstanceOf(ValidationError);
    expect(adapter.requests).toHaveLength(0);
  });

  it('batch-content generates the plan and writes a summary report', async () => {
    const { dir, services } = setup([BLOG_JSON, SOCIAL_JSON, new Error('boom')]);
    const input = join(dir, 'plan.json');
    writeFileSync(
      input,
      JSON.stringify([
        { type: 'blog_post', topic: 'Keeping a chef knife sharp', keywords: ['chef knife'] },
        { type: 'social_post', topic: 'Knife care 101', keywords: ['chef knife'], platform: 'pinterest' },
        { type: 'blog_post', topic: 'Storing knives', keywords: ['knife storage'] },
      ]),
      'utf-8',
    );

    const outcome = await services.runner.run('batch-content', { input });

    const reportPath = join(dir, 'reports', 'batch_generation_20260115_093000.json');
    expect(outcome.details).toEqual({ reportPath, total: 3, successful: 2, failed: 1, successRate: '66.7%' });
    expect(JSON.parse(readFileSync(reportPath, 'utf-8'))).toMatchObject({
      summary: { total: 3, successful: 2, failed: 1 },
      blogPosts: [
        {
          topic: 'Keeping a chef knife sharp',
          title: 'Keep Your Chef Knife Sharp',
          filePath: join(dir, 'content', '20260115_keep-your-chef-knife-sharp.json'),
        },
      ],
      socialPosts: [
        {
          platform: 'pinterest',
          caption: 'Sharp knives, happy cooks.',
          filePath: join(dir, 'content', '20260115_pinterest_knife-care-101.json'),
        },
      ],
      errors: [{ type: 'blog_post', topic: 'Storing knives', status: 'error', error: 'boom' }],
    });
    expect(services.contentStore.listRecentContent().map((c) => c.title)).toEqual(['Keep Your Chef Knife Sharp']);
  });
});
