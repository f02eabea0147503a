/**
 * Zod schemas for YAML config file validation.
 * These schemas are the single source of truth for config structure.
 * TypeScript types are inferred from these schemas in types.ts.
 */

import { z } from 'zod';

/** Schema for the LLM provider used for all content generation. */
export const LlmSchema = z.object({
  type: z.enum(['anthropic', 'openai']),
  apiKey: z.string().min(1, { message: 'llm.apiKey must not be empty' }),
  model: z.string().min(1, { message: 'llm.model must not be empty' }),
  baseUrl: z.url({ message: 'llm.baseUrl must be a valid URL' }).optional(),
  maxTokens: z.number().int().positive().default(4000),
  requestsPerMinute: z.number().int().positive().default(50),
});

/** Schema for the search-ranking data source used in keyword research. */
export const SearchSchema = z.object({
  apiKey: z.string().default(''),
  baseUrl: z.url({ message: 'search.baseUrl must be a valid URL' }).default('https://serpapi.com/search'),
  location: z.string().min(1).default('United States'),
  requestsPerMinute: z.number().int().positive().default(30),
});

/** Schema for the retry policy applied to every outbound call. */
export const RetrySchema = z.object({
  maxRetries: z.number().int().min(0).default(3),
  initialDelayMs: z.number().min(0).default(1000),
  maxDelayMs: z.number().min(0).default(60_000),
  exponentialBase: z.number().positive().default(2),
});

/** Schema for brand guidelines fed into prompts and scoring. */
export const BrandSchema = z.object({
  name: z.string().min(1, { message: 'brand.name must not be empty' }),
  tagline: z.string().default(''),
  voice: z.string().default('professional, warm, helpful'),
  targetAudience: z.string().default('home cooks'),
  mainCategories: z
    .array(z.string().min(1))
    .min(1, { message: 'brand.mainCategories must list at least one category' }),
});

export const SocialPlatformSchema = z.enum(['instagram', 'tiktok', 'pinterest', 'facebook']);

/** Schema for a scheduled blog topic. */
export const TopicSchema = z.object({
  topic: z.string().min(1),
  keywords: z.array(z.string().min(1)).min(1),
  wordCount: z.number().int().positive().optional(),
});

/** Schema for content generation settings. */
export const ContentSchema = z
  .object({
    minWordCount: z.number().int().positive().default(800),
    maxWordCount: z.number().int().positive().default(1500),
    dailyTopics: z.array(TopicSchema).default([]),
    socialPlatforms: z.array(SocialPlatformSchema).default(['instagram']),
    seedKeywords: z.array(z.string().min(1)).default([]),
  })
  .refine((content) => content.maxWordCount >= content.minWordCount, {
    message: 'content.maxWordCount must be >= content.minWordCount',
  });

/** Search-console exports read by the weekly audit. */
export const SearchConsoleSchema = z.object({
  pagesCsv: z.string().min(1).default('./data/gsc_pages.csv'),
  queriesCsv: z.string().min(1).default('./data/gsc_queries.csv'),
});

/** Schema for process-level settings. */
export const SettingsSchema = z.object({
  port: z.number().int().min(1).max(65535).default(3710),
  apiKeys: z
    .array(z.string().min(1, { message: 'API key must not be empty' }))
    .min(1, { message: 'At least one API key is required' }),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  dbPath: z.string().default('./data/autopilot.db'),
  outputDir: z.string().default('./output/content'),
  reportsDir: z.string().default('./reports'),
  requestTimeoutMs: z.number().int().min(1000).default(60_000),
  /** Append-only file that task alerts are written to. */
  alertsLog: z.string().min(1).default('./reports/alerts.log'),
  searchConsole: SearchConsoleSchema.default({
    pagesCsv: './data/gsc_pages.csv',
    queriesCsv: './data/gsc_queries.csv',
  }),
});

/** Top-level config schema. */
export const ConfigSchema = z.object({
  version: z.literal(1),
  settings: SettingsSchema,
  llm: LlmSchema,
  search: SearchSchema.default({
    apiKey: '',
    baseUrl: 'https://serpapi.com/search',
    location: 'United States',
    requestsPerMinute: 30,
  }),
  retry: RetrySchema.default({
    maxRetries: 3,
    initialDelayMs: 1000,
    maxDelayMs: 60_000,
    exponentialBase: 2,
  }),
  brand: BrandSchema,
  content: ContentSchema.default({
    minWordCount: 800,
    maxWordCount: 1500,
    dailyTopics: [],
    socialPlatforms: ['instagram'],
    seedKeywords: [],
  }),
});
