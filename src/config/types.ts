/**
 * TypeScript types inferred from Zod schemas.
 * These types are the compile-time companions to the runtime validation schemas.
 */

import { z } from 'zod';
import {
  ConfigSchema,
  LlmSchema,
  SearchSchema,
  RetrySchema,
  BrandSchema,
  ContentSchema,
  TopicSchema,
  SettingsSchema,
  SearchConsoleSchema,
  SocialPlatformSchema,
} from './schema.js';

/** Fully validated pipeline configuration. */
export type Config = z.infer<typeof ConfigSchema>;

/** LLM provider configuration. */
export type LlmConfig = z.infer<typeof LlmSchema>;

/** Search-ranking data source configuration. */
export type SearchConfig = z.infer<typeof SearchSchema>;

/** Retry policy values as written in the config file. */
export type RetryConfig = z.infer<typeof RetrySchema>;

/** Brand guidelines. */
export type BrandConfig = z.infer<typeof BrandSchema>;

/** Content generation settings. */
export type ContentConfig = z.infer<typeof ContentSchema>;

/** A scheduled blog topic. */
export type TopicConfig = z.infer<typeof TopicSchema>;

/** Process-level settings. */
export type Settings = z.infer<typeof SettingsSchema>;

/** Supported social platforms. */
export type SocialPlatform = z.infer<typeof SocialPlatformSchema>;

// Re-export schemas for convenience
export {
  ConfigSchema,
  LlmSchema,
  SearchSchema,
  RetrySchema,
  BrandSchema,
  ContentSchema,
  SettingsSchema,
} from './schema.js';

/** Search-console export locations. */
export type SearchConsoleConfig = z.infer<typeof SearchConsoleSchema>;
