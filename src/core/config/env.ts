// src/core/config/env.ts
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { HarvestError, ErrorCode } from '../errors.js';
import type { HarvestConfig } from '../types/index.js';
import { BROWSER_ENGINES, DEFAULT_BROWSER } from './browser-config.js';
import {
  DEFAULT_BACKOFF_BASE_SEC,
  DEFAULT_BACKOFF_MAX_SEC,
  DEFAULT_JITTER_SEC,
  DEFAULT_MAX_LOOPS,
  DEFAULT_PAGE_SIZE,
  DEFAULT_POPULAR_SOUND_MIN_USES,
  DEFAULT_RESET_AFTER_ERRORS,
  DEFAULT_TARGET_COUNT,
} from './constants.js';

const TRUTHY = ['1', 'true', 'yes'];

const flag = z.string().transform((value) => TRUTHY.includes(value.trim().toLowerCase()));

const envSchema = z.object({
  MS_TOKEN: z.string().optional(),
  DOWNLOAD_DIR: z.string().default('downloads'),
  DATA_CSV_PATH: z.string().default('tiktok_trending_dataset.csv'),
  DATA_JSONL: z.string().default('tiktok_trending_dataset.jsonl'),
  COUNT: z.coerce.number().int().positive().default(DEFAULT_TARGET_COUNT),
  PAGE_SIZE: z.coerce.number().int().positive().default(DEFAULT_PAGE_SIZE),
  MAX_LOOPS: z.coerce.number().int().positive().default(DEFAULT_MAX_LOOPS),
  RESET_SESSION_AFTER_ERRORS: z.coerce.number().int().positive().default(DEFAULT_RESET_AFTER_ERRORS),
  BACKOFF_BASE_SEC: z.coerce.number().nonnegative().default(DEFAULT_BACKOFF_BASE_SEC),
  BACKOFF_MAX_SEC: z.coerce.number().nonnegative().default(DEFAULT_BACKOFF_MAX_SEC),
  JITTER_SEC: z.coerce.number().nonnegative().default(DEFAULT_JITTER_SEC),
  POPULAR_SOUND_MIN_USES: z.coerce.number().int().nonnegative().default(DEFAULT_POPULAR_SOUND_MIN_USES),
  TIKTOK_BROWSER: z.enum(BROWSER_ENGINES).default(DEFAULT_BROWSER),
  HEADLESS: flag.default('true'),
  RESUME: flag.default('true'),
});

export type EnvKey = keyof z.input<typeof envSchema>;

export type EnvSource = Record<string, string | undefined>;

export type ConfigOverrides = Partial<Record<EnvKey, string>>;

/**
 * Merge environment and explicit overrides, validate, and shape the result.
 * Blank values count as unset so that `COUNT=` falls back to its default.
 */
export function resolveConfig(env: EnvSource, overrides: ConfigOverrides = {}): HarvestConfig {
  const cleaned: EnvSource = {};
  const sources: EnvSource[] = [pickKnown(env), { MS_TOKEN: env.MS_TOKEN ?? env.ms_token }, overrides];
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined && value.trim() !== '') {
        cleaned[key] = value;
      }
    }
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join('.'));
    throw new HarvestError(
      ErrorCode.INVALID_CONFIG,
      `Invalid configuration: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`,
      false,
      'Check the environment variables and command-line flags',
      { keys }
    );
  }

  const values = parsed.data;
  return {
    credentialToken: values.MS_TOKEN,
    downloadDir: values.DOWNLOAD_DIR,
    csvPath: values.DATA_CSV_PATH,
    jsonlPath: values.DATA_JSONL,
    targetCount: values.COUNT,
    pageSize: values.PAGE_SIZE,
    maxLoops: values.MAX_LOOPS,
    backoff: {
      baseSeconds: values.BACKOFF_BASE_SEC,
      maxSeconds: values.BACKOFF_MAX_SEC,
      jitterSeconds: values.JITTER_SEC,
      resetAfterErrors: values.RESET_SESSION_AFTER_ERRORS,
    },
    popularityThreshold: values.POPULAR_SOUND_MIN_USES,
    browser: {
      engine: values.TIKTOK_BROWSER,
      headless: values.HEADLESS,
    },
    resume: values.RESUME,
  };
}

/** Reads `.env` (if any) into `process.env`, then resolves. */
export function loadConfig(overrides: ConfigOverrides = {}): HarvestConfig {
  loadDotenv();
  return resolveConfig(process.env, overrides);
}

function pickKnown(env: EnvSource): EnvSource {
  const known = Object.keys(envSchema.shape);
  const picked: EnvSource = {};
  for (const key of known) {
    picked[key] = env[key];
  }
  return picked;
}
