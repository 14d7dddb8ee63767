/**
 * パイプライン設定
 *
 * @description 環境変数から API 上限・リトライ・並列度などを読み込む
 */

import { z } from 'zod';
import { ConfigError } from './errors';

export const DEFAULT_API_URL = 'https://api.bls.gov/publicAPI/v2/timeseries/data/';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

/** 環境変数スキーマ（空文字は未設定扱い） */
export const PipelineEnvSchema = z.object({
  BLS_API_URL: z.string().url().default(DEFAULT_API_URL),
  /** 1リクエストあたりの系列数上限（v2 登録: 50、未登録: 25） */
  BLS_SERIES_LIMIT: positiveInt(50),
  /** 1リクエストあたりの年数上限（v2 登録: 20、未登録: 10） */
  BLS_YEARS_LIMIT: positiveInt(20),
  BLS_MAX_ATTEMPTS: positiveInt(5),
  BLS_BACKOFF_BASE_MS: nonNegativeInt(1000),
  BLS_BACKOFF_MAX_MS: nonNegativeInt(32000),
  BLS_CONCURRENCY: positiveInt(2),
  BLS_TIMEOUT_MS: positiveInt(60000),
  BLS_REQUESTS_PER_MINUTE: positiveInt(50),
  BLS_MAPPING_PATH: z.string().optional(),
  BLS_PATTERNS_PATH: z.string().optional(),
});

export interface PipelineConfig {
  apiUrl: string;
  seriesLimit: number;
  yearsLimit: number;
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  concurrency: number;
  timeoutMs: number;
  requestsPerMinute: number;
  mappingPath?: string;
  patternsPath?: string;
}

/**
 * 環境変数から設定を構築
 *
 * @throws {ConfigError} 値が不正な場合（全項目の問題を列挙）
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const relevant: Record<string, string> = {};
  for (const key of Object.keys(PipelineEnvSchema.shape)) {
    const value = env[key]?.trim();
    if (value) {
      relevant[key] = value;
    }
  }

  const parsed = PipelineEnvSchema.safeParse(relevant);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const e = parsed.data;
  if (e.BLS_BACKOFF_MAX_MS < e.BLS_BACKOFF_BASE_MS) {
    const issue = 'BLS_BACKOFF_MAX_MS: must be >= BLS_BACKOFF_BASE_MS';
    throw new ConfigError(`Invalid configuration: ${issue}`, [issue]);
  }

  return {
    apiUrl: e.BLS_API_URL,
    seriesLimit: e.BLS_SERIES_LIMIT,
    yearsLimit: e.BLS_YEARS_LIMIT,
    retry: {
      maxAttempts: e.BLS_MAX_ATTEMPTS,
      baseDelayMs: e.BLS_BACKOFF_BASE_MS,
      maxDelayMs: e.BLS_BACKOFF_MAX_MS,
    },
    concurrency: e.BLS_CONCURRENCY,
    timeoutMs: e.BLS_TIMEOUT_MS,
    requestsPerMinute: e.BLS_REQUESTS_PER_MINUTE,
    mappingPath: e.BLS_MAPPING_PATH,
    patternsPath: e.BLS_PATTERNS_PATH,
  };
}
