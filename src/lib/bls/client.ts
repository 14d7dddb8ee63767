/**
 * BLS Public Data API v2 クライアント
 *
 * @description レート制限、リトライ、ログ対応。1チャンク = 1 POST リクエスト
 * @see https://www.bls.gov/developers/api_signature_v2.htm
 */

import { StaticCredential, type CredentialProvider } from './credentials';
import { DEFAULT_API_URL, type PipelineConfig } from './config';
import { FatalFetchError, TransientFetchError } from './errors';
import { RateLimiter } from './rate-limiter';
import {
  BlsEnvelopeSchema,
  REQUEST_SUCCEEDED,
  type BlsEnvelope,
  type BlsRequestPayload,
  type ChunkFetcher,
  type ChunkResponse,
  type FeatureFlags,
  type RequestChunk,
} from './types';
import {
  DEFAULT_RETRY_POLICY,
  RetryAbortedError,
  RetryableError,
  withRetry,
  type RetryPolicy,
} from '../utils/retry';
import { createLogger, type LogContext, type Logger } from '../utils/logger';

export interface BlsClientOptions {
  /** API キー供給（省略時はキーなしの未登録利用） */
  credentials?: CredentialProvider;
  /** エンドポイント URL */
  apiUrl?: string;
  /** 1リクエストのタイムアウト（ミリ秒、デフォルト: 60000） */
  timeoutMs?: number;
  /** リトライポリシー */
  retry?: Partial<RetryPolicy>;
  /** 共有レートリミッター */
  rateLimiter?: RateLimiter;
  /** ジッター用乱数 */
  random?: () => number;
  /** ロガーコンテキスト */
  logContext?: LogContext;
}

/**
 * リクエストボディを構築
 *
 * range が null の場合は年を送らず API 既定の期間になる
 */
export function buildRequestPayload(
  chunk: RequestChunk,
  flags: FeatureFlags,
  registrationKey?: string
): BlsRequestPayload {
  const payload: BlsRequestPayload = { seriesid: [...chunk.seriesIds] };
  if (registrationKey) payload.registrationkey = registrationKey;
  if (chunk.range) {
    payload.startyear = String(chunk.range.startYear);
    payload.endyear = String(chunk.range.endYear);
  }
  if (flags.catalog) payload.catalog = true;
  if (flags.calculations) payload.calculations = true;
  if (flags.annualAverage) payload.annualaverage = true;
  if (flags.aspects) payload.aspects = true;
  return payload;
}

function hasSeries(results: unknown): boolean {
  return (
    typeof results === 'object' &&
    results !== null &&
    'series' in results &&
    Array.isArray(results.series) &&
    results.series.length > 0
  );
}

/**
 * BLS API クライアント
 */
export class BlsClient implements ChunkFetcher {
  private readonly credentials: CredentialProvider;
  private readonly apiUrl: string;
  private readonly timeoutMs: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly rateLimiter?: RateLimiter;
  private readonly random: () => number;
  private readonly logger: Logger;

  constructor(options?: BlsClientOptions) {
    this.credentials = options?.credentials ?? new StaticCredential(undefined);
    this.apiUrl = options?.apiUrl ?? DEFAULT_API_URL;
    this.timeoutMs = options?.timeoutMs ?? 60000;
    this.retryPolicy = { ...DEFAULT_RETRY_POLICY, ...options?.retry };
    this.rateLimiter = options?.rateLimiter;
    this.random = options?.random ?? Math.random;
    this.logger = createLogger({ module: 'bls-client', ...options?.logContext });
  }

  /**
   * 1チャンクを取得
   *
   * @throws {TransientFetchError} 429 / 5xx がリトライ上限まで続いた
   * @throws {FatalFetchError} それ以外の失敗（reason で分類）
   */
  async fetchChunk(
    chunk: RequestChunk,
    flags: FeatureFlags,
    signal?: AbortSignal
  ): Promise<ChunkResponse> {
    const log = this.logger.child({ chunkIndex: chunk.index });
    const payload = buildRequestPayload(chunk, flags, this.credentials.nextKey());
    let attempts = 0;

    log.debug('BLS API request', {
      seriesCount: chunk.seriesIds.length,
      range: chunk.range,
      rateLimitTokens: this.rateLimiter?.availableTokens,
    });

    try {
      const envelope = await withRetry(
        (attempt) => {
          attempts = attempt;
          return this.post(payload, signal);
        },
        {
          ...this.retryPolicy,
          signal,
          random: this.random,
          onRetry: (attempt, error, delayMs) => {
            log.warn('BLS API request retry', { attempt, delayMs, error });
          },
        }
      );

      log.debug('BLS API response', { attempts, status: envelope.status });
      return { chunk, envelope, attempts };
    } catch (error) {
      const classified = this.classify(error, attempts);
      log.error('BLS API request failed', {
        attempts,
        errorCode: classified.code,
        error: classified,
      });
      throw classified;
    }
  }

  private classify(error: unknown, attempts: number): TransientFetchError | FatalFetchError {
    if (error instanceof FatalFetchError) {
      return error;
    }
    if (error instanceof RetryAbortedError) {
      return new FatalFetchError(`Request aborted after ${error.attempts} attempt(s)`, 'aborted', undefined, {
        cause: error,
      });
    }
    if (error instanceof RetryableError) {
      return new TransientFetchError(
        `${error.message} (gave up after ${attempts} attempt(s))`,
        error.statusCode ?? 0,
        attempts
      );
    }
    return new FatalFetchError(
      error instanceof Error ? error.message : String(error),
      'network',
      undefined,
      { cause: error }
    );
  }

  private isTransientStatus(status: number): boolean {
    return status >= 500 || this.retryPolicy.retryStatusCodes.includes(status);
  }

  /**
   * 1回分の POST（リトライは呼び出し側）
   */
  private async post(payload: BlsRequestPayload, signal?: AbortSignal): Promise<BlsEnvelope> {
    await this.rateLimiter?.acquire(signal);

    // タイムアウトと呼び出し側の中断を1つのシグナルにまとめる
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      let response: Response;
      let text: string;
      try {
        response = await fetch(this.apiUrl, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Accept: 'application/json',
          },
          body: JSON.stringify(payload),
          signal: controller.signal,
        });
        text = await response.text();
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        if (controller.signal.aborted) {
          throw new FatalFetchError(`Request timed out after ${this.timeoutMs}ms`, 'network', undefined, {
            cause: error,
          });
        }
        throw new FatalFetchError(
          `Network error: ${error instanceof Error ? error.message : String(error)}`,
          'network',
          undefined,
          { cause: error }
        );
      }

      if (!response.ok) {
        if (this.isTransientStatus(response.status)) {
          throw new RetryableError(`BLS API returned HTTP ${response.status}`, response.status);
        }
        throw new FatalFetchError(
          `BLS API returned HTTP ${response.status}: ${text.slice(0, 200)}`,
          'http_status',
          response.status
        );
      }

      let body: unknown;
      try {
        body = JSON.parse(text);
      } catch (error) {
        throw new FatalFetchError('Response body is not valid JSON', 'malformed_payload', response.status, {
          cause: error,
        });
      }

      const parsed = BlsEnvelopeSchema.safeParse(body);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
        throw new FatalFetchError(
          `Unexpected response shape: ${issues.join('; ')}`,
          'malformed_payload',
          response.status
        );
      }

      const envelope = parsed.data;
      if (envelope.status !== REQUEST_SUCCEEDED && !hasSeries(envelope.Results)) {
        const detail = envelope.message.length > 0 ? `: ${envelope.message.join('; ')}` : '';
        throw new FatalFetchError(`BLS API status ${envelope.status}${detail}`, 'api_status', response.status);
      }
      return envelope;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * 設定からクライアントを生成（レートリミッター付き）
 */
export function createBlsClient(
  config: PipelineConfig,
  credentials: CredentialProvider,
  logContext?: LogContext
): BlsClient {
  return new BlsClient({
    credentials,
    apiUrl: config.apiUrl,
    timeoutMs: config.timeoutMs,
    retry: config.retry,
    rateLimiter: new RateLimiter({ requestsPerMinute: config.requestsPerMinute }),
    logContext,
  });
}
