/**
 * 指数バックオフリトライユーティリティ
 *
 * @description 429/5xx エラー時に指数バックオフでリトライ
 *
 * 試行ごとの状態は RetryStateMachine が保持する:
 *   pending → attempting → succeeded
 *                        → retrying → attempting ...
 *                        → failed
 */

export type RetryState = 'pending' | 'attempting' | 'retrying' | 'succeeded' | 'failed';

export interface RetryPolicy {
  /** 最大試行回数（初回を含む、デフォルト: 5） */
  maxAttempts: number;
  /** 基本遅延時間（ミリ秒、デフォルト: 1000） */
  baseDelayMs: number;
  /** 最大遅延時間（ミリ秒、デフォルト: 32000） */
  maxDelayMs: number;
  /** ジッター幅（ミリ秒、デフォルト: 100） */
  jitterMs: number;
  /** リトライ対象のステータスコード */
  retryStatusCodes: readonly number[];
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 32000,
  jitterMs: 100,
  retryStatusCodes: [429, 500, 502, 503, 504],
};

export interface RetryOptions extends Partial<RetryPolicy> {
  /** リトライ時のコールバック */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** 中断シグナル（バックオフ待機中も即座に中断） */
  signal?: AbortSignal;
  /** ジッター用乱数（テスト用に差し替え可） */
  random?: () => number;
}

/**
 * リトライ可能なエラー
 */
export class RetryableError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'RetryableError';
  }
}

/**
 * 中断シグナルによる打ち切り
 */
export class RetryAbortedError extends Error {
  constructor(public readonly attempts: number) {
    super(`Aborted after ${attempts} attempt(s)`);
    this.name = 'RetryAbortedError';
  }
}

export type RetryDecision =
  | { action: 'retry'; attempt: number; delayMs: number }
  | { action: 'fail'; attempt: number; exhausted: boolean };

/**
 * ジッター付きの遅延時間を計算
 *
 * @param attempt 失敗した試行番号（1始まり）
 */
export function calculateDelay(
  attempt: number,
  policy: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs' | 'jitterMs'>,
  random: () => number = Math.random
): number {
  // 指数バックオフ: baseDelay * 2^(attempt-1)
  const exponentialDelay = policy.baseDelayMs * Math.pow(2, attempt - 1);
  // 最大遅延でキャップ
  const cappedDelay = Math.min(exponentialDelay, policy.maxDelayMs);
  return cappedDelay + random() * policy.jitterMs;
}

/**
 * 1タスク分のリトライ状態
 */
export class RetryStateMachine {
  readonly policy: RetryPolicy;
  private readonly random: () => number;
  private currentState: RetryState = 'pending';
  private attemptCount = 0;

  constructor(policy?: Partial<RetryPolicy>, random: () => number = Math.random) {
    this.policy = {
      maxAttempts: policy?.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
      baseDelayMs: policy?.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
      maxDelayMs: policy?.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
      jitterMs: policy?.jitterMs ?? DEFAULT_RETRY_POLICY.jitterMs,
      retryStatusCodes: policy?.retryStatusCodes ?? DEFAULT_RETRY_POLICY.retryStatusCodes,
    };
    if (!Number.isInteger(this.policy.maxAttempts) || this.policy.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer (got ${this.policy.maxAttempts})`);
    }
    this.random = random;
  }

  get state(): RetryState {
    return this.currentState;
  }

  get attempts(): number {
    return this.attemptCount;
  }

  /**
   * 試行を開始（pending / retrying → attempting）
   *
   * @returns 今回の試行番号（1始まり）
   */
  begin(): number {
    if (this.currentState !== 'pending' && this.currentState !== 'retrying') {
      throw new Error(`Cannot begin attempt from state ${this.currentState}`);
    }
    this.currentState = 'attempting';
    this.attemptCount++;
    return this.attemptCount;
  }

  /**
   * 試行成功（attempting → succeeded）
   */
  succeed(): void {
    this.assertAttempting();
    this.currentState = 'succeeded';
  }

  /**
   * 試行失敗（attempting → retrying | failed）
   */
  fail(retryable: boolean): RetryDecision {
    this.assertAttempting();
    const attempt = this.attemptCount;

    if (!retryable) {
      this.currentState = 'failed';
      return { action: 'fail', attempt, exhausted: false };
    }
    if (attempt >= this.policy.maxAttempts) {
      this.currentState = 'failed';
      return { action: 'fail', attempt, exhausted: true };
    }

    this.currentState = 'retrying';
    return { action: 'retry', attempt, delayMs: calculateDelay(attempt, this.policy, this.random) };
  }

  /**
   * 中断（どの状態からでも failed）
   */
  abort(): void {
    this.currentState = 'failed';
  }

  private assertAttempting(): void {
    if (this.currentState !== 'attempting') {
      throw new Error(`No attempt in progress (state ${this.currentState})`);
    }
  }
}

/**
 * リトライ対象かどうかを判定
 */
export function isRetryableError(error: unknown, retryStatusCodes: readonly number[]): boolean {
  if (error instanceof RetryableError) {
    return true;
  }
  if (error instanceof Error && 'statusCode' in error) {
    const { statusCode } = error;
    return typeof statusCode === 'number' && retryStatusCodes.includes(statusCode);
  }
  return false;
}

/**
 * 指定時間スリープ（中断シグナル対応）
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * 指数バックオフリトライでラップされた関数を実行
 *
 * リトライ上限に達した場合は最後のエラーをそのまま投げる。
 * 中断された場合は RetryAbortedError を投げる。
 *
 * @example
 * ```typescript
 * const result = await withRetry(
 *   async (attempt) => {
 *     const response = await fetch(url);
 *     if (!response.ok) {
 *       throw new RetryableError('Request failed', response.status);
 *     }
 *     return response.json();
 *   },
 *   { maxAttempts: 3, baseDelayMs: 1000 }
 * );
 * ```
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options?: RetryOptions
): Promise<T> {
  const { onRetry, signal, random, ...policy } = options ?? {};
  const machine = new RetryStateMachine(policy, random);

  for (;;) {
    if (signal?.aborted) {
      machine.abort();
      throw new RetryAbortedError(machine.attempts);
    }

    const attempt = machine.begin();
    try {
      const result = await fn(attempt);
      machine.succeed();
      return result;
    } catch (error) {
      if (signal?.aborted) {
        machine.abort();
        throw new RetryAbortedError(machine.attempts);
      }

      const decision = machine.fail(isRetryableError(error, machine.policy.retryStatusCodes));
      if (decision.action === 'fail') {
        throw error;
      }

      onRetry?.(attempt, error instanceof Error ? error : new Error(String(error)), decision.delayMs);

      try {
        await sleep(decision.delayMs, signal);
      } catch {
        machine.abort();
        throw new RetryAbortedError(machine.attempts);
      }
    }
  }
}
