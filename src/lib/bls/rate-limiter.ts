/**
 * BLS API レート制限
 *
 * @description v2 登録ユーザー: 1日500クエリ、10秒あたり50リクエスト
 * トークンバケットアルゴリズムで制御
 */

import { sleep } from '../utils/retry';

export interface RateLimiterOptions {
  /** 1分あたりの最大リクエスト数（デフォルト: 50） */
  requestsPerMinute?: number;
  /** 最小リクエスト間隔（ミリ秒、デフォルト: 200） */
  minIntervalMs?: number;
}

/**
 * トークンバケット方式のレート制限
 *
 * 並列ワーカー間で共有される。acquire() は呼び出し順に待機時間を予約する。
 */
export class RateLimiter {
  private readonly requestsPerMinute: number;
  private readonly minIntervalMs: number;
  private readonly bucketCapacity: number;
  private tokens: number;
  private lastRefillTime: number;
  private lastRequestTime: number;

  constructor(options?: RateLimiterOptions) {
    this.requestsPerMinute = options?.requestsPerMinute ?? 50;
    this.minIntervalMs = options?.minIntervalMs ?? 200;
    this.bucketCapacity = this.requestsPerMinute;
    this.tokens = this.bucketCapacity;
    this.lastRefillTime = Date.now();
    this.lastRequestTime = 0;
  }

  /**
   * トークンを補充
   */
  private refill(): void {
    const now = Date.now();
    const elapsedMs = now - this.lastRefillTime;
    // 1分あたり requestsPerMinute トークンを補充
    const tokensToAdd = (elapsedMs / 60000) * this.requestsPerMinute;
    this.tokens = Math.min(this.bucketCapacity, this.tokens + tokensToAdd);
    this.lastRefillTime = now;
  }

  /**
   * 次のリクエストまでの待機時間（ミリ秒）を計算
   */
  private getWaitTime(): number {
    this.refill();

    if (this.tokens >= 1) {
      const timeSinceLastRequest = Date.now() - this.lastRequestTime;
      if (timeSinceLastRequest < this.minIntervalMs) {
        return this.minIntervalMs - timeSinceLastRequest;
      }
      return 0;
    }

    // トークンがない場合、1トークン補充されるまでの時間を計算
    const msPerToken = 60000 / this.requestsPerMinute;
    const tokensNeeded = 1 - this.tokens;
    return Math.ceil(tokensNeeded * msPerToken);
  }

  /**
   * トークンを消費（リクエスト実行前に呼び出す）
   * 必要に応じて待機する。signal が中断されると reject する
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    const waitTime = this.getWaitTime();

    // 待機前に消費を予約し、並列ワーカーが同じトークンを取らないようにする
    this.tokens -= 1;
    this.lastRequestTime = Date.now() + waitTime;

    if (waitTime > 0) {
      await sleep(waitTime, signal);
    }
  }

  /**
   * 現在利用可能なトークン数
   */
  get availableTokens(): number {
    this.refill();
    return Math.floor(this.tokens);
  }
}
