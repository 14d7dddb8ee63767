/**
 * バッチ処理ユーティリティ
 *
 * @description 配列の分割と、同時実行数を制限したワーカープール
 */

/**
 * 配列を指定サイズのチャンクに分割
 */
export function chunkArray<T>(array: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`chunk size must be a positive integer (got ${size})`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < array.length; i += size) {
    chunks.push(array.slice(i, i + size));
  }
  return chunks;
}

export type PoolOutcome<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown }
  | { status: 'skipped' };

export interface WorkerPoolOptions {
  /** 同時実行数（デフォルト: 2） */
  concurrency?: number;
  /** 中断されると未着手のアイテムは skipped になる */
  signal?: AbortSignal;
  /** 各アイテム完了時のコールバック */
  onSettled?: (index: number, completed: number, total: number) => void;
}

/**
 * 同時実行数を制限して非同期処理を実行
 *
 * 固定数のワーカーがキューから順に取り出すため、遅いアイテム（バックオフ待機中など）が
 * 他のアイテムの着手を妨げない。結果は入力順。1件の失敗で他は止まらない
 */
export async function runWorkerPool<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  options?: WorkerPoolOptions
): Promise<PoolOutcome<R>[]> {
  const concurrency = options?.concurrency ?? 2;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer (got ${concurrency})`);
  }

  const outcomes: PoolOutcome<R>[] = items.map(() => ({ status: 'skipped' }));
  let next = 0;
  let completed = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length && !options?.signal?.aborted) {
      const index = next++;
      try {
        outcomes[index] = { status: 'fulfilled', value: await fn(items[index], index) };
      } catch (reason) {
        outcomes[index] = { status: 'rejected', reason };
      }
      completed++;
      options?.onSettled?.(index, completed, items.length);
    }
  };

  const workerCount = Math.min(concurrency, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return outcomes;
}
