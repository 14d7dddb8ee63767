/**
 * 抽出オーケストレーター
 *
 * @description 解決 → 分割 → 並列取得 → 統合 → 正規化 を1回の呼び出しで実行する
 *
 * 失敗したチャンクは chunkFailures に記録して残りを返す。
 * 全チャンクが失敗した場合のみ ExtractionFailedError を投げる
 */

import { AliasTable, resolveSeriesTokens } from './alias-resolver';
import { DEFAULT_CHUNK_LIMITS, planChunks, type ChunkLimits } from './chunk-planner';
import { ExtractionFailedError, toChunkFailure, type ChunkFailure } from './errors';
import { flattenChunk, mergeChunks, type ChunkNormalization } from './normalizer';
import type { SeriesPatternRegistry } from './series-patterns';
import { columnsFor } from './table';
import {
  DEFAULT_FEATURE_FLAGS,
  type ChunkFetcher,
  type DateRange,
  type FeatureFlags,
  type PartialSeriesFailure,
  type TidyRecord,
} from './types';
import { runWorkerPool } from '../utils/batch';
import { createLogger } from '../utils/logger';

export interface ExtractOptions {
  /** チャンク取得の実装（通常は BlsClient） */
  fetcher: ChunkFetcher;
  /** 取得年範囲（省略時は API 既定の期間） */
  range?: DateRange | null;
  flags?: Partial<FeatureFlags>;
  /** 同時リクエスト数（デフォルト: 2） */
  concurrency?: number;
  /** ソフトデッドライン（ミリ秒）。経過後は新規チャンクを開始せず、実行中のリクエストを中断する */
  deadlineMs?: number;
  aliasTable?: AliasTable;
  patterns?: SeriesPatternRegistry;
  limits?: ChunkLimits;
}

export interface ExtractionStats {
  chunksPlanned: number;
  chunksSucceeded: number;
  duplicatesDropped: number;
}

export interface ExtractionResult {
  /** 解決済み系列ID（出力順） */
  seriesIds: string[];
  columns: string[];
  records: TidyRecord[];
  missingSeries: string[];
  seriesFailures: PartialSeriesFailure[];
  chunkFailures: ChunkFailure[];
  /** API から返ったメッセージ（重複除去） */
  messages: string[];
  stats: ExtractionStats;
}

/**
 * 系列トークンを取得して正規化済みの結果を返す
 *
 * @throws {ResolutionError} 解決できないトークンがある（I/O 前）
 * @throws {ChunkPlanError} 年範囲・上限が不正（I/O 前）
 * @throws {ExtractionFailedError} 全チャンクが失敗
 */
export async function extractSeries(
  tokens: readonly string[],
  options: ExtractOptions
): Promise<ExtractionResult> {
  const log = createLogger({ module: 'orchestrator', runId: crypto.randomUUID() });
  const flags: FeatureFlags = { ...DEFAULT_FEATURE_FLAGS, ...options.flags };

  const resolution = resolveSeriesTokens(tokens, options.aliasTable ?? AliasTable.empty(), options.patterns);
  const chunks = planChunks(resolution.seriesIds, options.range ?? null, options.limits ?? DEFAULT_CHUNK_LIMITS);

  log.info('Extraction started', {
    seriesCount: resolution.seriesIds.length,
    chunkCount: chunks.length,
    range: options.range ?? null,
  });
  const timer = log.startTimer('Extraction');

  const normalizeOptions = {
    reverseMap: resolution.reverseMap,
    requestedIds: resolution.seriesIds,
    flags,
  };

  const controller = new AbortController();
  const deadline =
    options.deadlineMs !== undefined
      ? setTimeout(() => {
          log.warn('Deadline reached; aborting remaining chunks', { deadlineMs: options.deadlineMs });
          controller.abort();
        }, options.deadlineMs)
      : undefined;

  const outcomes = await runWorkerPool(
    chunks,
    async (chunk) => {
      const response = await options.fetcher.fetchChunk(chunk, flags, controller.signal);
      return flattenChunk(response, normalizeOptions);
    },
    {
      concurrency: options.concurrency ?? 2,
      signal: controller.signal,
      onSettled: (index, completed, total) => {
        log.debug('Chunk settled', { chunkIndex: index, completed, total });
      },
    }
  ).finally(() => clearTimeout(deadline));

  const parts: ChunkNormalization[] = [];
  const chunkFailures: ChunkFailure[] = [];
  outcomes.forEach((outcome, i) => {
    const chunk = chunks[i];
    if (outcome.status === 'fulfilled') {
      parts.push(outcome.value);
    } else if (outcome.status === 'rejected') {
      const failure = toChunkFailure(chunk, outcome.reason);
      log.warn('Chunk failed', { chunkIndex: chunk.index, errorCode: failure.kind, message: failure.message });
      chunkFailures.push(failure);
    } else {
      chunkFailures.push({
        chunkIndex: chunk.index,
        seriesIds: chunk.seriesIds,
        range: chunk.range,
        kind: 'aborted',
        message: 'Not started before the deadline',
      });
    }
  });

  if (parts.length === 0) {
    const error = new ExtractionFailedError(chunkFailures);
    timer.endWithError(error, { chunkCount: chunks.length });
    throw error;
  }

  const merged = mergeChunks(parts, normalizeOptions);

  timer.end({
    rowCount: merged.records.length,
    chunksSucceeded: parts.length,
    chunksFailed: chunkFailures.length,
    duplicatesDropped: merged.duplicatesDropped,
  });

  return {
    seriesIds: resolution.seriesIds,
    columns: columnsFor(flags),
    records: merged.records,
    missingSeries: merged.missingSeries,
    seriesFailures: merged.seriesFailures,
    chunkFailures,
    messages: merged.messages,
    stats: {
      chunksPlanned: chunks.length,
      chunksSucceeded: parts.length,
      duplicatesDropped: merged.duplicatesDropped,
    },
  };
}
