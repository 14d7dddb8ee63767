/**
 * パイプライン共通エラー
 *
 * @description 解決・分割・取得・正規化の各段階で発生するエラーの分類
 */

import type { DateRange, RequestChunk } from './types';

export type PipelineErrorCode =
  | 'RESOLUTION'
  | 'CHUNK_PLAN'
  | 'ALIAS_TABLE'
  | 'PATTERN'
  | 'TRANSIENT_FETCH'
  | 'FATAL_FETCH'
  | 'NORMALIZATION'
  | 'EXTRACTION_FAILED'
  | 'CONFIG';

/**
 * 全エラーの基底クラス
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: PipelineErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PipelineError';
  }
}

/**
 * エイリアス / パターン / リテラルのいずれにも該当しないトークン
 */
export class ResolutionError extends PipelineError {
  constructor(
    message: string,
    public readonly tokens: readonly string[]
  ) {
    super(message, 'RESOLUTION');
    this.name = 'ResolutionError';
  }
}

/**
 * チャンク分割の入力不正
 */
export class ChunkPlanError extends PipelineError {
  constructor(message: string) {
    super(message, 'CHUNK_PLAN');
    this.name = 'ChunkPlanError';
  }
}

/**
 * エイリアス定義ファイルの不正（行番号 / エントリ番号付き）
 */
export class AliasTableError extends PipelineError {
  constructor(
    message: string,
    public readonly source: string,
    public readonly line?: number
  ) {
    super(line !== undefined ? `${source}:${line}: ${message}` : `${source}: ${message}`, 'ALIAS_TABLE');
    this.name = 'AliasTableError';
  }
}

/**
 * 系列パターン定義の不正
 */
export class PatternError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PATTERN', options);
    this.name = 'PatternError';
  }
}

/**
 * リトライ上限到達（429 / 5xx）
 */
export class TransientFetchError extends PipelineError {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly attempts: number
  ) {
    super(message, 'TRANSIENT_FETCH');
    this.name = 'TransientFetchError';
  }
}

export type FatalFetchCause =
  | 'http_status'
  | 'malformed_payload'
  | 'network'
  | 'api_status'
  | 'aborted';

/**
 * リトライしない失敗（4xx / ペイロード不正 / ネットワーク / 中断）
 */
export class FatalFetchError extends PipelineError {
  constructor(
    message: string,
    public readonly reason: FatalFetchCause,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'FATAL_FETCH', options);
    this.name = 'FatalFetchError';
  }
}

/**
 * レスポンスを平坦化できない
 */
export class NormalizationError extends PipelineError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message, 'NORMALIZATION');
    this.name = 'NormalizationError';
  }
}

/**
 * 設定値の不正
 */
export class ConfigError extends PipelineError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message, 'CONFIG');
    this.name = 'ConfigError';
  }
}

/**
 * チャンク単位の失敗記録
 */
export interface ChunkFailure {
  chunkIndex: number;
  seriesIds: readonly string[];
  range: DateRange | null;
  kind: 'transient' | 'fatal' | 'normalization' | 'aborted';
  message: string;
  statusCode?: number;
  attempts?: number;
}

/**
 * 全チャンク失敗時の集約エラー
 */
export class ExtractionFailedError extends PipelineError {
  constructor(public readonly failures: readonly ChunkFailure[]) {
    super(
      `All ${failures.length} chunk(s) failed: ` +
        failures.map((f) => `#${f.chunkIndex} ${f.kind}: ${f.message}`).join('; '),
      'EXTRACTION_FAILED'
    );
    this.name = 'ExtractionFailedError';
  }
}

/**
 * 発生したエラーをチャンク失敗記録に変換
 */
export function toChunkFailure(chunk: RequestChunk, error: unknown): ChunkFailure {
  const base = {
    chunkIndex: chunk.index,
    seriesIds: chunk.seriesIds,
    range: chunk.range,
  };

  if (error instanceof TransientFetchError) {
    return {
      ...base,
      kind: 'transient',
      message: error.message,
      statusCode: error.statusCode,
      attempts: error.attempts,
    };
  }
  if (error instanceof FatalFetchError) {
    return {
      ...base,
      kind: error.reason === 'aborted' ? 'aborted' : 'fatal',
      message: error.message,
      statusCode: error.statusCode,
    };
  }
  if (error instanceof NormalizationError) {
    return { ...base, kind: 'normalization', message: error.message };
  }
  return {
    ...base,
    kind: 'fatal',
    message: error instanceof Error ? error.message : String(error),
  };
}
