/**
 * BLS Public Data API v2 の型定義とスキーマ
 *
 * @description リクエスト / レスポンスの型、パイプライン内部のデータ型
 * @see https://www.bls.gov/developers/api_signature_v2.htm
 */

import { z } from 'zod';

// ============================================
// パイプライン内部型
// ============================================

/**
 * 取得年範囲（両端含む）
 */
export interface DateRange {
  startYear: number;
  endYear: number;
}

/**
 * 1回の API 呼び出し単位
 */
export interface RequestChunk {
  /** 計画内の通し番号（0始まり） */
  index: number;
  /** 系列ID（上限 N 件） */
  seriesIds: readonly string[];
  /** 年範囲（null は API 既定の期間） */
  range: DateRange | null;
}

/**
 * API オプションフラグ
 */
export interface FeatureFlags {
  /** カタログ情報（調査名・地域・品目など） */
  catalog: boolean;
  /** 前月比・前年比などの API 計算値 */
  calculations: boolean;
  /** 年平均（M13） */
  annualAverage: boolean;
  /** aspects */
  aspects: boolean;
}

export const DEFAULT_FEATURE_FLAGS: FeatureFlags = {
  catalog: false,
  calculations: false,
  annualAverage: false,
  aspects: false,
};

/** 計算値の期間（月数） */
export const CALCULATION_HORIZONS = ['1', '3', '6', '12'] as const;
export type CalculationHorizon = (typeof CALCULATION_HORIZONS)[number];

export interface CatalogFields {
  surveyName: string | null;
  measureDataType: string | null;
  area: string | null;
  item: string | null;
  seasonality: string | null;
  seriesTitle: string | null;
}

export interface CalculationFields {
  netChanges: Record<CalculationHorizon, number | null>;
  pctChanges: Record<CalculationHorizon, number | null>;
}

/**
 * 正規化済み1行（系列ID × 年 × 期間）
 */
export interface TidyRecord {
  seriesId: string;
  year: number;
  /** 期間コード（M01..M13, Q01..Q05, A01, S01..S03） */
  period: string;
  periodName: string | null;
  value: number | null;
  /** 解決元トークン（複数は "|" 区切り） */
  alias: string | null;
  latest: boolean;
  footnotes: string | null;
  catalog: CatalogFields | null;
  calculations: CalculationFields | null;
}

/**
 * バッチ内の個別系列の失敗（チャンク自体は成功）
 */
export interface PartialSeriesFailure {
  seriesId: string;
  chunkIndex: number;
  reason: 'invalid_series' | 'no_data';
  message: string;
}

// ============================================
// API レスポンス スキーマ
// 必須は seriesID / year / period / value のみ。未知フィールドは無視
// ============================================

const FootnoteSchema = z
  .object({
    code: z.string().nullish(),
    text: z.string().nullish(),
  })
  .passthrough();

export type BlsFootnote = z.infer<typeof FootnoteSchema>;

/** Results.footnotes は配列形式とコード→本文の辞書形式の両方がある */
const FootnoteDictionarySchema = z.union([
  z.array(FootnoteSchema.nullable()),
  z.record(z.string()),
]);

const CalculationMapSchema = z.record(z.union([z.string(), z.number(), z.null()]));

const PeriodEntrySchema = z
  .object({
    year: z.union([z.string(), z.number()]).transform((v) => String(v).trim()).pipe(
      z.string().regex(/^\d{4}$/, 'year must be a 4-digit year')
    ),
    period: z.string().min(1),
    periodName: z.string().nullish(),
    value: z.union([z.string(), z.number(), z.null()]),
    latest: z.union([z.string(), z.boolean()]).nullish(),
    footnotes: z.array(FootnoteSchema.nullable()).nullish(),
    calculations: z
      .object({
        net_changes: CalculationMapSchema.optional(),
        pct_changes: CalculationMapSchema.optional(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export type BlsPeriodEntry = z.infer<typeof PeriodEntrySchema>;

const CatalogSchema = z.record(z.unknown());

export const BlsSeriesSchema = z
  .object({
    seriesID: z.string().min(1),
    catalog: CatalogSchema.nullish(),
    data: z.array(PeriodEntrySchema).nullish(),
  })
  .passthrough();

export type BlsSeries = z.infer<typeof BlsSeriesSchema>;

export const BlsResultsSchema = z
  .object({
    series: z.array(BlsSeriesSchema).nullish(),
    footnotes: FootnoteDictionarySchema.nullish(),
  })
  .passthrough();

export type BlsResults = z.infer<typeof BlsResultsSchema>;

/**
 * レスポンス外枠。Results の中身は正規化時に検証する
 */
export const BlsEnvelopeSchema = z
  .object({
    status: z.string(),
    responseTime: z.number().optional(),
    message: z
      .union([z.array(z.string()), z.string(), z.null()])
      .optional()
      .transform((m) => (m == null ? [] : Array.isArray(m) ? m : [m])),
    Results: z.unknown().optional(),
  })
  .passthrough();

export type BlsEnvelope = z.infer<typeof BlsEnvelopeSchema>;

/** 成功ステータス */
export const REQUEST_SUCCEEDED = 'REQUEST_SUCCEEDED';

/**
 * POST /timeseries/data/ リクエストボディ
 */
export interface BlsRequestPayload {
  seriesid: string[];
  registrationkey?: string;
  startyear?: string;
  endyear?: string;
  catalog?: boolean;
  calculations?: boolean;
  annualaverage?: boolean;
  aspects?: boolean;
}

/**
 * 取得成功したチャンクの生レスポンス
 */
export interface ChunkResponse {
  chunk: RequestChunk;
  envelope: BlsEnvelope;
  /** 成功までの試行回数 */
  attempts: number;
}

/**
 * 1チャンクを取得するコンポーネント（テストではスタブに差し替える）
 */
export interface ChunkFetcher {
  fetchChunk(
    chunk: RequestChunk,
    flags: FeatureFlags,
    signal?: AbortSignal
  ): Promise<ChunkResponse>;
}
