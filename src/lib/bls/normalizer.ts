/**
 * レスポンス正規化
 *
 * @description 系列ごとにネストした API レスポンスを (系列ID, 年, 期間) 単位の行に平坦化し、
 * カタログ・エイリアス・脚注を付与して重複を除く
 */

import { NormalizationError } from './errors';
import {
  BlsResultsSchema,
  CALCULATION_HORIZONS,
  type BlsPeriodEntry,
  type BlsResults,
  type BlsSeries,
  type CalculationFields,
  type CalculationHorizon,
  type CatalogFields,
  type ChunkResponse,
  type FeatureFlags,
  type PartialSeriesFailure,
  type TidyRecord,
} from './types';
import { createLogger } from '../utils/logger';

const logger = createLogger({ module: 'normalizer' });

export interface NormalizeOptions {
  /** 系列ID → 解決元トークン */
  reverseMap: ReadonlyMap<string, readonly string[]>;
  /** 解決済み系列ID（出力順の基準） */
  requestedIds: readonly string[];
  flags: FeatureFlags;
}

/**
 * 1チャンク分の平坦化結果
 */
export interface ChunkNormalization {
  chunkIndex: number;
  records: TidyRecord[];
  seriesFailures: PartialSeriesFailure[];
  messages: string[];
}

export interface NormalizedOutput {
  records: TidyRecord[];
  /** 1行も得られなかった系列ID */
  missingSeries: string[];
  seriesFailures: PartialSeriesFailure[];
  messages: string[];
  /** 後勝ちで捨てた重複行数 */
  duplicatesDropped: number;
}

/** 系列単位のエラーメッセージ */
const SERIES_MESSAGE_PATTERNS: ReadonlyArray<[RegExp, PartialSeriesFailure['reason']]> = [
  [/^Series does not exist for Series\s+([A-Za-z0-9]+)/i, 'invalid_series'],
  [/^Invalid Series for Series\s+([A-Za-z0-9]+)/i, 'invalid_series'],
  [/^No Data Available for Series\s+([A-Za-z0-9]+)/i, 'no_data'],
];

/** カタログのキー → 出力フィールド */
const CATALOG_KEYS: ReadonlyArray<[keyof CatalogFields, string]> = [
  ['surveyName', 'survey_name'],
  ['measureDataType', 'measure_data_type'],
  ['area', 'area'],
  ['item', 'item'],
  ['seasonality', 'seasonality'],
  ['seriesTitle', 'series_title'],
];

/**
 * 値文字列を数値に変換（"-" や空文字、数値でないものは null）
 */
export function parseObservationValue(raw: string | number | null | undefined): number | null {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;
  const trimmed = raw.trim();
  if (trimmed === '' || trimmed === '-') return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

function buildFootnoteDictionary(footnotes: BlsResults['footnotes']): Map<string, string> {
  const dictionary = new Map<string, string>();
  if (!footnotes) return dictionary;

  if (Array.isArray(footnotes)) {
    for (const note of footnotes) {
      const code = note?.code?.trim();
      const text = note?.text?.trim();
      if (code && text) dictionary.set(code, text);
    }
  } else {
    for (const [code, text] of Object.entries(footnotes)) {
      if (text.trim()) dictionary.set(code.trim(), text.trim());
    }
  }
  return dictionary;
}

/**
 * 脚注をテキストに解決（インライン本文 → 辞書 → コード）
 */
function resolveFootnotes(
  footnotes: BlsPeriodEntry['footnotes'],
  dictionary: ReadonlyMap<string, string>
): string | null {
  const texts: string[] = [];
  for (const note of footnotes ?? []) {
    if (!note) continue;
    const code = note.code?.trim();
    const text = note.text?.trim() || (code ? dictionary.get(code) ?? code : undefined);
    if (text && !texts.includes(text)) texts.push(text);
  }
  return texts.length > 0 ? texts.join('; ') : null;
}

function extractCatalog(catalog: BlsSeries['catalog']): CatalogFields | null {
  if (!catalog) return null;
  const fields: CatalogFields = {
    surveyName: null,
    measureDataType: null,
    area: null,
    item: null,
    seasonality: null,
    seriesTitle: null,
  };
  for (const [field, key] of CATALOG_KEYS) {
    const value = catalog[key];
    if (typeof value === 'string' && value.trim()) {
      fields[field] = value.trim();
    } else if (typeof value === 'number') {
      fields[field] = String(value);
    }
  }
  return fields;
}

function extractCalculations(calculations: BlsPeriodEntry['calculations']): CalculationFields | null {
  if (!calculations) return null;
  const pick = (source: Record<string, string | number | null> | undefined) => {
    const result: Record<CalculationHorizon, number | null> = { '1': null, '3': null, '6': null, '12': null };
    for (const horizon of CALCULATION_HORIZONS) {
      result[horizon] = parseObservationValue(source?.[horizon]);
    }
    return result;
  };
  return {
    netChanges: pick(calculations.net_changes),
    pctChanges: pick(calculations.pct_changes),
  };
}

/**
 * API メッセージから系列単位の失敗を抽出
 */
export function parseSeriesMessages(
  messages: readonly string[],
  chunkIndex: number,
  chunkSeriesIds: readonly string[]
): PartialSeriesFailure[] {
  const inChunk = new Set(chunkSeriesIds.map((id) => id.toUpperCase()));
  const failures: PartialSeriesFailure[] = [];
  const seen = new Set<string>();

  for (const message of messages) {
    for (const [pattern, reason] of SERIES_MESSAGE_PATTERNS) {
      const match = pattern.exec(message.trim());
      if (!match) continue;
      const seriesId = match[1].toUpperCase();
      const key = `${seriesId}|${reason}`;
      if (inChunk.has(seriesId) && !seen.has(key)) {
        seen.add(key);
        failures.push({ seriesId, chunkIndex, reason, message: message.trim() });
      }
      break;
    }
  }
  return failures;
}

/**
 * 1チャンクのレスポンスを平坦化
 *
 * @throws {NormalizationError} 必須項目（seriesID / year / period / value）を欠くなど、平坦化できない場合
 */
export function flattenChunk(response: ChunkResponse, options: NormalizeOptions): ChunkNormalization {
  const { chunk, envelope } = response;
  const parsed = BlsResultsSchema.safeParse(envelope.Results ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `Results.${i.path.join('.')}: ${i.message}`);
    throw new NormalizationError(
      `Chunk #${chunk.index} response cannot be normalized: ${issues.slice(0, 3).join('; ')}`,
      issues
    );
  }

  const dictionary = buildFootnoteDictionary(parsed.data.footnotes);
  const records: TidyRecord[] = [];

  for (const series of parsed.data.series ?? []) {
    const seriesId = series.seriesID.trim().toUpperCase();
    const alias = options.reverseMap.get(seriesId)?.join('|') ?? null;
    const catalog = options.flags.catalog ? extractCatalog(series.catalog) : null;

    for (const entry of series.data ?? []) {
      records.push({
        seriesId,
        year: Number(entry.year),
        period: entry.period.trim().toUpperCase(),
        periodName: entry.periodName?.trim() || null,
        value: parseObservationValue(entry.value),
        alias,
        latest: entry.latest === true || entry.latest === 'true',
        footnotes: resolveFootnotes(entry.footnotes, dictionary),
        catalog,
        calculations: options.flags.calculations ? extractCalculations(entry.calculations) : null,
      });
    }
  }

  return {
    chunkIndex: chunk.index,
    records,
    seriesFailures: parseSeriesMessages(envelope.message, chunk.index, chunk.seriesIds),
    messages: [...envelope.message],
  };
}

function recordKey(record: Pick<TidyRecord, 'seriesId' | 'year' | 'period'>): string {
  return `${record.seriesId}|${record.year}|${record.period}`;
}

/**
 * チャンク単位の結果を統合
 *
 * 同じ (系列ID, 年, 期間) はチャンク番号の大きい方が勝つ。
 * 並び順は解決済み系列IDの順 → 年 → 期間
 */
export function mergeChunks(
  parts: readonly ChunkNormalization[],
  options: Pick<NormalizeOptions, 'requestedIds'>
): NormalizedOutput {
  const ordered = [...parts].sort((a, b) => a.chunkIndex - b.chunkIndex);
  const byKey = new Map<string, TidyRecord>();
  let duplicatesDropped = 0;

  for (const part of ordered) {
    for (const record of part.records) {
      const key = recordKey(record);
      if (byKey.has(key)) {
        duplicatesDropped++;
        logger.warn('Duplicate observation replaced', {
          chunkIndex: part.chunkIndex,
          seriesId: record.seriesId,
          year: record.year,
          period: record.period,
        });
      }
      byKey.set(key, record);
    }
  }

  const rank = new Map(options.requestedIds.map((id, i) => [id.toUpperCase(), i]));
  const rankOf = (id: string) => rank.get(id) ?? rank.size;
  const records = [...byKey.values()].sort(
    (a, b) =>
      rankOf(a.seriesId) - rankOf(b.seriesId) ||
      (a.seriesId < b.seriesId ? -1 : a.seriesId > b.seriesId ? 1 : 0) ||
      a.year - b.year ||
      (a.period < b.period ? -1 : a.period > b.period ? 1 : 0)
  );

  const withRows = new Set(records.map((r) => r.seriesId));
  const missingSeries = options.requestedIds.filter((id) => !withRows.has(id.toUpperCase()));

  const seriesFailures: PartialSeriesFailure[] = [];
  const failureKeys = new Set<string>();
  const messages: string[] = [];
  for (const part of ordered) {
    for (const failure of part.seriesFailures) {
      const key = `${failure.seriesId}|${failure.reason}`;
      if (!failureKeys.has(key)) {
        failureKeys.add(key);
        seriesFailures.push(failure);
      }
    }
    for (const message of part.messages) {
      if (!messages.includes(message)) messages.push(message);
    }
  }

  return { records, missingSeries, seriesFailures, messages, duplicatesDropped };
}

/**
 * 取得済みレスポンスをまとめて正規化
 *
 * @throws {NormalizationError} いずれかのチャンクが平坦化できない場合
 */
export function normalizeChunks(
  responses: readonly ChunkResponse[],
  options: NormalizeOptions
): NormalizedOutput {
  return mergeChunks(
    responses.map((response) => flattenChunk(response, options)),
    options
  );
}
