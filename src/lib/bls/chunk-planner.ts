/**
 * リクエスト分割
 *
 * @description 系列ID × 年範囲を API 上限（1回あたり N 系列、M 年）に収まるチャンクへ分割する
 */

import { chunkArray } from '../utils/batch';
import { ChunkPlanError } from './errors';
import type { DateRange, RequestChunk } from './types';

export interface ChunkLimits {
  /** 1リクエストあたりの系列数上限 N */
  seriesLimit: number;
  /** 1リクエストあたりの年数上限 M */
  yearsLimit: number;
}

/** v2 登録ユーザーの上限 */
export const DEFAULT_CHUNK_LIMITS: ChunkLimits = {
  seriesLimit: 50,
  yearsLimit: 20,
};

function assertLimit(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ChunkPlanError(`${name} must be a positive integer (got ${value})`);
  }
}

/**
 * 年範囲を M 年以下の連続した部分範囲に分割
 */
export function splitDateRange(range: DateRange, yearsLimit: number): DateRange[] {
  assertLimit('yearsLimit', yearsLimit);
  const { startYear, endYear } = range;
  if (!Number.isInteger(startYear) || !Number.isInteger(endYear)) {
    throw new ChunkPlanError(`Years must be integers (got ${startYear}-${endYear})`);
  }
  if (startYear > endYear) {
    throw new ChunkPlanError(`Start year ${startYear} is after end year ${endYear}`);
  }

  const ranges: DateRange[] = [];
  for (let s = startYear; s <= endYear; s += yearsLimit) {
    ranges.push({ startYear: s, endYear: Math.min(s + yearsLimit - 1, endYear) });
  }
  return ranges;
}

/**
 * チャンク計画を作成
 *
 * 系列グループ × 年部分範囲の直積。系列グループが外側、年が内側の順に並ぶため、
 * 同じ系列グループの年範囲違いは隣接する。
 * range が null の場合は年を指定しない（API 既定の期間）チャンクを系列グループごとに1つ作る
 *
 * @throws {ChunkPlanError} 系列が0件、重複あり、上限・年範囲が不正
 */
export function planChunks(
  seriesIds: readonly string[],
  range: DateRange | null,
  limits: ChunkLimits = DEFAULT_CHUNK_LIMITS
): RequestChunk[] {
  assertLimit('seriesLimit', limits.seriesLimit);
  assertLimit('yearsLimit', limits.yearsLimit);

  if (seriesIds.length === 0) {
    throw new ChunkPlanError('No series IDs to request');
  }
  const duplicates = seriesIds.filter((id, i) => seriesIds.indexOf(id) !== i);
  if (duplicates.length > 0) {
    throw new ChunkPlanError(`Series IDs must be unique (duplicated: ${[...new Set(duplicates)].join(', ')})`);
  }

  const subRanges: Array<DateRange | null> = range ? splitDateRange(range, limits.yearsLimit) : [null];
  const groups = chunkArray(seriesIds, limits.seriesLimit);

  const chunks: RequestChunk[] = [];
  for (const group of groups) {
    for (const subRange of subRanges) {
      chunks.push({ index: chunks.length, seriesIds: group, range: subRange });
    }
  }
  return chunks;
}
