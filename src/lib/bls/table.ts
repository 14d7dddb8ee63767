/**
 * 表形式出力
 *
 * @description 抽出結果を列名付きの行に変換する。列構成はフラグ次第
 */

import { formatCsv, type CsvCell } from '../utils/csv';
import { CALCULATION_HORIZONS, type FeatureFlags, type TidyRecord } from './types';

const BASE_COLUMNS = [
  'series_id',
  'alias',
  'year',
  'period',
  'period_name',
  'value',
  'latest',
  'footnotes',
] as const;

const CATALOG_COLUMNS = [
  'seasonality',
  'series_title',
  'survey_name',
  'measure_data_type',
  'area',
  'item',
] as const;

const CALCULATION_COLUMNS = [
  ...CALCULATION_HORIZONS.map((h) => `net_change_${h}` as const),
  ...CALCULATION_HORIZONS.map((h) => `pct_change_${h}` as const),
];

export interface Table {
  columns: string[];
  rows: CsvCell[][];
}

/**
 * フラグに応じた列名一覧
 */
export function columnsFor(flags: Pick<FeatureFlags, 'catalog' | 'calculations'>): string[] {
  return [
    ...BASE_COLUMNS,
    ...(flags.catalog ? CATALOG_COLUMNS : []),
    ...(flags.calculations ? CALCULATION_COLUMNS : []),
  ];
}

function toRow(record: TidyRecord, flags: Pick<FeatureFlags, 'catalog' | 'calculations'>): CsvCell[] {
  const row: CsvCell[] = [
    record.seriesId,
    record.alias,
    record.year,
    record.period,
    record.periodName,
    record.value,
    record.latest,
    record.footnotes,
  ];

  if (flags.catalog) {
    const c = record.catalog;
    row.push(
      c?.seasonality ?? null,
      c?.seriesTitle ?? null,
      c?.surveyName ?? null,
      c?.measureDataType ?? null,
      c?.area ?? null,
      c?.item ?? null
    );
  }

  if (flags.calculations) {
    const calc = record.calculations;
    for (const h of CALCULATION_HORIZONS) row.push(calc?.netChanges[h] ?? null);
    for (const h of CALCULATION_HORIZONS) row.push(calc?.pctChanges[h] ?? null);
  }

  return row;
}

/**
 * 抽出結果を表に変換
 */
export function toTable(
  result: { records: readonly TidyRecord[] },
  flags: Pick<FeatureFlags, 'catalog' | 'calculations'>
): Table {
  return {
    columns: columnsFor(flags),
    rows: result.records.map((record) => toRow(record, flags)),
  };
}

export function toCsv(table: Table): string {
  return formatCsv(table.columns, table.rows);
}
