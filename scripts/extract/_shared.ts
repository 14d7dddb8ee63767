/**
 * 抽出 CLI 共通ユーティリティ
 *
 * @description 引数解析・環境変数ロード・結果表示
 */

import { config } from 'dotenv';
import { resolve } from 'path';
import type { ChunkFailure } from '../../src/lib/bls/errors';
import type { Table } from '../../src/lib/bls/table';
import type { DateRange, FeatureFlags, PartialSeriesFailure } from '../../src/lib/bls/types';
import { formatCsvCell } from '../../src/lib/utils/csv';
import { isLogLevel, type LogLevel } from '../../src/lib/utils/logger';

/** 標準出力に表示する行数 */
export const SAMPLE_ROWS = 25;

export const USAGE = `Usage: npm run extract -- <series-token>... [options]

Series tokens may be aliases from the mapping file ("CPI All Items", cpi_all_items),
series IDs (CUUR0000SA0) or patterns (CU:area=0000,item=SA0|SAF1).

Options:
  --start <year>        First year (end defaults to the current year)
  --end <year>          Last year (start defaults to the same year)
  --mapping <file>      Alias mapping file (.csv or .json)
  --patterns <file>     Series pattern definitions (.json)
  --catalog             Include catalog columns
  --calculations        Include net / percent change columns
  --annualaverage       Request annual averages (M13)
  --aspects             Request aspects
  --concurrency <n>     Parallel requests (default: BLS_CONCURRENCY or 2)
  --timeout <seconds>   Soft deadline for the whole extraction
  --out <file>          Write CSV instead of printing a sample
  --log <level>         debug | info | warn | error
  -h, --help            Show this help`;

/**
 * 引数エラー（終了コード 1）
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface ExtractCliOptions {
  tokens: string[];
  range: DateRange | null;
  flags: FeatureFlags;
  mappingPath?: string;
  patternsPath?: string;
  concurrency?: number;
  deadlineMs?: number;
  out?: string;
  logLevel?: LogLevel;
  help: boolean;
}

let envLoaded = false;

/**
 * .env.local → .env の順に読み込む（既存の環境変数は上書きしない）
 */
export function loadEnv(): void {
  if (envLoaded) return;
  config({ path: resolve(process.cwd(), '.env.local') });
  config({ path: resolve(process.cwd(), '.env') });
  envLoaded = true;
}

function parseYear(flag: string, value: string): number {
  if (!/^\d{4}$/.test(value)) {
    throw new UsageError(`Invalid ${flag} year: ${value}. Expected YYYY`);
  }
  return Number(value);
}

function parsePositiveInt(flag: string, value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new UsageError(`Invalid ${flag} value: ${value}. Expected positive integer`);
  }
  return n;
}

/**
 * CLIオプションを解析
 *
 * --start のみ指定時は終了年を currentYear、--end のみ指定時は開始年を終了年と同じにする
 *
 * @throws {UsageError}
 */
export function parseArgs(argv: readonly string[], currentYear: number): ExtractCliOptions {
  const options: ExtractCliOptions = {
    tokens: [],
    range: null,
    flags: { catalog: false, calculations: false, annualAverage: false, aspects: false },
    help: false,
  };
  let start: number | undefined;
  let end: number | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    const takeValue = (): string => {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new UsageError(`${arg} requires a value`);
      }
      i++;
      return value;
    };

    switch (arg) {
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '--start':
        start = parseYear(arg, takeValue());
        break;
      case '--end':
        end = parseYear(arg, takeValue());
        break;
      case '--mapping':
        options.mappingPath = takeValue();
        break;
      case '--patterns':
        options.patternsPath = takeValue();
        break;
      case '--catalog':
        options.flags.catalog = true;
        break;
      case '--calculations':
        options.flags.calculations = true;
        break;
      case '--annualaverage':
        options.flags.annualAverage = true;
        break;
      case '--aspects':
        options.flags.aspects = true;
        break;
      case '--concurrency':
        options.concurrency = parsePositiveInt(arg, takeValue());
        break;
      case '--timeout':
        options.deadlineMs = parsePositiveInt(arg, takeValue()) * 1000;
        break;
      case '--out':
        options.out = takeValue();
        break;
      case '--log': {
        const level = takeValue().toLowerCase();
        if (!isLogLevel(level)) {
          throw new UsageError(`Invalid --log level: ${level}. Expected debug, info, warn or error`);
        }
        options.logLevel = level;
        break;
      }
      default:
        if (arg.startsWith('--')) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        options.tokens.push(arg);
    }
  }

  if (start !== undefined || end !== undefined) {
    const startYear = start ?? end ?? currentYear;
    const endYear = end ?? currentYear;
    if (startYear > endYear) {
      throw new UsageError(`--start (${startYear}) must be before or equal to --end (${endYear})`);
    }
    options.range = { startYear, endYear };
  }

  if (!options.help && options.tokens.length === 0) {
    throw new UsageError('At least one series token is required');
  }

  return options;
}

/**
 * 表の先頭 limit 行を桁揃えして文字列化
 */
export function formatSample(table: Table, limit: number = SAMPLE_ROWS): string {
  const shown = table.rows.slice(0, limit).map((row) => row.map(formatCsvCell));
  const widths = table.columns.map((column, c) =>
    Math.max(column.length, ...shown.map((row) => row[c]?.length ?? 0))
  );
  const line = (cells: readonly string[]) =>
    cells.map((cell, c) => cell.padEnd(widths[c])).join('  ').trimEnd();

  const lines = [line(table.columns), ...shown.map(line)];
  if (table.rows.length > limit) {
    lines.push(`... ${table.rows.length - limit} more row(s)`);
  }
  return lines.join('\n');
}

/**
 * 失敗・欠損の要約（問題がなければ空配列）
 */
export function formatFailureSummary(result: {
  missingSeries: readonly string[];
  seriesFailures: readonly PartialSeriesFailure[];
  chunkFailures: readonly ChunkFailure[];
}): string[] {
  const lines: string[] = [];
  for (const failure of result.chunkFailures) {
    const range = failure.range ? `${failure.range.startYear}-${failure.range.endYear}` : 'default';
    lines.push(
      `chunk #${failure.chunkIndex} (${failure.seriesIds.length} series, ${range}) ${failure.kind}: ${failure.message}`
    );
  }
  for (const failure of result.seriesFailures) {
    lines.push(`series ${failure.seriesId} ${failure.reason}: ${failure.message}`);
  }
  if (result.missingSeries.length > 0) {
    lines.push(`no data: ${result.missingSeries.join(', ')}`);
  }
  return lines;
}
