#!/usr/bin/env tsx
/**
 * 系列抽出 CLI
 *
 * @description BLS API から系列を取得し、先頭25行を表示するか CSV に書き出す
 *
 * @example
 * ```
 * npm run extract -- cpi_all_items --start 2018 --end 2020
 * npm run extract -- "CU:area=0000,item=SA0|SAF1" LNS14000000 --catalog --out cpi.csv
 * ```
 *
 * 終了コード: 0 成功（一部失敗を含む）/ 1 引数・入力エラー / 2 抽出失敗
 */

import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import {
  formatFailureSummary,
  formatSample,
  loadEnv,
  parseArgs,
  UsageError,
  USAGE,
  type ExtractCliOptions,
} from './_shared';
import { loadAliasTable } from '../../src/lib/bls/alias-resolver';
import { createBlsClient } from '../../src/lib/bls/client';
import { loadConfig } from '../../src/lib/bls/config';
import { EnvKeyPool } from '../../src/lib/bls/credentials';
import { ExtractionFailedError, PipelineError } from '../../src/lib/bls/errors';
import { extractSeries } from '../../src/lib/bls/orchestrator';
import {
  DEFAULT_PATTERNS_PATH,
  loadSeriesPatterns,
  type SeriesPatternRegistry,
} from '../../src/lib/bls/series-patterns';
import { toCsv, toTable } from '../../src/lib/bls/table';
import { setLogLevel } from '../../src/lib/utils/logger';

/** 入力側の問題として扱うエラー */
const INPUT_ERROR_CODES = new Set(['RESOLUTION', 'CHUNK_PLAN', 'ALIAS_TABLE', 'PATTERN', 'CONFIG']);

async function run(options: ExtractCliOptions): Promise<number> {
  const config = loadConfig();
  const credentials = EnvKeyPool.fromEnv();
  const aliasTable = loadAliasTable(options.mappingPath ?? config.mappingPath);

  const patternsPath = options.patternsPath ?? config.patternsPath;
  const patterns: SeriesPatternRegistry =
    patternsPath || existsSync(resolve(process.cwd(), DEFAULT_PATTERNS_PATH))
      ? loadSeriesPatterns(patternsPath ?? DEFAULT_PATTERNS_PATH)
      : new Map<string, never>();

  const result = await extractSeries(options.tokens, {
    fetcher: createBlsClient(config, credentials),
    range: options.range,
    flags: options.flags,
    concurrency: options.concurrency ?? config.concurrency,
    deadlineMs: options.deadlineMs,
    aliasTable,
    patterns,
    limits: { seriesLimit: config.seriesLimit, yearsLimit: config.yearsLimit },
  });

  const table = toTable(result, options.flags);
  if (options.out) {
    mkdirSync(dirname(options.out), { recursive: true });
    writeFileSync(options.out, toCsv(table), 'utf-8');
    console.log(`Wrote ${table.rows.length} row(s) to ${options.out}`);
  } else {
    console.log(formatSample(table));
  }

  const summary = formatFailureSummary(result);
  if (summary.length > 0) {
    console.error(`\n${summary.length} issue(s):`);
    for (const line of summary) {
      console.error(`  ${line}`);
    }
  }
  return 0;
}

async function main(argv: readonly string[]): Promise<number> {
  let options: ExtractCliOptions;
  try {
    options = parseArgs(argv, new Date().getFullYear());
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message);
      console.error(USAGE);
      return 1;
    }
    throw error;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  loadEnv();
  if (options.logLevel) {
    setLogLevel(options.logLevel);
  }

  try {
    return await run(options);
  } catch (error) {
    if (error instanceof ExtractionFailedError) {
      console.error(`Extraction failed: every chunk failed (${error.failures.length})`);
      for (const line of formatFailureSummary({ missingSeries: [], seriesFailures: [], chunkFailures: error.failures })) {
        console.error(`  ${line}`);
      }
      return 2;
    }
    if (error instanceof PipelineError && INPUT_ERROR_CODES.has(error.code)) {
      console.error(error.message);
      return 1;
    }
    console.error('Extraction failed:', error);
    return 2;
  }
}

// 直接実行時のみmain()を呼ぶ（import時は実行しない）
const isDirectRun = process.argv[1]?.endsWith('extract/index.ts') || process.argv[1]?.endsWith('extract');
if (isDirectRun) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exit(code);
    })
    .catch((error) => {
      console.error(error);
      process.exit(2);
    });
}

export { main as extractCli };
