/**
 * エイリアス解決
 *
 * @description 人が読める名前・パターン・系列IDの混在したトークン列を、
 * 重複のない系列ID列と「系列ID → 元トークン」の逆引きに変換する
 */

import { existsSync, readFileSync } from 'fs';
import { extname, resolve } from 'path';
import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { parseCsvLines } from '../utils/csv';
import { AliasTableError, ResolutionError } from './errors';
import { expandPatternToken, isPatternToken, type SeriesPatternRegistry } from './series-patterns';

const logger = createLogger({ module: 'alias-resolver' });

/** 既定のエイリアス定義ファイル（カレントディレクトリ基準、先に見つかった方を使用） */
export const DEFAULT_MAPPING_CANDIDATES = ['data/code-mapping.csv', 'data/code-mapping.json'] as const;

const ALIAS_COLUMNS: readonly string[] = ['alias', 'name', 'label', 'code'];
const SERIES_COLUMNS: readonly string[] = ['series', 'series_id', 'seriesid'];

const SERIES_ID_RE = /^[A-Za-z0-9]+$/;

/**
 * エイリアスキーの正規化
 *
 * 大文字小文字と区切り文字（- _ 空白 . /）の違いを無視する
 * 例: "CPI All Items" / "cpi_all_items" / "cpi-all-items" → "cpiallitems"
 */
export function normalizeAliasKey(value: string): string {
  return value.trim().toLowerCase().replace(/[-_\s./]+/g, '');
}

/**
 * 系列IDとして妥当な文字列か（英字と数字を両方含む 8〜25 文字の英数字）
 */
export function isLiteralSeriesId(token: string): boolean {
  return (
    token.length >= 8 &&
    token.length <= 25 &&
    SERIES_ID_RE.test(token) &&
    /[A-Za-z]/.test(token) &&
    /\d/.test(token)
  );
}

/**
 * 読み込み後に変更されないエイリアス表
 */
export class AliasTable {
  private readonly entries: ReadonlyMap<string, readonly string[]>;

  private constructor(
    entries: Map<string, readonly string[]>,
    readonly source: string
  ) {
    this.entries = entries;
  }

  /**
   * (エイリアス, 系列ID列) の並びから構築
   *
   * 同じエイリアスが複数回現れた場合は出現順に連結し、重複IDは除く
   */
  static fromPairs(pairs: Iterable<readonly [string, readonly string[]]>, source = 'inline'): AliasTable {
    const merged = new Map<string, string[]>();
    for (const [alias, ids] of pairs) {
      const key = normalizeAliasKey(alias);
      const list = merged.get(key) ?? [];
      for (const id of ids) {
        if (!list.includes(id)) list.push(id);
      }
      merged.set(key, list);
    }

    const frozen = new Map<string, readonly string[]>();
    for (const [key, ids] of merged) {
      frozen.set(key, Object.freeze([...ids]));
    }
    return new AliasTable(frozen, source);
  }

  static empty(): AliasTable {
    return new AliasTable(new Map(), 'empty');
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * トークンに対応する系列IDを返す（正規化して照合）
   */
  lookup(token: string): readonly string[] | undefined {
    return this.entries.get(normalizeAliasKey(token));
  }
}

/**
 * 系列IDセルを分解（カンマ区切りで1対多）
 */
function splitSeriesCell(cell: string): string[] | null {
  const ids = cell
    .split(',')
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
  if (ids.length === 0 || ids.some((id) => !SERIES_ID_RE.test(id))) {
    return null;
  }
  return ids.map((id) => id.toUpperCase());
}

/**
 * CSV 形式のエイリアス定義をパース
 *
 * ヘッダーに alias/name/label/code と series/series_id/seriesid があればその列を、
 * なければちょうど2列の場合に限り [エイリアス, 系列ID] とみなす
 *
 * @throws {AliasTableError} 行番号付き
 */
export function parseAliasCsv(text: string, source = 'inline.csv'): AliasTable {
  const rows = parseCsvLines(text);
  if (rows.length === 0) {
    throw new AliasTableError('mapping file has no header row', source);
  }

  const [headerLine, headerCells] = rows[0];
  const header = headerCells.map((h) => h.toLowerCase());
  let aliasIndex = header.findIndex((h) => ALIAS_COLUMNS.includes(h));
  let seriesIndex = header.findIndex((h) => SERIES_COLUMNS.includes(h));

  if (aliasIndex < 0 || seriesIndex < 0) {
    if (header.length !== 2) {
      throw new AliasTableError(
        `header must include one of ${ALIAS_COLUMNS.join('/')} and one of ${SERIES_COLUMNS.join('/')}, ` +
          `or be exactly two columns (found: ${header.join(', ')})`,
        source,
        headerLine
      );
    }
    aliasIndex = 0;
    seriesIndex = 1;
  }

  const pairs: Array<[string, string[]]> = [];
  for (const [line, cells] of rows.slice(1)) {
    if (cells.length !== header.length) {
      throw new AliasTableError(`expected ${header.length} cells, found ${cells.length}`, source, line);
    }
    const alias = cells[aliasIndex];
    if (normalizeAliasKey(alias).length === 0) {
      throw new AliasTableError('alias is empty', source, line);
    }
    const ids = splitSeriesCell(cells[seriesIndex]);
    if (!ids) {
      throw new AliasTableError(`invalid series id list "${cells[seriesIndex]}" for alias "${alias}"`, source, line);
    }
    pairs.push([alias, ids]);
  }

  return AliasTable.fromPairs(pairs, source);
}

const SeriesValueSchema = z.union([z.string(), z.array(z.string())]);

const GroupEntrySchema = z
  .object({
    alias: z.string().optional(),
    name: z.string().optional(),
    label: z.string().optional(),
    code: z.string().optional(),
    series: SeriesValueSchema.optional(),
    series_id: SeriesValueSchema.optional(),
    seriesid: SeriesValueSchema.optional(),
  })
  .passthrough();

function seriesValueToIds(value: string | string[]): string[] | null {
  const cells = Array.isArray(value) ? value : [value];
  const ids: string[] = [];
  for (const cell of cells) {
    const split = splitSeriesCell(cell);
    if (!split) return null;
    ids.push(...split);
  }
  return ids;
}

/**
 * JSON 形式のエイリアス定義をパース
 *
 * 対応形式:
 * - `{ "CPI All Items": "CUUR0000SA0", "Headline": ["...", "..."] }`
 * - `{ "groups": [{ "alias": "...", "series": "..." }] }`
 * - `[{ "name": "...", "series_id": ["...", "..."] }]`
 *
 * @throws {AliasTableError} エントリ番号付き（配列形式は1始まり）
 */
export function parseAliasJson(text: string, source = 'inline.json'): AliasTable {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new AliasTableError(`invalid JSON (${error instanceof Error ? error.message : String(error)})`, source);
  }

  const pairs: Array<[string, string[]]> = [];

  const fromEntries = (entries: unknown[]) => {
    entries.forEach((entry, i) => {
      const parsed = GroupEntrySchema.safeParse(entry);
      if (!parsed.success) {
        throw new AliasTableError('entry must be an object with alias and series fields', source, i + 1);
      }
      const e = parsed.data;
      const alias = e.alias ?? e.name ?? e.label ?? e.code;
      const series = e.series ?? e.series_id ?? e.seriesid;
      if (!alias || normalizeAliasKey(alias).length === 0 || series === undefined) {
        throw new AliasTableError('entry is missing alias or series', source, i + 1);
      }
      const ids = seriesValueToIds(series);
      if (!ids) {
        throw new AliasTableError(`invalid series id list for alias "${alias}"`, source, i + 1);
      }
      pairs.push([alias, ids]);
    });
  };

  if (Array.isArray(data)) {
    fromEntries(data);
  } else if (typeof data === 'object' && data !== null) {
    const groups = 'groups' in data ? data.groups : undefined;
    if (Array.isArray(groups)) {
      fromEntries(groups);
    } else {
      Object.entries(data).forEach(([alias, value], i) => {
        const parsed = SeriesValueSchema.safeParse(value);
        const ids = parsed.success ? seriesValueToIds(parsed.data) : null;
        if (!ids || normalizeAliasKey(alias).length === 0) {
          throw new AliasTableError(`invalid mapping for alias "${alias}"`, source, i + 1);
        }
        pairs.push([alias, ids]);
      });
    }
  } else {
    throw new AliasTableError('unsupported JSON mapping schema', source);
  }

  return AliasTable.fromPairs(pairs, source);
}

/**
 * エイリアス定義ファイルを読み込む
 *
 * 明示パスがあればそれのみ（存在しなければエラー）。なければ既定候補を順に探し、
 * 見つからない場合は空の表を返す（系列IDとパターンのみ受け付ける）
 */
export function loadAliasTable(explicitPath?: string, baseDir: string = process.cwd()): AliasTable {
  const candidates = explicitPath ? [explicitPath] : [...DEFAULT_MAPPING_CANDIDATES];

  for (const candidate of candidates) {
    const fullPath = resolve(baseDir, candidate);
    if (!existsSync(fullPath)) {
      if (explicitPath) {
        throw new AliasTableError('file not found', fullPath);
      }
      continue;
    }

    const text = readFileSync(fullPath, 'utf-8');
    const ext = extname(fullPath).toLowerCase();
    let table: AliasTable;
    if (ext === '.csv') {
      table = parseAliasCsv(text, fullPath);
    } else if (ext === '.json') {
      table = parseAliasJson(text, fullPath);
    } else {
      throw new AliasTableError(`unsupported mapping file extension "${ext}"`, fullPath);
    }

    logger.info('Loaded alias mapping', { path: fullPath, entries: table.size });
    return table;
  }

  logger.info('No mapping file found; only series IDs and patterns will be accepted');
  return AliasTable.empty();
}

/**
 * 解決結果
 */
export interface Resolution {
  /** 重複除去済みの系列ID（初出順） */
  seriesIds: string[];
  /** 系列ID → 解決元トークン（エイリアス・パターン経由のみ） */
  reverseMap: Map<string, string[]>;
}

/**
 * トークン列を系列IDへ解決
 *
 * 判定順: エイリアス → パターン → 系列IDリテラル。
 * 1つでも解決できないトークンがあれば全体を失敗とする
 *
 * @throws {ResolutionError} 未解決トークンを全て列挙
 */
export function resolveSeriesTokens(
  tokens: readonly string[],
  table: AliasTable,
  patterns: SeriesPatternRegistry = new Map()
): Resolution {
  const seriesIds: string[] = [];
  const seen = new Set<string>();
  const reverseMap = new Map<string, string[]>();
  const unresolved: string[] = [];
  const details: string[] = [];

  const add = (rawId: string, origin?: string) => {
    const id = rawId.toUpperCase();
    if (!seen.has(id)) {
      seen.add(id);
      seriesIds.push(id);
    }
    if (origin !== undefined) {
      const origins = reverseMap.get(id) ?? [];
      if (!origins.includes(origin)) origins.push(origin);
      reverseMap.set(id, origins);
    }
  };

  for (const raw of tokens) {
    const token = raw.trim();
    if (!token) continue;

    const mapped = table.lookup(token);
    if (mapped) {
      for (const id of mapped) {
        add(id, token);
      }
      continue;
    }

    if (isPatternToken(token)) {
      try {
        for (const id of expandPatternToken(token, patterns)) {
          add(id, token);
        }
      } catch (error) {
        if (!(error instanceof ResolutionError)) throw error;
        unresolved.push(token);
        details.push(error.message);
      }
    } else if (isLiteralSeriesId(token)) {
      add(token);
    } else {
      unresolved.push(token);
    }
  }

  if (unresolved.length > 0) {
    const unique = [...new Set(unresolved)];
    const message =
      `Unknown series tokens (not an alias, pattern or series ID): ${unique.join(', ')}` +
      (details.length > 0 ? ` [${details.join('; ')}]` : '');
    throw new ResolutionError(message, unique);
  }

  if (seriesIds.length === 0) {
    throw new ResolutionError('No series tokens given', []);
  }

  logger.debug('Resolved series tokens', {
    tokenCount: tokens.length,
    seriesCount: seriesIds.length,
  });

  return { seriesIds, reverseMap };
}
