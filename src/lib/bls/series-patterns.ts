/**
 * 系列IDパターン展開
 *
 * @description `CU:area=0000,item=SA0|SAF1` のようなトークンを、接頭辞ごとのテンプレート
 * （例: `CU{seasonal}{periodicity}{area}{item}`）に代入して具体的な系列IDへ展開する
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { PatternError, ResolutionError } from './errors';

/** パターン定義ファイルの既定パス（カレントディレクトリ基準） */
export const DEFAULT_PATTERNS_PATH = 'data/series-patterns.json';

/** `<prefix>:<field>=<value>[,<field>=<value>...]` */
const PATTERN_TOKEN_RE = /^([A-Za-z][A-Za-z0-9]*):(\s*[A-Za-z][\w-]*\s*=.*)$/;

const CODE_RE = /^[A-Za-z0-9]+$/;

const PLACEHOLDER_RE = /\{([A-Za-z][\w]*)\}/g;

const FieldSchema = z.object({
  description: z.string().optional(),
  /** `area_code` など別名 */
  aliases: z.array(z.string()).default([]),
  default: z.string().regex(CODE_RE).optional(),
  /** `*` 指定時に展開する既知コード */
  values: z.array(z.string().regex(CODE_RE)).optional(),
});

const PatternSchema = z.object({
  description: z.string().optional(),
  template: z.string().min(1),
  fields: z.record(FieldSchema),
});

export const SeriesPatternFileSchema = z.object({
  patterns: z.record(PatternSchema),
});

export type SeriesPatternFile = z.infer<typeof SeriesPatternFileSchema>;

interface PatternField {
  name: string;
  aliases: readonly string[];
  defaultValue?: string;
  values?: readonly string[];
}

export interface SeriesPattern {
  prefix: string;
  description?: string;
  template: string;
  /** テンプレート内の出現順 */
  fields: readonly PatternField[];
}

/**
 * 接頭辞（大文字）→ パターン。読み込み後は変更しない
 */
export type SeriesPatternRegistry = ReadonlyMap<string, SeriesPattern>;

/**
 * 定義オブジェクトからレジストリを構築
 *
 * @throws {PatternError} テンプレートのプレースホルダが未定義の場合など
 */
export function buildPatternRegistry(definition: unknown): SeriesPatternRegistry {
  const parsed = SeriesPatternFileSchema.safeParse(definition);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new PatternError(`Invalid series pattern definition: ${issues.join('; ')}`);
  }

  const registry = new Map<string, SeriesPattern>();
  for (const [prefix, pattern] of Object.entries(parsed.data.patterns)) {
    const placeholders = [...pattern.template.matchAll(PLACEHOLDER_RE)].map((m) => m[1]);
    if (placeholders.length === 0) {
      throw new PatternError(`Pattern ${prefix}: template has no placeholders`);
    }

    const fields: PatternField[] = placeholders.map((name) => {
      const field = pattern.fields[name];
      if (!field) {
        throw new PatternError(`Pattern ${prefix}: placeholder {${name}} is not declared in fields`);
      }
      return {
        name,
        aliases: field.aliases.map((a) => a.toLowerCase()),
        defaultValue: field.default,
        values: field.values,
      };
    });

    registry.set(prefix.toUpperCase(), {
      prefix: prefix.toUpperCase(),
      description: pattern.description,
      template: pattern.template,
      fields,
    });
  }
  return registry;
}

/**
 * パターン定義ファイルを読み込む
 */
export function loadSeriesPatterns(
  path: string = DEFAULT_PATTERNS_PATH,
  baseDir: string = process.cwd()
): SeriesPatternRegistry {
  const fullPath = resolve(baseDir, path);
  let definition: unknown;
  try {
    definition = JSON.parse(readFileSync(fullPath, 'utf-8'));
  } catch (error) {
    throw new PatternError(`Failed to read series patterns from ${fullPath}`, { cause: error });
  }
  return buildPatternRegistry(definition);
}

/**
 * パターン文法に一致するか
 */
export function isPatternToken(token: string): boolean {
  return PATTERN_TOKEN_RE.test(token.trim());
}

/**
 * パターントークンを系列IDへ展開
 *
 * 値は単一コード、`|` 区切りの複数コード、または `*`（既知コード全て）。
 * 展開順はテンプレートのプレースホルダ順の直積（左が外側）。
 *
 * @throws {ResolutionError} 接頭辞・フィールドが不明、必須フィールドの欠落など
 */
export function expandPatternToken(token: string, registry: SeriesPatternRegistry): string[] {
  const match = PATTERN_TOKEN_RE.exec(token.trim());
  if (!match) {
    throw new ResolutionError(`Not a pattern token: ${token}`, [token]);
  }

  const [, rawPrefix, body] = match;
  const pattern = registry.get(rawPrefix.toUpperCase());
  if (!pattern) {
    throw new ResolutionError(`Unknown pattern prefix "${rawPrefix}" in ${token}`, [token]);
  }

  const assigned = new Map<string, string[]>();
  for (const assignment of body.split(',')) {
    const eq = assignment.indexOf('=');
    if (eq < 0) {
      throw new ResolutionError(`Malformed assignment "${assignment.trim()}" in ${token}`, [token]);
    }
    const fieldName = assignment.slice(0, eq).trim().toLowerCase();
    const rawValue = assignment.slice(eq + 1).trim();

    const field = pattern.fields.find(
      (f) => f.name.toLowerCase() === fieldName || f.aliases.includes(fieldName)
    );
    if (!field) {
      throw new ResolutionError(
        `Unknown field "${fieldName}" for pattern ${pattern.prefix} in ${token} ` +
          `(fields: ${pattern.fields.map((f) => f.name).join(', ')})`,
        [token]
      );
    }
    if (assigned.has(field.name)) {
      throw new ResolutionError(`Field "${field.name}" assigned twice in ${token}`, [token]);
    }
    assigned.set(field.name, expandFieldValue(rawValue, field, token));
  }

  const valueLists = pattern.fields.map((field) => {
    const values = assigned.get(field.name);
    if (values) return values;
    if (field.defaultValue !== undefined) return [field.defaultValue];
    throw new ResolutionError(
      `Field "${field.name}" is required for pattern ${pattern.prefix} in ${token}`,
      [token]
    );
  });

  return cartesian(valueLists).map((combo) => {
    let index = 0;
    return pattern.template.replace(PLACEHOLDER_RE, () => combo[index++]).toUpperCase();
  });
}

function expandFieldValue(rawValue: string, field: PatternField, token: string): string[] {
  if (rawValue === '*') {
    if (!field.values || field.values.length === 0) {
      throw new ResolutionError(`Field "${field.name}" has no known values to expand "*" in ${token}`, [
        token,
      ]);
    }
    return [...field.values];
  }

  const values = rawValue
    .split('|')
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
  if (values.length === 0) {
    throw new ResolutionError(`Field "${field.name}" has an empty value in ${token}`, [token]);
  }
  for (const value of values) {
    if (!CODE_RE.test(value)) {
      throw new ResolutionError(`Invalid code "${value}" for field "${field.name}" in ${token}`, [token]);
    }
  }
  return [...new Set(values.map((v) => v.toUpperCase()))];
}

function cartesian(lists: readonly string[][]): string[][] {
  return lists.reduce<string[][]>(
    (acc, list) => acc.flatMap((prefix) => list.map((value) => [...prefix, value])),
    [[]]
  );
}
