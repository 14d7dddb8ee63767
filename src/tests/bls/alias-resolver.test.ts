import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import {
  AliasTable,
  isLiteralSeriesId,
  loadAliasTable,
  normalizeAliasKey,
  parseAliasCsv,
  parseAliasJson,
  resolveSeriesTokens,
} from '@/lib/bls/alias-resolver';
import { loadSeriesPatterns } from '@/lib/bls/series-patterns';
import { AliasTableError, ResolutionError } from '@/lib/bls/errors';

const REPO_ROOT = path.resolve(__dirname, '../../..');

const MAPPING_CSV = [
  'alias,series_id',
  'CPI All Items,CUUR0000SA0',
  'CPI Core,CUUR0000SA0L1E',
  'CPI Headline And Core,"CUUR0000SA0,CUUR0000SA0L1E"',
  'Labor Market,LNS14000000',
  'Labor Market,CES0000000001',
  'Labor Market,LNS14000000',
].join('\n');

/** 例外を捕捉して返す */
function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

describe('alias-resolver.ts', () => {
  describe('normalizeAliasKey', () => {
    it('大文字小文字と区切り文字の違いを無視する', () => {
      const keys = ['CPI All Items', 'cpi_all_items', 'cpi-all-items', ' CPI.All/Items ', 'CPIALLITEMS'];
      expect(new Set(keys.map(normalizeAliasKey))).toEqual(new Set(['cpiallitems']));
    });
  });

  describe('isLiteralSeriesId', () => {
    it.each([
      ['CUUR0000SA0', true],
      ['lns14000000', true],
      ['ABCDEFGH', false],
      ['12345678', false],
      ['A1B2', false],
      ['A1234567890123456789012345', false],
      ['CUUR-0000SA0', false],
    ])('%s → %s', (token, expected) => {
      expect(isLiteralSeriesId(token)).toBe(expected);
    });
  });

  describe('parseAliasCsv', () => {
    it('ヘッダーの列名で列を特定する', () => {
      const table = parseAliasCsv('series,note,name\nCUUR0000SA0,x,Headline\n');
      expect(table.lookup('headline')).toEqual(['CUUR0000SA0']);
    });

    it('カンマ区切りのセルは1対多になる', () => {
      const table = parseAliasCsv(MAPPING_CSV);
      expect(table.lookup('cpi_headline_and_core')).toEqual(['CUUR0000SA0', 'CUUR0000SA0L1E']);
    });

    it('同じエイリアスの行は出現順に連結し重複を除く', () => {
      const table = parseAliasCsv(MAPPING_CSV);
      expect(table.lookup('labor-market')).toEqual(['LNS14000000', 'CES0000000001']);
      expect(table.size).toBe(4);
    });

    it('ヘッダー名が不明でも2列なら位置で解釈し、IDは大文字化する', () => {
      const table = parseAliasCsv('foo,bar\nMy Series,cuur0000sa0\n');
      expect(table.lookup('my series')).toEqual(['CUUR0000SA0']);
    });

    it('読み込み後の値は変更できない', () => {
      const ids = parseAliasCsv(MAPPING_CSV).lookup('CPI Core');
      expect(Object.isFrozen(ids)).toBe(true);
    });

    it.each([
      ['', 'inline.csv: mapping file has no header row'],
      [
        'a,b,c\nx,y,z',
        'inline.csv:1: header must include one of alias/name/label/code and one of series/series_id/seriesid, ' +
          'or be exactly two columns (found: a, b, c)',
      ],
      ['alias,series\nok,CUUR0000SA0\nx,y,z', 'inline.csv:3: expected 2 cells, found 3'],
      ['alias,series\n\n,CUUR0000SA0', 'inline.csv:3: alias is empty'],
      ['alias,series\nBroken,', 'inline.csv:2: invalid series id list "" for alias "Broken"'],
      ['alias,series\nBroken,CU-UR', 'inline.csv:2: invalid series id list "CU-UR" for alias "Broken"'],
    ])('不正な定義は行番号付きの AliasTableError (%#)', (text, message) => {
      const error = catchError(() => parseAliasCsv(text));
      expect(error).toBeInstanceOf(AliasTableError);
      expect(error).toMatchObject({ message });
    });
  });

  describe('parseAliasJson', () => {
    it('オブジェクト形式', () => {
      const table = parseAliasJson(
        JSON.stringify({ 'CPI All Items': 'CUUR0000SA0', Headline: ['CUUR0000SA0', 'cuur0000sa0l1e'] })
      );
      expect(table.lookup('cpi all items')).toEqual(['CUUR0000SA0']);
      expect(table.lookup('HEADLINE')).toEqual(['CUUR0000SA0', 'CUUR0000SA0L1E']);
    });

    it('groups 形式', () => {
      const table = parseAliasJson(
        JSON.stringify({ groups: [{ label: 'Jobs', seriesid: 'CES0000000001,LNS14000000' }] })
      );
      expect(table.lookup('jobs')).toEqual(['CES0000000001', 'LNS14000000']);
    });

    it('配列形式', () => {
      const table = parseAliasJson(JSON.stringify([{ name: 'Unemployment', series_id: ['LNS14000000'] }]));
      expect(table.lookup('unemployment')).toEqual(['LNS14000000']);
    });

    it.each([
      ['[{"alias":"x","series":"CUUR0000SA0"},{"alias":"y"}]', 'inline.json:2: entry is missing alias or series'],
      ['[5]', 'inline.json:1: entry must be an object with alias and series fields'],
      ['{"ok":"CUUR0000SA0","bad":42}', 'inline.json:2: invalid mapping for alias "bad"'],
      ['"just a string"', 'inline.json: unsupported JSON mapping schema'],
    ])('不正な定義はエントリ番号付きの AliasTableError (%#)', (text, message) => {
      const error = catchError(() => parseAliasJson(text));
      expect(error).toBeInstanceOf(AliasTableError);
      expect(error).toMatchObject({ message });
    });

    it('JSON として読めない場合', () => {
      expect(() => parseAliasJson('{oops')).toThrow(/^inline\.json: invalid JSON \(/);
    });
  });

  describe('loadAliasTable', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(path.join(tmpdir(), 'alias-table-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('既定候補がなければ空の表', () => {
      const table = loadAliasTable(undefined, dir);
      expect(table.size).toBe(0);
    });

    it('既定候補の JSON を読み込む', () => {
      mkdirSync(path.join(dir, 'data'));
      writeFileSync(path.join(dir, 'data', 'code-mapping.json'), JSON.stringify({ Payrolls: 'CES0000000001' }));

      expect(loadAliasTable(undefined, dir).lookup('payrolls')).toEqual(['CES0000000001']);
    });

    it('明示パスが存在しない場合はエラー', () => {
      const missing = path.join(dir, 'missing.csv');
      expect(() => loadAliasTable(missing, dir)).toThrow(new AliasTableError('file not found', missing));
    });

    it('未対応の拡張子はエラー', () => {
      writeFileSync(path.join(dir, 'mapping.txt'), 'alias,series\n');
      expect(() => loadAliasTable('mapping.txt', dir)).toThrow('unsupported mapping file extension ".txt"');
    });

    it('同梱のマッピングを読み込む', () => {
      const table = loadAliasTable(undefined, REPO_ROOT);
      expect(table.lookup('cpi_all_items')).toEqual(['CUUR0000SA0']);
      expect(table.lookup('Labor Market')).toEqual(['LNS14000000', 'LNS11300000', 'CES0000000001']);
    });
  });

  describe('resolveSeriesTokens', () => {
    const table = parseAliasCsv(MAPPING_CSV);

    it('表記ゆれのあるエイリアスは同じ系列に解決する', () => {
      const resolution = resolveSeriesTokens(['cpi_all_items', 'CPI-ALL-ITEMS', ' CPI All Items '], table);

      expect(resolution.seriesIds).toEqual(['CUUR0000SA0']);
      expect(resolution.reverseMap.get('CUUR0000SA0')).toEqual(['cpi_all_items', 'CPI-ALL-ITEMS', 'CPI All Items']);
    });

    it('初出順で重複を除き、逆引きにすべての元トークンを残す', () => {
      const resolution = resolveSeriesTokens(['CPI Core', 'CPI Headline And Core'], table);

      expect(resolution.seriesIds).toEqual(['CUUR0000SA0L1E', 'CUUR0000SA0']);
      expect(resolution.reverseMap.get('CUUR0000SA0L1E')).toEqual(['CPI Core', 'CPI Headline And Core']);
      expect(resolution.reverseMap.get('CUUR0000SA0')).toEqual(['CPI Headline And Core']);
    });

    it('系列IDリテラルは大文字化し、逆引きには含めない', () => {
      const resolution = resolveSeriesTokens(['lns11300000'], table);

      expect(resolution.seriesIds).toEqual(['LNS11300000']);
      expect(resolution.reverseMap.size).toBe(0);
    });

    it('空白のみのトークンは無視する', () => {
      expect(resolveSeriesTokens(['', '  ', 'CPI Core'], table).seriesIds).toEqual(['CUUR0000SA0L1E']);
    });

    it('未解決トークンはすべて列挙して1つのエラーにする', () => {
      const error = catchError(() => resolveSeriesTokens(['foo', 'CPI Core', 'bar baz', 'foo'], table));

      expect(error).toBeInstanceOf(ResolutionError);
      expect(error).toMatchObject({
        message: 'Unknown series tokens (not an alias, pattern or series ID): foo, bar baz',
        tokens: ['foo', 'bar baz'],
      });
    });

    it('パターンの失敗理由をメッセージに含める', () => {
      const error = catchError(() => resolveSeriesTokens(['XX:area=1'], table));

      expect(error).toMatchObject({
        message:
          'Unknown series tokens (not an alias, pattern or series ID): XX:area=1 ' +
          '[Unknown pattern prefix "XX" in XX:area=1]',
        tokens: ['XX:area=1'],
      });
    });

    it('トークンがない場合はエラー', () => {
      expect(() => resolveSeriesTokens([' '], table)).toThrow(new ResolutionError('No series tokens given', []));
    });

    it('パターンとエイリアスを混在して解決する', () => {
      const patterns = loadSeriesPatterns('data/series-patterns.json', REPO_ROOT);
      const resolution = resolveSeriesTokens(['cpi_all_items', 'CU:item=SA0|SAF1'], table, patterns);

      expect(resolution.seriesIds).toEqual(['CUUR0000SA0', 'CUUR0000SAF1']);
      expect(resolution.reverseMap.get('CUUR0000SA0')).toEqual(['cpi_all_items', 'CU:item=SA0|SAF1']);
      expect(resolution.reverseMap.get('CUUR0000SAF1')).toEqual(['CU:item=SA0|SAF1']);
    });

    it('小文字の値を含むパターンとリテラルは同じ系列として1つにまとめる', () => {
      const patterns = loadSeriesPatterns('data/series-patterns.json', REPO_ROOT);
      const resolution = resolveSeriesTokens(['CU:area=s49a,item=sa0', 'cuurs49asa0'], table, patterns);

      expect(resolution.seriesIds).toEqual(['CUURS49ASA0']);
      expect(resolution.reverseMap.get('CUURS49ASA0')).toEqual(['CU:area=s49a,item=sa0']);
    });

    it('パターンと同じ形のエイリアスは表の定義を優先する', () => {
      const custom = AliasTable.fromPairs([['CU:item=SA0', ['CUSR0000SA0']]]);
      const patterns = loadSeriesPatterns('data/series-patterns.json', REPO_ROOT);
      const resolution = resolveSeriesTokens(['CU:item=SA0', 'CU:item=SAF1'], custom, patterns);

      expect(resolution.seriesIds).toEqual(['CUSR0000SA0', 'CUUR0000SAF1']);
      expect(resolution.reverseMap.get('CUSR0000SA0')).toEqual(['CU:item=SA0']);
    });

    it('空の表ではリテラルのみ受け付ける', () => {
      expect(resolveSeriesTokens(['CES0000000001'], AliasTable.empty()).seriesIds).toEqual(['CES0000000001']);
      expect(() => resolveSeriesTokens(['cpi_all_items'], AliasTable.empty())).toThrow(ResolutionError);
    });
  });
});
