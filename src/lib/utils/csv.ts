/**
 * CSV ユーティリティ
 *
 * @description エイリアス定義の読み込みと抽出結果の書き出しに使用
 */

export type CsvCell = string | number | boolean | null | undefined;

/**
 * CSVテキストを行ごとにパース（ダブルクォート対応）
 *
 * 空行はスキップする。戻り値の各要素は [元の行番号(1始まり), セル配列]
 */
export function parseCsvLines(csvText: string): Array<[number, string[]]> {
  const result: Array<[number, string[]]> = [];
  const lines = csvText.replace(/^\uFEFF/, '').split(/\r?\n/);

  lines.forEach((line, index) => {
    if (line.trim().length === 0) return;

    const cells: string[] = [];
    let current = '';
    let inQuotes = false;

    for (let i = 0; i < line.length; i++) {
      const ch = line[i];
      if (inQuotes) {
        if (ch === '"' && line[i + 1] === '"') {
          current += '"';
          i++;
        } else if (ch === '"') {
          inQuotes = false;
        } else {
          current += ch;
        }
      } else {
        if (ch === '"') {
          inQuotes = true;
        } else if (ch === ',') {
          cells.push(current.trim());
          current = '';
        } else {
          current += ch;
        }
      }
    }
    cells.push(current.trim());
    result.push([index + 1, cells]);
  });

  return result;
}

/**
 * 1セルを CSV 表現に変換（RFC 4180）
 */
export function formatCsvCell(value: CsvCell): string {
  if (value === null || value === undefined) return '';
  const str = String(value);
  if (/[",\r\n]/.test(str)) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/**
 * ヘッダーと行から CSV テキストを生成（末尾改行付き）
 */
export function formatCsv(columns: readonly string[], rows: ReadonlyArray<readonly CsvCell[]>): string {
  const lines = [columns.map(formatCsvCell).join(',')];
  for (const row of rows) {
    lines.push(row.map(formatCsvCell).join(','));
  }
  return lines.join('\n') + '\n';
}
