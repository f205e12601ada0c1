/**
 * Sheets Module - Pure Transformations
 *
 * A1 ranges and request URLs.
 */
import type { CellValue, SheetsConfig } from "./schema.js";

/**
 * Quote a tab name for A1 notation. Embedded quotes are doubled.
 */
export function quoteTabName(tab: string): string {
  return `'${tab.replace(/'/g, "''")}'`;
}

/**
 * Convert a 1-based column number to letters (1 → A, 27 → AA).
 */
export function columnLetter(column: number): string {
  let n = column;
  let letters = "";
  while (n > 0) {
    const rem = (n - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

/**
 * Whole-column range covering `columns` columns of a tab, e.g. 'Log'!A:F.
 */
export function tabRange(tab: string, columns: number): string {
  return `${quoteTabName(tab)}!A:${columnLetter(Math.max(1, columns))}`;
}

export function buildValuesUrl(config: SheetsConfig, range: string): string {
  return `${config.apiUrl}/spreadsheets/${encodeURIComponent(config.spreadsheetId)}/values/${encodeURIComponent(range)}`;
}

export function buildAppendUrl(config: SheetsConfig, range: string): string {
  const params = new URLSearchParams({
    valueInputOption: "USER_ENTERED",
    insertDataOption: "INSERT_ROWS",
  });
  return `${buildValuesUrl(config, range)}:append?${params.toString()}`;
}

/**
 * Normalize a returned grid: every cell becomes a string.
 */
export function normalizeGrid(
  values: ReadonlyArray<ReadonlyArray<CellValue>> | undefined,
): string[][] {
  if (!values) return [];
  return values.map((row) => row.map((cell) => String(cell)));
}
