export type CsvCell = string | number | boolean | undefined | null;

export function escapeCsvCell(value: CsvCell): string {
  if (value === undefined || value === null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsvLine(cells: readonly CsvCell[]): string {
  return cells.map(escapeCsvCell).join(',');
}

/** Byte-order mark so spreadsheet tools pick UTF-8. */
export const UTF8_BOM = '\uFEFF';
