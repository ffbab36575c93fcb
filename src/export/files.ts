import { appendFile, mkdir, stat, writeFile } from 'fs/promises';
import { join } from 'path';
import { errorCode } from '../errors.js';
import { DetailWriter, RequestOutcome, RunTotals, SummaryRow, SummaryWriter } from '../types.js';
import { DETAIL_COLUMNS, detailRow, SUMMARY_COLUMNS, summaryRow } from './columns.js';
import { toCsvLine, UTF8_BOM } from './csv.js';

export function formatDate(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function outputFolderPath(baseDir: string, prefix: string, date: Date = new Date()): string {
  return join(baseDir, `${prefix}_${formatDate(date)}`);
}

export async function ensureOutputFolder(baseDir: string, prefix: string, date?: Date): Promise<string> {
  const folder = outputFolderPath(baseDir, prefix, date);
  await mkdir(folder, { recursive: true });
  return folder;
}

export function safeFileName(name: string): string {
  return name.replace(/[^A-Za-z0-9._-]+/g, '_') || 'unnamed';
}

async function isEmptyOrMissing(path: string): Promise<boolean> {
  try {
    return (await stat(path)).size === 0;
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return true;
    throw error;
  }
}

export interface CsvDetailWriterOptions {
  folder: string;
  /** One file per outcome group instead of a single file. */
  splitByGroup?: boolean;
  fileName?: string;
}

/** Appends detail rows to CSV, writing the header once per file. */
export class CsvDetailWriter implements DetailWriter {
  private initialized: Set<string> = new Set();

  constructor(private options: CsvDetailWriterOptions) {}

  fileFor(group: string): string {
    const name = this.options.splitByGroup
      ? `${safeFileName(group)}.csv`
      : (this.options.fileName ?? 'detailed_results.csv');
    return join(this.options.folder, name);
  }

  async write(batch: readonly RequestOutcome[]): Promise<void> {
    const byFile = new Map<string, string[]>();
    for (const outcome of batch) {
      const file = this.fileFor(outcome.group);
      const lines = byFile.get(file) ?? [];
      lines.push(toCsvLine(detailRow(outcome)));
      byFile.set(file, lines);
    }

    for (const [file, lines] of byFile) {
      await this.ensureHeader(file);
      await appendFile(file, lines.join('\n') + '\n', 'utf-8');
    }
  }

  private async ensureHeader(file: string): Promise<void> {
    if (this.initialized.has(file)) {
      return;
    }
    if (await isEmptyOrMissing(file)) {
      await writeFile(file, UTF8_BOM + toCsvLine(DETAIL_COLUMNS) + '\n', 'utf-8');
    }
    this.initialized.add(file);
  }
}

/** Writes `summary_statistics.csv` and `summary_statistics.json` into the folder. */
export class FileSummaryWriter implements SummaryWriter {
  written: string[] = [];

  constructor(private folder: string, private baseName = 'summary_statistics') {}

  async write(rows: readonly SummaryRow[], totals: RunTotals): Promise<void> {
    const csvPath = join(this.folder, `${this.baseName}.csv`);
    const jsonPath = join(this.folder, `${this.baseName}.json`);

    const csv = [toCsvLine(SUMMARY_COLUMNS), ...rows.map(row => toCsvLine(summaryRow(row, totals)))].join('\n');
    await writeFile(csvPath, UTF8_BOM + csv + '\n', 'utf-8');
    await writeFile(jsonPath, JSON.stringify({ run: totals, targets: rows }, null, 2) + '\n', 'utf-8');

    this.written = [csvPath, jsonPath];
  }
}
