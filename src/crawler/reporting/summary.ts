import fs from 'node:fs';
import path from 'node:path';

import { createStorageError } from '../../errors.js';
import type { CorpusSummary, DocumentRecord, SummaryStats } from '../../types.js';
import { toLedgerLine, type LedgerLine } from '../state/ledger.js';

const CSV_COLUMNS = [
  'id',
  'url',
  'raw_path',
  'text_path',
  'raw_size_bytes',
  'text_size_bytes',
  'word_count',
  'status_code',
] as const satisfies readonly (keyof LedgerLine)[];

export const OVERALL_SUMMARY_FILE = 'overall_summary.json';

/** On-disk shape of `<site>_stats.json`; keys follow the ledger's snake_case. */
export interface StatsFile {
  num_documents: number;
  total_raw_bytes: number;
  total_text_bytes: number;
  total_words: number;
  avg_raw_bytes: number;
  avg_text_bytes: number;
  avg_words: number;
  median_raw_bytes: number;
  median_text_bytes: number;
  median_words: number;
}

export type OverallSummaryFile = Record<string, { meta_count: number; stats: StatsFile }>;

export function toStatsFile(stats: SummaryStats): StatsFile {
  return {
    num_documents: stats.numDocuments,
    total_raw_bytes: stats.totalRawBytes,
    total_text_bytes: stats.totalTextBytes,
    total_words: stats.totalWords,
    avg_raw_bytes: stats.avgRawBytes,
    avg_text_bytes: stats.avgTextBytes,
    avg_words: stats.avgWords,
    median_raw_bytes: stats.medianRawBytes,
    median_text_bytes: stats.medianTextBytes,
    median_words: stats.medianWords,
  };
}

export function toOverallSummaryFile(summary: CorpusSummary): OverallSummaryFile {
  const file: OverallSummaryFile = {};
  for (const [siteKey, entry] of Object.entries(summary)) {
    file[siteKey] = { meta_count: entry.metaCount, stats: toStatsFile(entry.stats) };
  }
  return file;
}

export function renderRecordsCsv(records: readonly DocumentRecord[]): string {
  const lines: string[] = [CSV_COLUMNS.join(',')];

  for (const record of records) {
    const line = toLedgerLine(record);
    lines.push(CSV_COLUMNS.map((column) => csvEscape(line[column])).join(','));
  }

  return `${lines.join('\n')}\n`;
}

export function csvEscape(value: string | number): string {
  const text = String(value);
  if (/[",\n\r]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * Writes `<site>_meta.csv` and `<site>_stats.json` into the site directory.
 * Both files are rebuilt from scratch on every run.
 */
export function writeSiteSummaryFiles(
  outputDir: string,
  siteKey: string,
  records: readonly DocumentRecord[],
  stats: SummaryStats,
): { csvPath: string; statsPath: string } {
  const siteDir = path.join(outputDir, siteKey);
  const csvPath = path.join(siteDir, `${siteKey}_meta.csv`);
  const statsPath = path.join(siteDir, `${siteKey}_stats.json`);

  writeOutputFile(csvPath, renderRecordsCsv(records), siteKey);
  writeOutputFile(statsPath, `${JSON.stringify(toStatsFile(stats), null, 2)}\n`, siteKey);

  return { csvPath, statsPath };
}

export function writeOverallSummary(outputDir: string, summary: CorpusSummary): string {
  const summaryPath = path.join(outputDir, OVERALL_SUMMARY_FILE);
  writeOutputFile(summaryPath, `${JSON.stringify(toOverallSummaryFile(summary), null, 2)}\n`);
  return summaryPath;
}

function writeOutputFile(filePath: string, content: string, site?: string): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, 'utf8');
  } catch (error) {
    throw createStorageError(
      `Unable to write ${filePath}`,
      { site, stage: 'summary', path: filePath },
      { cause: error },
    );
  }
}
