import type { DocumentRecord, SummaryStats } from '../../types.js';

/** Full recompute over every record; never updated incrementally. */
export function computeStats(records: readonly DocumentRecord[]): SummaryStats {
  const rawSizes = records.map((record) => record.rawSizeBytes);
  const textSizes = records.map((record) => record.textSizeBytes);
  const words = records.map((record) => record.wordCount);

  return {
    numDocuments: records.length,
    totalRawBytes: sum(rawSizes),
    totalTextBytes: sum(textSizes),
    totalWords: sum(words),
    avgRawBytes: average(rawSizes),
    avgTextBytes: average(textSizes),
    avgWords: average(words),
    medianRawBytes: median(rawSizes),
    medianTextBytes: median(textSizes),
    medianWords: median(words),
  };
}

export function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

export function average(values: readonly number[]): number {
  return values.length === 0 ? 0 : sum(values) / values.length;
}

export function median(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }

  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);

  if (sorted.length % 2 === 1) {
    return sorted[mid];
  }

  return (sorted[mid - 1] + sorted[mid]) / 2;
}
