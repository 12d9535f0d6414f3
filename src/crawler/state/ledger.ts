import fs from 'node:fs';
import path from 'node:path';

import { createLedgerError, createStorageError } from '../../errors.js';
import type { DocumentRecord, SiteState } from '../../types.js';
import { resolveSiteLayout } from './artifacts.js';

/** On-disk shape of one ledger line. Field names are part of the file format. */
export interface LedgerLine {
  id: number;
  url: string;
  raw_path: string;
  text_path: string;
  raw_size_bytes: number;
  text_size_bytes: number;
  word_count: number;
  status_code: number;
}

/**
 * Append-only per-site record of accepted documents. The ledger is the only
 * state that survives a restart: `load` replays it into a seen-set, `append`
 * makes a record durable before the caller moves on.
 */
export class LedgerStore {
  constructor(private readonly outputDir: string) {}

  ledgerPath(siteKey: string): string {
    return resolveSiteLayout(this.outputDir, siteKey).ledgerPath;
  }

  load(siteKey: string): SiteState {
    const file = this.ledgerPath(siteKey);
    const state: SiteState = { seen: new Set<number>(), records: [] };

    if (!fs.existsSync(file)) {
      return state;
    }

    let content: string;
    try {
      content = fs.readFileSync(file, 'utf8');
    } catch (error) {
      throw createStorageError(
        `Unable to read ledger ${file}`,
        { site: siteKey, stage: 'load', path: file },
        { cause: error },
      );
    }

    const lines = content.split('\n');
    // A complete ledger always ends with a newline, leaving one empty tail segment.
    if (lines[lines.length - 1] === '') {
      lines.pop();
    }

    lines.forEach((line, index) => {
      const record = parseLedgerLine(line, { site: siteKey, file, line: index + 1 });
      if (state.seen.has(record.id)) {
        throw createLedgerError(`Duplicate identifier ${record.id} in ledger`, {
          site: siteKey,
          stage: 'load',
          path: file,
          line: index + 1,
          id: record.id,
        });
      }
      state.seen.add(record.id);
      state.records.push(record);
    });

    return state;
  }

  /** Appends one line and fsyncs it; returns only once the record is on disk. */
  append(siteKey: string, record: DocumentRecord): void {
    const file = this.ledgerPath(siteKey);
    const line = `${JSON.stringify(toLedgerLine(record))}\n`;

    try {
      fs.mkdirSync(path.dirname(file), { recursive: true });
      const fd = fs.openSync(file, 'a');
      try {
        fs.writeSync(fd, line);
        fs.fsyncSync(fd);
      } finally {
        fs.closeSync(fd);
      }
    } catch (error) {
      throw createStorageError(
        `Unable to append to ledger ${file}`,
        { site: siteKey, stage: 'persist', path: file, id: record.id },
        { cause: error },
      );
    }
  }
}

export function toLedgerLine(record: DocumentRecord): LedgerLine {
  return {
    id: record.id,
    url: record.url,
    raw_path: record.rawPath,
    text_path: record.textPath,
    raw_size_bytes: record.rawSizeBytes,
    text_size_bytes: record.textSizeBytes,
    word_count: record.wordCount,
    status_code: record.statusCode,
  };
}

export function parseLedgerLine(
  line: string,
  location: { site: string; file: string; line: number },
): DocumentRecord {
  const details = { ...location, stage: 'load' };

  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    throw createLedgerError(
      `Corrupt ledger line ${location.line} in ${location.file}`,
      details,
      { cause: error },
    );
  }

  if (!isLedgerLine(parsed)) {
    throw createLedgerError(
      `Ledger line ${location.line} in ${location.file} is not a document record`,
      details,
    );
  }

  return {
    id: parsed.id,
    url: parsed.url,
    rawPath: parsed.raw_path,
    textPath: parsed.text_path,
    rawSizeBytes: parsed.raw_size_bytes,
    textSizeBytes: parsed.text_size_bytes,
    wordCount: parsed.word_count,
    statusCode: parsed.status_code,
  };
}

function isLedgerLine(value: unknown): value is LedgerLine {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }

  const fields = new Map<string, unknown>(Object.entries(value));
  const isCount = (key: string): boolean => {
    const field = fields.get(key);
    return Number.isInteger(field) && typeof field === 'number' && field >= 0;
  };

  return (
    isCount('id') &&
    typeof fields.get('url') === 'string' &&
    typeof fields.get('raw_path') === 'string' &&
    typeof fields.get('text_path') === 'string' &&
    isCount('raw_size_bytes') &&
    isCount('text_size_bytes') &&
    isCount('word_count') &&
    isCount('status_code')
  );
}
