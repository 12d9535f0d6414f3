import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { isCorpusError } from '../src/errors.js';
import { LedgerStore } from '../src/crawler/state/ledger.js';
import type { DocumentRecord } from '../src/types.js';

const makeRecord = (id: number, overrides: Partial<DocumentRecord> = {}): DocumentRecord => ({
  id,
  url: `https://recipes.test/r/${id}`,
  rawPath: `corpus/site/raw/${id}.html`,
  textPath: `corpus/site/text/${id}.txt`,
  rawSizeBytes: 1_000 + id,
  textSizeBytes: 100 + id,
  wordCount: 10 + id,
  statusCode: 200,
  ...overrides,
});

function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
}

describe('LedgerStore', () => {
  let outputDir: string;
  let store: LedgerStore;

  beforeEach(() => {
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), 'corpus-ledger-'));
    store = new LedgerStore(outputDir);
  });

  afterEach(() => {
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  it('places the ledger under the site meta directory', () => {
    expect(store.ledgerPath('alpha')).toBe(path.join(outputDir, 'alpha', 'meta', 'meta.jsonl'));
  });

  it('treats a missing ledger as an empty site', () => {
    const state = store.load('alpha');
    expect(state.records).toEqual([]);
    expect(state.seen.size).toBe(0);
  });

  it('replays appended records in order on a fresh load', () => {
    store.append('alpha', makeRecord(9));
    store.append('alpha', makeRecord(7));
    store.append('alpha', makeRecord(4));

    const state = new LedgerStore(outputDir).load('alpha');
    expect(state.records.map((record) => record.id)).toEqual([9, 7, 4]);
    expect([...state.seen]).toEqual([9, 7, 4]);
    expect(state.records[1]).toEqual(makeRecord(7));
  });

  it('writes one snake_case JSON object per line', () => {
    store.append('alpha', makeRecord(5));

    const content = fs.readFileSync(store.ledgerPath('alpha'), 'utf8');
    expect(content).toBe(
      '{"id":5,"url":"https://recipes.test/r/5","raw_path":"corpus/site/raw/5.html",' +
        '"text_path":"corpus/site/text/5.txt","raw_size_bytes":1005,"text_size_bytes":105,' +
        '"word_count":15,"status_code":200}\n',
    );
  });

  it('keeps non-ASCII characters as they are', () => {
    store.append('alpha', makeRecord(3, { url: 'https://рецепты.test/борщ/3' }));

    const content = fs.readFileSync(store.ledgerPath('alpha'), 'utf8');
    expect(content).toContain('"url":"https://рецепты.test/борщ/3"');
    expect(store.load('alpha').records[0]?.url).toBe('https://рецепты.test/борщ/3');
  });

  it('keeps sites in separate ledgers', () => {
    store.append('alpha', makeRecord(1));
    store.append('beta', makeRecord(2));

    expect(store.load('alpha').records.map((record) => record.id)).toEqual([1]);
    expect(store.load('beta').records.map((record) => record.id)).toEqual([2]);
  });

  it('rejects a partially written trailing line', () => {
    store.append('alpha', makeRecord(9));
    fs.appendFileSync(store.ledgerPath('alpha'), '{"id":8,"url":"https://rec');

    const error = captureError(() => store.load('alpha'));
    expect(isCorpusError(error)).toBe(true);
    if (isCorpusError(error)) {
      expect(error.kind).toBe('ledger');
      expect(error.severity).toBe('fatal');
      expect(error.message).toBe(`Corrupt ledger line 2 in ${store.ledgerPath('alpha')}`);
      expect(error.details).toMatchObject({ site: 'alpha', line: 2, stage: 'load' });
    }
  });

  it('rejects lines that are JSON but not document records', () => {
    fs.mkdirSync(path.dirname(store.ledgerPath('alpha')), { recursive: true });
    fs.writeFileSync(store.ledgerPath('alpha'), '{"id":"nine","url":"https://recipes.test/r/9"}\n');

    const error = captureError(() => store.load('alpha'));
    expect(isCorpusError(error) && error.kind).toBe('ledger');
    expect(error instanceof Error && error.message).toBe(
      `Ledger line 1 in ${store.ledgerPath('alpha')} is not a document record`,
    );
  });

  it('rejects blank lines in the middle of the ledger', () => {
    store.append('alpha', makeRecord(9));
    fs.appendFileSync(store.ledgerPath('alpha'), '\n');
    store.append('alpha', makeRecord(8));

    const error = captureError(() => store.load('alpha'));
    expect(isCorpusError(error) && error.details?.line).toBe(2);
  });

  it('rejects an identifier recorded twice', () => {
    store.append('alpha', makeRecord(9));
    store.append('alpha', makeRecord(9));

    const error = captureError(() => store.load('alpha'));
    expect(isCorpusError(error) && error.kind).toBe('ledger');
    expect(error instanceof Error && error.message).toBe('Duplicate identifier 9 in ledger');
  });

  it('raises a storage error when the ledger cannot be opened', () => {
    fs.mkdirSync(path.join(outputDir, 'alpha'), { recursive: true });
    fs.writeFileSync(path.join(outputDir, 'alpha', 'meta'), 'not a directory');

    const error = captureError(() => store.append('alpha', makeRecord(1)));
    expect(isCorpusError(error) && error.kind).toBe('storage');
    expect(isCorpusError(error) && error.details).toMatchObject({ site: 'alpha', stage: 'persist', id: 1 });
  });
});
