import fs from 'node:fs';
import path from 'node:path';

import { createStorageError } from '../../errors.js';

export interface SiteLayout {
  siteKey: string;
  siteDir: string;
  rawDir: string;
  textDir: string;
  metaDir: string;
  ledgerPath: string;
}

export interface StoredArtifacts {
  rawPath: string;
  textPath: string;
  rawSizeBytes: number;
  textSizeBytes: number;
}

export function resolveSiteLayout(outputDir: string, siteKey: string): SiteLayout {
  const siteDir = path.join(outputDir, siteKey);
  const metaDir = path.join(siteDir, 'meta');
  return {
    siteKey,
    siteDir,
    rawDir: path.join(siteDir, 'raw'),
    textDir: path.join(siteDir, 'text'),
    metaDir,
    ledgerPath: path.join(metaDir, 'meta.jsonl'),
  };
}

export function ensureSiteDirs(layout: SiteLayout): void {
  for (const dir of [layout.rawDir, layout.textDir, layout.metaDir]) {
    try {
      fs.mkdirSync(dir, { recursive: true });
    } catch (error) {
      throw createStorageError(
        `Unable to create directory ${dir}`,
        { site: layout.siteKey, stage: 'prepare', path: dir },
        { cause: error },
      );
    }
  }
}

/**
 * Writes the response bytes unchanged and the extracted text as UTF-8 under the
 * site's raw/ and text/ directories, named by identifier. Sizes are the on-disk
 * byte counts.
 */
export function writeArtifacts(
  layout: SiteLayout,
  id: number,
  raw: Uint8Array,
  text: string,
): StoredArtifacts {
  const rawPath = path.join(layout.rawDir, `${id}.html`);
  const textPath = path.join(layout.textDir, `${id}.txt`);
  const textBytes = Buffer.from(text, 'utf8');

  writeFile(layout, id, rawPath, raw);
  writeFile(layout, id, textPath, textBytes);

  return {
    rawPath,
    textPath,
    rawSizeBytes: raw.byteLength,
    textSizeBytes: textBytes.byteLength,
  };
}

function writeFile(layout: SiteLayout, id: number, filePath: string, data: Uint8Array): void {
  try {
    fs.writeFileSync(filePath, data);
  } catch (error) {
    throw createStorageError(
      `Unable to write ${filePath}`,
      { site: layout.siteKey, stage: 'persist', id, path: filePath },
      { cause: error },
    );
  }
}
