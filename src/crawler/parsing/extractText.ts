import { load } from 'cheerio';
import { hasChildren, isText, type AnyNode } from 'domhandler';

import { createParseError } from '../../errors.js';
import { reportCorpusError } from '../../util/errorHandler.js';

const NON_CONTENT_SELECTOR = 'script, style, noscript';

/**
 * Best-effort visible text of an HTML document: non-content elements and
 * comments are dropped, text nodes are joined with a space and every
 * whitespace run collapses to a single space.
 */
export function extractText(html: string): string {
  try {
    const $ = load(html);
    $(NON_CONTENT_SELECTOR).remove();

    const chunks: string[] = [];
    collectText($.root().toArray(), chunks);

    return chunks.join(' ').replace(/\s+/g, ' ').trim();
  } catch (error) {
    reportCorpusError(
      createParseError('Failed to extract text from HTML', { htmlLength: html.length }, { cause: error }),
      { stage: 'extract' },
      { throwOnFatal: false },
    );
    return '';
  }
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

// Comments and directives are not text nodes and are skipped here.
function collectText(nodes: AnyNode[], chunks: string[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      const value = node.data.trim();
      if (value) {
        chunks.push(value);
      }
    } else if (hasChildren(node)) {
      collectText(node.children, chunks);
    }
  }
}
