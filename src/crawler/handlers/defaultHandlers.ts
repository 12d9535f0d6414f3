import type { CorpusHandlers } from '../../types.js';
import { updateQuietProgress, writeDocument, writeSiteSummary } from '../../util/output.js';

export function createDefaultHandlers(): CorpusHandlers {
  return {
    onDocument: (siteKey, record) => writeDocument(siteKey, record),
    onProgress: (progress) => updateQuietProgress(progress),
    onSiteComplete: (result, stats) => writeSiteSummary(result, stats),
  };
}
