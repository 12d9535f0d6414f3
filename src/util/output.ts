import type { DocumentRecord, SiteWalkResult, SummaryStats, WalkProgress } from '../types.js';

const QUIET_PROGRESS_INTERVAL_MS = 250;

let quietMode = false;
let quietProgressTimer: ReturnType<typeof setTimeout> | undefined;
let quietProgressPending: WalkProgress | undefined;
let quietProgressLastTimestamp = -Infinity;
let quietProgressLastLength = 0;
let quietProgressRendered = false;

export function writeSiteStart(siteKey: string): void {
  flushQuietProgress();
  process.stdout.write(`\n=== Collecting ${siteKey} ===\n`);
}

export function writeDocument(siteKey: string, record: DocumentRecord): void {
  if (quietMode) {
    return;
  }

  process.stdout.write(`SAVED [${siteKey}] ${record.id} ${record.url} (${record.wordCount} words)\n`);
}

export function writeSiteSummary(result: SiteWalkResult, stats: SummaryStats): void {
  flushQuietProgress({ persist: true });
  process.stdout.write(renderSiteSummary(result, stats));
}

export function writeRunComplete(outputDir: string): void {
  flushQuietProgress({ persist: true });
  process.stdout.write(`\nDone. Results in: ${outputDir}\n`);
}

export function logError(message: string): void {
  flushQuietProgress();
  const payload = message.endsWith('\n') ? message : `${message}\n`;
  process.stderr.write(payload);
}

export function flushOutputBuffers(): void {
  flushQuietProgress();
}

export function setOutputConfig(config: { quiet: boolean }): void {
  if (quietMode && !config.quiet) {
    flushQuietProgress();
  }

  quietMode = config.quiet;
  resetQuietProgressState();
}

export function resetOutputConfig(): void {
  setOutputConfig({ quiet: false });
}

export function updateQuietProgress(snapshot: WalkProgress): void {
  if (!quietMode) {
    return;
  }

  quietProgressPending = snapshot;
  scheduleQuietProgressRender();
}

export function flushQuietProgress(options: { persist?: boolean } = {}): void {
  if (quietProgressTimer) {
    clearTimeout(quietProgressTimer);
    quietProgressTimer = undefined;
  }

  if (quietProgressPending) {
    performQuietProgressRender();
  }

  if (!quietProgressRendered) {
    return;
  }

  if (options.persist) {
    process.stdout.write('\n');
  } else if (quietProgressLastLength > 0) {
    process.stdout.write(`\r${' '.repeat(quietProgressLastLength)}\r`);
  }

  quietProgressRendered = false;
  quietProgressLastLength = 0;
  quietProgressLastTimestamp = -Infinity;
}

export function renderSiteSummary(result: SiteWalkResult, stats: SummaryStats): string {
  const lines: string[] = [
    '',
    `--- ${result.siteKey} summary ---`,
    `Documents: ${stats.numDocuments}`,
    `Attempts this run: ${result.attempts}`,
    `Known identifiers skipped: ${result.skipped}`,
    `Stopped: ${result.stopReason}`,
    `Raw bytes: total ${stats.totalRawBytes}, avg ${formatNumber(stats.avgRawBytes)}, median ${formatNumber(stats.medianRawBytes)}`,
    `Text bytes: total ${stats.totalTextBytes}, avg ${formatNumber(stats.avgTextBytes)}, median ${formatNumber(stats.medianTextBytes)}`,
    `Words: total ${stats.totalWords}, avg ${formatNumber(stats.avgWords)}, median ${formatNumber(stats.medianWords)}`,
  ];

  return `${lines.join('\n')}\n`;
}

function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

function scheduleQuietProgressRender(): void {
  if (quietProgressTimer) {
    return;
  }

  const now = Date.now();
  const elapsed = now - quietProgressLastTimestamp;
  const wait = elapsed >= QUIET_PROGRESS_INTERVAL_MS ? 0 : QUIET_PROGRESS_INTERVAL_MS - elapsed;

  quietProgressTimer = setTimeout(() => {
    quietProgressTimer = undefined;
    performQuietProgressRender();
  }, wait);
}

function performQuietProgressRender(): void {
  const snapshot = quietProgressPending;
  quietProgressPending = undefined;

  if (!snapshot) {
    return;
  }

  emitQuietProgress(snapshot);
  quietProgressLastTimestamp = Date.now();
}

function emitQuietProgress(snapshot: WalkProgress): void {
  const line = renderQuietProgressLine(snapshot);
  const padded = padQuietProgressLine(line);
  process.stdout.write(`\r${padded}`);
  quietProgressLastLength = padded.length;
  quietProgressRendered = true;
}

export function renderQuietProgressLine(snapshot: WalkProgress): string {
  const parts = [
    `found:${snapshot.found}/${snapshot.target}`,
    `attempts:${snapshot.attempts}`,
    `id:${snapshot.currentId}`,
  ];

  return `[${snapshot.siteKey}] ${parts.join(' ')}`;
}

function padQuietProgressLine(text: string): string {
  if (quietProgressLastLength > text.length) {
    return `${text}${' '.repeat(quietProgressLastLength - text.length)}`;
  }

  return text;
}

function resetQuietProgressState(): void {
  if (quietProgressTimer) {
    clearTimeout(quietProgressTimer);
    quietProgressTimer = undefined;
  }

  quietProgressPending = undefined;
  quietProgressLastTimestamp = -Infinity;
  quietProgressLastLength = 0;
  quietProgressRendered = false;
}
