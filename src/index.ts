import path from 'node:path';
import pLimit from 'p-limit';

import { DEFAULT_SITES } from './config/sites.js';
import { createDefaultHandlers } from './crawler/handlers/defaultHandlers.js';
import { DEFAULT_USER_AGENT } from './crawler/network/fetchPage.js';
import { createFetcher, DEFAULT_RETRY_POLICY } from './crawler/network/fetchPageWithRetry.js';
import { computeStats } from './crawler/reporting/stats.js';
import { writeOverallSummary, writeSiteSummaryFiles } from './crawler/reporting/summary.js';
import { LedgerStore } from './crawler/state/ledger.js';
import { countPlaceholders } from './crawler/url/buildUrl.js';
import { SiteWalker } from './crawler/walk.js';
import { CorpusError, createConfigurationError, ensureCorpusError } from './errors.js';
import { configureLogger, getLogger } from './logger.js';
import type {
  CorpusConfig,
  CorpusHandlers,
  CorpusOptions,
  CorpusSummary,
  Fetcher,
  SiteConfig,
  Sleeper,
} from './types.js';
import { reportCorpusError } from './util/errorHandler.js';
import {
  flushOutputBuffers,
  resetOutputConfig,
  setOutputConfig,
  writeRunComplete,
  writeSiteStart,
} from './util/output.js';

const DEFAULT_OPTIONS: CorpusOptions = {
  outputDir: 'recipes_corpus',
  targetPerSite: 150,
  timeoutMs: 10_000,
  retry: DEFAULT_RETRY_POLICY,
  delay: { minMs: 800, maxMs: 1_800 },
  progressEvery: 1_000,
  maxAttemptsPerSite: 100_000,
  siteConcurrency: 1,
  userAgent: DEFAULT_USER_AGENT,
  quiet: false,
  logLevel: 'silent',
  sites: DEFAULT_SITES,
};

/** Test seams; production runs use the real network and timers. */
export interface CorpusRuntime {
  fetcher?: Fetcher;
  sleep?: Sleeper;
  random?: () => number;
}

/**
 * Runs one walker per configured site, then rebuilds every summary file from
 * the ledgers. A fatal error in any site halts the run.
 */
export async function collectCorpus(
  config: CorpusConfig = {},
  runtime: CorpusRuntime = {},
): Promise<CorpusSummary> {
  const options = resolveOptions(config);
  const handlers: CorpusHandlers = {
    ...createDefaultHandlers(),
    ...(config.handlers ?? {}),
  };

  if (config.logLevel !== undefined) {
    configureLogger({ level: options.logLevel });
  }
  setOutputConfig({ quiet: options.quiet });

  const logger = getLogger();
  const ledger = new LedgerStore(options.outputDir);
  const fetcher =
    runtime.fetcher ??
    createFetcher({
      timeoutMs: options.timeoutMs,
      retry: options.retry,
      userAgent: options.userAgent,
      sleep: runtime.sleep,
    });
  const limit = pLimit(options.siteConcurrency);
  const activeWalkers = new Set<SiteWalker>();
  const summary: CorpusSummary = {};
  const outcome: { failure?: CorpusError } = {};

  logger.info(
    { outputDir: options.outputDir, sites: options.sites.map((site) => site.key) },
    'starting corpus collection',
  );

  const runSite = async (site: SiteConfig): Promise<void> => {
    if (outcome.failure) {
      return;
    }

    writeSiteStart(site.key);
    const walker = new SiteWalker(
      site,
      {
        fetcher,
        ledger,
        outputDir: options.outputDir,
        sleep: runtime.sleep,
        random: runtime.random,
        handlers,
      },
      {
        target: options.targetPerSite,
        delay: options.delay,
        progressEvery: options.progressEvery,
        maxAttempts: options.maxAttemptsPerSite,
      },
    );
    activeWalkers.add(walker);

    try {
      const result = await walker.run();
      const stats = computeStats(result.records);
      writeSiteSummaryFiles(options.outputDir, site.key, result.records, stats);
      summary[site.key] = { metaCount: result.records.length, stats };
      handlers.onSiteComplete?.(result, stats);
    } catch (error) {
      if (!outcome.failure) {
        outcome.failure = toSiteFailure(error, site.key, walker.currentPhase);
        reportCorpusError(outcome.failure, {}, { throwOnFatal: false });
        for (const other of activeWalkers) {
          other.cancel();
        }
      }
    } finally {
      activeWalkers.delete(walker);
    }
  };

  try {
    await Promise.all(options.sites.map((site) => limit(() => runSite(site))));

    if (outcome.failure) {
      throw outcome.failure;
    }

    const ordered = orderSummary(options.sites, summary);
    writeOverallSummary(options.outputDir, ordered);
    handlers.onComplete?.(ordered);
    if (!config.handlers?.onComplete) {
      writeRunComplete(path.resolve(options.outputDir));
    }

    return ordered;
  } finally {
    flushOutputBuffers();
    resetOutputConfig();
  }
}

/** Re-labels a walk failure so the message names the site and the stage it died in. */
function toSiteFailure(error: unknown, siteKey: string, phase: string): CorpusError {
  const cause = ensureCorpusError(error, { kind: 'internal', severity: 'fatal' });
  const stage = stageOf(cause.details) ?? phase;

  return new CorpusError({
    message: `Site ${siteKey} failed during ${stage}: ${cause.message}`,
    kind: cause.kind,
    severity: 'fatal',
    details: { ...(cause.details ?? {}), site: siteKey, stage },
    cause,
  });
}

export function resolveOptions(config: CorpusConfig): CorpusOptions {
  const options: CorpusOptions = {
    outputDir: config.outputDir ?? DEFAULT_OPTIONS.outputDir,
    targetPerSite: coercePositiveInteger(
      config.targetPerSite ?? DEFAULT_OPTIONS.targetPerSite,
      'target',
    ),
    timeoutMs: coercePositiveInteger(config.timeoutMs ?? DEFAULT_OPTIONS.timeoutMs, 'timeout-ms'),
    retry: {
      maxAttempts: coercePositiveInteger(
        config.retry?.maxAttempts ?? DEFAULT_OPTIONS.retry.maxAttempts,
        'retry.maxAttempts',
      ),
      initialBackoffMs: coerceNonNegativeInteger(
        config.retry?.initialBackoffMs ?? DEFAULT_OPTIONS.retry.initialBackoffMs,
        'retry.initialBackoffMs',
      ),
      backoffFactor: config.retry?.backoffFactor ?? DEFAULT_OPTIONS.retry.backoffFactor,
    },
    delay: {
      minMs: coerceNonNegativeInteger(config.delay?.minMs ?? DEFAULT_OPTIONS.delay.minMs, 'min-delay-ms'),
      maxMs: coerceNonNegativeInteger(config.delay?.maxMs ?? DEFAULT_OPTIONS.delay.maxMs, 'max-delay-ms'),
    },
    progressEvery: coercePositiveInteger(
      config.progressEvery ?? DEFAULT_OPTIONS.progressEvery,
      'progress-every',
    ),
    maxAttemptsPerSite: coercePositiveInteger(
      config.maxAttemptsPerSite ?? DEFAULT_OPTIONS.maxAttemptsPerSite,
      'max-attempts',
    ),
    siteConcurrency: coercePositiveInteger(
      config.siteConcurrency ?? DEFAULT_OPTIONS.siteConcurrency,
      'site-concurrency',
    ),
    userAgent: config.userAgent ?? DEFAULT_OPTIONS.userAgent,
    quiet: config.quiet ?? DEFAULT_OPTIONS.quiet,
    logLevel: config.logLevel ?? DEFAULT_OPTIONS.logLevel,
    sites: selectSites(config.sites ?? DEFAULT_OPTIONS.sites, config.siteFilter),
  };

  if (!Number.isFinite(options.retry.backoffFactor) || options.retry.backoffFactor <= 1) {
    throw createConfigurationError('retry.backoffFactor must be greater than 1.', {
      value: options.retry.backoffFactor,
    });
  }

  if (options.delay.minMs > options.delay.maxMs) {
    throw createConfigurationError('min-delay-ms must not exceed max-delay-ms.', {
      minMs: options.delay.minMs,
      maxMs: options.delay.maxMs,
    });
  }

  return Object.freeze(options);
}

export function validateSite(site: SiteConfig): SiteConfig {
  if (!/^[A-Za-z0-9_-]+$/.test(site.key)) {
    throw createConfigurationError(`Invalid site key: ${site.key}`, { site: site.key });
  }

  if (countPlaceholders(site.urlTemplate) !== 1) {
    throw createConfigurationError('URL template must contain exactly one {} placeholder.', {
      site: site.key,
      urlTemplate: site.urlTemplate,
    });
  }

  let protocol: string;
  try {
    protocol = new URL(site.urlTemplate.replace(/\{(?:id)?\}/, '0')).protocol;
  } catch {
    throw createConfigurationError(`Invalid URL template: ${site.urlTemplate}`, { site: site.key });
  }

  if (protocol !== 'http:' && protocol !== 'https:') {
    throw createConfigurationError('URL template must use http or https protocol.', {
      site: site.key,
      protocol,
    });
  }

  if (!Number.isInteger(site.step) || site.step === 0) {
    throw createConfigurationError('step must be a non-zero integer.', {
      site: site.key,
      step: site.step,
    });
  }

  const startId = coerceNonNegativeInteger(site.startId, `${site.key}.startId`);
  const maxId =
    site.maxId === undefined ? undefined : coerceNonNegativeInteger(site.maxId, `${site.key}.maxId`);
  if (maxId !== undefined && startId > maxId) {
    throw createConfigurationError('startId must not exceed maxId.', {
      site: site.key,
      startId,
      maxId,
    });
  }

  if (site.classifier.minBytes < 0 || site.classifier.fallbackBytes < site.classifier.minBytes) {
    throw createConfigurationError('Classifier thresholds must satisfy 0 <= minBytes <= fallbackBytes.', {
      site: site.key,
      minBytes: site.classifier.minBytes,
      fallbackBytes: site.classifier.fallbackBytes,
    });
  }

  return Object.freeze({
    ...site,
    startId,
    ...(maxId === undefined ? {} : { maxId }),
    classifier: Object.freeze({ ...site.classifier, keywords: [...site.classifier.keywords] }),
  });
}

function selectSites(
  sites: readonly SiteConfig[],
  filter: readonly string[] | undefined,
): readonly SiteConfig[] {
  const validated = sites.map(validateSite);
  const keys = new Set<string>();
  for (const site of validated) {
    if (keys.has(site.key)) {
      throw createConfigurationError(`Duplicate site key: ${site.key}`, { site: site.key });
    }
    keys.add(site.key);
  }

  if (!filter || filter.length === 0) {
    return validated;
  }

  for (const key of filter) {
    if (!keys.has(key)) {
      throw createConfigurationError(`Unknown site: ${key}`, { site: key, known: [...keys] });
    }
  }

  return validated.filter((site) => filter.includes(site.key));
}

function orderSummary(sites: readonly SiteConfig[], summary: CorpusSummary): CorpusSummary {
  const ordered: CorpusSummary = {};
  for (const site of sites) {
    const entry = summary[site.key];
    if (entry) {
      ordered[site.key] = entry;
    }
  }
  return ordered;
}

function stageOf(details: Record<string, unknown> | undefined): string | undefined {
  const stage = details?.stage;
  return typeof stage === 'string' ? stage : undefined;
}

function coercePositiveInteger(value: number, field: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw createConfigurationError(`${field} must be a positive integer.`, { value, field });
  }

  return Math.trunc(value);
}

function coerceNonNegativeInteger(value: number, field: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw createConfigurationError(`${field} must be zero or a positive integer.`, { value, field });
  }

  return Math.trunc(value);
}

export { DEFAULT_OPTIONS };
export { loadConfig } from './config/loadConfig.js';
export { SiteWalker } from './crawler/walk.js';
export { LedgerStore } from './crawler/state/ledger.js';
export { fetchPageWithRetry } from './crawler/network/fetchPageWithRetry.js';
export { isLikelyDocument } from './crawler/classify/isLikelyDocument.js';
export { extractText } from './crawler/parsing/extractText.js';
export { computeStats } from './crawler/reporting/stats.js';
export type {
  CorpusConfig,
  CorpusHandlers,
  CorpusOptions,
  CorpusSummary,
  DocumentRecord,
  FetchResult,
  SiteConfig,
  SiteWalkResult,
  SummaryStats,
} from './types.js';
