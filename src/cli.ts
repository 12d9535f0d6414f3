#!/usr/bin/env node
import { createRequire } from 'node:module';
import { Command } from 'commander';

import { loadConfig, parseLogLevel } from './config/loadConfig.js';
import { createConfigurationError, ensureCorpusError } from './errors.js';
import { collectCorpus } from './index.js';
import { configureLogger } from './logger.js';
import type { CorpusConfig } from './types.js';
import { logError } from './util/output.js';

const require = createRequire(import.meta.url);
// eslint-disable-next-line @typescript-eslint/no-var-requires -- package.json access for CLI metadata
const pkg = require('../package.json') as { version?: string };

const program = new Command();

program
  .name('recipe-corpus')
  .description('Collect a recipe text corpus by walking numeric page identifiers.')
  .version(pkg.version ?? '0.0.0');

program
  .command('collect')
  .description('Walk every configured site until each holds the target number of documents.')
  .option('--config <path>', 'JSON file with options and site definitions.')
  .option('--output-dir <path>', 'Corpus root directory. (default: recipes_corpus)')
  .option('--target <number>', 'Documents to collect per site. (default: 150)')
  .option('--site <key...>', 'Only walk the named sites.')
  .option('--timeout-ms <number>', 'Timeout per request attempt in milliseconds. (default: 10000)')
  .option('--retries <number>', 'Attempts per URL before giving up on transport errors. (default: 3)')
  .option('--max-attempts <number>', 'Upper bound on fetches per site in one run. (default: 100000)')
  .option('--min-delay-ms <number>', 'Lower bound of the pause after each fetch. (default: 800)')
  .option('--max-delay-ms <number>', 'Upper bound of the pause after each fetch. (default: 1800)')
  .option('--site-concurrency <number>', 'Sites walked at the same time. (default: 1)')
  .option('--quiet', 'Replace per-document lines with a single progress line.')
  .option('--log-level <level>', 'Set log verbosity (pino levels: trace|debug|info|warn|error|fatal|silent).')
  .action(async (options: Record<string, unknown>) => {
    try {
      const config = buildConfig(options);
      configureLogger({ level: config.logLevel ?? 'info' });
      await collectCorpus(config);
    } catch (error) {
      reportCliError(error);
    }
  });

await program.parseAsync(process.argv);

function buildConfig(rawOptions: Record<string, unknown>): CorpusConfig {
  const configPath = rawOptions.config === undefined ? undefined : String(rawOptions.config);
  const config: CorpusConfig = { ...loadConfig(configPath) };

  if (rawOptions.outputDir !== undefined) {
    config.outputDir = String(rawOptions.outputDir);
  }

  if (rawOptions.target !== undefined) {
    config.targetPerSite = asNumber(rawOptions.target, 'target');
  }

  if (Array.isArray(rawOptions.site)) {
    config.siteFilter = rawOptions.site.map((key) => String(key));
  }

  if (rawOptions.timeoutMs !== undefined) {
    config.timeoutMs = asNumber(rawOptions.timeoutMs, 'timeout-ms');
  }

  if (rawOptions.retries !== undefined) {
    config.retry = { ...config.retry, maxAttempts: asNumber(rawOptions.retries, 'retries') };
  }

  if (rawOptions.maxAttempts !== undefined) {
    config.maxAttemptsPerSite = asNumber(rawOptions.maxAttempts, 'max-attempts');
  }

  if (rawOptions.minDelayMs !== undefined) {
    config.delay = { ...config.delay, minMs: asNumber(rawOptions.minDelayMs, 'min-delay-ms') };
  }

  if (rawOptions.maxDelayMs !== undefined) {
    config.delay = { ...config.delay, maxMs: asNumber(rawOptions.maxDelayMs, 'max-delay-ms') };
  }

  if (rawOptions.siteConcurrency !== undefined) {
    config.siteConcurrency = asNumber(rawOptions.siteConcurrency, 'site-concurrency');
  }

  if (rawOptions.quiet === true) {
    config.quiet = true;
  }

  if (rawOptions.logLevel !== undefined) {
    config.logLevel = parseLogLevel(String(rawOptions.logLevel));
  }

  return config;
}

function asNumber(value: unknown, label: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw createConfigurationError(`${label} must be a finite number.`, { value });
  }

  return parsed;
}

// Site failures were already logged with their bindings; print the message once.
function reportCliError(error: unknown): void {
  const corpusError = ensureCorpusError(error, { kind: 'internal', severity: 'fatal' });
  logError(`Error: ${corpusError.message}`);
  process.exitCode = 1;
}
