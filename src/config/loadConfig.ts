import fs from 'node:fs';
import path from 'node:path';

import { DEFAULT_CLASSIFIER_RULES } from '../crawler/classify/isLikelyDocument.js';
import { createConfigurationError } from '../errors.js';
import type { ClassifierRules, CorpusOverrides, LogLevel, SiteConfig } from '../types.js';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

type Fields = Map<string, unknown>;

/**
 * Reads overrides from an optional JSON file, then from CORPUS_* environment
 * variables. Values are only shape-checked here; range checks happen when the
 * options are resolved.
 */
export function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): CorpusOverrides {
  const fileConfig = readConfigFile(configPath);
  return applyEnvOverrides(fileConfig, env);
}

export function readConfigFile(configPath?: string): CorpusOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw createConfigurationError(`Config file not found: ${absolutePath}`, { configPath });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(absolutePath, 'utf8'));
  } catch (error) {
    throw createConfigurationError(
      `Config file is not valid JSON: ${absolutePath}`,
      { configPath },
      { cause: error },
    );
  }

  return parseConfigObject(parsed, absolutePath);
}

export function parseConfigObject(value: unknown, source = 'config'): CorpusOverrides {
  const fields = asFields(value, source);
  const overrides: CorpusOverrides = {};

  const outputDir = optionalString(fields, 'outputDir', source);
  if (outputDir !== undefined) {
    overrides.outputDir = outputDir;
  }

  const userAgent = optionalString(fields, 'userAgent', source);
  if (userAgent !== undefined) {
    overrides.userAgent = userAgent;
  }

  const targetPerSite = optionalNumber(fields, 'targetPerSite', source);
  if (targetPerSite !== undefined) {
    overrides.targetPerSite = targetPerSite;
  }

  const timeoutMs = optionalNumber(fields, 'timeoutMs', source);
  if (timeoutMs !== undefined) {
    overrides.timeoutMs = timeoutMs;
  }

  const progressEvery = optionalNumber(fields, 'progressEvery', source);
  if (progressEvery !== undefined) {
    overrides.progressEvery = progressEvery;
  }

  const maxAttemptsPerSite = optionalNumber(fields, 'maxAttemptsPerSite', source);
  if (maxAttemptsPerSite !== undefined) {
    overrides.maxAttemptsPerSite = maxAttemptsPerSite;
  }

  const siteConcurrency = optionalNumber(fields, 'siteConcurrency', source);
  if (siteConcurrency !== undefined) {
    overrides.siteConcurrency = siteConcurrency;
  }

  const quiet = fields.get('quiet');
  if (quiet !== undefined) {
    if (typeof quiet !== 'boolean') {
      throw createConfigurationError(`${source}: quiet must be a boolean.`, { value: quiet });
    }
    overrides.quiet = quiet;
  }

  const logLevel = optionalString(fields, 'logLevel', source);
  if (logLevel !== undefined) {
    overrides.logLevel = parseLogLevel(logLevel);
  }

  if (fields.has('retry')) {
    const retry = asFields(fields.get('retry'), `${source}.retry`);
    overrides.retry = {
      maxAttempts: optionalNumber(retry, 'maxAttempts', `${source}.retry`),
      initialBackoffMs: optionalNumber(retry, 'initialBackoffMs', `${source}.retry`),
      backoffFactor: optionalNumber(retry, 'backoffFactor', `${source}.retry`),
    };
  }

  if (fields.has('delay')) {
    const delay = asFields(fields.get('delay'), `${source}.delay`);
    overrides.delay = {
      minMs: optionalNumber(delay, 'minMs', `${source}.delay`),
      maxMs: optionalNumber(delay, 'maxMs', `${source}.delay`),
    };
  }

  if (fields.has('sites')) {
    const sites = fields.get('sites');
    if (!Array.isArray(sites)) {
      throw createConfigurationError(`${source}: sites must be an array.`, { value: sites });
    }
    overrides.sites = sites.map((site, index) => parseSite(site, `${source}.sites[${index}]`));
  }

  return overrides;
}

export function applyEnvOverrides(base: CorpusOverrides, env: NodeJS.ProcessEnv): CorpusOverrides {
  const merged: CorpusOverrides = { ...base };

  if (env.CORPUS_OUTPUT_DIR) {
    merged.outputDir = env.CORPUS_OUTPUT_DIR;
  }
  if (env.CORPUS_TARGET_PER_SITE) {
    merged.targetPerSite = parseEnvNumber('CORPUS_TARGET_PER_SITE', env.CORPUS_TARGET_PER_SITE);
  }
  if (env.CORPUS_TIMEOUT_MS) {
    merged.timeoutMs = parseEnvNumber('CORPUS_TIMEOUT_MS', env.CORPUS_TIMEOUT_MS);
  }
  if (env.CORPUS_LOG_LEVEL) {
    merged.logLevel = parseLogLevel(env.CORPUS_LOG_LEVEL);
  }

  return merged;
}

export function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value.trim().toLowerCase());
  if (!level) {
    throw createConfigurationError(`Unsupported log level: ${value}`, { value });
  }
  return level;
}

function parseSite(value: unknown, source: string): SiteConfig {
  const fields = asFields(value, source);
  const key = requiredString(fields, 'key', source);
  const urlTemplate = requiredString(fields, 'urlTemplate', source);
  const startId = optionalNumber(fields, 'startId', source);
  const step = optionalNumber(fields, 'step', source);

  if (startId === undefined || step === undefined) {
    throw createConfigurationError(`${source}: startId and step are required.`, { key });
  }

  const site: SiteConfig = {
    key,
    urlTemplate,
    startId,
    step,
    classifier: parseClassifier(fields.get('classifier'), `${source}.classifier`),
  };

  const maxId = optionalNumber(fields, 'maxId', source);
  if (maxId !== undefined) {
    site.maxId = maxId;
  }

  return site;
}

function parseClassifier(value: unknown, source: string): ClassifierRules {
  if (value === undefined) {
    return DEFAULT_CLASSIFIER_RULES;
  }

  const fields = asFields(value, source);
  let keywords = DEFAULT_CLASSIFIER_RULES.keywords;
  const rawKeywords = fields.get('keywords');
  if (rawKeywords !== undefined) {
    if (!isStringArray(rawKeywords)) {
      throw createConfigurationError(`${source}: keywords must be an array of strings.`, {
        value: rawKeywords,
      });
    }
    keywords = rawKeywords;
  }

  return {
    minBytes: optionalNumber(fields, 'minBytes', source) ?? DEFAULT_CLASSIFIER_RULES.minBytes,
    fallbackBytes:
      optionalNumber(fields, 'fallbackBytes', source) ?? DEFAULT_CLASSIFIER_RULES.fallbackBytes,
    keywords,
  };
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function asFields(value: unknown, source: string): Fields {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw createConfigurationError(`${source} must be a JSON object.`, { source });
  }
  return new Map<string, unknown>(Object.entries(value));
}

function optionalString(fields: Fields, key: string, source: string): string | undefined {
  const value = fields.get(key);
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw createConfigurationError(`${source}: ${key} must be a string.`, { key, value });
  }
  return value;
}

function requiredString(fields: Fields, key: string, source: string): string {
  const value = optionalString(fields, key, source);
  if (value === undefined) {
    throw createConfigurationError(`${source}: ${key} is required.`, { key });
  }
  return value;
}

function optionalNumber(fields: Fields, key: string, source: string): number | undefined {
  const value = fields.get(key);
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw createConfigurationError(`${source}: ${key} must be a finite number.`, { key, value });
  }
  return value;
}

function parseEnvNumber(name: string, raw: string): number {
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw createConfigurationError(`${name} must be a finite number.`, { value: raw });
  }
  return parsed;
}
