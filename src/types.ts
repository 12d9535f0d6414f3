export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface ClassifierRules {
  minBytes: number;
  fallbackBytes: number;
  keywords: readonly string[];
}

export interface SiteConfig {
  key: string;
  urlTemplate: string;
  startId: number;
  step: number;
  classifier: ClassifierRules;
  maxId?: number;
}

/**
 * `body` is the decoded text and `raw` the bytes as received. Both are null
 * only when every attempt failed before any response arrived.
 */
export type FetchResult =
  | { status: number; body: string; raw: Buffer }
  | { status: null; body: null; raw: null };

export interface DocumentRecord {
  id: number;
  url: string;
  rawPath: string;
  textPath: string;
  rawSizeBytes: number;
  textSizeBytes: number;
  wordCount: number;
  statusCode: number;
}

export interface SiteState {
  seen: Set<number>;
  records: DocumentRecord[];
}

export type WalkPhase = 'seeking' | 'fetching' | 'classifying' | 'persisting' | 'throttling' | 'done';

export type StopReason = 'target-reached' | 'identifiers-exhausted' | 'attempt-limit' | 'cancelled';

export interface SiteWalkResult {
  siteKey: string;
  records: DocumentRecord[];
  attempts: number;
  found: number;
  skipped: number;
  stopReason: StopReason;
}

export interface SummaryStats {
  numDocuments: number;
  totalRawBytes: number;
  totalTextBytes: number;
  totalWords: number;
  avgRawBytes: number;
  avgTextBytes: number;
  avgWords: number;
  medianRawBytes: number;
  medianTextBytes: number;
  medianWords: number;
}

export interface SiteSummary {
  metaCount: number;
  stats: SummaryStats;
}

export type CorpusSummary = Record<string, SiteSummary>;

export interface RetryPolicy {
  maxAttempts: number;
  initialBackoffMs: number;
  backoffFactor: number;
}

export interface DelayRange {
  minMs: number;
  maxMs: number;
}

export interface CorpusOptions {
  outputDir: string;
  targetPerSite: number;
  timeoutMs: number;
  retry: RetryPolicy;
  delay: DelayRange;
  progressEvery: number;
  maxAttemptsPerSite: number;
  siteConcurrency: number;
  userAgent: string;
  quiet: boolean;
  logLevel: LogLevel;
  sites: readonly SiteConfig[];
}

export type Fetcher = (url: string) => Promise<FetchResult>;

export type Sleeper = (ms: number) => Promise<void>;

export interface CorpusHandlers {
  onDocument?(siteKey: string, record: DocumentRecord): void;
  onProgress?(progress: WalkProgress): void;
  onSiteComplete?(result: SiteWalkResult, stats: SummaryStats): void;
  onComplete?(summary: CorpusSummary): void;
}

export type CorpusOverrides = Partial<Omit<CorpusOptions, 'retry' | 'delay'>> & {
  retry?: Partial<RetryPolicy>;
  delay?: Partial<DelayRange>;
};

export interface CorpusConfig extends CorpusOverrides {
  handlers?: CorpusHandlers;
  siteFilter?: readonly string[];
}

export interface WalkProgress {
  siteKey: string;
  attempts: number;
  found: number;
  target: number;
  currentId: number;
}
