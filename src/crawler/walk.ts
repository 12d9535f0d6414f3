import { ensureCorpusError } from '../errors.js';
import { getLogger, type LoggerLike } from '../logger.js';
import type {
  CorpusHandlers,
  DelayRange,
  DocumentRecord,
  Fetcher,
  SiteConfig,
  SiteState,
  SiteWalkResult,
  Sleeper,
  StopReason,
  WalkPhase,
} from '../types.js';
import { isLikelyDocument } from './classify/isLikelyDocument.js';
import { delay } from './network/fetchPageWithRetry.js';
import { countWords, extractText } from './parsing/extractText.js';
import { ensureSiteDirs, resolveSiteLayout, writeArtifacts, type SiteLayout } from './state/artifacts.js';
import { LedgerStore } from './state/ledger.js';
import { buildUrl } from './url/buildUrl.js';

export interface SiteWalkerDeps {
  fetcher: Fetcher;
  ledger: LedgerStore;
  outputDir: string;
  sleep?: Sleeper;
  random?: () => number;
  handlers?: CorpusHandlers;
  logger?: LoggerLike;
}

export interface SiteWalkerOptions {
  target: number;
  delay: DelayRange;
  progressEvery: number;
  maxAttempts: number;
}

/**
 * Walks one site's identifier space until the target number of documents is
 * on disk. Every step is sequential: fetch, classify, persist, throttle. The
 * seen-set loaded from the ledger gates which identifiers are fetched at all.
 */
export class SiteWalker {
  private readonly layout: SiteLayout;
  private readonly logger: LoggerLike;
  private readonly sleep: Sleeper;
  private readonly random: () => number;
  private readonly sigintHandler = (): void => {
    this.cancelled = true;
  };
  private sigintAttached = false;
  private cancelled = false;
  private phase: WalkPhase = 'seeking';
  private attempts = 0;
  private skipped = 0;

  constructor(
    private readonly site: SiteConfig,
    private readonly deps: SiteWalkerDeps,
    private readonly options: SiteWalkerOptions,
  ) {
    this.layout = resolveSiteLayout(deps.outputDir, site.key);
    this.logger = (deps.logger ?? getLogger()).child({ site: site.key });
    this.sleep = deps.sleep ?? delay;
    this.random = deps.random ?? Math.random;
  }

  get currentPhase(): WalkPhase {
    return this.phase;
  }

  cancel(): void {
    this.cancelled = true;
  }

  async run(): Promise<SiteWalkResult> {
    const state = this.deps.ledger.load(this.site.key);
    ensureSiteDirs(this.layout);

    this.logger.info(
      { resumed: state.records.length, target: this.options.target, startId: this.site.startId },
      'starting site walk',
    );

    this.attachSignalHandler();
    try {
      const stopReason = await this.walk(state);
      this.phase = 'done';
      this.logger.info(
        { stopReason, attempts: this.attempts, found: state.records.length, skipped: this.skipped },
        'site walk finished',
      );

      return {
        siteKey: this.site.key,
        records: state.records,
        attempts: this.attempts,
        found: state.records.length,
        skipped: this.skipped,
        stopReason,
      };
    } finally {
      this.detachSignalHandler();
    }
  }

  private async walk(state: SiteState): Promise<StopReason> {
    let candidate = this.site.startId;

    for (;;) {
      this.phase = 'seeking';

      if (state.records.length >= this.options.target) {
        return 'target-reached';
      }
      if (this.cancelled) {
        return 'cancelled';
      }
      if (this.attempts >= this.options.maxAttempts) {
        return 'attempt-limit';
      }
      if (!this.inBounds(candidate)) {
        return 'identifiers-exhausted';
      }

      if (state.seen.has(candidate)) {
        this.skipped += 1;
        candidate += this.site.step;
        continue;
      }

      await this.attempt(candidate, state);
      await this.throttle();
      candidate += this.site.step;
    }
  }

  private async attempt(id: number, state: SiteState): Promise<void> {
    const url = buildUrl(this.site.urlTemplate, id);

    try {
      this.phase = 'fetching';
      const result = await this.deps.fetcher(url);
      this.attempts += 1;

      if (result.status === 200 && result.body) {
        this.phase = 'classifying';
        if (isLikelyDocument(result.body, this.site.classifier)) {
          this.phase = 'persisting';
          const record = this.persist(id, url, result.body, result.raw, result.status);
          state.seen.add(id);
          state.records.push(record);
          this.deps.handlers?.onDocument?.(this.site.key, record);
        } else {
          this.logger.debug({ id, url }, 'rejected by classifier');
        }
      } else {
        this.logger.debug({ id, url, status: result.status }, 'no document');
      }
    } catch (error) {
      throw ensureCorpusError(error, {
        kind: 'internal',
        severity: 'fatal',
        details: { site: this.site.key, stage: this.phase, id, url },
      });
    }

    this.reportProgress(id, state);
  }

  private persist(
    id: number,
    url: string,
    body: string,
    raw: Buffer,
    status: number,
  ): DocumentRecord {
    const text = extractText(body);
    const artifacts = writeArtifacts(this.layout, id, raw, text);
    const record: DocumentRecord = {
      id,
      url,
      ...artifacts,
      wordCount: countWords(text),
      statusCode: status,
    };

    // Artifacts first: a ledger line must never point at a missing file.
    this.deps.ledger.append(this.site.key, record);
    return record;
  }

  private async throttle(): Promise<void> {
    this.phase = 'throttling';
    const { minMs, maxMs } = this.options.delay;
    await this.sleep(minMs + this.random() * (maxMs - minMs));
  }

  private reportProgress(id: number, state: SiteState): void {
    const found = state.records.length;

    this.deps.handlers?.onProgress?.({
      siteKey: this.site.key,
      attempts: this.attempts,
      found,
      target: this.options.target,
      currentId: id,
    });

    if (this.attempts % this.options.progressEvery === 0) {
      this.logger.info({ attempts: this.attempts, found, currentId: id }, 'walk progress');
    }
  }

  private inBounds(id: number): boolean {
    if (id < 0) {
      return false;
    }
    return this.site.maxId === undefined || id <= this.site.maxId;
  }

  private attachSignalHandler(): void {
    if (typeof process.once === 'function') {
      process.once('SIGINT', this.sigintHandler);
      this.sigintAttached = true;
    }
  }

  private detachSignalHandler(): void {
    if (!this.sigintAttached) {
      return;
    }

    process.removeListener('SIGINT', this.sigintHandler);
    this.sigintAttached = false;
  }
}
