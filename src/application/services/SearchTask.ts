import { PaperRecord } from '../../core/entities/Paper.js';
import { JobEventKind, JobStatus, SearchJob, isTerminal, snapshotOf } from '../../core/entities/SearchJob.js';
import { IPageSession, IPageSessionFactory } from '../../core/interfaces/IPageSession.js';
import { IProgressPublisher } from '../../core/interfaces/IProgressPublisher.js';
import {
  DiscoveryError,
  ExtractionSkip,
  PublishFailure,
  SessionClosedError,
  SessionInitError,
  errorMessage,
} from '../../core/errors.js';
import { PaperExtractor } from '../../core/extraction/PaperExtractor.js';
import { ProfileDiscovery } from '../../core/extraction/ProfileDiscovery.js';
import { SUBJECT_NAME_SELECTORS, ITEM_ROW_SELECTORS } from '../../core/extraction/selectors.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { round2, sleep, withTimeout } from '../../utils/timing.js';

export const COLLECTED_INFO_PROGRESS = 25;
const ITEMS_PROGRESS_SPAN = 70;
const DEFAULT_PUBLISH_TIMEOUT_MS = 5000;

export interface SearchTaskTiming {
  waitTimeoutMs: number;
  pageLoadDelayMs: number;
  itemDelayMs: number;
  /** Longest wait for one push before the pipeline moves on */
  publishTimeoutMs?: number;
}

export interface SearchTaskDependencies {
  sessionFactory: IPageSessionFactory;
  publisher: IProgressPublisher;
  discovery: ProfileDiscovery;
  extractor: PaperExtractor;
  timing: SearchTaskTiming;
  logger?: Logger;
}

/**
 * Something the queue can run on a worker slot
 */
export interface RunnableTask {
  /** Never rejects; the job ends in a terminal status */
  run(): Promise<void>;
  /** Releases held resources from outside, e.g. on shutdown */
  release(): Promise<void>;
}

type Outcome = { status: 'completed' } | { status: 'error'; message: string };

/**
 * Drives one search job through its stages:
 * pending -> collecting_info -> collected_info -> searching_papers -> completed,
 * with error reachable from any non-terminal stage.
 *
 * The task is the job's only writer. It owns one page session for the whole run
 * and closes it before the terminal status is applied or published.
 */
export class SearchTask implements RunnableTask {
  private session: IPageSession | null = null;
  private released = false;
  private logger: Logger;

  constructor(
    private job: SearchJob,
    private deps: SearchTaskDependencies
  ) {
    this.logger = deps.logger ?? silentLogger;
  }

  async run(): Promise<void> {
    // Synchronous on pickup: from here on the job can no longer be cancelled
    this.transition('collecting_info');
    this.logger.info(`Job ${this.job.id} picked up by ${this.job.workerId ?? 'unknown worker'}`);
    await this.publish('job_progress');

    let outcome: Outcome;
    try {
      this.session = await this.openSession();
      await this.collectInfo(this.session);
      await this.publish('job_progress');
      await this.searchItems(this.session);
      outcome = { status: 'completed' };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`Job ${this.job.id} failed: ${message}`);
      outcome = { status: 'error', message };
    } finally {
      await this.closeSession();
    }

    this.finish(outcome);
    await this.publish(outcome.status === 'completed' ? 'job_completed' : 'job_failed');
  }

  async release(): Promise<void> {
    this.released = true;
    await this.closeSession();
  }

  private async closeSession(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (!session) {
      return;
    }

    try {
      await session.close();
      this.logger.debug(`Job ${this.job.id} page session closed`);
    } catch (error) {
      this.logger.warn(`Job ${this.job.id} failed to close page session: ${errorMessage(error)}`);
    }
  }

  private async openSession(): Promise<IPageSession> {
    let session: IPageSession;
    try {
      session = await this.deps.sessionFactory.open();
    } catch (error) {
      throw new SessionInitError(`Failed to open page session: ${errorMessage(error)}`, { cause: error });
    }

    // Released while the session was opening
    if (this.released) {
      await session.close();
      throw new SessionClosedError();
    }
    return session;
  }

  private async collectInfo(session: IPageSession): Promise<void> {
    const { discovery, timing } = this.deps;
    const url = this.job.sourceUrl;

    try {
      await session.navigate(url);
    } catch (error) {
      throw new DiscoveryError(`Failed to load ${url}: ${errorMessage(error)}`, { cause: error });
    }
    await sleep(timing.pageLoadDelayMs);

    const ready = await session.waitUntil(
      async () => (await session.findFirst([...SUBJECT_NAME_SELECTORS, ...ITEM_ROW_SELECTORS])) !== null,
      timing.waitTimeoutMs
    );
    if (!ready) {
      this.logger.warn(`Job ${this.job.id}: profile content did not appear within ${timing.waitTimeoutMs}ms`);
    }

    const subjectName = await discovery.resolveSubjectName(session);
    if (!subjectName) {
      throw new DiscoveryError(`Could not resolve the subject name on ${url}`);
    }
    this.job.subjectName = subjectName;
    this.logger.info(`Job ${this.job.id}: subject is "${subjectName}"`);
    await this.publish('job_progress');

    await discovery.sortByYear(session);
    await discovery.loadAllItems(session);

    const itemUrls = await discovery.collectItemUrls(session);
    if (itemUrls.length === 0) {
      throw new DiscoveryError(`No item links found on ${url}`);
    }

    this.job.itemUrls = itemUrls;
    this.job.totalCount = itemUrls.length;
    this.job.fetchedCount = 0;
    this.transition('collected_info', COLLECTED_INFO_PROGRESS);
    this.logger.info(`Job ${this.job.id}: discovered ${itemUrls.length} items`);
  }

  private async searchItems(session: IPageSession): Promise<void> {
    const { itemUrls } = this.job;
    const total = itemUrls.length;
    this.transition('searching_papers');

    for (const [index, itemUrl] of itemUrls.entries()) {
      this.job.fetchedCount = index + 1;
      this.setProgress(round2(COLLECTED_INFO_PROGRESS + ((index + 1) / total) * ITEMS_PROGRESS_SPAN));

      try {
        const record = await this.extractItem(session, itemUrl);
        if (record) {
          this.job.items.push(record);
          this.logger.debug(`Job ${this.job.id}: [${index + 1}/${total}] ${record.title.slice(0, 50)}`);
        } else {
          this.job.skippedCount++;
          this.logger.warn(`Job ${this.job.id}: [${index + 1}/${total}] no record extracted from ${itemUrl}`);
        }
      } catch (error) {
        // A released session ends the run; nothing after it can be fetched
        if (error instanceof SessionClosedError) {
          throw error;
        }
        this.job.skippedCount++;
        const skip = error instanceof ExtractionSkip ? error : new ExtractionSkip(itemUrl, errorMessage(error));
        this.logger.warn(`Job ${this.job.id}: [${index + 1}/${total}] skipped ${skip.itemUrl}: ${skip.message}`);
      }

      await this.publish('job_progress');
    }
  }

  private async extractItem(session: IPageSession, itemUrl: string): Promise<PaperRecord | null> {
    try {
      await session.navigate(itemUrl);
    } catch (error) {
      if (error instanceof SessionClosedError) {
        throw error;
      }
      throw new ExtractionSkip(itemUrl, `navigation failed: ${errorMessage(error)}`, { cause: error });
    }
    await sleep(this.deps.timing.itemDelayMs);
    return this.deps.extractor.extract(session, itemUrl);
  }

  private finish(outcome: Outcome): void {
    this.job.completedTime = new Date();
    if (outcome.status === 'completed') {
      this.transition('completed', 100);
    } else {
      this.job.errorMessage = outcome.message;
      this.transition('error');
    }
  }

  private transition(status: JobStatus, progress?: number): void {
    if (isTerminal(this.job.status)) {
      throw new Error(`Job ${this.job.id} is already ${this.job.status}`);
    }
    this.job.status = status;
    if (progress !== undefined) {
      this.setProgress(progress);
    }
  }

  private setProgress(progress: number): void {
    this.job.progress = Math.min(100, Math.max(this.job.progress, progress));
  }

  /**
   * Push failures never reach the pipeline
   */
  private async publish(event: JobEventKind): Promise<void> {
    const { clientId, id } = this.job;
    try {
      const delivered = await withTimeout(
        this.deps.publisher.publish(event, snapshotOf(this.job), clientId),
        this.deps.timing.publishTimeoutMs ?? DEFAULT_PUBLISH_TIMEOUT_MS,
        `Publishing ${event}`
      );
      if (!delivered) {
        this.logger.debug(`Job ${id}: ${event} not delivered to client ${clientId}`);
      }
    } catch (error) {
      const failure = new PublishFailure(`Publishing ${event} for job ${id} failed: ${errorMessage(error)}`, {
        cause: error,
      });
      this.logger.warn(failure.message);
    }
  }
}
