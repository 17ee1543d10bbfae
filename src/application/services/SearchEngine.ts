import { JobSnapshot } from '../../core/entities/SearchJob.js';
import { IPageSessionFactory } from '../../core/interfaces/IPageSession.js';
import { IProgressPublisher } from '../../core/interfaces/IProgressPublisher.js';
import { PaperExtractor } from '../../core/extraction/PaperExtractor.js';
import { DiscoveryOptions, ProfileDiscovery } from '../../core/extraction/ProfileDiscovery.js';
import { PoolStats, SearchQueue } from '../../infrastructure/queue/SearchQueue.js';
import { Logger, createLogger } from '../../utils/logger.js';
import { SearchTask, SearchTaskTiming } from './SearchTask.js';

export interface SearchEngineOptions {
  maxWorkers: number;
  historyCapacity: number;
  timing: SearchTaskTiming;
  discovery: DiscoveryOptions;
  debug?: boolean;
}

export interface SearchEngineDependencies {
  sessionFactory: IPageSessionFactory;
  publisher: IProgressPublisher;
  /** Builds a tagged logger per component; defaults to console loggers */
  loggerFor?: (scope: string) => Logger;
}

/**
 * Service for submitting and observing search jobs
 */
export class SearchEngine {
  private queue: SearchQueue;

  constructor(options: SearchEngineOptions, deps: SearchEngineDependencies) {
    const loggerFor = deps.loggerFor ?? ((scope: string) => createLogger(scope, options.debug ?? false));
    const discovery = new ProfileDiscovery(options.discovery, loggerFor('ProfileDiscovery'));
    const extractor = new PaperExtractor(loggerFor('PaperExtractor'));
    const taskLogger = loggerFor('SearchTask');

    this.queue = new SearchQueue(
      (job) =>
        new SearchTask(job, {
          sessionFactory: deps.sessionFactory,
          publisher: deps.publisher,
          discovery,
          extractor,
          timing: options.timing,
          logger: taskLogger,
        }),
      { maxWorkers: options.maxWorkers, historyCapacity: options.historyCapacity },
      loggerFor('SearchQueue')
    );
  }

  /**
   * Submit a search; returns the job id
   */
  submit(sourceUrl: string, clientId: string, searchId: string): string {
    return this.queue.submit(sourceUrl, clientId, searchId);
  }

  getStatus(clientId: string, searchId: string): JobSnapshot | null {
    return this.queue.getStatus(clientId, searchId);
  }

  cancel(clientId: string, searchId: string): boolean {
    return this.queue.cancel(clientId, searchId);
  }

  recentCompleted(limit = 0): JobSnapshot[] {
    return this.queue.recentCompleted(limit);
  }

  poolStats(): PoolStats {
    return this.queue.poolStats();
  }

  isAccepting(): boolean {
    return this.queue.isAccepting();
  }

  /**
   * Attach a callback for when jobs land in history
   */
  onJobFinished(callback: (snapshot: JobSnapshot) => void): void {
    this.queue.attachJobFinished(callback);
  }

  shutdown(options: { wait: boolean } = { wait: true }): Promise<void> {
    return this.queue.shutdown(options);
  }
}
