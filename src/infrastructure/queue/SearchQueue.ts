import {
  JobSnapshot,
  SearchJob,
  createSearchJob,
  isTerminal,
  jobIdOf,
  snapshotOf,
} from '../../core/entities/SearchJob.js';
import { EngineShutdownError, errorMessage } from '../../core/errors.js';
import { RunnableTask } from '../../application/services/SearchTask.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { HistoryCache } from './HistoryCache.js';

export type TaskFactory = (job: SearchJob) => RunnableTask;

export interface SearchQueueOptions {
  maxWorkers: number;
  historyCapacity: number;
}

export interface PoolStats {
  runningCount: number;
  pendingCount: number;
  completedCount: number;
  capacity: number;
  maxWorkers: number;
  runningIds: string[];
  completedIds: string[];
}

interface Execution {
  task: RunnableTask;
  done: Promise<void>;
}

/**
 * Registry of search jobs plus a fixed set of worker slots.
 *
 * A job is in the running set from submit until it finishes, then in history.
 * Every method that touches the registry runs without awaiting, so each one is a
 * single uninterrupted step on the event loop.
 */
export class SearchQueue {
  private pending: SearchJob[] = [];
  private active: Map<string, SearchJob> = new Map();
  private executions: Map<string, Execution> = new Map();
  private freeWorkers: string[];
  private history: HistoryCache<JobSnapshot>;
  private accepting = true;
  readonly maxWorkers: number;

  /**
   * Callback for when a job reaches history
   */
  jobFinishedCallback?: (snapshot: JobSnapshot) => void;

  constructor(
    private createTask: TaskFactory,
    options: SearchQueueOptions,
    private logger: Logger = silentLogger
  ) {
    this.maxWorkers = options.maxWorkers;
    this.freeWorkers = Array.from({ length: options.maxWorkers }, (_, i) => `worker-${i + 1}`);
    this.history = new HistoryCache<JobSnapshot>(options.historyCapacity);
  }

  /**
   * Queue a job, or return the id of the one already running for this identity
   */
  submit(sourceUrl: string, clientId: string, searchId: string): string {
    if (!this.accepting) {
      throw new EngineShutdownError();
    }

    const id = jobIdOf(clientId, searchId);
    if (this.active.has(id)) {
      this.logger.warn(`Job ${id} is already running`);
      return id;
    }

    const job = createSearchJob(sourceUrl, clientId, searchId);
    this.active.set(id, job);
    this.pending.push(job);
    this.logger.info(`Job ${id} queued (${this.pending.length} pending)`);

    this.processQueue();
    return id;
  }

  getStatus(clientId: string, searchId: string): JobSnapshot | null {
    const id = jobIdOf(clientId, searchId);
    const job = this.active.get(id);
    if (job) {
      return snapshotOf(job);
    }
    return this.history.get(id);
  }

  /**
   * Only a job no worker has claimed yet can be cancelled
   */
  cancel(clientId: string, searchId: string): boolean {
    const id = jobIdOf(clientId, searchId);
    const index = this.pending.findIndex((job) => job.id === id);
    if (index === -1) {
      return false;
    }

    this.pending.splice(index, 1);
    this.active.delete(id);
    this.logger.info(`Job ${id} cancelled before start`);
    return true;
  }

  recentCompleted(limit = 0): JobSnapshot[] {
    return this.history.recent(limit);
  }

  poolStats(): PoolStats {
    return {
      runningCount: this.active.size,
      pendingCount: this.pending.length,
      completedCount: this.history.size,
      capacity: this.history.capacity,
      maxWorkers: this.maxWorkers,
      runningIds: Array.from(this.active.keys()),
      completedIds: this.history.keys(),
    };
  }

  isAccepting(): boolean {
    return this.accepting;
  }

  /**
   * Stop taking work. Queued jobs are dropped. With `wait`, resolves after every
   * executing job has finished; otherwise their page sessions are released and
   * the call returns straight away.
   */
  async shutdown(options: { wait: boolean } = { wait: true }): Promise<void> {
    this.accepting = false;

    for (const job of this.pending.splice(0)) {
      this.active.delete(job.id);
    }

    const executions = Array.from(this.executions.values());
    this.logger.info(`Shutting down with ${executions.length} executing job(s), wait=${options.wait}`);

    if (options.wait) {
      await Promise.all(executions.map((execution) => execution.done));
      return;
    }

    await Promise.all(executions.map((execution) => execution.task.release()));
  }

  attachJobFinished(callback: (snapshot: JobSnapshot) => void): void {
    this.jobFinishedCallback = callback;
  }

  private processQueue(): void {
    while (this.accepting && this.pending.length > 0 && this.freeWorkers.length > 0) {
      const job = this.pending.shift();
      const workerId = this.freeWorkers.shift();
      if (!job || !workerId) {
        break;
      }

      job.workerId = workerId;
      let task: RunnableTask;
      try {
        task = this.createTask(job);
      } catch (error) {
        this.fail(job, workerId, error);
        this.finish(job, workerId);
        continue;
      }
      const done = this.execute(job, task, workerId);
      this.executions.set(job.id, { task, done });
    }
  }

  private async execute(job: SearchJob, task: RunnableTask, workerId: string): Promise<void> {
    try {
      await task.run();
    } catch (error) {
      // run() settles its own job; reaching here means the task itself broke
      this.fail(job, workerId, error);
    }
    this.finish(job, workerId);
  }

  private fail(job: SearchJob, workerId: string, error: unknown): void {
    this.logger.error(`Job ${job.id} crashed on ${workerId}: ${errorMessage(error)}`);
    if (!isTerminal(job.status)) {
      job.status = 'error';
      job.errorMessage = errorMessage(error);
      job.completedTime = new Date();
    }
  }

  private finish(job: SearchJob, workerId: string): void {
    const snapshot = snapshotOf(job);

    this.active.delete(job.id);
    this.executions.delete(job.id);
    const evicted = this.history.add(job.id, snapshot);
    this.freeWorkers.push(workerId);

    this.logger.info(`Job ${job.id} finished on ${workerId} with status ${job.status}`);
    if (evicted.length > 0) {
      this.logger.debug(`Evicted from history: ${evicted.join(', ')}`);
    }

    if (this.jobFinishedCallback) {
      try {
        this.jobFinishedCallback(snapshot);
      } catch (error) {
        this.logger.error(`Job finished callback failed for ${job.id}: ${errorMessage(error)}`);
      }
    }

    this.processQueue();
  }
}
