import { PaperRecord, WirePaperRecord, toWirePaper } from './Paper.js';

/**
 * Search job domain entity
 */
export type JobStatus =
  | 'pending'
  | 'collecting_info'
  | 'collected_info'
  | 'searching_papers'
  | 'completed'
  | 'error';

export type JobEventKind = 'job_progress' | 'job_completed' | 'job_failed';

export interface SearchJob {
  id: string;
  clientId: string;
  searchId: string;
  sourceUrl: string;
  subjectName: string;
  status: JobStatus;
  progress: number; // 0-100, never decreases
  fetchedCount: number | null;
  totalCount: number | null;
  skippedCount: number;
  itemUrls: string[];
  items: PaperRecord[];
  errorMessage: string | null;
  startTime: Date;
  completedTime: Date | null;
  workerId: string | null;
}

/**
 * Point-in-time copy of a job. Observers only ever see these.
 */
export type JobSnapshot = Readonly<Omit<SearchJob, 'itemUrls' | 'items'>> & {
  readonly itemUrls: readonly string[];
  readonly items: readonly PaperRecord[];
};

export interface WireJobSnapshot {
  job_id: string;
  client_id: string;
  search_id: string;
  source_url: string;
  subject_name: string;
  status: JobStatus;
  progress: number;
  fetched_count: number | null;
  total_count: number | null;
  skipped_count: number;
  item_urls: string[];
  items: WirePaperRecord[];
  error_message: string | null;
  start_time: string;
  completed_time: string | null;
  worker_id: string | null;
}

export function jobIdOf(clientId: string, searchId: string): string {
  return `${clientId}_${searchId}`;
}

export function isTerminal(status: JobStatus): boolean {
  return status === 'completed' || status === 'error';
}

export function createSearchJob(sourceUrl: string, clientId: string, searchId: string): SearchJob {
  return {
    id: jobIdOf(clientId, searchId),
    clientId,
    searchId,
    sourceUrl,
    subjectName: '',
    status: 'pending',
    progress: 0,
    fetchedCount: null,
    totalCount: null,
    skippedCount: 0,
    itemUrls: [],
    items: [],
    errorMessage: null,
    startTime: new Date(),
    completedTime: null,
    workerId: null,
  };
}

export function snapshotOf(job: SearchJob): JobSnapshot {
  return Object.freeze({
    ...job,
    itemUrls: Object.freeze([...job.itemUrls]),
    items: Object.freeze([...job.items]),
    startTime: new Date(job.startTime.getTime()),
    completedTime: job.completedTime ? new Date(job.completedTime.getTime()) : null,
  });
}

export function toWireSnapshot(snapshot: JobSnapshot): WireJobSnapshot {
  return {
    job_id: snapshot.id,
    client_id: snapshot.clientId,
    search_id: snapshot.searchId,
    source_url: snapshot.sourceUrl,
    subject_name: snapshot.subjectName,
    status: snapshot.status,
    progress: snapshot.progress,
    fetched_count: snapshot.fetchedCount,
    total_count: snapshot.totalCount,
    skipped_count: snapshot.skippedCount,
    item_urls: [...snapshot.itemUrls],
    items: snapshot.items.map(toWirePaper),
    error_message: snapshot.errorMessage,
    start_time: snapshot.startTime.toISOString(),
    completed_time: snapshot.completedTime ? snapshot.completedTime.toISOString() : null,
    worker_id: snapshot.workerId,
  };
}
