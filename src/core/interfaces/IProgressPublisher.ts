import { JobEventKind, JobSnapshot } from '../entities/SearchJob.js';

/**
 * Push channel used to stream job snapshots to the submitting client
 */
export interface IProgressPublisher {
  /**
   * Best effort: resolves false on failure and never rejects
   */
  publish(event: JobEventKind, snapshot: JobSnapshot, clientId: string): Promise<boolean>;
}
