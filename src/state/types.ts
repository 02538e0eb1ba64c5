import type { DeploymentRecord } from '../types';

/**
 * Persistence for the single deployment record. One writer at a time; no locking.
 */
export interface StateStore {
  load(): Promise<DeploymentRecord | null>;
  save(record: DeploymentRecord): Promise<void>;
  clear(): Promise<void>;
}
