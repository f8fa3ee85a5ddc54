/**
 * Storage interfaces.
 *
 * Batch runs started through the HTTP surface are tracked here. The
 * in-memory implementation is the only one shipped; the interface keeps
 * the routes independent of it.
 */

import { BatchRun } from '../domain/run';

/** Pagination options for list queries. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

export interface RunStore {
  create(run: BatchRun): Promise<BatchRun>;
  getById(id: string): Promise<BatchRun | null>;
  update(id: string, run: Partial<BatchRun>): Promise<BatchRun | null>;
  /** Most recent first. */
  list(options?: ListOptions): Promise<BatchRun[]>;
  delete(id: string): Promise<boolean>;
}
