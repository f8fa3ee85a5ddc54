/**
 * In-memory run store.
 *
 * Stored and returned runs are deep copies: a caller mutating a returned
 * run (or its summary) never touches the store's own copy.
 */

import { BatchRun } from '../domain/run';
import { ListOptions, RunStore } from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

export class MemoryRunStore implements RunStore {
  private data = new Map<string, BatchRun>();

  async create(run: BatchRun): Promise<BatchRun> {
    this.data.set(run.id, deepCopy(run));
    return deepCopy(run);
  }

  async getById(id: string): Promise<BatchRun | null> {
    const run = this.data.get(id);
    return run ? deepCopy(run) : null;
  }

  async update(id: string, updates: Partial<BatchRun>): Promise<BatchRun | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated = { ...deepCopy(existing), ...deepCopy(updates), id, updatedAt: new Date().toISOString() };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async list(options?: ListOptions): Promise<BatchRun[]> {
    // Map keeps insertion order; newest first
    const items = [...this.data.values()].reverse();
    return applyListOptions(items.map(deepCopy), options);
  }

  async delete(id: string): Promise<boolean> {
    return this.data.delete(id);
  }
}

/** Create a new in-memory run store. */
export function createMemoryRunStore(): RunStore {
  return new MemoryRunStore();
}
