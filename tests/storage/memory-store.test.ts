/**
 * Memory run store: copy isolation and ordering.
 */

import { BatchRun, BatchRunStatus } from '../../src/domain/run';
import { SourceKind } from '../../src/domain/deny-event';
import { createMemoryRunStore } from '../../src/storage/memory-store';

function run(id: string): BatchRun {
  return {
    id,
    status: BatchRunStatus.Queued,
    window: { start: '2026-01-25T00:00:00.000Z', end: '2026-01-26T00:00:00.000Z' },
    sources: [SourceKind.InteractionAudit, SourceKind.DlpRuleMatch],
    createdAt: '2026-01-26T01:00:00.000Z',
    updatedAt: '2026-01-26T01:00:00.000Z',
  };
}

describe('MemoryRunStore', () => {
  it('returned runs are isolated from the store', async () => {
    const store = createMemoryRunStore();
    await store.create(run('run_1'));

    const fetched = await store.getById('run_1');
    fetched?.sources.push(SourceKind.ContentFilterTelemetry);

    const fresh = await store.getById('run_1');
    expect(fresh?.sources).toEqual([SourceKind.InteractionAudit, SourceKind.DlpRuleMatch]);
  });

  it('the input to create is copied', async () => {
    const store = createMemoryRunStore();
    const input = run('run_1');
    await store.create(input);
    input.window.start = 'changed';

    expect((await store.getById('run_1'))?.window.start).toBe('2026-01-25T00:00:00.000Z');
  });

  it('update merges fields and keeps the id', async () => {
    const store = createMemoryRunStore();
    await store.create(run('run_1'));

    const updated = await store.update('run_1', { id: 'other', status: BatchRunStatus.Running });

    expect(updated?.id).toBe('run_1');
    expect(updated?.status).toBe(BatchRunStatus.Running);
    expect(updated?.sources).toHaveLength(2);
    expect(updated?.updatedAt).not.toBe('2026-01-26T01:00:00.000Z');
    expect(await store.getById('other')).toBeNull();
  });

  it('update of an unknown run returns null', async () => {
    const store = createMemoryRunStore();
    expect(await store.update('missing', { status: BatchRunStatus.Failed })).toBeNull();
  });

  it('lists most recent first with limit and offset', async () => {
    const store = createMemoryRunStore();
    for (const id of ['run_1', 'run_2', 'run_3']) {
      await store.create(run(id));
    }

    expect((await store.list()).map((r) => r.id)).toEqual(['run_3', 'run_2', 'run_1']);
    expect((await store.list({ limit: 1, offset: 1 })).map((r) => r.id)).toEqual(['run_2']);
  });

  it('delete removes a run once', async () => {
    const store = createMemoryRunStore();
    await store.create(run('run_1'));

    expect(await store.delete('run_1')).toBe(true);
    expect(await store.delete('run_1')).toBe(false);
    expect(await store.getById('run_1')).toBeNull();
  });
});
