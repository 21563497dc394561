// Tests for the in-memory audit store

import { describe, it, expect, beforeEach } from 'vitest';
import type { AuditEntry } from '@archivist/protocol';
import { createInMemoryAuditStore, type AuditStore } from './audit.js';

function createMockAuditEntry(id: string, overrides: Partial<AuditEntry> = {}): AuditEntry {
  return {
    id,
    timestamp: '2024-01-01T00:00:00.000Z',
    operationType: 'create_entry',
    resourceType: 'entry',
    resourceId: '1',
    details: {},
    success: true,
    durationMs: 1,
    ...overrides,
  };
}

describe('createInMemoryAuditStore', () => {
  let store: AuditStore;

  beforeEach(async () => {
    store = createInMemoryAuditStore();
    await store.append(createMockAuditEntry('a', { timestamp: '2024-01-01T00:00:00.000Z' }));
    await store.append(
      createMockAuditEntry('b', {
        timestamp: '2024-01-02T00:00:00.000Z',
        operationType: 'add_credit',
        resourceType: 'association',
        resourceId: '1:2:AUTHOR',
        success: false,
        error: 'Credit already recorded',
      })
    );
    await store.append(createMockAuditEntry('c', { timestamp: '2024-01-03T00:00:00.000Z', resourceId: '2' }));
  });

  it('gets an entry by id', async () => {
    expect((await store.get('b'))?.operationType).toBe('add_credit');
    expect(await store.get('missing')).toBeNull();
  });

  it('returns the most recent entries first', async () => {
    const all = await store.query();
    expect(all.map((e) => e.id)).toEqual(['c', 'b', 'a']);
  });

  it('filters by resource', async () => {
    const entries = await store.getByResource('entry', '1');
    expect(entries.map((e) => e.id)).toEqual(['a']);
  });

  it('filters by outcome and operation', async () => {
    expect((await store.query({ success: false })).map((e) => e.id)).toEqual(['b']);
    expect((await store.query({ operationType: 'create_entry' })).map((e) => e.id)).toEqual(['c', 'a']);
  });

  it('applies time windows and pagination', async () => {
    const windowed = await store.query({ since: '2024-01-02T00:00:00.000Z' });
    expect(windowed.map((e) => e.id)).toEqual(['c', 'b']);

    const page = await store.query({ offset: 1, limit: 1 });
    expect(page.map((e) => e.id)).toEqual(['b']);
  });
});
