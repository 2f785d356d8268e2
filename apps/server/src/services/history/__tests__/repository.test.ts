/**
 * History repository tests
 *
 * The PostgreSQL repository runs against a mocked drizzle query chain.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Database } from '../../../db/client.js';
import { historyEntries } from '../../../db/schema.js';
import {
  MemoryHistoryRepository,
  PostgresHistoryRepository,
  mapHistoryRow,
} from '../repository.js';
import { at, createMockHistoryEntry, T0 } from '../../../test/fixtures.js';

function createRow(overrides: Record<string, unknown> = {}) {
  return {
    id: 'entry-1',
    sessionKeyGroup: ['A', 'B'],
    userId: 'user-1',
    userName: 'alice',
    itemId: 'item-42',
    mediaTitle: 'Test Movie',
    mediaType: 'movie',
    startedAt: T0,
    stoppedAt: at(600),
    pausedDurationMs: 2000,
    watchedPercent: 42.5,
    note: null,
    updatedAt: at(601),
    ...overrides,
  };
}

// select().from().where().orderBy().limit() resolving to rows
function mockSelectChain(rows: unknown[]) {
  const chain = {
    from: vi.fn().mockReturnThis(),
    where: vi.fn().mockReturnThis(),
    orderBy: vi.fn().mockReturnThis(),
    limit: vi.fn().mockResolvedValue(rows),
  };
  return chain;
}

describe('mapHistoryRow', () => {
  it('maps a row to a history entry', () => {
    const entry = mapHistoryRow(createRow({ note: 'stale' }) as never);
    expect(entry).toEqual({
      id: 'entry-1',
      sessionKeyGroup: ['A', 'B'],
      userId: 'user-1',
      userName: 'alice',
      itemId: 'item-42',
      mediaTitle: 'Test Movie',
      mediaType: 'movie',
      startedAt: T0,
      stoppedAt: at(600),
      pausedDurationMs: 2000,
      watchedPercent: 42.5,
      note: 'stale',
      updatedAt: at(601),
    });
  });
});

describe('PostgresHistoryRepository', () => {
  const db = {
    select: vi.fn(),
    insert: vi.fn(),
  };
  let repository: PostgresHistoryRepository;

  beforeEach(() => {
    repository = new PostgresHistoryRepository(db as unknown as Database);
  });

  it('returns null when no row matches the session key', async () => {
    db.select.mockReturnValue(mockSelectChain([]));
    expect(await repository.findBySessionKey('A')).toBeNull();
  });

  it('returns the latest entry for a user and item', async () => {
    const chain = mockSelectChain([createRow()]);
    db.select.mockReturnValue(chain);

    const entry = await repository.findLatestForUserItem('user-1', 'item-42');

    expect(entry?.id).toBe('entry-1');
    expect(chain.limit).toHaveBeenCalledWith(1);
  });

  it('upserts by id with ON CONFLICT DO UPDATE', async () => {
    const entry = createMockHistoryEntry({ id: 'entry-1', sessionKeyGroup: ['A'] });
    const chain = {
      values: vi.fn().mockReturnThis(),
      onConflictDoUpdate: vi.fn().mockReturnThis(),
      returning: vi.fn().mockResolvedValue([createRow({ sessionKeyGroup: ['A'] })]),
    };
    db.insert.mockReturnValue(chain);

    const stored = await repository.upsert(entry);

    expect(db.insert).toHaveBeenCalledWith(historyEntries);
    expect(chain.values).toHaveBeenCalledWith(
      expect.objectContaining({ id: 'entry-1', sessionKeyGroup: ['A'] })
    );
    const conflict = chain.onConflictDoUpdate.mock.calls[0]?.[0];
    expect(conflict.target).toBe(historyEntries.id);
    expect(conflict.set).not.toHaveProperty('id');
    expect(stored.sessionKeyGroup).toEqual(['A']);
  });
});

describe('MemoryHistoryRepository', () => {
  it('lists newest first and returns copies', async () => {
    const repository = new MemoryHistoryRepository();
    await repository.upsert(createMockHistoryEntry({ id: 'old', stoppedAt: at(100) }));
    await repository.upsert(createMockHistoryEntry({ id: 'new', stoppedAt: at(200) }));

    const recent = await repository.listRecent(10);
    expect(recent.map((e) => e.id)).toEqual(['new', 'old']);

    recent[0]?.sessionKeyGroup.push('mutated');
    expect((await repository.findById('new'))?.sessionKeyGroup).toEqual(['session-1']);
  });

  it('replaces an entry with the same id', async () => {
    const repository = new MemoryHistoryRepository();
    await repository.upsert(createMockHistoryEntry({ id: 'e', watchedPercent: 10 }));
    await repository.upsert(createMockHistoryEntry({ id: 'e', watchedPercent: 80 }));

    expect(repository.size).toBe(1);
    expect((await repository.findById('e'))?.watchedPercent).toBe(80);
  });

  it('finds the entry holding a session key', async () => {
    const repository = new MemoryHistoryRepository();
    await repository.upsert(createMockHistoryEntry({ id: 'e', sessionKeyGroup: ['A', 'B'] }));

    expect((await repository.findBySessionKey('B'))?.id).toBe('e');
    expect(await repository.findBySessionKey('C')).toBeNull();
  });
});
