/**
 * History persistence
 *
 * The writer only talks to a HistoryRepository. PostgreSQL (drizzle) in
 * production, in-memory for tests and when no DATABASE_URL is configured.
 */

import { and, arrayContains, desc, eq } from 'drizzle-orm';
import type { HistoryEntry } from '@reelwatch/shared';
import type { Database } from '../../db/client.js';
import { historyEntries, type HistoryEntryRow } from '../../db/schema.js';

export interface HistoryRepository {
  findById(id: string): Promise<HistoryEntry | null>;
  /** Entry whose sessionKeyGroup contains the key (most recent if several) */
  findBySessionKey(sessionKey: string): Promise<HistoryEntry | null>;
  /** Entry for the user and item with the latest stoppedAt */
  findLatestForUserItem(userId: string, itemId: string): Promise<HistoryEntry | null>;
  /** Insert or replace by id */
  upsert(entry: HistoryEntry): Promise<HistoryEntry>;
  /** Newest first by stoppedAt */
  listRecent(limit: number): Promise<HistoryEntry[]>;
}

/**
 * Map a history_entries row to the shared HistoryEntry type
 */
export function mapHistoryRow(row: HistoryEntryRow): HistoryEntry {
  return {
    id: row.id,
    sessionKeyGroup: row.sessionKeyGroup,
    userId: row.userId,
    userName: row.userName,
    itemId: row.itemId,
    mediaTitle: row.mediaTitle,
    mediaType: row.mediaType,
    startedAt: row.startedAt,
    stoppedAt: row.stoppedAt,
    pausedDurationMs: row.pausedDurationMs,
    watchedPercent: row.watchedPercent,
    note: row.note ?? null,
    updatedAt: row.updatedAt,
  };
}

// ============================================================================
// PostgreSQL
// ============================================================================

export class PostgresHistoryRepository implements HistoryRepository {
  constructor(private readonly db: Database) {}

  async findById(id: string): Promise<HistoryEntry | null> {
    const rows = await this.db
      .select()
      .from(historyEntries)
      .where(eq(historyEntries.id, id))
      .limit(1);
    const row = rows[0];
    return row ? mapHistoryRow(row) : null;
  }

  async findBySessionKey(sessionKey: string): Promise<HistoryEntry | null> {
    const rows = await this.db
      .select()
      .from(historyEntries)
      .where(arrayContains(historyEntries.sessionKeyGroup, [sessionKey]))
      .orderBy(desc(historyEntries.stoppedAt))
      .limit(1);
    const row = rows[0];
    return row ? mapHistoryRow(row) : null;
  }

  async findLatestForUserItem(userId: string, itemId: string): Promise<HistoryEntry | null> {
    const rows = await this.db
      .select()
      .from(historyEntries)
      .where(and(eq(historyEntries.userId, userId), eq(historyEntries.itemId, itemId)))
      .orderBy(desc(historyEntries.stoppedAt))
      .limit(1);
    const row = rows[0];
    return row ? mapHistoryRow(row) : null;
  }

  async upsert(entry: HistoryEntry): Promise<HistoryEntry> {
    const values = {
      sessionKeyGroup: entry.sessionKeyGroup,
      userId: entry.userId,
      userName: entry.userName,
      itemId: entry.itemId,
      mediaTitle: entry.mediaTitle,
      mediaType: entry.mediaType,
      startedAt: entry.startedAt,
      stoppedAt: entry.stoppedAt,
      pausedDurationMs: entry.pausedDurationMs,
      watchedPercent: entry.watchedPercent,
      note: entry.note,
      updatedAt: entry.updatedAt,
    };

    const rows = await this.db
      .insert(historyEntries)
      .values({ id: entry.id, ...values })
      .onConflictDoUpdate({ target: historyEntries.id, set: values })
      .returning();

    const row = rows[0];
    return row ? mapHistoryRow(row) : entry;
  }

  async listRecent(limit: number): Promise<HistoryEntry[]> {
    const rows = await this.db
      .select()
      .from(historyEntries)
      .orderBy(desc(historyEntries.stoppedAt))
      .limit(limit);
    return rows.map(mapHistoryRow);
  }
}

// ============================================================================
// In-memory
// ============================================================================

function copyEntry(entry: HistoryEntry): HistoryEntry {
  return { ...entry, sessionKeyGroup: [...entry.sessionKeyGroup] };
}

function byStoppedDesc(a: HistoryEntry, b: HistoryEntry): number {
  return b.stoppedAt.getTime() - a.stoppedAt.getTime();
}

export class MemoryHistoryRepository implements HistoryRepository {
  private readonly entries = new Map<string, HistoryEntry>();

  async findById(id: string): Promise<HistoryEntry | null> {
    const entry = this.entries.get(id);
    return entry ? copyEntry(entry) : null;
  }

  async findBySessionKey(sessionKey: string): Promise<HistoryEntry | null> {
    const [entry] = [...this.entries.values()]
      .filter((e) => e.sessionKeyGroup.includes(sessionKey))
      .sort(byStoppedDesc);
    return entry ? copyEntry(entry) : null;
  }

  async findLatestForUserItem(userId: string, itemId: string): Promise<HistoryEntry | null> {
    const [entry] = [...this.entries.values()]
      .filter((e) => e.userId === userId && e.itemId === itemId)
      .sort(byStoppedDesc);
    return entry ? copyEntry(entry) : null;
  }

  async upsert(entry: HistoryEntry): Promise<HistoryEntry> {
    this.entries.set(entry.id, copyEntry(entry));
    return copyEntry(entry);
  }

  async listRecent(limit: number): Promise<HistoryEntry[]> {
    return [...this.entries.values()].sort(byStoppedDesc).slice(0, limit).map(copyEntry);
  }

  get size(): number {
    return this.entries.size;
  }
}
