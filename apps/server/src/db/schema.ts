/**
 * Drizzle ORM schema definitions for Reelwatch
 *
 * Only durable history lives in PostgreSQL; the live session table is owned
 * in memory by the reconciler (mirrored to Redis when configured).
 */

import {
  pgTable,
  uuid,
  varchar,
  text,
  timestamp,
  integer,
  real,
  index,
} from 'drizzle-orm/pg-core';
import type { HistoryNote, MediaType } from '@reelwatch/shared';

// One row per continuous watch (merged across reconnect churn)
export const historyEntries = pgTable(
  'history_entries',
  {
    id: uuid('id').primaryKey(),
    // Every session key merged into this watch
    sessionKeyGroup: text('session_key_group').array().notNull(),
    userId: varchar('user_id', { length: 255 }).notNull(),
    userName: varchar('user_name', { length: 255 }).notNull(),
    itemId: varchar('item_id', { length: 255 }).notNull(),
    mediaTitle: text('media_title').notNull(),
    mediaType: varchar('media_type', { length: 20 }).notNull().$type<MediaType>(),
    startedAt: timestamp('started_at', { withTimezone: true }).notNull(),
    stoppedAt: timestamp('stopped_at', { withTimezone: true }).notNull(),
    pausedDurationMs: integer('paused_duration_ms').notNull().default(0),
    watchedPercent: real('watched_percent').notNull().default(0), // 0-100
    note: varchar('note', { length: 20 }).$type<HistoryNote>(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    // Merge candidate lookup
    index('history_user_item_stopped_idx').on(table.userId, table.itemId, table.stoppedAt),
    index('history_stopped_idx').on(table.stoppedAt),
  ]
);

export type HistoryEntryRow = typeof historyEntries.$inferSelect;
export type NewHistoryEntryRow = typeof historyEntries.$inferInsert;
