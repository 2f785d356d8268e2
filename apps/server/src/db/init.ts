/**
 * History schema initialization
 *
 * Runs on every start and is idempotent.
 */

import { sql } from 'drizzle-orm';
import type { Database } from './client.js';

export async function ensureHistorySchema(db: Database): Promise<void> {
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS history_entries (
      id uuid PRIMARY KEY,
      session_key_group text[] NOT NULL,
      user_id varchar(255) NOT NULL,
      user_name varchar(255) NOT NULL,
      item_id varchar(255) NOT NULL,
      media_title text NOT NULL,
      media_type varchar(20) NOT NULL,
      started_at timestamptz NOT NULL,
      stopped_at timestamptz NOT NULL,
      paused_duration_ms integer NOT NULL DEFAULT 0,
      watched_percent real NOT NULL DEFAULT 0,
      note varchar(20),
      updated_at timestamptz NOT NULL DEFAULT now()
    )
  `);
  await db.execute(sql`
    CREATE INDEX IF NOT EXISTS history_user_item_stopped_idx
      ON history_entries (user_id, item_id, stopped_at)
  `);
  await db.execute(sql`
    CREATE INDEX IF NOT EXISTS history_stopped_idx ON history_entries (stopped_at)
  `);
}
