/**
 * Live session mirror
 *
 * The reconciler owns the live table; the store is a write-behind copy for
 * other processes and restarts to read. Memory and Redis (hash) backends.
 */

import type { Redis } from 'ioredis';
import {
  REDIS_KEYS,
  liveSessionRecordSchema,
  type LiveSessionRecord,
  type Session,
} from '@reelwatch/shared';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('SessionStore');

export interface SessionStore {
  upsert(record: LiveSessionRecord): Promise<void>;
  remove(sessionKey: string): Promise<void>;
  get(sessionKey: string): Promise<LiveSessionRecord | null>;
  list(): Promise<LiveSessionRecord[]>;
  clear(): Promise<void>;
}

export function toLiveSessionRecord(session: Session): LiveSessionRecord {
  return {
    sessionId: session.id,
    sessionKey: session.sessionKey,
    userId: session.userId,
    userName: session.userName,
    itemId: session.itemId,
    mediaTitle: session.media.title,
    state: session.state,
    positionMs: session.positionMs,
    durationMs: session.durationMs,
    lastSeenRevision: session.lastSeenRevision,
    startedAt: session.startedAt.toISOString(),
    lastSeenAt: session.lastSeenAt.toISOString(),
  };
}

export class MemorySessionStore implements SessionStore {
  private readonly records = new Map<string, LiveSessionRecord>();

  async upsert(record: LiveSessionRecord): Promise<void> {
    this.records.set(record.sessionKey, { ...record });
  }

  async remove(sessionKey: string): Promise<void> {
    this.records.delete(sessionKey);
  }

  async get(sessionKey: string): Promise<LiveSessionRecord | null> {
    const record = this.records.get(sessionKey);
    return record ? { ...record } : null;
  }

  async list(): Promise<LiveSessionRecord[]> {
    return [...this.records.values()].map((record) => ({ ...record }));
  }

  async clear(): Promise<void> {
    this.records.clear();
  }
}

/**
 * One Redis hash: field = sessionKey, value = JSON record
 */
export class RedisSessionStore implements SessionStore {
  constructor(
    private readonly redis: Redis,
    private readonly hashKey: string = REDIS_KEYS.LIVE_SESSIONS
  ) {}

  async upsert(record: LiveSessionRecord): Promise<void> {
    await this.redis.hset(this.hashKey, record.sessionKey, JSON.stringify(record));
  }

  async remove(sessionKey: string): Promise<void> {
    await this.redis.hdel(this.hashKey, sessionKey);
  }

  async get(sessionKey: string): Promise<LiveSessionRecord | null> {
    const data = await this.redis.hget(this.hashKey, sessionKey);
    return data ? this.parse(sessionKey, data) : null;
  }

  async list(): Promise<LiveSessionRecord[]> {
    const all = await this.redis.hgetall(this.hashKey);
    const records: LiveSessionRecord[] = [];
    for (const [sessionKey, data] of Object.entries(all)) {
      const record = this.parse(sessionKey, data);
      if (record) records.push(record);
    }
    return records;
  }

  async clear(): Promise<void> {
    await this.redis.del(this.hashKey);
  }

  private parse(sessionKey: string, data: string): LiveSessionRecord | null {
    try {
      const result = liveSessionRecordSchema.safeParse(JSON.parse(data));
      if (result.success) return result.data;
      log.warn('Discarding invalid session record', { sessionKey });
    } catch {
      log.warn('Discarding unparseable session record', { sessionKey });
    }
    return null;
  }
}
