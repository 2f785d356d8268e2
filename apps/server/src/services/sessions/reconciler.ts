/**
 * Session Reconciler
 *
 * Single owner of the live session table. Every producer (poller, push
 * ingestor, stale sweep, shutdown) feeds observations through `apply()`,
 * which validates them, serializes them per session key and either moves the
 * session along the state machine (one LifecycleEvent), touches it, or drops
 * the observation and counts why.
 *
 * A session that reaches `stopped` stays in the table with `flushPending`
 * until the history write for it completes (`completeFlush`). The key then
 * leaves a tombstone carrying the final revision for the grace period so late
 * observations cannot resurrect it.
 *
 * Emby and Jellyfin keep the session key when the player moves on to the next
 * item. A different item under a live key stops the current logical session
 * and starts a new one; the stopped one waits for its flush outside the table.
 */

import { EventEmitter } from 'node:events';
import { randomUUID } from 'node:crypto';
import {
  observationSchema,
  SESSION_LIMITS,
  type HistoryNote,
  type LifecycleEvent,
  type Observation,
  type ObservationSource,
  type ReconcilerCounters,
  type Session,
  type SessionSnapshot,
  type SessionState,
} from '@reelwatch/shared';
import { MalformedObservationError, errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { KeyedSerialExecutor, RevisionClock } from './concurrency.js';
import { isLegalTransition, resolveConflict, targetState } from './stateMachine.js';
import { calculatePauseAccumulation, isStaleSession } from './stateTracker.js';
import { toLiveSessionRecord, type SessionStore } from './sessionStore.js';

const log = createLogger('Reconciler');

export type ApplyResult =
  | {
      outcome: 'transition';
      event: LifecycleEvent;
      /** Stop of the logical session this one replaced after a media change */
      replaced?: LifecycleEvent;
    }
  | { outcome: 'touch' }
  | { outcome: 'stale' }
  | { outcome: 'illegal' }
  | { outcome: 'malformed'; error: MalformedObservationError };

type TransitionResult = Extract<ApplyResult, { outcome: 'transition' }>;

export type ReconcilerEvents = {
  transition: [event: LifecycleEvent];
  flushed: [session: Session];
};

export interface ReconcilerOptions {
  /** How long a flushed key's tombstone (and a silent session) lives */
  staleSessionGraceMs?: number;
  store?: SessionStore;
  now?: () => Date;
}

interface Tombstone {
  revision: number;
  expiresAt: number;
}

function emptyCounters(): ReconcilerCounters {
  return {
    accepted: 0,
    touched: 0,
    transitions: 0,
    malformed: 0,
    stale: 0,
    illegal: 0,
    newLogicalSessions: 0,
  };
}

export class SessionReconciler extends EventEmitter<ReconcilerEvents> {
  private readonly sessions = new Map<string, Session>();
  private readonly tombstones = new Map<string, Tombstone>();
  /** Sessions stopped by a media change, waiting for their flush, by session id */
  private readonly replaced = new Map<string, Session>();
  private readonly executor = new KeyedSerialExecutor();
  private readonly systemClock: RevisionClock;
  private readonly store: SessionStore | null;
  private readonly now: () => Date;
  private graceMs: number;
  private counters = emptyCounters();

  constructor(options: ReconcilerOptions = {}) {
    super();
    this.graceMs = options.staleSessionGraceMs ?? SESSION_LIMITS.STALE_SESSION_GRACE_MS;
    this.store = options.store ?? null;
    this.now = options.now ?? (() => new Date());
    this.systemClock = new RevisionClock(() => this.now().getTime());
  }

  setGracePeriod(graceMs: number): void {
    this.graceMs = graceMs;
  }

  // ==========================================================================
  // Intake
  // ==========================================================================

  /**
   * Apply one observation. Never throws for bad input; the result says what happened.
   */
  async apply(input: Observation): Promise<ApplyResult> {
    const parsed = observationSchema.safeParse(input);
    if (!parsed.success) {
      const error = MalformedObservationError.fromZodError(parsed.error);
      this.counters.malformed++;
      log.warn('Dropping malformed observation', {
        sessionKey: input.sessionKey,
        source: input.source,
        fields: error.details,
      });
      return { outcome: 'malformed', error };
    }

    // Validated copy; the caller's objects are never retained
    const observation: Observation = parsed.data;
    return this.executor.run(observation.sessionKey, () => this.applyLocked(observation));
  }

  private async applyLocked(observation: Observation): Promise<ApplyResult> {
    const existing = this.sessions.get(observation.sessionKey);
    const result = existing
      ? this.applyToExisting(existing, observation)
      : this.applyToUnknown(observation);

    if (result.outcome === 'transition' || result.outcome === 'touch') {
      this.counters.accepted++;
      const session = this.sessions.get(observation.sessionKey);
      if (session) await this.mirror(session);
    }
    if (result.outcome === 'transition') {
      if (result.replaced) this.emit('transition', result.replaced);
      this.emit('transition', result.event);
    }
    return result;
  }

  private applyToUnknown(observation: Observation): ApplyResult {
    const tombstone = this.liveTombstone(observation.sessionKey);
    if (tombstone && observation.revision <= tombstone.revision) {
      this.counters.stale++;
      return { outcome: 'stale' };
    }

    const to = targetState(observation);
    // Nothing to stop, and nothing to create without a snapshot
    if (to === 'stopped' || !observation.snapshot) {
      this.counters.stale++;
      return { outcome: 'stale' };
    }

    if (tombstone) {
      this.counters.newLogicalSessions++;
      this.tombstones.delete(observation.sessionKey);
      log.debug('Key reused after flush, starting a new logical session', {
        sessionKey: observation.sessionKey,
      });
    }

    const session = this.createSession(observation, observation.snapshot);
    this.sessions.set(session.sessionKey, session);
    return this.transition(session, to, observation, true);
  }

  private applyToExisting(session: Session, observation: Observation): ApplyResult {
    const to = targetState(observation);
    const resolution = resolveConflict(session, observation, to);

    if (resolution === 'stale') {
      this.counters.stale++;
      return { outcome: 'stale' };
    }

    if (session.flushPending) {
      this.counters.illegal++;
      return { outcome: 'illegal' };
    }

    const snapshot = observation.snapshot;
    if (snapshot && snapshot.itemId !== session.itemId && to !== 'stopped') {
      return this.replaceForMediaChange(session, observation, snapshot, to);
    }

    if (resolution === 'position') {
      if (observation.snapshot) session.positionMs = observation.snapshot.positionMs;
      session.lastSeenAt = observation.observedAt;
      this.recordSource(session, observation.source);
      this.counters.touched++;
      return { outcome: 'touch' };
    }

    if (to === session.state) {
      this.refresh(session, observation);
      this.counters.touched++;
      return { outcome: 'touch' };
    }

    if (!isLegalTransition(session.state, to)) {
      this.counters.illegal++;
      log.debug('Discarding illegal transition', {
        sessionKey: session.sessionKey,
        from: session.state,
        to,
        source: observation.source,
      });
      return { outcome: 'illegal' };
    }

    return this.transition(session, to, observation, false);
  }

  // ==========================================================================
  // Mutation
  // ==========================================================================

  private createSession(observation: Observation, snapshot: SessionSnapshot): Session {
    return {
      id: randomUUID(),
      sessionKey: observation.sessionKey,
      userId: snapshot.userId,
      userName: snapshot.userName,
      itemId: snapshot.itemId,
      state: 'starting',
      positionMs: snapshot.positionMs,
      durationMs: snapshot.durationMs,
      isTranscoding: snapshot.isTranscoding,
      transcode: snapshot.transcode,
      media: snapshot.media,
      player: snapshot.player,
      lastSeenRevision: observation.revision,
      lastSource: observation.source,
      sources: [observation.source],
      startedAt: observation.observedAt,
      lastSeenAt: observation.observedAt,
      lastPausedAt: null,
      pausedDurationMs: 0,
      flushPending: false,
      note: null,
      rawPayload: snapshot.raw ?? null,
    };
  }

  /** Copy revision, position and stream details from an accepted observation */
  private refresh(session: Session, observation: Observation): void {
    const snapshot = observation.snapshot;
    if (snapshot) {
      session.positionMs = snapshot.positionMs;
      session.durationMs = snapshot.durationMs || session.durationMs;
      session.isTranscoding = snapshot.isTranscoding;
      session.transcode = snapshot.transcode;
      session.player = snapshot.player;
      session.rawPayload = snapshot.raw ?? session.rawPayload;
    }
    session.lastSeenRevision = Math.max(session.lastSeenRevision, observation.revision);
    session.lastSeenAt = observation.observedAt;
    session.lastSource = observation.source;
    this.recordSource(session, observation.source);
  }

  /**
   * Stop the current logical session where it stood (its own item and
   * position) and start a new one for the item now playing under the key
   */
  private replaceForMediaChange(
    previous: Session,
    observation: Observation,
    snapshot: SessionSnapshot,
    to: SessionState
  ): ApplyResult {
    const from = previous.state;
    const at = observation.observedAt;
    const pause = calculatePauseAccumulation(from, 'stopped', previous, at);
    previous.lastPausedAt = pause.lastPausedAt;
    previous.pausedDurationMs = pause.pausedDurationMs;
    previous.lastSeenRevision = Math.max(previous.lastSeenRevision, observation.revision);
    previous.lastSeenAt = at;
    previous.state = 'stopped';
    previous.flushPending = true;
    this.counters.transitions++;

    const replaced = this.buildEvent(previous, from, observation, false);
    this.replaced.set(previous.id, previous);

    log.debug('Media changed under a live key, starting a new logical session', {
      sessionKey: previous.sessionKey,
      fromItem: previous.itemId,
      toItem: snapshot.itemId,
    });
    this.counters.newLogicalSessions++;
    const session = this.createSession(observation, snapshot);
    this.sessions.set(session.sessionKey, session);

    return { ...this.transition(session, to, observation, true), replaced };
  }

  private transition(
    session: Session,
    to: SessionState,
    observation: Observation,
    isFirstObservation: boolean
  ): TransitionResult {
    const from = session.state;
    this.refresh(session, observation);

    const at = observation.observedAt;
    const pause = calculatePauseAccumulation(from, to, session, at);
    session.lastPausedAt = pause.lastPausedAt;
    session.pausedDurationMs = pause.pausedDurationMs;
    session.state = to;

    if (to === 'error') {
      session.note = observation.note ?? 'playback_error';
    }
    if (to === 'stopped') {
      session.flushPending = true;
      session.note = observation.note ?? session.note;
    }

    this.counters.transitions++;
    const event = this.buildEvent(session, from, observation, isFirstObservation);
    return { outcome: 'transition', event };
  }

  private buildEvent(
    session: Session,
    from: SessionState,
    observation: Observation,
    isFirstObservation: boolean
  ): LifecycleEvent {
    return {
      sessionKey: session.sessionKey,
      fromState: from,
      toState: session.state,
      timestamp: observation.observedAt,
      source: observation.source,
      isFirstObservation,
      sessionSnapshot: structuredClone(session),
    };
  }

  private recordSource(session: Session, source: ObservationSource): void {
    if (!session.sources.includes(source)) session.sources.push(source);
  }

  // ==========================================================================
  // Flush & system stops
  // ==========================================================================

  /**
   * History for the session was written: drop it from the live set and leave
   * a tombstone. A no-op if the key now belongs to another logical session.
   */
  async completeFlush(sessionKey: string, sessionId: string): Promise<void> {
    await this.executor.run(sessionKey, async () => {
      const displaced = this.replaced.get(sessionId);
      if (displaced) {
        // The key is live again under the session that replaced it
        this.replaced.delete(sessionId);
        this.emit('flushed', structuredClone(displaced));
        return;
      }

      const session = this.sessions.get(sessionKey);
      if (!session || session.id !== sessionId) return;

      this.sessions.delete(sessionKey);
      this.tombstones.set(sessionKey, {
        revision: session.lastSeenRevision,
        expiresAt: this.now().getTime() + this.graceMs,
      });
      await this.unmirror(sessionKey);
      this.emit('flushed', structuredClone(session));
    });
  }

  /**
   * Stop a session on the system's behalf (stale sweep, poll failure, shutdown)
   */
  async stopSession(
    sessionKey: string,
    note: HistoryNote,
    source: Extract<ObservationSource, 'sweep' | 'system'> = 'system'
  ): Promise<ApplyResult> {
    const session = this.sessions.get(sessionKey);
    if (session) this.systemClock.advancePast(session.lastSeenRevision);

    return this.apply({
      sessionKey,
      source,
      kind: 'stop',
      revision: this.systemClock.next(),
      observedAt: this.now(),
      note,
    });
  }

  /**
   * Stop every session nobody has reported within the grace period
   */
  async sweepStale(): Promise<number> {
    const now = this.now();
    this.purgeTombstones(now.getTime());

    const stale = [...this.sessions.values()].filter(
      (s) => !s.flushPending && isStaleSession(s.lastSeenAt, this.graceMs, now)
    );
    let stopped = 0;
    for (const session of stale) {
      const result = await this.stopSession(session.sessionKey, 'stale', 'sweep');
      if (result.outcome === 'transition') stopped++;
    }
    if (stopped > 0) {
      log.info(`Stopped ${stopped} stale session(s)`, { graceMs: this.graceMs });
    }
    return stopped;
  }

  /**
   * Stop every live session whose only reporter is the given source
   */
  async stopSessionsOnlyFrom(source: ObservationSource, note: HistoryNote): Promise<number> {
    const targets = [...this.sessions.values()].filter(
      (s) => !s.flushPending && s.sources.length === 1 && s.sources[0] === source
    );
    let stopped = 0;
    for (const session of targets) {
      const result = await this.stopSession(session.sessionKey, note);
      if (result.outcome === 'transition') stopped++;
    }
    return stopped;
  }

  /**
   * Stop everything still live (clean shutdown)
   */
  async stopAll(note: HistoryNote): Promise<number> {
    let stopped = 0;
    for (const session of [...this.sessions.values()]) {
      if (session.flushPending) continue;
      const result = await this.stopSession(session.sessionKey, note);
      if (result.outcome === 'transition') stopped++;
    }
    return stopped;
  }

  /** Wait for all queued observations to be applied */
  async drain(): Promise<void> {
    await this.executor.drain();
  }

  // ==========================================================================
  // Read accessors
  // ==========================================================================

  /** Deep copies; callers can never mutate the live table */
  getSnapshot(): Session[] {
    return [...this.sessions.values()].map((s) => structuredClone(s));
  }

  getSession(sessionKey: string): Session | undefined {
    const session = this.sessions.get(sessionKey);
    return session ? structuredClone(session) : undefined;
  }

  get size(): number {
    return this.sessions.size;
  }

  getCounters(): ReconcilerCounters {
    return { ...this.counters };
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private liveTombstone(sessionKey: string): Tombstone | undefined {
    const tombstone = this.tombstones.get(sessionKey);
    if (tombstone && tombstone.expiresAt <= this.now().getTime()) {
      this.tombstones.delete(sessionKey);
      return undefined;
    }
    return tombstone;
  }

  private purgeTombstones(nowMs: number): void {
    for (const [key, tombstone] of this.tombstones) {
      if (tombstone.expiresAt <= nowMs) this.tombstones.delete(key);
    }
  }

  private async mirror(session: Session): Promise<void> {
    if (!this.store) return;
    try {
      await this.store.upsert(toLiveSessionRecord(session));
    } catch (error) {
      log.warn('Session store write failed', {
        sessionKey: session.sessionKey,
        error: errorMessage(error),
      });
    }
  }

  private async unmirror(sessionKey: string): Promise<void> {
    if (!this.store) return;
    try {
      await this.store.remove(sessionKey);
    } catch (error) {
      log.warn('Session store remove failed', { sessionKey, error: errorMessage(error) });
    }
  }
}
