/**
 * Jellyfin/Emby WebSocket event source
 *
 * Keeps one WebSocket open to the server's session feed and re-emits what it
 * hears as typed events. Reconnects forever with capped exponential backoff;
 * after a run of failed attempts it reports `fallback` so the rest of the
 * system knows polling is carrying state alone.
 *
 * Protocol:
 * - connect to /embywebsocket (Emby) or /socket (Jellyfin) with api_key + deviceId
 * - send SessionsStart "0,1500" to receive the full session list every 1.5s
 * - ForceKeepAlive carries the server's idle timeout (s); we send KeepAlive at half of it
 * - Sessions: full list of sessions; PlaybackStopped: one session ended
 */

import { EventEmitter } from 'node:events';
import WebSocket from 'ws';
import {
  PUSH_CONFIG,
  type PushConnectionState,
  type PushConnectionStatus,
  type SessionSnapshot,
} from '@reelwatch/shared';
import { createLogger } from '../../../utils/logger.js';
import { computeBackoff, type BackoffPolicy } from '../../../utils/retry.js';
import { isRecord, parseNumber, parseOptionalString } from '../../../utils/parsing.js';

const log = createLogger('PushSocket');

export const PUSH_DEVICE_ID = 'reelwatch-server';

// ============================================================================
// Socket abstraction
// ============================================================================

export interface PushSocketHandlers {
  onOpen: () => void;
  onMessage: (text: string) => void;
  onClose: (code: number, reason: string) => void;
  onError: (error: Error) => void;
}

export interface PushSocket {
  send(data: string): void;
  close(): void;
}

export type PushSocketFactory = (url: string, handlers: PushSocketHandlers) => PushSocket;

function rawToText(data: WebSocket.RawData): string {
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return data.toString('utf8');
}

/**
 * Default factory backed by the `ws` package
 */
export const createWsSocket: PushSocketFactory = (url, handlers) => {
  const ws = new WebSocket(url);
  ws.on('open', () => handlers.onOpen());
  ws.on('message', (data) => handlers.onMessage(rawToText(data)));
  ws.on('close', (code, reason) => handlers.onClose(code, reason.toString('utf8')));
  ws.on('error', (error) => handlers.onError(error));

  return {
    send: (data) => ws.send(data),
    close: () => ws.terminate(),
  };
};

// ============================================================================
// Event source
// ============================================================================

export interface PushEventSourceOptions {
  serverType: 'jellyfin' | 'emby';
  url: string;
  token: string;
  /** Turns a Sessions payload into snapshots (platform parser) */
  parseSessions: (data: unknown) => SessionSnapshot[];
  socketFactory?: PushSocketFactory;
  backoff?: BackoffPolicy;
  heartbeatTimeoutMs?: number;
  fallbackThreshold?: number;
}

// Events emitted by PushEventSource
export type PushEventSourceEvents = {
  sessions: [sessions: SessionSnapshot[], receivedAt: Date];
  'session:stopped': [sessionKey: string, receivedAt: Date];
  'connection:state': [state: PushConnectionState];
  'connection:error': [error: Error];
};

/**
 * @example
 * const source = client.openEventStream();
 * source.on('sessions', (sessions) => { ... });
 * source.on('connection:state', (state) => { ... });
 * source.connect();
 */
export class PushEventSource extends EventEmitter<PushEventSourceEvents> {
  private readonly options: PushEventSourceOptions;
  private readonly socketFactory: PushSocketFactory;
  private backoff: BackoffPolicy;

  private socket: PushSocket | null = null;
  /** Incremented per socket so callbacks from a replaced socket are ignored */
  private generation = 0;
  private stopped = true;

  private state: PushConnectionState = 'disconnected';
  private connectedAt: Date | null = null;
  private lastEventAt: Date | null = null;
  private reconnectAttempts = 0;
  private lastError: string | null = null;

  private reconnectTimer: NodeJS.Timeout | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private keepAliveTimer: NodeJS.Timeout | null = null;

  constructor(options: PushEventSourceOptions) {
    super();
    this.options = options;
    this.socketFactory = options.socketFactory ?? createWsSocket;
    this.backoff = options.backoff ?? {
      initialDelayMs: PUSH_CONFIG.INITIAL_RETRY_DELAY_MS,
      maxDelayMs: PUSH_CONFIG.MAX_RETRY_DELAY_MS,
      multiplier: PUSH_CONFIG.RETRY_MULTIPLIER,
    };
  }

  /**
   * WebSocket URL for the server's session feed
   */
  get socketUrl(): string {
    const base = this.options.url.replace(/\/$/, '').replace(/^http/i, 'ws');
    const path = this.options.serverType === 'emby' ? '/embywebsocket' : '/socket';
    const params = new URLSearchParams({ api_key: this.options.token, deviceId: PUSH_DEVICE_ID });
    return `${base}${path}?${params}`;
  }

  connect(): void {
    this.stopped = false;
    const generation = ++this.generation;
    this.clearTimers();
    this.closeSocket();
    // fallback holds until a socket actually opens
    if (this.state !== 'fallback') {
      this.setState(this.reconnectAttempts > 0 ? 'reconnecting' : 'connecting');
    }

    const current = () => generation === this.generation && !this.stopped;

    this.socket = this.socketFactory(this.socketUrl, {
      onOpen: () => {
        if (current()) this.handleOpen();
      },
      onMessage: (text) => {
        if (current()) this.handleMessage(text);
      },
      onClose: (code, reason) => {
        if (current()) this.handleClose(code, reason);
      },
      onError: (error) => {
        if (current()) this.handleError(error);
      },
    });
  }

  disconnect(): void {
    this.stopped = true;
    this.generation++;
    this.clearTimers();
    this.closeSocket();
    this.setState('disconnected');
  }

  /**
   * Apply new reconnect bounds; takes effect from the next scheduled attempt
   */
  setBackoff(backoff: BackoffPolicy): void {
    this.backoff = backoff;
  }

  getStatus(): PushConnectionStatus {
    return {
      state: this.state,
      connectedAt: this.connectedAt,
      lastEventAt: this.lastEventAt,
      reconnectAttempts: this.reconnectAttempts,
      error: this.lastError,
    };
  }

  // ==========================================================================
  // Socket callbacks
  // ==========================================================================

  private handleOpen(): void {
    this.reconnectAttempts = 0;
    this.lastError = null;
    this.connectedAt = new Date();
    this.setState('connected');
    this.send({ MessageType: 'SessionsStart', Data: PUSH_CONFIG.SESSIONS_SUBSCRIPTION });
    this.armHeartbeat();
  }

  private handleMessage(text: string): void {
    const receivedAt = new Date();
    this.lastEventAt = receivedAt;
    this.armHeartbeat();

    let message: unknown;
    try {
      message = JSON.parse(text);
    } catch {
      log.warn('Ignoring non-JSON message', { length: text.length });
      return;
    }
    if (!isRecord(message)) return;

    switch (message.MessageType) {
      case 'ForceKeepAlive':
        this.startKeepAlive(parseNumber(message.Data, 60));
        break;
      case 'Sessions':
        if (Array.isArray(message.Data)) {
          this.emit('sessions', this.options.parseSessions(message.Data), receivedAt);
        }
        break;
      case 'PlaybackStopped': {
        const data = isRecord(message.Data) ? message.Data : {};
        const sessionKey = parseOptionalString(data.SessionId) ?? parseOptionalString(data.Id);
        if (sessionKey) this.emit('session:stopped', sessionKey, receivedAt);
        break;
      }
      default:
        // KeepAlive acks, PlaybackStart/Progress (covered by Sessions), library events
        break;
    }
  }

  private handleClose(code: number, reason: string): void {
    this.socket = null;
    this.clearTimers();
    this.lastError = this.lastError ?? `closed (${code}${reason ? `: ${reason}` : ''})`;
    this.scheduleReconnect();
  }

  private handleError(error: Error): void {
    this.lastError = error.message;
    // EventEmitter throws on an unhandled 'error'; connection:error is informational
    this.emit('connection:error', error);
  }

  // ==========================================================================
  // Reconnect & heartbeat
  // ==========================================================================

  private scheduleReconnect(): void {
    if (this.stopped) return;

    this.reconnectAttempts++;
    const threshold = this.options.fallbackThreshold ?? PUSH_CONFIG.FALLBACK_THRESHOLD;
    this.setState(this.reconnectAttempts >= threshold ? 'fallback' : 'reconnecting');

    const delay = computeBackoff(this.reconnectAttempts, this.backoff);
    log.debug(`Reconnecting in ${delay}ms`, { attempt: this.reconnectAttempts });
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, delay);
  }

  private armHeartbeat(): void {
    if (this.heartbeatTimer) clearTimeout(this.heartbeatTimer);
    const timeout = this.options.heartbeatTimeoutMs ?? PUSH_CONFIG.HEARTBEAT_TIMEOUT_MS;
    this.heartbeatTimer = setTimeout(() => {
      this.heartbeatTimer = null;
      this.lastError = `no message for ${timeout}ms`;
      log.warn('Heartbeat timeout, forcing reconnect', { timeoutMs: timeout });
      this.generation++;
      this.closeSocket();
      this.clearTimers();
      this.scheduleReconnect();
    }, timeout);
  }

  private startKeepAlive(serverTimeoutSeconds: number): void {
    if (this.keepAliveTimer) clearInterval(this.keepAliveTimer);
    this.send({ MessageType: 'KeepAlive' });
    const intervalMs = Math.max(1000, (serverTimeoutSeconds * 1000) / 2);
    this.keepAliveTimer = setInterval(() => this.send({ MessageType: 'KeepAlive' }), intervalMs);
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private send(message: Record<string, unknown>): void {
    try {
      this.socket?.send(JSON.stringify(message));
    } catch (error) {
      log.warn('Send failed', { error: error instanceof Error ? error.message : String(error) });
    }
  }

  private setState(state: PushConnectionState): void {
    if (state === this.state) return;
    this.state = state;
    this.emit('connection:state', state);
  }

  private closeSocket(): void {
    const socket = this.socket;
    this.socket = null;
    socket?.close();
  }

  private clearTimers(): void {
    if (this.reconnectTimer) clearTimeout(this.reconnectTimer);
    if (this.heartbeatTimer) clearTimeout(this.heartbeatTimer);
    if (this.keepAliveTimer) clearInterval(this.keepAliveTimer);
    this.reconnectTimer = null;
    this.heartbeatTimer = null;
    this.keepAliveTimer = null;
  }
}
