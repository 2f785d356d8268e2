/**
 * Connector base shared by every media server client
 *
 * Owns the request policy: per-call timeout, retry with exponential backoff
 * for transient failures only, and the unauthorized latch.
 */

import { CONNECTOR_CONFIG, type ServerType } from '@reelwatch/shared';
import { ConnectorError } from '../../../utils/errors.js';
import { toConnectorError } from '../../../utils/http.js';
import { createLogger } from '../../../utils/logger.js';
import { withRetry } from '../../../utils/retry.js';
import type { MediaServerConfig, ServerIdentity } from '../types.js';

const log = createLogger('Connector');

export abstract class ConnectorBase {
  public abstract readonly serverType: ServerType;

  protected baseUrl: string;
  protected token: string;
  protected timeoutMs: number;
  protected maxAttempts: number;
  protected retryDelayMs: number;

  private unauthorized = false;

  constructor(config: MediaServerConfig) {
    this.baseUrl = config.url.replace(/\/$/, '');
    this.token = config.token;
    this.timeoutMs = config.timeoutMs ?? CONNECTOR_CONFIG.REQUEST_TIMEOUT_MS;
    this.maxAttempts = config.maxAttempts ?? CONNECTOR_CONFIG.MAX_RETRIES;
    this.retryDelayMs = config.retryDelayMs ?? CONNECTOR_CONFIG.INITIAL_RETRY_DELAY_MS;
  }

  get isUnauthorized(): boolean {
    return this.unauthorized;
  }

  reconfigure(config: Partial<MediaServerConfig>): void {
    if (config.url !== undefined) this.baseUrl = config.url.replace(/\/$/, '');
    if (config.token !== undefined) this.token = config.token;
    if (config.timeoutMs !== undefined) this.timeoutMs = config.timeoutMs;
    if (config.maxAttempts !== undefined) this.maxAttempts = config.maxAttempts;
    if (config.retryDelayMs !== undefined) this.retryDelayMs = config.retryDelayMs;

    if (this.unauthorized) {
      log.info('Credentials replaced, clearing unauthorized state', { serverType: this.serverType });
    }
    this.unauthorized = false;
  }

  abstract getServerIdentity(): Promise<ServerIdentity>;

  /**
   * Test connection to the server
   */
  async testConnection(): Promise<boolean> {
    try {
      await this.getServerIdentity();
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Run one upstream call under the connector's request policy.
   * Every failure leaves here as a ConnectorError.
   */
  protected async call<T>(operation: string, fn: (timeoutMs: number) => Promise<T>): Promise<T> {
    if (this.unauthorized) {
      throw new ConnectorError(
        this.serverType,
        'unauthorized',
        `${operation} refused: credentials were rejected, reconfigure required`
      );
    }

    try {
      return await withRetry(
        async () => {
          try {
            return await fn(this.timeoutMs);
          } catch (error) {
            throw toConnectorError(this.serverType, error);
          }
        },
        {
          maxAttempts: this.maxAttempts,
          initialDelayMs: this.retryDelayMs,
          maxDelayMs: CONNECTOR_CONFIG.MAX_RETRY_DELAY_MS,
          multiplier: CONNECTOR_CONFIG.RETRY_MULTIPLIER,
          shouldRetry: (error) => error instanceof ConnectorError && error.retryable,
          onRetry: (error, attempt, delayMs) => {
            log.warn(`${operation} failed (attempt ${attempt}/${this.maxAttempts}), retrying`, {
              delayMs,
              error: error instanceof Error ? error.message : String(error),
            });
          },
        }
      );
    } catch (error) {
      const connectorError = toConnectorError(this.serverType, error);
      if (connectorError.kind === 'unauthorized' && !this.unauthorized) {
        this.unauthorized = true;
        log.error('Server rejected credentials; connector disabled until reconfigured', {
          serverType: this.serverType,
          operation,
        });
      }
      throw connectorError;
    }
  }
}
