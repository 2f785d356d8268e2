/**
 * Zod schema validation tests for observations, pipeline config and API queries
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_PIPELINE_CONFIG,
  observationSchema,
  pipelineConfigSchema,
  recentHistoryQuerySchema,
  updatePipelineConfigSchema,
} from '@reelwatch/shared';
import { createMockSnapshot, createObservation, T0 } from './fixtures.js';

describe('observationSchema', () => {
  it('accepts an update with a snapshot', () => {
    const result = observationSchema.safeParse(createObservation());
    expect(result.success).toBe(true);
  });

  it('accepts a stop without a snapshot', () => {
    const result = observationSchema.safeParse(createObservation({ kind: 'stop', note: 'stale' }));
    expect(result.success).toBe(true);
  });

  it('rejects a start without a snapshot', () => {
    const result = observationSchema.safeParse({
      sessionKey: 'session-1',
      source: 'poll',
      kind: 'start',
      revision: 1,
      observedAt: T0,
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['snapshot']);
    }
  });

  it('rejects a snapshot for a different key', () => {
    const result = observationSchema.safeParse(
      createObservation({ snapshot: createMockSnapshot({ sessionKey: 'other' }) })
    );
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['snapshot', 'sessionKey']);
    }
  });

  it('rejects a negative revision and an unknown source', () => {
    expect(observationSchema.safeParse(createObservation({ revision: -1 })).success).toBe(false);
    expect(
      observationSchema.safeParse({ ...createObservation(), source: 'carrier-pigeon' }).success
    ).toBe(false);
  });

  it('rejects an unknown history note', () => {
    const result = observationSchema.safeParse({
      ...createObservation({ kind: 'stop' }),
      note: 'bored',
    });
    expect(result.success).toBe(false);
  });
});

describe('pipelineConfigSchema', () => {
  it('accepts the defaults', () => {
    expect(pipelineConfigSchema.safeParse(DEFAULT_PIPELINE_CONFIG).success).toBe(true);
  });

  it('rejects a reconnect floor above the ceiling', () => {
    const result = pipelineConfigSchema.safeParse({
      ...DEFAULT_PIPELINE_CONFIG,
      pushReconnectInitialMs: 120_000,
      pushReconnectMaxMs: 60_000,
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['pushReconnectInitialMs']);
    }
  });

  it('bounds the watched threshold to (0, 1]', () => {
    const base = DEFAULT_PIPELINE_CONFIG;
    expect(pipelineConfigSchema.safeParse({ ...base, watchedThreshold: 1 }).success).toBe(true);
    expect(pipelineConfigSchema.safeParse({ ...base, watchedThreshold: 0 }).success).toBe(false);
    expect(pipelineConfigSchema.safeParse({ ...base, watchedThreshold: 85 }).success).toBe(false);
  });
});

describe('updatePipelineConfigSchema', () => {
  it('accepts a partial update', () => {
    const result = updatePipelineConfigSchema.safeParse({ pollIntervalMs: 2000 });
    expect(result.success).toBe(true);
    if (result.success) expect(result.data).toEqual({ pollIntervalMs: 2000 });
  });

  it('rejects unknown keys', () => {
    expect(updatePipelineConfigSchema.safeParse({ pollEveryMs: 2000 }).success).toBe(false);
  });

  it('rejects a poll interval below 500ms', () => {
    expect(updatePipelineConfigSchema.safeParse({ pollIntervalMs: 100 }).success).toBe(false);
  });
});

describe('recentHistoryQuerySchema', () => {
  it('defaults the limit to 20', () => {
    expect(recentHistoryQuerySchema.parse({})).toEqual({ limit: 20 });
  });

  it('coerces a query string limit', () => {
    expect(recentHistoryQuerySchema.parse({ limit: '5' })).toEqual({ limit: 5 });
  });

  it('caps the limit at 100', () => {
    expect(recentHistoryQuerySchema.safeParse({ limit: '500' }).success).toBe(false);
  });
});
