/**
 * Safe Type Coercion Utilities
 *
 * Narrow unknown API response data into typed values. Used by every connector
 * parser so a missing or oddly-typed upstream field never throws.
 */

/**
 * Type guard for plain JSON objects
 */
export function isRecord(val: unknown): val is Record<string, unknown> {
  return val != null && typeof val === 'object' && !Array.isArray(val);
}

/**
 * Safely convert unknown value to string
 *
 * @example
 * parseString(response.Id) // "abc123"
 * parseString(null) // ""
 * parseString(undefined, 'unknown') // "unknown"
 */
export function parseString(val: unknown, defaultVal = ''): string {
  if (val == null) return defaultVal;
  return String(val);
}

/**
 * Returns undefined for null/undefined, otherwise the value as a string
 */
export function parseOptionalString(val: unknown): string | undefined {
  if (val == null) return undefined;
  return String(val);
}

/**
 * Safely convert unknown value to number
 *
 * @example
 * parseNumber(response.Duration) // 7200
 * parseNumber("invalid") // 0
 */
export function parseNumber(val: unknown, defaultVal = 0): number {
  if (val == null || val === '') return defaultVal;
  const num = Number(val);
  return Number.isFinite(num) ? num : defaultVal;
}

export function parseOptionalNumber(val: unknown): number | undefined {
  if (val == null || val === '') return undefined;
  const num = Number(val);
  return Number.isFinite(num) ? num : undefined;
}

/**
 * Safely convert unknown value to boolean. Accepts the strings "true"/"1" (Plex XML attributes)
 */
export function parseBoolean(val: unknown, defaultVal = false): boolean {
  if (val == null) return defaultVal;
  if (typeof val === 'string') return val === 'true' || val === '1';
  return Boolean(val);
}

/**
 * Safely get a nested object from an unknown object
 *
 * @example
 * const playState = getNestedObject(session, 'PlayState');
 * const isPaused = parseBoolean(playState?.IsPaused);
 */
export function getNestedObject(val: unknown, key: string): Record<string, unknown> | undefined {
  if (!isRecord(val)) return undefined;
  const nested = val[key];
  return isRecord(nested) ? nested : undefined;
}

/**
 * Safely get a nested property value
 *
 * @example
 * const videoDirect = getNestedValue(session, 'TranscodingInfo', 'IsVideoDirect');
 */
export function getNestedValue(val: unknown, ...keys: string[]): unknown {
  let current: unknown = val;
  for (const key of keys) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

/**
 * Keep the object elements of an array; anything else yields []
 */
export function parseRecordArray(val: unknown): Record<string, unknown>[] {
  if (!Array.isArray(val)) return [];
  return val.filter(isRecord);
}
