/**
 * SafeLogger - JSON rendering for log output
 *
 * - Masks fields registered with registerSensitiveFields
 * - Falls back to toString() for values JSON cannot represent
 * - Never throws: serialization failures return "{}"
 */
import logger from '../../infra/logger/logger.js';
import { getSensitiveOptions } from './sensitive.js';

const FULL_MASK_LENGTH = 8;

/**
 * Mask a value, optionally leaving the last characters visible
 *
 * @example
 * mask('123456789', 3) // '******789'
 * mask('secret')       // '********'
 */
export function mask(value: string, showLast?: number, maskChar?: string): string;
export function mask(
  value: string | null | undefined,
  showLast?: number,
  maskChar?: string
): string | null | undefined;
export function mask(
  value: string | null | undefined,
  showLast = 0,
  maskChar = '*'
): string | null | undefined {
  if (value === null || value === undefined || value.length === 0) {
    return value;
  }

  if (showLast <= 0) {
    return maskChar.repeat(FULL_MASK_LENGTH);
  }

  if (value.length <= showLast) {
    return maskChar.repeat(value.length);
  }

  return maskChar.repeat(value.length - showLast) + value.slice(value.length - showLast);
}

function hasCustomToString(value: object): boolean {
  return value.toString !== Object.prototype.toString;
}

function hasToJson(value: object): value is { toJSON: () => unknown } {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

/**
 * Convert a value into something JSON.stringify renders faithfully
 */
function normalize(value: unknown, ancestors: object[]): unknown {
  if (typeof value === 'bigint' || typeof value === 'symbol') {
    return value.toString();
  }

  if (typeof value === 'function') {
    return `[Function ${value.name || 'anonymous'}]`;
  }

  if (typeof value !== 'object' || value === null) {
    return value;
  }

  if (ancestors.includes(value)) {
    return '[Circular]';
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }

  const path = [...ancestors, value];

  if (Array.isArray(value)) {
    return value.map((item) => normalize(item, path));
  }

  if (value instanceof Map) {
    const entries: Record<string, unknown> = {};
    for (const [key, entry] of value) {
      entries[String(key)] = normalize(entry, path);
    }
    return entries;
  }

  if (value instanceof Set) {
    return Array.from(value, (item) => normalize(item, path));
  }

  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }

  if (hasToJson(value)) {
    return normalize(value.toJSON(), path);
  }

  const keys = Object.keys(value);
  if (keys.length === 0 && hasCustomToString(value)) {
    return String(value);
  }

  const result: Record<string, unknown> = {};
  for (const key of keys) {
    const field: unknown = Reflect.get(value, key);
    const sensitive = getSensitiveOptions(value, key);
    if (sensitive && field !== null && field !== undefined) {
      result[key] = mask(String(field), sensitive.showLast, sensitive.maskChar);
    } else {
      result[key] = normalize(field, path);
    }
  }
  return result;
}

/**
 * Serialize any value to indented JSON with sensitive fields masked
 */
export function toJson(value: unknown): string {
  try {
    return JSON.stringify(normalize(value, []), null, 2) ?? 'null';
  } catch (error) {
    logger.warn({ err: error }, 'Failed to serialize object to JSON');
    return '{}';
  }
}

export const SafeLogger = {
  toJson,
  mask,
};

export default SafeLogger;
