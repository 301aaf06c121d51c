import { DeviceError, LinkplayError, ProtocolError } from '../errors.js';
import { dehex } from './hex.js';

export type Result<T> = { ok: true; value: T } | { ok: false; error: LinkplayError };

export type ShapeKind = 'ok' | 'integer' | 'text' | 'record' | 'field' | 'enumeration';

export type DeviceRecord = Record<string, unknown>;

/**
 * What a command expects back from the device. `match` returns undefined when
 * the body is not in this shape; {@link normalize} then decides between a
 * device-reported failure and an unrecognized response.
 */
export interface ResponseShape<T> {
  readonly kind: ShapeKind;
  readonly expected: string;
  match(body: string): T | undefined;
}

const FAILURE_TOKENS = new Set(['fail', 'failed', 'error', 'unknown command']);

export function isFailureToken(body: string): boolean {
  return FAILURE_TOKENS.has(body.trim().toLowerCase());
}

export function normalize<T>(shape: ResponseShape<T>, raw: string): Result<T> {
  const body = raw.trim();
  const value = body ? shape.match(body) : undefined;
  if (value !== undefined) {
    return { ok: true, value };
  }
  if (isFailureToken(body)) {
    return { ok: false, error: new DeviceError(`Device reported failure: '${body}'`) };
  }
  return {
    ok: false,
    error: new ProtocolError(
      body ? `Expected ${shape.expected} from device, got '${truncate(body)}'` : `Expected ${shape.expected} from device, got an empty response`,
    ),
  };
}

export function unwrap<T>(result: Result<T>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}

function truncate(body: string): string {
  return body.length > 120 ? `${body.slice(0, 120)}…` : body;
}

export function parseRecord(body: string): DeviceRecord | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return undefined;
  }
  return isRecord(parsed) ? parsed : undefined;
}

export function isRecord(value: unknown): value is DeviceRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toInteger(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : undefined;
  }
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
    return parseInt(value, 10);
  }
  return undefined;
}

function fieldOf(body: string, name: string): unknown {
  return parseRecord(body)?.[name];
}

// --- Shapes ---

export const ok: ResponseShape<true> = {
  kind: 'ok',
  expected: "'OK'",
  match: (body) => (body === 'OK' ? true : undefined),
};

export const text: ResponseShape<string> = {
  kind: 'text',
  expected: 'a non-empty response',
  match: (body) => (isFailureToken(body) ? undefined : body),
};

export const record: ResponseShape<DeviceRecord> = {
  kind: 'record',
  expected: 'a JSON object',
  match: parseRecord,
};

/** Bare numeric text, or (when a field is named) that field of a JSON object. */
export function integer(field?: string): ResponseShape<number> {
  return {
    kind: 'integer',
    expected: field ? `an integer or a JSON object with integer '${field}'` : 'an integer',
    match: (body) => toInteger(body) ?? (field ? toInteger(fieldOf(body, field)) : undefined),
  };
}

export function stringField(field: string): ResponseShape<string> {
  return {
    kind: 'field',
    expected: `a JSON object with '${field}'`,
    match: (body) => {
      const value = fieldOf(body, field);
      if (typeof value === 'string') return value;
      if (typeof value === 'number') return String(value);
      return undefined;
    },
  };
}

export function hexField(field: string): ResponseShape<string> {
  const inner = stringField(field);
  return {
    kind: 'field',
    expected: inner.expected,
    match: (body) => {
      const value = inner.match(body);
      return value === undefined ? undefined : dehex(value);
    },
  };
}

export function flagField(field: string): ResponseShape<boolean> {
  return {
    kind: 'field',
    expected: `a JSON object with '${field}' set to 0 or 1`,
    match: (body) => {
      const value = toInteger(fieldOf(body, field));
      if (value === 1) return true;
      if (value === 0) return false;
      return undefined;
    },
  };
}

export function integerField(field: string): ResponseShape<number> {
  return {
    kind: 'field',
    expected: `a JSON object with integer '${field}'`,
    match: (body) => toInteger(fieldOf(body, field)),
  };
}

/**
 * Maps a wire value back to its name in a closed table. The table is checked
 * before failure tokens, since some firmware states (`FAIL`) are values.
 */
export function enumeration<K extends string>(
  table: Readonly<Record<K, number | string>>,
  field?: string,
): ResponseShape<K> {
  const names = Object.keys(table).join(', ');
  return {
    kind: 'enumeration',
    expected: field ? `a JSON object with '${field}' one of [${names}]` : `one of [${names}]`,
    match: (body) => {
      const wire = field ? fieldOf(body, field) : body;
      if (typeof wire !== 'string' && typeof wire !== 'number') {
        return undefined;
      }
      for (const name in table) {
        if (String(table[name]) === String(wire).trim()) {
          return name;
        }
      }
      return undefined;
    },
  };
}
