import { ValidationError } from './errors.js';
import type { StatusRef } from './taiga-client.js';
import { isRecord, toInteger } from './utils.js';

// Coercion helpers for loosely typed input (HTTP query strings and JSON bodies).
// Every failure is a ValidationError naming the offending field.

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function parseInteger(value: unknown, field: string): number {
  const parsed = toInteger(value);
  if (parsed === undefined) {
    throw new ValidationError(`${field} must be an integer`);
  }
  return parsed;
}

export function optionalInteger(value: unknown, field: string): number | null {
  return value === null ? null : parseInteger(value, field);
}

export function ensureJsonObject(body: unknown): Record<string, unknown> {
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return body;
}

export function requireField(data: Record<string, unknown>, field: string): unknown {
  if (!Object.prototype.hasOwnProperty.call(data, field)) {
    throw new ValidationError(`Field '${field}' is required`);
  }
  return data[field];
}

/**
 * Reads an optional body field. Absent keys stay `undefined` (leave unchanged);
 * present keys, `null` included, go through `parse`.
 */
export function optionalField<T>(
  data: Record<string, unknown>,
  field: string,
  parse: (value: unknown, field: string) => T
): T | undefined {
  if (!Object.prototype.hasOwnProperty.call(data, field)) {
    return undefined;
  }
  return parse(data[field], field);
}

export function ensureList(value: unknown, field: string): string[] | null {
  if (value === null) return null;
  if (!Array.isArray(value)) {
    throw new ValidationError(`${field} must be a list`);
  }
  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      throw new ValidationError(`${field} must be a list of strings`);
    }
    items.push(item);
  }
  return items;
}

export function ensureStatusRef(value: unknown, field: string): StatusRef | null {
  if (value === null) return null;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  throw new ValidationError(`${field} must be an integer or string`);
}

export function ensureText(value: unknown, field: string): string | null {
  if (value === null) return null;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  throw new ValidationError(`${field} must be a string`);
}

export function ensureObject(value: unknown, field: string): Record<string, unknown> | null {
  if (value === null) return null;
  if (!isRecord(value)) {
    throw new ValidationError(`${field} must be an object`);
  }
  return value;
}

/** Accepts a calendar date in `YYYY-MM-DD` form; `null` clears the date. */
export function validateDueDate(value: string | null): string | null {
  if (value === null) return null;

  const parsed = new Date(`${value}T00:00:00Z`);
  if (!ISO_DATE.test(value) || isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== value) {
    throw new ValidationError('due_date must be in YYYY-MM-DD format');
  }
  return value;
}

// ============================================
// QUERY STRING HELPERS
// ============================================

type QueryBag = Record<string, unknown>;

export function queryValues(query: QueryBag, name: string): string[] {
  const raw = query[name];
  if (typeof raw === 'string') return [raw];
  if (Array.isArray(raw)) {
    return raw.filter((item): item is string => typeof item === 'string');
  }
  return [];
}

/** First non-empty value of a query parameter. */
export function queryValue(query: QueryBag, name: string): string | undefined {
  return queryValues(query, name).find((value) => value !== '');
}

export function requireQueryValue(query: QueryBag, name: string): string {
  const value = queryValue(query, name);
  if (value === undefined) {
    throw new ValidationError(`${name} is required`);
  }
  return value;
}

export function optionalQueryInteger(query: QueryBag, name: string): number | undefined {
  const value = queryValue(query, name);
  return value === undefined ? undefined : parseInteger(value, name);
}
