/**
 * Record readers
 *
 * Turn loosely-typed loader records into typed warnings/events.
 * Anything missing or malformed raises RecordValidationError naming the field.
 */

import { RecordValidationError } from './errors.js';
import { JSONField } from './schema.js';
import type {
  CountEvent,
  CountWarning,
  FacetEvent,
  FacetWarning,
  LocationScope,
  RawRecord,
  RecordId,
  ScopedFields,
} from './types.js';

function describe(value: unknown): string {
  return value === undefined ? 'missing' : JSON.stringify(value);
}

/**
 * Read a non-empty string field
 */
export function readString(record: RawRecord, field: string): string {
  const value = record[field];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new RecordValidationError(`${field} must be a non-empty string, got ${describe(value)}`, field);
  }
  return value;
}

/**
 * Read an optional string field; null and undefined become undefined
 */
export function readOptionalString(record: RawRecord, field: string): string | undefined {
  const value = record[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new RecordValidationError(`${field} must be a string, got ${describe(value)}`, field);
  }
  return value;
}

/**
 * Read a finite number. Numeric strings are accepted.
 */
export function readNumber(record: RawRecord, field: string): number {
  const value = record[field];
  const parsed = typeof value === 'string' && value.trim().length > 0 ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
    throw new RecordValidationError(`${field} must be a finite number, got ${describe(value)}`, field);
  }
  return parsed;
}

/**
 * Read a Warning_ID / Event_ID
 */
export function readRecordId(record: RawRecord, field: string): RecordId {
  const value = record[field];
  if ((typeof value === 'string' && value.length > 0) || (typeof value === 'number' && Number.isFinite(value))) {
    return value;
  }
  throw new RecordValidationError(`${field} must be a string or number, got ${describe(value)}`, field);
}

/**
 * Read a facet that may hold one value or a collection of acceptable values
 */
export function readFacetValues(record: RawRecord, field: string): readonly string[] {
  const value = record[field];
  if (typeof value === 'string') {
    return [value];
  }
  if (Array.isArray(value) && value.length > 0 && value.every((v): v is string => typeof v === 'string')) {
    return [...value];
  }
  throw new RecordValidationError(`${field} must be a string or a list of strings, got ${describe(value)}`, field);
}

const TRUE_STRINGS = new Set(['true', '1', 'yes', 't', 'y']);
const FALSE_STRINGS = new Set(['false', '0', 'no', 'f', 'n']);

/**
 * Coerce a boolean-ish value (true, 1, "True", "false", ...) to a boolean.
 * Returns null when the value cannot be read as a boolean.
 */
export function coerceBoolean(value: unknown): boolean | null {
  if (typeof value === 'boolean') return value;
  if (value === 0 || value === 1) return value === 1;
  if (typeof value === 'string') {
    const lower = value.trim().toLowerCase();
    if (TRUE_STRINGS.has(lower)) return true;
    if (FALSE_STRINGS.has(lower)) return false;
  }
  return null;
}

/**
 * Read a boolean flag, accepting boolean-ish strings
 */
export function readBoolean(record: RawRecord, field: string): boolean {
  const value = record[field];
  const coerced = coerceBoolean(value);
  if (coerced === null) {
    throw new RecordValidationError(`${field} must be a boolean, got ${describe(value)}`, field);
  }
  return coerced;
}

/**
 * Read category and location fields without throwing.
 * Returns null when the record lacks a category or country.
 */
export function readScopedFields(record: RawRecord): ScopedFields | null {
  const category = record[JSONField.EVENT_TYPE];
  const country = record[JSONField.COUNTRY];
  if (typeof category !== 'string' || typeof country !== 'string') {
    return null;
  }
  const state = record[JSONField.STATE];
  const city = record[JSONField.CITY];
  return {
    category,
    country,
    state: typeof state === 'string' ? state : undefined,
    city: typeof city === 'string' ? city : undefined,
  };
}

/**
 * Check whether a record belongs to a category and location scope.
 * Only the scope levels that are set are compared.
 */
export function isInScope(record: RawRecord, category: string, scope: LocationScope): boolean {
  const fields = readScopedFields(record);
  if (!fields) return false;
  if (fields.category !== category) return false;
  if (fields.country !== scope.country) return false;
  if (scope.state !== undefined && fields.state !== scope.state) return false;
  if (scope.city !== undefined && fields.city !== scope.city) return false;
  return true;
}

function readScope(record: RawRecord): ScopedFields {
  return {
    category: readString(record, JSONField.EVENT_TYPE),
    country: readString(record, JSONField.COUNTRY),
    state: readOptionalString(record, JSONField.STATE),
    city: readOptionalString(record, JSONField.CITY),
  };
}

export function parseCountWarning(record: RawRecord): CountWarning {
  return {
    ...readScope(record),
    warningId: readRecordId(record, JSONField.WARNING_ID),
    eventDate: readString(record, JSONField.EVENT_DATE),
    caseCount: readNumber(record, JSONField.CASE_COUNT),
  };
}

export function parseCountEvent(record: RawRecord): CountEvent {
  return {
    ...readScope(record),
    eventId: readRecordId(record, JSONField.EVENT_ID),
    eventDate: readString(record, JSONField.EVENT_DATE),
    caseCount: readNumber(record, JSONField.CASE_COUNT),
  };
}

export function parseFacetWarning(record: RawRecord): FacetWarning {
  return {
    ...readScope(record),
    warningId: readRecordId(record, JSONField.WARNING_ID),
    eventDate: readString(record, JSONField.EVENT_DATE),
    latitude: readNumber(record, JSONField.LATITUDE),
    longitude: readNumber(record, JSONField.LONGITUDE),
    actor: readString(record, JSONField.ACTOR),
    subtype: readString(record, JSONField.SUBTYPE),
  };
}

export function parseFacetEvent(record: RawRecord): FacetEvent {
  return {
    ...readScope(record),
    eventId: readRecordId(record, JSONField.EVENT_ID),
    eventDate: readString(record, JSONField.EVENT_DATE),
    latitude: readNumber(record, JSONField.LATITUDE),
    longitude: readNumber(record, JSONField.LONGITUDE),
    approximateLocation: readBoolean(record, JSONField.APPROXIMATE_LOCATION),
    actor: readFacetValues(record, JSONField.ACTOR),
    subtype: readFacetValues(record, JSONField.SUBTYPE),
  };
}
