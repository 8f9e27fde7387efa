import type { NumericRange } from '../domain/MaterialProperties';
import { validationError } from '../reliability/DomainError';

/**
 * Shape checks for untrusted JSON (request bodies, seed files).
 *
 * Readers only check presence and primitive type and throw a VALIDATION_ERROR
 * naming the field. Domain rules (ranges, ordering) live in the engine's
 * input validation.
 */

export type UnknownRecord = Record<string, unknown>;

export const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const requireRecord = (value: unknown, field: string): UnknownRecord => {
  if (!isRecord(value)) {
    throw validationError(field, `${field} must be an object.`);
  }
  return value;
};

export const requireArray = (value: unknown, field: string): unknown[] => {
  if (!Array.isArray(value)) {
    throw validationError(field, `${field} must be an array.`);
  }
  return value;
};

export const readString = (
  record: UnknownRecord,
  key: string,
  path = '',
): string => {
  const value = record[key];
  if (typeof value !== 'string' || !value.trim()) {
    throw validationError(`${path}${key}`, `${path}${key} is required.`);
  }
  return value.trim();
};

export const readOptionalString = (
  record: UnknownRecord,
  key: string,
  path = '',
): string | undefined =>
  record[key] === undefined || record[key] === null
    ? undefined
    : readString(record, key, path);

export const readNumber = (
  record: UnknownRecord,
  key: string,
  path = '',
): number => {
  const value = record[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw validationError(
      `${path}${key}`,
      `${path}${key} must be a finite number.`,
    );
  }
  return value;
};

export const readOptionalNumber = (
  record: UnknownRecord,
  key: string,
  path = '',
): number | undefined =>
  record[key] === undefined || record[key] === null
    ? undefined
    : readNumber(record, key, path);

export const readOptionalBoolean = (
  record: UnknownRecord,
  key: string,
  path = '',
): boolean | undefined => {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw validationError(`${path}${key}`, `${path}${key} must be a boolean.`);
  }
  return value;
};

export const readRecord = (
  record: UnknownRecord,
  key: string,
  path = '',
): UnknownRecord => requireRecord(record[key], `${path}${key}`);

export const readRange = (
  record: UnknownRecord,
  key: string,
  path = '',
): NumericRange => {
  const range = readRecord(record, key, path);
  const nested = `${path}${key}.`;
  return {
    min: readNumber(range, 'min', nested),
    max: readNumber(range, 'max', nested),
  };
};

export const readOneOf = <T extends string>(
  record: UnknownRecord,
  key: string,
  allowed: readonly T[],
  path = '',
): T => {
  const value = record[key];
  const match = allowed.find((option) => option === value);
  if (match === undefined) {
    throw validationError(
      `${path}${key}`,
      `${path}${key} must be one of ${allowed.join(', ')}.`,
    );
  }
  return match;
};

export const readOptionalOneOf = <T extends string>(
  record: UnknownRecord,
  key: string,
  allowed: readonly T[],
  path = '',
): T | undefined =>
  record[key] === undefined || record[key] === null
    ? undefined
    : readOneOf(record, key, allowed, path);
