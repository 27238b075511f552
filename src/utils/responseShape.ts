import { MalformedResponseError } from '../core/errors';

// Narrowing des corps JSON d'exchange (champs supplémentaires ignorés)

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function requireRecord(source: string, value: unknown, path: string): JsonRecord {
  if (!isRecord(value)) {
    throw new MalformedResponseError(source, `${path} is not an object`);
  }
  return value;
}

export function requireArray(source: string, value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new MalformedResponseError(source, `${path} is not an array`);
  }
  return value;
}

export function requireString(source: string, value: unknown, path: string): string {
  if (typeof value !== 'string') {
    throw new MalformedResponseError(source, `${path} is not a string`);
  }
  return value;
}
