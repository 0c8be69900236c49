import type { Request } from 'express';
import { ValidationError } from '../errors';
import type { CsvDelimiter } from '../types';
import { parseDecimal } from '../utils/numbers';

export function readBody(req: Request): Record<string, unknown> {
  const body: Record<string, unknown> = req.body && typeof req.body === 'object' && !Array.isArray(req.body)
    ? req.body
    : {};
  return body;
}

/** Accepts JSON numbers and decimal strings such as "11,5". */
export function readNumber(value: unknown, field: string): number {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string') {
    const parsed = parseDecimal(value);
    if (parsed !== null) return parsed;
  }
  throw new ValidationError(`${field} must be a number`);
}

export function readOptionalString(value: unknown, field: string): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be a string`);
  }
  return value;
}

export function readDelimiter(value: unknown): CsvDelimiter {
  return value === ',' || value === 'comma' ? ',' : ';';
}
