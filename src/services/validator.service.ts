import { InvalidArgumentError } from '../errors.js';
import { SERVICE_RANGE_END, SERVICE_RANGE_START } from '../config/constants.js';

const CURRENCY_PATTERN = /^[A-Z]{3}$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function validateCurrency(code: string | undefined, field: string): string {
  if (!code) {
    throw new InvalidArgumentError(`${field} currency is required.`);
  }
  const normalized = code.trim().toUpperCase();
  if (!CURRENCY_PATTERN.test(normalized)) {
    throw new InvalidArgumentError(`${field} must be a 3-letter code (got '${normalized}').`);
  }
  return normalized;
}

/** Parses a strict `YYYY-MM-DD` calendar date into UTC midnight. */
export function parseDate(value: string, field = 'date'): Date {
  const match = DATE_PATTERN.exec(value);
  if (match) {
    const year = parseInt(match[1], 10);
    const month = parseInt(match[2], 10);
    const day = parseInt(match[3], 10);
    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);
    // 2025-02-30 rolls over into March
    if (date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day) {
      return date;
    }
  }
  throw new InvalidArgumentError(`${field} must be in YYYY-MM-DD format (got '${value}').`);
}

export function formatDate(date: Date): string {
  return date.toISOString().split('T')[0];
}

export function parseDateCount(value: string): number {
  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`num-dates must be an integer (got '${value}').`);
  }
  return parseInt(trimmed, 10);
}

export function isWithinServiceRange(date: Date): boolean {
  const day = formatDate(date);
  return day >= SERVICE_RANGE_START && day <= SERVICE_RANGE_END;
}
