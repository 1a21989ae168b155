import { InvalidArgumentError } from '../errors.js';
import { formatDate } from './validator.service.js';

const DAY_MS = 24 * 60 * 60 * 1000;

// Ties go to the even neighbour: 7.5 -> 8, 22.5 -> 22
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

function daysBetween(start: Date, end: Date): number {
  return Math.round((end.getTime() - start.getTime()) / DAY_MS);
}

/**
 * Samples `count` dates evenly across `[start, end]`, both ends included.
 *
 * Each offset is rounded on its own rather than accumulated, so the gaps may
 * differ by a day. Dates that collapse onto the same day after rounding are
 * kept once, which means the result can be shorter than `count`.
 */
export function evenlySpacedDates(start: Date, end: Date, count: number): Date[] {
  if (count < 2) {
    throw new InvalidArgumentError('num-dates must be >= 2');
  }
  const span = daysBetween(start, end);
  if (span < 0) {
    throw new InvalidArgumentError('end-date must be on or after start-date');
  }

  // Beyond one sample per day the rounded offsets already cover every day
  const samples = Math.min(count, span + 1);
  if (samples === 1) {
    return [start];
  }

  let candidates: Date[];
  if (samples === 2) {
    candidates = [start, end];
  } else {
    const step = span / (samples - 1);
    candidates = [];
    for (let i = 0; i < samples; i++) {
      candidates.push(addDays(start, roundHalfEven(i * step)));
    }
    candidates[0] = start;
    candidates[candidates.length - 1] = end;
  }

  const seen = new Set<string>();
  return candidates.filter(date => {
    const day = formatDate(date);
    if (seen.has(day)) return false;
    seen.add(day);
    return true;
  });
}
