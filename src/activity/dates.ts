import { ParseError } from './activity.errors.js';
import type { Window } from './types.js';

const DAY_MS = 86400e3;
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** GitHub timestamps look like `2024-01-05T12:34:56Z`. */
export function parseTimestamp(field: string, value: unknown): Date {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ParseError(field, value, 'expected an ISO 8601 timestamp');
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) throw new ParseError(field, value);
  return date;
}

export function parseOptionalTimestamp(field: string, value: unknown): Date | null {
  return value === null || value === undefined ? null : parseTimestamp(field, value);
}

/** `YYYY-MM-DD` to UTC midnight. Rejects impossible dates such as 2024-02-30. */
export function parseIsoDate(field: string, value: unknown): Date {
  const m = typeof value === 'string' ? value.match(ISO_DATE_RE) : null;
  if (!m) throw new ParseError(field, value, 'expected YYYY-MM-DD');
  const date = new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])));
  if (toIsoDate(date) !== value) throw new ParseError(field, value, 'no such day');
  return date;
}

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function startOfUtcDay(date: Date): Date {
  return new Date(Math.floor(date.getTime() / DAY_MS) * DAY_MS);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

export function minDate(a: Date, b: Date): Date {
  return a.getTime() <= b.getTime() ? a : b;
}

export function inWindow(date: Date, window: Window): boolean {
  const t = date.getTime();
  return window.start.getTime() <= t && t < window.end.getTime();
}

export function before(date: Date, bound: Date): boolean {
  return date.getTime() < bound.getTime();
}

export function atOrAfter(date: Date, bound: Date): boolean {
  return date.getTime() >= bound.getTime();
}
