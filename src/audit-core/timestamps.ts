import type { RawTimestamp } from './records';

export type TimestampResolution =
  | { state: 'absent' }
  | { state: 'invalid'; raw: string }
  | { state: 'valid'; iso: string; ms: number };

// `2026-02-11 10:15:00` style values carry no zone; source rows store UTC.
const ZONELESS = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

/**
 * Resolves a raw source timestamp (ISO string, epoch milliseconds or Date)
 * to a canonical UTC ISO string.
 */
export function resolveTimestamp(raw: RawTimestamp): TimestampResolution {
  if (raw === null || raw === undefined) return { state: 'absent' };

  let ms: number;
  if (raw instanceof Date) {
    ms = raw.getTime();
  } else if (typeof raw === 'number') {
    ms = Number.isFinite(raw) ? raw : Number.NaN;
  } else {
    const text = raw.trim();
    if (text === '') return { state: 'absent' };
    ms = Date.parse(ZONELESS.test(text) ? `${text.replace(' ', 'T')}Z` : text);
  }

  // Finite epochs beyond ±8.64e15 ms have no Date; `getTime()` is NaN for them.
  const date = new Date(ms);
  if (Number.isNaN(date.getTime())) return { state: 'invalid', raw: String(raw) };
  return { state: 'valid', iso: date.toISOString(), ms: date.getTime() };
}

export function utcDay(iso: string): string {
  return iso.slice(0, 10);
}

export function minutesBetween(fromIso: string, toIso: string): number {
  return (Date.parse(toIso) - Date.parse(fromIso)) / 60_000;
}

export function secondsBetween(fromIso: string, toIso: string): number {
  return (Date.parse(toIso) - Date.parse(fromIso)) / 1000;
}
