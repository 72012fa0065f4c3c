import type { AuditRepository } from '@db/repository';

export interface AuditSettings {
  sessionGapMinutes: number;
  anomalySampleSize: number;
  defaultWindowDays: number;
  topNLimit: number;
}

/** Everything a router needs; passed in so tests can swap the store and the clock. */
export interface ApiContext {
  repository: AuditRepository;
  settings: AuditSettings;
  now: () => Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/** `[now - days, now]` as ISO strings; `to` is exclusive, so it is pushed one millisecond past now. */
export function trailingWindow(now: Date, days: number): { from: string; to: string } {
  return {
    from: new Date(now.getTime() - days * DAY_MS).toISOString(),
    to: new Date(now.getTime() + 1).toISOString(),
  };
}
