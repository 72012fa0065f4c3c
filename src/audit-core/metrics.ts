import { ERROR_CATEGORIES } from '@shared/constants';
import type { ErrorCategory } from '@shared/types';
import { addCounts, bump, copyCounts, countMap, ownEntry } from './counts';
import { eventTime, type AuditEvent } from './events';
import type { Session } from './sessions';
import { utcDay } from './timestamps';

// ---------------------------------------------------------------------------
// Public interface
// ---------------------------------------------------------------------------
//
// Every rollup is a prototype-less count map (see ./counts). `combineMetrics`
// adds maps key by key, so partials computed per time shard combine into the
// same totals as one pass.

export interface UserActivity {
  actions: number;
  byDay: Record<string, number>;
  byScenario: Record<string, number>;
  byActionType: Record<string, number>;
}

export interface MetricsAccumulator {
  errorCategories: Record<string, number>;
  failingNodes: Record<string, number>;
  dailyRuns: Record<string, { success: number; failed: number }>;
  users: Record<string, UserActivity>;
}

export interface MetricsWindow {
  /** Inclusive. */
  from?: string;
  /** Exclusive, so adjacent windows never count an event twice. */
  to?: string;
}

export interface CountEntry<K extends string = string> {
  key: K;
  count: number;
}

export interface DailySuccessRate {
  day: string;
  success: number;
  failed: number;
  total: number;
  successRate: number;
}

export interface UserVelocity {
  userId: string;
  windowDays: number;
  totalActions: number;
  actionsPerDay: number;
  activeDays: number;
  scenariosTouched: number;
  mostFrequentActionType: string | null;
  actionTypeDistribution: Record<string, number>;
  sessionCount: number;
  /** Mean session length, rounded to two decimals; 0 without sessions. */
  avgSessionDurationMinutes: number;
}

// ---------------------------------------------------------------------------
// Accumulation
// ---------------------------------------------------------------------------

export function emptyMetrics(): MetricsAccumulator {
  return { errorCategories: countMap(), failingNodes: countMap(), dailyRuns: countMap(), users: countMap() };
}

function dayCounts(dailyRuns: MetricsAccumulator['dailyRuns'], day: string): { success: number; failed: number } {
  const existing = ownEntry(dailyRuns, day);
  if (existing) return existing;
  const created = { success: 0, failed: 0 };
  dailyRuns[day] = created;
  return created;
}

function inWindow(event: AuditEvent, window: MetricsWindow): boolean {
  const t = eventTime(event);
  if (window.from !== undefined && t < Date.parse(window.from)) return false;
  if (window.to !== undefined && t >= Date.parse(window.to)) return false;
  return true;
}

function userActivity(acc: MetricsAccumulator, userId: string): UserActivity {
  const existing = ownEntry(acc.users, userId);
  if (existing) return existing;
  const created: UserActivity = { actions: 0, byDay: countMap(), byScenario: countMap(), byActionType: countMap() };
  acc.users[userId] = created;
  return created;
}

export function accumulateMetrics(
  events: readonly AuditEvent[],
  window: MetricsWindow = {},
): MetricsAccumulator {
  const acc = emptyMetrics();

  for (const event of events) {
    if (!inWindow(event, window)) continue;

    switch (event.eventType) {
      case 'log_entry':
        if (event.payload.severity === 'ERROR') {
          bump(acc.errorCategories, event.payload.errorCategory);
          if (event.nodeId !== null) bump(acc.failingNodes, event.nodeId);
        }
        break;
      case 'run_failed': {
        dayCounts(acc.dailyRuns, utcDay(event.timestamp)).failed += 1;
        for (const nodeId of event.payload.failedNodeIds) bump(acc.failingNodes, nodeId);
        break;
      }
      case 'run_completed': {
        dayCounts(acc.dailyRuns, utcDay(event.timestamp)).success += 1;
        break;
      }
      case 'user_action': {
        if (event.actor === null) break;
        const activity = userActivity(acc, event.actor);
        activity.actions += 1;
        bump(activity.byDay, utcDay(event.timestamp));
        bump(activity.byScenario, event.scenarioId);
        bump(activity.byActionType, event.payload.actionType);
        break;
      }
      case 'state_change':
      case 'input_change':
      case 'run_started':
        break;
    }
  }

  return acc;
}

/** Associative, commutative merge; `emptyMetrics()` is the identity. */
export function combineMetrics(a: MetricsAccumulator, b: MetricsAccumulator): MetricsAccumulator {
  const dailyRuns: MetricsAccumulator['dailyRuns'] = countMap();
  for (const source of [a.dailyRuns, b.dailyRuns]) {
    for (const [day, counts] of Object.entries(source)) {
      const target = dayCounts(dailyRuns, day);
      target.success += counts.success;
      target.failed += counts.failed;
    }
  }

  const users: Record<string, UserActivity> = countMap();
  for (const source of [a.users, b.users]) {
    for (const [userId, activity] of Object.entries(source)) {
      const target = ownEntry(users, userId);
      users[userId] = target
        ? {
            actions: target.actions + activity.actions,
            byDay: addCounts(target.byDay, activity.byDay),
            byScenario: addCounts(target.byScenario, activity.byScenario),
            byActionType: addCounts(target.byActionType, activity.byActionType),
          }
        : {
            actions: activity.actions,
            byDay: copyCounts(activity.byDay),
            byScenario: copyCounts(activity.byScenario),
            byActionType: copyCounts(activity.byActionType),
          };
    }
  }

  return {
    errorCategories: addCounts(a.errorCategories, b.errorCategories),
    failingNodes: addCounts(a.failingNodes, b.failingNodes),
    dailyRuns,
    users,
  };
}

// ---------------------------------------------------------------------------
// Readers
// ---------------------------------------------------------------------------

/** Highest counts first; equal counts by key so the order is stable. */
function topN(counts: Record<string, number>, limit: number): CountEntry[] {
  return Object.entries(counts)
    .map(([key, count]) => ({ key, count }))
    .sort((a, b) => b.count - a.count || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
    .slice(0, Math.max(0, limit));
}

export function topErrorCategories(acc: MetricsAccumulator, limit = 10): CountEntry<ErrorCategory>[] {
  return topN(acc.errorCategories, limit).flatMap((entry) =>
    isErrorCategory(entry.key) ? [{ key: entry.key, count: entry.count }] : [],
  );
}

export function topFailingNodes(acc: MetricsAccumulator, limit = 10): CountEntry[] {
  return topN(acc.failingNodes, limit);
}

export function dailySuccessRate(acc: MetricsAccumulator): DailySuccessRate[] {
  return Object.entries(acc.dailyRuns)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([day, { success, failed }]) => {
      const total = success + failed;
      return { day, success, failed, total, successRate: total > 0 ? success / total : 0 };
    });
}

/**
 * Activity rollup for one user. `sessions` are that user's sessions over the
 * same window, as produced by `groupSessions`.
 */
export function userVelocity(
  acc: MetricsAccumulator,
  userId: string,
  windowDays: number,
  sessions: readonly Session[] = [],
): UserVelocity {
  const activity = ownEntry(acc.users, userId);
  const days = Math.max(windowDays, 1);
  const sessionCount = sessions.length;
  const totalMinutes = sessions.reduce((sum, s) => sum + s.durationMinutes, 0);
  const avgSessionDurationMinutes = sessionCount > 0 ? Math.round((totalMinutes / sessionCount) * 100) / 100 : 0;
  if (!activity) {
    return {
      userId,
      windowDays: days,
      totalActions: 0,
      actionsPerDay: 0,
      activeDays: 0,
      scenariosTouched: 0,
      mostFrequentActionType: null,
      actionTypeDistribution: {},
      sessionCount,
      avgSessionDurationMinutes,
    };
  }
  const [mostFrequent] = topN(activity.byActionType, 1);
  return {
    userId,
    windowDays: days,
    totalActions: activity.actions,
    actionsPerDay: activity.actions / days,
    activeDays: Object.keys(activity.byDay).length,
    scenariosTouched: Object.keys(activity.byScenario).length,
    mostFrequentActionType: mostFrequent ? mostFrequent.key : null,
    actionTypeDistribution: copyCounts(activity.byActionType),
    sessionCount,
    avgSessionDurationMinutes,
  };
}

const CATEGORY_SET: ReadonlySet<string> = new Set<ErrorCategory>(ERROR_CATEGORIES);

function isErrorCategory(value: string): value is ErrorCategory {
  return CATEGORY_SET.has(value);
}
