import { describe, it, expect } from 'vitest';
import {
  accumulateMetrics,
  combineMetrics,
  dailySuccessRate,
  emptyMetrics,
  groupSessions,
  isUserActionEvent,
  topErrorCategories,
  topFailingNodes,
  userVelocity,
  type AuditEvent,
} from '@core/index';
import { logEntry, runCompleted, runFailed, userAction } from '../fixtures/audit-events';

const EVENTS: AuditEvent[] = [
  logEntry('2026-02-01T10:00:00Z', 'Query timed out', 'ERROR', 'timeout', { nodeId: 'n1' }),
  logEntry('2026-02-01T11:00:00Z', 'Deadline exceeded', 'ERROR', 'timeout', { nodeId: 'n1' }),
  logEntry('2026-02-01T12:00:00Z', 'SQL syntax error', 'ERROR', 'database', { nodeId: 'n2' }),
  logEntry('2026-02-01T12:30:00Z', 'Deadlock detected', 'ERROR', 'database'),
  logEntry('2026-02-01T12:45:00Z', 'Slow node', 'WARN', 'timeout', { nodeId: 'n3' }),
  runFailed('2026-02-01T13:00:00Z', 'R1', ['n1']),
  runCompleted('2026-02-01T14:00:00Z', 'R2', 60),
  runCompleted('2026-02-02T09:00:00Z', 'R3', 60),
  userAction('2026-02-01T09:00:00Z', 'edit_input'),
  userAction('2026-02-01T09:05:00Z', 'edit_input'),
  userAction('2026-02-02T09:00:00Z', 'trigger_run', { scenarioId: 'S-2' }),
  userAction('2026-02-02T09:30:00Z', 'view_results', { actor: 'asmith' }),
];

describe('accumulateMetrics', () => {
  const metrics = accumulateMetrics(EVENTS);

  it('counts ERROR logs by category and ignores other severities', () => {
    expect(topErrorCategories(metrics)).toEqual([
      { key: 'database', count: 2 },
      { key: 'timeout', count: 2 },
    ]);
  });

  it('counts failing nodes from ERROR logs and failed runs', () => {
    expect(topFailingNodes(metrics)).toEqual([
      { key: 'n1', count: 3 },
      { key: 'n2', count: 1 },
    ]);
    expect(topFailingNodes(metrics, 1)).toEqual([{ key: 'n1', count: 3 }]);
  });

  it('reports daily run success rates in day order', () => {
    expect(dailySuccessRate(metrics)).toEqual([
      { day: '2026-02-01', success: 1, failed: 1, total: 2, successRate: 0.5 },
      { day: '2026-02-02', success: 1, failed: 0, total: 1, successRate: 1 },
    ]);
  });

  it('applies a half-open window', () => {
    const windowed = accumulateMetrics(EVENTS, { from: '2026-02-01T12:00:00Z', to: '2026-02-02T09:00:00Z' });
    expect(topErrorCategories(windowed)).toEqual([{ key: 'database', count: 2 }]);
    expect(dailySuccessRate(windowed)).toEqual([
      { day: '2026-02-01', success: 1, failed: 1, total: 2, successRate: 0.5 },
    ]);
  });
});

describe('combineMetrics', () => {
  const shards = [
    accumulateMetrics(EVENTS, { to: '2026-02-01T12:00:00Z' }),
    accumulateMetrics(EVENTS, { from: '2026-02-01T12:00:00Z', to: '2026-02-02T00:00:00Z' }),
    accumulateMetrics(EVENTS, { from: '2026-02-02T00:00:00Z' }),
  ];

  it('combines time shards into the single-pass totals', () => {
    const combined = shards.reduce(combineMetrics, emptyMetrics());
    expect(combined).toEqual(accumulateMetrics(EVENTS));
  });

  it('is associative and has the empty accumulator as identity', () => {
    const [a, b, c] = shards;
    expect(combineMetrics(combineMetrics(a, b), c)).toEqual(combineMetrics(a, combineMetrics(b, c)));
    expect(combineMetrics(a, emptyMetrics())).toEqual(a);
    expect(combineMetrics(emptyMetrics(), a)).toEqual(a);
  });

  it('does not mutate its inputs', () => {
    const [a, b] = shards;
    const before = JSON.stringify(a);
    combineMetrics(a, b);
    expect(JSON.stringify(a)).toBe(before);
  });
});

describe('userVelocity', () => {
  const metrics = accumulateMetrics(EVENTS);

  it('rolls up one user over the window', () => {
    expect(userVelocity(metrics, 'jdoe', 2)).toEqual({
      userId: 'jdoe',
      windowDays: 2,
      totalActions: 3,
      actionsPerDay: 1.5,
      activeDays: 2,
      scenariosTouched: 2,
      mostFrequentActionType: 'edit_input',
      actionTypeDistribution: { edit_input: 2, trigger_run: 1 },
      sessionCount: 0,
      avgSessionDurationMinutes: 0,
    });
  });

  it('reports session count and mean duration from the grouped sessions', () => {
    const actions = EVENTS.filter(isUserActionEvent).filter((e) => e.actor === 'jdoe');
    const velocity = userVelocity(metrics, 'jdoe', 2, groupSessions('jdoe', actions));
    expect(velocity.sessionCount).toBe(2);
    expect(velocity.avgSessionDurationMinutes).toBe(2.5);
  });

  it('rounds the mean session duration to two decimals', () => {
    const sessions = groupSessions('jdoe', [
      userAction('2026-02-01T09:00:00Z', 'edit_input'),
      userAction('2026-02-01T09:10:00Z', 'edit_input'),
      userAction('2026-02-01T12:00:00Z', 'edit_input'),
      userAction('2026-02-01T15:00:00Z', 'edit_input'),
    ]);
    expect(userVelocity(metrics, 'jdoe', 2, sessions).avgSessionDurationMinutes).toBe(3.33);
  });

  it('picks the alphabetically first action type on a tie', () => {
    const tied = accumulateMetrics([
      userAction('2026-02-01T09:00:00Z', 'view_results'),
      userAction('2026-02-01T09:01:00Z', 'edit_input'),
    ]);
    expect(userVelocity(tied, 'jdoe', 1).mostFrequentActionType).toBe('edit_input');
  });

  it('returns zeros for an inactive user and never divides by zero days', () => {
    expect(userVelocity(metrics, 'nobody', 0)).toEqual({
      userId: 'nobody',
      windowDays: 1,
      totalActions: 0,
      actionsPerDay: 0,
      activeDays: 0,
      scenariosTouched: 0,
      mostFrequentActionType: null,
      actionTypeDistribution: {},
      sessionCount: 0,
      avgSessionDurationMinutes: 0,
    });
  });
});

describe('count map keys', () => {
  const events: AuditEvent[] = [
    userAction('2026-02-01T09:00:00Z', 'toString', { actor: 'constructor' }),
    userAction('2026-02-01T09:05:00Z', '__proto__', { actor: 'constructor', scenarioId: 'hasOwnProperty' }),
    logEntry('2026-02-01T10:00:00Z', 'Query failed', 'ERROR', 'database', { nodeId: 'valueOf' }),
    runFailed('2026-02-01T10:01:00Z', 'R1', ['__proto__']),
  ];

  it('counts keys named after Object.prototype members as ordinary entries', () => {
    const metrics = accumulateMetrics(events);
    const velocity = userVelocity(metrics, 'constructor', 1);

    expect(velocity.totalActions).toBe(2);
    expect(velocity.scenariosTouched).toBe(2);
    expect(velocity.mostFrequentActionType).toBe('__proto__');
    expect(Object.entries(velocity.actionTypeDistribution)).toEqual([
      ['toString', 1],
      ['__proto__', 1],
    ]);
    expect(topFailingNodes(metrics)).toEqual([
      { key: '__proto__', count: 1 },
      { key: 'valueOf', count: 1 },
    ]);
  });

  it('treats a user id named after an Object.prototype member as unknown until seen', () => {
    expect(userVelocity(accumulateMetrics(events), 'toString', 1).totalActions).toBe(0);
  });

  it('combines such keys by addition', () => {
    const metrics = accumulateMetrics(events);
    const combined = combineMetrics(metrics, metrics);
    expect(Object.entries(userVelocity(combined, 'constructor', 1).actionTypeDistribution)).toEqual([
      ['toString', 2],
      ['__proto__', 2],
    ]);
    expect(topFailingNodes(combined)).toEqual([
      { key: '__proto__', count: 2 },
      { key: 'valueOf', count: 2 },
    ]);
  });
});
