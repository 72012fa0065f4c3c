import { describe, it, expect } from 'vitest';
import {
  buildScenarioTimeline,
  compareRunPair,
  deriveRuns,
  diffRunContext,
  InputHistory,
  normalizeRecords,
  toInputChangeRecords,
  type AuditEvent,
  type RunComparison,
  type RunContextInput,
} from '@core/index';
import { attributeOrphanLogs, buildCorrelationIndex } from '@worker/index';
import {
  inputChange,
  logEntry,
  runCompleted,
  runFailed,
  runStarted,
  TWO_RUN_BATCH,
} from '../fixtures/audit-events';

function contextOf(events: AuditEvent[]): RunContextInput {
  const timeline = buildScenarioTimeline(events).events;
  return { runs: deriveRuns(timeline), inputChanges: toInputChangeRecords(timeline), events: timeline };
}

function expectComparison(result: ReturnType<typeof diffRunContext>): RunComparison {
  if (!result.ok) throw new Error(`${result.error.kind}: ${result.error.message}`);
  return result.value;
}

describe('deriveRuns', () => {
  it('rebuilds runs from their start and end events', () => {
    const runs = deriveRuns([
      runCompleted('2026-02-01T10:55:00Z', 'R2', 300),
      runStarted('2026-02-01T10:50:00Z', 'R2'),
      runStarted('2026-02-01T10:30:00Z', 'R1'),
      runFailed('2026-02-01T10:32:00Z', 'R1', ['n1'], {
        payload: { status: 'timeout', durationSeconds: 120, failReason: 'Timeout after 120s', failedNodeIds: ['n1'] },
      }),
      runStarted('2026-02-01T11:00:00Z', 'R3'),
    ]);

    expect(runs.map((r) => [r.runId, r.status, r.durationSeconds])).toEqual([
      ['R1', 'timeout', 120],
      ['R2', 'success', 300],
      ['R3', 'running', null],
    ]);
    expect(runs[0].failReason).toBe('Timeout after 120s');
    expect(runs[0].failedNodeIds).toEqual(['n1']);
  });
});

describe('diffRunContext: two runs after a failed one', () => {
  // Same scenario the ingestion fixture describes, normalized end to end.
  const raw = TWO_RUN_BATCH.records.map((r) => ({ source: r.source, record: r.record }));
  const { events } = normalizeRecords(attributeOrphanLogs(raw, buildCorrelationIndex(raw)));
  const input = contextOf(events);

  it('falls back to every change since creation when no earlier run succeeded', () => {
    const comparison = expectComparison(diffRunContext({ ...input, targetRunId: 'R2' }));

    expect(comparison.runA).toBeNull();
    expect(comparison.windowStart).toBeNull();
    expect(comparison.windowEnd).toBe('2026-02-01T10:50:00.000Z');
    expect(comparison.timeGapSeconds).toBeNull();
    expect(comparison.inputChanges).toHaveLength(2);
    expect(comparison.changedNodes).toEqual([
      {
        nodeId: 'X',
        changedAt: '2026-02-01T10:40:00.000Z',
        actor: 'jdoe',
        previousHash: 'h2',
        newHash: 'h3',
        baselineHash: null,
        netChange: 'initial',
        changeCount: 2,
      },
    ]);
    expect(comparison.runBSummary).toMatchObject({ runId: 'R2', status: 'success', errorLogCount: 0 });
  });

  it('summarizes the first run with its attributed error log', () => {
    const comparison = expectComparison(diffRunContext({ ...input, targetRunId: 'R1' }));

    expect(comparison.changedNodes.map((n) => [n.nodeId, n.previousHash, n.newHash, n.changeCount])).toEqual([
      ['X', 'h1', 'h2', 1],
    ]);
    expect(comparison.runBSummary).toEqual({
      runId: 'R1',
      status: 'timeout',
      startedAt: '2026-02-01T10:30:00.000Z',
      endedAt: '2026-02-01T10:32:00.000Z',
      durationSeconds: 120,
      failedNodeCount: 0,
      errorLogCount: 1,
    });
  });
});

describe('diffRunContext: base run selection and window bounds', () => {
  const events: AuditEvent[] = [
    inputChange('2026-02-01T08:00:00Z', 'a', null, 'v1'),
    runStarted('2026-02-01T09:00:00Z', 'R1'),
    runCompleted('2026-02-01T09:05:00Z', 'R1', 300),
    // lands exactly on R2's start: already part of R2, not of R3's window
    inputChange('2026-02-01T10:00:00Z', 'b', null, 'w1'),
    runStarted('2026-02-01T10:00:00Z', 'R2'),
    runCompleted('2026-02-01T10:05:00Z', 'R2', 300),
    inputChange('2026-02-01T10:30:00Z', 'a', 'v1', 'v2'),
    runStarted('2026-02-01T10:45:00Z', 'R3'),
    runFailed('2026-02-01T10:46:00Z', 'R3', ['a']),
    inputChange('2026-02-01T10:50:00Z', 'a', 'v2', 'v1'),
    // lands exactly on R4's start: included in R4's window
    inputChange('2026-02-01T11:00:00Z', 'c', null, 'z1'),
    runStarted('2026-02-01T11:00:00Z', 'R4'),
    logEntry('2026-02-01T11:01:00Z', 'Division by zero', 'ERROR', 'calculation', { runId: 'R4' }),
  ];
  const input = contextOf(events);

  it('uses the most recent successful run that started before the target', () => {
    const comparison = expectComparison(diffRunContext({ ...input, targetRunId: 'R4' }));
    expect(comparison.runA?.runId).toBe('R2');
    expect(comparison.windowStart).toBe('2026-02-01T10:00:00.000Z');
    expect(comparison.timeGapSeconds).toBe(3600);
    expect(comparison.runBSummary.errorLogCount).toBe(1);
    expect(comparison.runASummary?.errorLogCount).toBe(0);
  });

  it('reports an edited-then-reverted node as unchanged and keeps the boundary change', () => {
    const comparison = expectComparison(diffRunContext({ ...input, targetRunId: 'R4' }));
    expect(comparison.changedNodes.map((n) => [n.nodeId, n.baselineHash, n.newHash, n.netChange, n.changeCount])).toEqual([
      ['a', 'v1', 'v1', 'unchanged', 2],
      ['c', null, 'z1', 'initial', 1],
    ]);
  });

  it('excludes a change made at the base run start', () => {
    const comparison = expectComparison(diffRunContext({ ...input, targetRunId: 'R3' }));
    expect(comparison.runA?.runId).toBe('R2');
    expect(comparison.changedNodes.map((n) => [n.nodeId, n.netChange])).toEqual([['a', 'modified']]);
  });

  it('fails for an unknown run and for a scenario without runs', () => {
    const unknown = diffRunContext({ ...input, targetRunId: 'R9' });
    expect(!unknown.ok && unknown.error).toEqual({
      kind: 'RunNotFound',
      message: 'Run R9 not found',
      detail: { runId: 'R9' },
    });

    const empty = diffRunContext({ runs: [], inputChanges: [], targetRunId: 'R1' });
    expect(!empty.ok && empty.error.kind).toBe('NoRunsForScenario');
  });
});

describe('compareRunPair', () => {
  const input = contextOf([
    inputChange('2026-02-01T08:00:00Z', 'a', null, 'v1'),
    runStarted('2026-02-01T09:00:00Z', 'R1'),
    runFailed('2026-02-01T09:01:00Z', 'R1'),
    inputChange('2026-02-01T09:30:00Z', 'a', 'v1', 'v2'),
    runStarted('2026-02-01T10:00:00Z', 'R2'),
  ]);

  it('orders the pair by start time regardless of argument order', () => {
    const comparison = expectComparison(compareRunPair({ ...input, runAId: 'R2', runBId: 'R1' }));
    expect(comparison.runA?.runId).toBe('R1');
    expect(comparison.runB.runId).toBe('R2');
    expect(comparison.changedNodes.map((n) => [n.nodeId, n.baselineHash, n.newHash, n.netChange])).toEqual([
      ['a', 'v1', 'v2', 'modified'],
    ]);
  });

  it('uses a failed run as the base when asked to', () => {
    const comparison = expectComparison(compareRunPair({ ...input, runAId: 'R1', runBId: 'R2' }));
    expect(comparison.runA?.status).toBe('failed');
  });

  it('names the missing run', () => {
    const result = compareRunPair({ ...input, runAId: 'R1', runBId: 'nope' });
    expect(!result.ok && result.error.message).toBe('Run nope not found');
  });
});

describe('InputHistory', () => {
  const history = new InputHistory(
    toInputChangeRecords([
      inputChange('2026-02-01T10:00:00Z', 'a', 'v1', 'v2'),
      inputChange('2026-02-01T08:00:00Z', 'a', null, 'v1'),
      inputChange('2026-02-01T09:00:00Z', 'b', null, 'w1'),
    ]),
  );

  it('answers the value in effect at a time', () => {
    expect(history.valueAt('a', '2026-02-01T07:59:59Z')).toBeNull();
    expect(history.valueAt('a', '2026-02-01T08:00:00Z')).toBe('v1');
    expect(history.valueAt('a', '2026-02-01T09:59:59Z')).toBe('v1');
    expect(history.valueAt('a', '2026-02-01T10:00:00Z')).toBe('v2');
    expect(history.valueAt('missing', '2026-02-01T10:00:00Z')).toBeNull();
  });

  it('takes a snapshot across nodes', () => {
    expect(Object.fromEntries(history.snapshotAt('2026-02-01T09:30:00Z'))).toEqual({ a: 'v1', b: 'w1' });
    expect(history.nodeIds()).toEqual(['a', 'b']);
    expect(history.versions('a').map((v) => v.newHash)).toEqual(['v1', 'v2']);
  });
});
