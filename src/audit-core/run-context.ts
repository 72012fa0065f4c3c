// src/audit-core/run-context.ts
// "What changed between the last successful run and this one?"

import type { RunStatus } from '@shared/types';
import { fail, succeed, type AuditResult } from './errors';
import type { AuditEvent, HashChange } from './events';
import {
  classifyHashChange,
  compareChanges,
  InputHistory,
  upperBound,
  type InputChangeRecord,
} from './input-history';

// ── Types ────────────────────────────────────────────────────────────────────

export interface Run {
  runId: string;
  scenarioId: string;
  startedAt: string;
  endedAt: string | null;
  status: RunStatus;
  correlationId: string | null;
  actor: string | null;
  failReason: string | null;
  durationSeconds: number | null;
  failedNodeIds: string[];
}

export interface RunSummary {
  runId: string;
  status: RunStatus;
  startedAt: string;
  endedAt: string | null;
  durationSeconds: number | null;
  failedNodeCount: number;
  errorLogCount: number;
}

export interface ChangedNode {
  nodeId: string;
  changedAt: string;
  actor: string | null;
  previousHash: string | null;
  /** Hash in effect when the target run executed. */
  newHash: string;
  /** Hash in effect when the base run executed; null without a base run. */
  baselineHash: string | null;
  /** Net effect across the window; `unchanged` means the node was edited and reverted. */
  netChange: HashChange;
  changeCount: number;
}

export interface RunComparison {
  scenarioId: string;
  runA: Run | null;
  runB: Run;
  timeGapSeconds: number | null;
  /** Exclusive lower bound; null means "since scenario creation". */
  windowStart: string | null;
  /** Inclusive upper bound. */
  windowEnd: string;
  inputChanges: InputChangeRecord[];
  changedNodes: ChangedNode[];
  runASummary: RunSummary | null;
  runBSummary: RunSummary;
}

export interface RunContextInput {
  runs: readonly Run[];
  inputChanges: readonly InputChangeRecord[];
  /** Optional scenario events; ERROR logs per run feed the summaries. */
  events?: readonly AuditEvent[];
}

// ── Runs ─────────────────────────────────────────────────────────────────────

function byStartedAt(a: Run, b: Run): number {
  const byStart = Date.parse(a.startedAt) - Date.parse(b.startedAt);
  if (byStart !== 0) return byStart;
  return a.runId < b.runId ? -1 : a.runId > b.runId ? 1 : 0;
}

/** Rebuilds runs from run events, ordered by startedAt. */
export function deriveRuns(events: readonly AuditEvent[]): Run[] {
  const runs = new Map<string, Run>();

  for (const event of events) {
    if (event.eventType !== 'run_started') continue;
    runs.set(event.runId, {
      runId: event.runId,
      scenarioId: event.scenarioId,
      startedAt: event.timestamp,
      endedAt: null,
      status: event.payload.status,
      correlationId: event.correlationId,
      actor: event.actor,
      failReason: null,
      durationSeconds: null,
      failedNodeIds: [],
    });
  }

  for (const event of events) {
    if (event.eventType !== 'run_completed' && event.eventType !== 'run_failed') continue;
    const run = runs.get(event.runId);
    if (!run) continue;
    if (event.eventType === 'run_completed') {
      runs.set(event.runId, {
        ...run,
        endedAt: event.timestamp,
        status: event.payload.status,
        durationSeconds: event.payload.durationSeconds,
      });
    } else {
      runs.set(event.runId, {
        ...run,
        endedAt: event.timestamp,
        status: event.payload.status,
        durationSeconds: event.payload.durationSeconds,
        failReason: event.payload.failReason,
        failedNodeIds: [...event.payload.failedNodeIds],
      });
    }
  }

  return [...runs.values()].sort(byStartedAt);
}

function summarizeRun(run: Run, events: readonly AuditEvent[]): RunSummary {
  let errorLogCount = 0;
  for (const event of events) {
    if (event.eventType === 'log_entry' && event.runId === run.runId && event.payload.severity === 'ERROR') {
      errorLogCount += 1;
    }
  }
  return {
    runId: run.runId,
    status: run.status,
    startedAt: run.startedAt,
    endedAt: run.endedAt,
    durationSeconds: run.durationSeconds,
    failedNodeCount: run.failedNodeIds.length,
    errorLogCount,
  };
}

// ── Diff ─────────────────────────────────────────────────────────────────────

function buildComparison(
  runA: Run | null,
  runB: Run,
  input: RunContextInput,
): RunComparison {
  const ordered = [...input.inputChanges].sort(compareChanges);
  const windowStartMs = runA ? Date.parse(runA.startedAt) : Number.NEGATIVE_INFINITY;
  const windowEndMs = Date.parse(runB.startedAt);

  // (runA.startedAt, runB.startedAt]: a change at the base run's start was already in that run.
  const lower = runA ? upperBound(ordered, windowStartMs) : 0;
  const upper = upperBound(ordered, windowEndMs);
  const inputChanges = lower < upper ? ordered.slice(lower, upper) : [];

  const history = new InputHistory(ordered);
  const lastPerNode = new Map<string, { change: InputChangeRecord; count: number }>();
  for (const change of inputChanges) {
    const seen = lastPerNode.get(change.nodeId);
    lastPerNode.set(change.nodeId, { change, count: (seen?.count ?? 0) + 1 });
  }

  const changedNodes: ChangedNode[] = [...lastPerNode.values()].map(({ change, count }) => {
    const baselineHash = runA ? history.valueAt(change.nodeId, runA.startedAt) : null;
    return {
      nodeId: change.nodeId,
      changedAt: change.changedAt,
      actor: change.actor,
      previousHash: change.previousHash,
      newHash: change.newHash,
      baselineHash,
      netChange: classifyHashChange(baselineHash, change.newHash),
      changeCount: count,
    };
  });
  changedNodes.sort(
    (a, b) => Date.parse(a.changedAt) - Date.parse(b.changedAt) || (a.nodeId < b.nodeId ? -1 : a.nodeId > b.nodeId ? 1 : 0),
  );

  const events = input.events ?? [];
  return {
    scenarioId: runB.scenarioId,
    runA,
    runB,
    timeGapSeconds: runA ? (windowEndMs - windowStartMs) / 1000 : null,
    windowStart: runA ? runA.startedAt : null,
    windowEnd: runB.startedAt,
    inputChanges,
    changedNodes,
    runASummary: runA ? summarizeRun(runA, events) : null,
    runBSummary: summarizeRun(runB, events),
  };
}

/**
 * Compares a target run with the most recent successful run that started
 * strictly before it. Without one, every change up to the target's start is
 * reported ("changes since scenario creation").
 */
export function diffRunContext(
  input: RunContextInput & { targetRunId: string },
): AuditResult<RunComparison> {
  if (input.runs.length === 0) {
    return fail('NoRunsForScenario', 'Scenario has no runs');
  }
  const runs = [...input.runs].sort(byStartedAt);
  const target = runs.find((r) => r.runId === input.targetRunId);
  if (!target) {
    return fail('RunNotFound', `Run ${input.targetRunId} not found`, { runId: input.targetRunId });
  }

  const targetStart = Date.parse(target.startedAt);
  let base: Run | null = null;
  for (const run of runs) {
    if (Date.parse(run.startedAt) >= targetStart) break;
    if (run.status === 'success') base = run;
  }

  return succeed(buildComparison(base, target, input));
}

/** Compares an explicit pair of runs; the earlier one becomes the base. */
export function compareRunPair(
  input: RunContextInput & { runAId: string; runBId: string },
): AuditResult<RunComparison> {
  if (input.runs.length === 0) {
    return fail('NoRunsForScenario', 'Scenario has no runs');
  }
  const first = input.runs.find((r) => r.runId === input.runAId);
  const second = input.runs.find((r) => r.runId === input.runBId);
  if (!first || !second) {
    const missing = !first ? input.runAId : input.runBId;
    return fail('RunNotFound', `Run ${missing} not found`, { runId: missing });
  }
  const [runA, runB] = byStartedAt(first, second) <= 0 ? [first, second] : [second, first];
  return succeed(buildComparison(runA, runB, input));
}
