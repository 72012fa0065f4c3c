// src/audit-core/diagnostics.ts
// Run-level log drill-down and scenario-level error rollup.

import { ERROR_CATEGORIES } from '@shared/constants';
import type { ErrorCategory, LogSeverity } from '@shared/types';
import { fail, succeed, type AuditResult } from './errors';
import type { AuditEvent, LogEntryEvent } from './events';
import { accumulateMetrics, topErrorCategories, type CountEntry } from './metrics';
import { deriveRuns, type Run } from './run-context';

/** Log messages are cut to this many characters in diagnostics. */
export const DIAGNOSTIC_MESSAGE_LIMIT = 500;

export interface RunLogLine {
  timestamp: string;
  severity: LogSeverity;
  message: string;
  errorCategory: ErrorCategory;
  hasStackTrace: boolean;
  nodeId: string | null;
}

export interface RunDiagnostics {
  run: Run;
  errorLogCount: number;
  errorCategories: CountEntry<ErrorCategory>[];
  logs: RunLogLine[];
}

export interface ScenarioErrorSummary {
  scenarioId: string;
  totalRuns: number;
  successfulRuns: number;
  /** `failed` and `timeout` runs. */
  failedRuns: number;
  /** Over finished runs only; 0 when none has finished. */
  successRate: number;
  totalNodeFailures: number;
  errorCategories: CountEntry<ErrorCategory>[];
}

function toLogLine(event: LogEntryEvent): RunLogLine {
  return {
    timestamp: event.timestamp,
    severity: event.payload.severity,
    message: event.payload.message.slice(0, DIAGNOSTIC_MESSAGE_LIMIT),
    errorCategory: event.payload.errorCategory,
    hasStackTrace: event.payload.hasStackTrace,
    nodeId: event.nodeId,
  };
}

/**
 * Collects one run's log lines, in the order given, with its ERROR categories.
 * `events` is one scenario's timeline.
 */
export function runDiagnostics(events: readonly AuditEvent[], runId: string): AuditResult<RunDiagnostics> {
  const runs = deriveRuns(events);
  if (runs.length === 0) {
    return fail('NoRunsForScenario', 'Scenario has no runs');
  }
  const run = runs.find((r) => r.runId === runId);
  if (!run) {
    return fail('RunNotFound', `Run ${runId} not found`, { runId });
  }

  const runLogs = events.filter((e): e is LogEntryEvent => e.eventType === 'log_entry' && e.runId === runId);
  return succeed({
    run,
    errorLogCount: runLogs.filter((e) => e.payload.severity === 'ERROR').length,
    errorCategories: topErrorCategories(accumulateMetrics(runLogs), ERROR_CATEGORIES.length),
    logs: runLogs.map(toLogLine),
  });
}

export function scenarioErrorSummary(scenarioId: string, events: readonly AuditEvent[]): ScenarioErrorSummary {
  const runs = deriveRuns(events);
  const successfulRuns = runs.filter((r) => r.status === 'success').length;
  const failedRuns = runs.filter((r) => r.status === 'failed' || r.status === 'timeout').length;
  const finished = successfulRuns + failedRuns;

  return {
    scenarioId,
    totalRuns: runs.length,
    successfulRuns,
    failedRuns,
    successRate: finished > 0 ? successfulRuns / finished : 0,
    totalNodeFailures: runs.reduce((sum, r) => sum + r.failedNodeIds.length, 0),
    errorCategories: topErrorCategories(accumulateMetrics(events), ERROR_CATEGORIES.length),
  };
}
