import {
  normalizeRecord,
  type AuditEvent,
  type InputChangeEvent,
  type LogEntryEvent,
  type RunCompletedEvent,
  type RunFailedEvent,
  type RunStartedEvent,
  type SourceRecord,
  type StateChangeEvent,
  type UserActionEvent,
} from '@core/index';
import type { ErrorCategory, LogSeverity } from '@shared/types';

// ---------------------------------------------------------------------------
// Event builders
// ---------------------------------------------------------------------------

const SCENARIO = 'S-1';

export function at(time: string): string {
  return new Date(time).toISOString();
}

export function stateChange(
  time: string,
  overrides: Partial<Omit<StateChangeEvent, 'eventType'>> = {},
): StateChangeEvent {
  return {
    eventType: 'state_change',
    scenarioId: SCENARIO,
    timestamp: at(time),
    actor: 'jdoe',
    correlationId: null,
    runId: null,
    nodeId: null,
    sequenceHint: 0,
    payload: { transitionType: 'created', previousStatus: null, newStatus: 'draft' },
    ...overrides,
  };
}

export function inputChange(
  time: string,
  nodeId: string,
  previousHash: string | null,
  newHash: string,
  overrides: Partial<Omit<InputChangeEvent, 'eventType'>> = {},
): InputChangeEvent {
  return {
    eventType: 'input_change',
    scenarioId: SCENARIO,
    timestamp: at(time),
    actor: 'jdoe',
    correlationId: null,
    runId: null,
    nodeId,
    sequenceHint: null,
    payload: {
      previousHash,
      newHash,
      change: previousHash === null ? 'initial' : previousHash === newHash ? 'unchanged' : 'modified',
    },
    ...overrides,
  };
}

export function runStarted(
  time: string,
  runId: string,
  overrides: Partial<Omit<RunStartedEvent, 'eventType'>> = {},
): RunStartedEvent {
  return {
    eventType: 'run_started',
    scenarioId: SCENARIO,
    timestamp: at(time),
    actor: 'jdoe',
    correlationId: runId,
    runId,
    nodeId: null,
    sequenceHint: null,
    payload: { status: 'running' },
    ...overrides,
  };
}

export function runCompleted(
  time: string,
  runId: string,
  durationSeconds: number,
  overrides: Partial<Omit<RunCompletedEvent, 'eventType'>> = {},
): RunCompletedEvent {
  return {
    eventType: 'run_completed',
    scenarioId: SCENARIO,
    timestamp: at(time),
    actor: 'jdoe',
    correlationId: runId,
    runId,
    nodeId: null,
    sequenceHint: null,
    payload: { status: 'success', durationSeconds },
    ...overrides,
  };
}

export function runFailed(
  time: string,
  runId: string,
  failedNodeIds: string[] = [],
  overrides: Partial<Omit<RunFailedEvent, 'eventType'>> = {},
): RunFailedEvent {
  return {
    eventType: 'run_failed',
    scenarioId: SCENARIO,
    timestamp: at(time),
    actor: 'jdoe',
    correlationId: runId,
    runId,
    nodeId: null,
    sequenceHint: null,
    payload: { status: 'failed', durationSeconds: 60, failReason: 'failed', failedNodeIds },
    ...overrides,
  };
}

export function logEntry(
  time: string,
  message: string,
  severity: LogSeverity = 'INFO',
  errorCategory: ErrorCategory = 'uncategorized',
  overrides: Partial<Omit<LogEntryEvent, 'eventType'>> = {},
): LogEntryEvent {
  return {
    eventType: 'log_entry',
    scenarioId: SCENARIO,
    timestamp: at(time),
    actor: null,
    correlationId: null,
    runId: null,
    nodeId: null,
    sequenceHint: null,
    payload: { severity, message, errorCategory, hasStackTrace: false, logStream: null },
    ...overrides,
  };
}

export function userAction(
  time: string,
  actionType: string,
  overrides: Partial<Omit<UserActionEvent, 'eventType'>> = {},
): UserActionEvent {
  return {
    eventType: 'user_action',
    scenarioId: SCENARIO,
    timestamp: at(time),
    actor: 'jdoe',
    correlationId: null,
    runId: null,
    nodeId: null,
    sequenceHint: null,
    payload: {
      actionType,
      actionCategory: 'other',
      targetEntityType: null,
      targetEntityId: null,
      success: true,
      details: {},
    },
    ...overrides,
  };
}

/** Normalizes one raw record and fails the test if it is rejected. */
export function normalized(input: SourceRecord): AuditEvent[] {
  const result = normalizeRecord(input);
  if (!result.ok) {
    throw new Error(`${result.error.kind}: ${result.error.message}`);
  }
  return result.value.events;
}

// ---------------------------------------------------------------------------
// Raw batch: one scenario, two runs
// ---------------------------------------------------------------------------
//
// 10:00 created, 10:15 X h1->h2, 10:30 R1 started, 10:31 ERROR log (no
// scenario id, attributed through R1's correlation id), 10:32 R1 timed out,
// 10:40 X h2->h3, 10:50 R2 started, 10:55 R2 succeeded. jdoe's actions form
// one session on Feb 1 and one on Feb 2.

export const TWO_RUN_BATCH: { batchId: string; records: SourceRecord[] } = {
  batchId: 'batch-two-runs',
  records: [
    {
      source: 'scenario',
      record: {
        scenarioId: 'S-100',
        status: 'draft',
        createdAt: '2026-02-01T10:00:00Z',
        createdBy: 'jdoe',
        createdReqId: 'req-c',
      },
    },
    {
      source: 'input_change',
      record: {
        scenarioId: 'S-100',
        nodeId: 'X',
        changedAt: '2026-02-01T10:15:00Z',
        changedBy: 'jdoe',
        previousHash: 'h1',
        inputHash: 'h2',
        changeSequence: 2,
        correlationId: 'req-x1',
      },
    },
    {
      source: 'run',
      record: {
        runId: 'R1',
        scenarioId: 'S-100',
        runBy: 'jdoe',
        startedAt: '2026-02-01T10:30:00Z',
        endedAt: '2026-02-01T10:32:00Z',
        status: 'timeout',
        failReason: 'Timeout after 120s',
        correlationId: 'req-r1',
      },
    },
    {
      source: 'log',
      record: {
        timestamp: '2026-02-01T10:31:00Z',
        severity: 'ERROR',
        message: 'Database connection reset',
        correlationId: 'req-r1',
        runId: 'R1',
        nodeId: 'X',
      },
    },
    {
      source: 'input_change',
      record: {
        scenarioId: 'S-100',
        nodeId: 'X',
        changedAt: '2026-02-01T10:40:00Z',
        changedBy: 'jdoe',
        previousHash: 'h2',
        inputHash: 'h3',
        changeSequence: 3,
        correlationId: 'req-x2',
      },
    },
    {
      source: 'run',
      record: {
        runId: 'R2',
        scenarioId: 'S-100',
        runBy: 'jdoe',
        startedAt: '2026-02-01T10:50:00Z',
        endedAt: '2026-02-01T10:55:00Z',
        status: 'success',
        correlationId: 'req-r2',
      },
    },
    {
      source: 'user_action',
      record: {
        scenarioId: 'S-100',
        userId: 'jdoe',
        actionTimestamp: '2026-02-01T10:14:00Z',
        actionType: 'edit_input',
        correlationId: 'req-x1',
      },
    },
    {
      source: 'user_action',
      record: {
        scenarioId: 'S-100',
        userId: 'jdoe',
        actionTimestamp: '2026-02-01T10:29:00Z',
        actionType: 'trigger_run',
        targetEntityType: 'run',
        targetEntityId: 'R1',
        correlationId: 'req-r1',
      },
    },
    {
      source: 'user_action',
      record: {
        scenarioId: 'S-100',
        userId: 'jdoe',
        actionTimestamp: '2026-02-01T10:39:00Z',
        actionType: 'edit_input',
        correlationId: 'req-x2',
      },
    },
    {
      source: 'user_action',
      record: {
        scenarioId: 'S-100',
        userId: 'jdoe',
        actionTimestamp: '2026-02-01T10:49:00Z',
        actionType: 'trigger_run',
        targetEntityType: 'run',
        targetEntityId: 'R2',
        correlationId: 'req-r2',
      },
    },
    {
      source: 'user_action',
      record: {
        scenarioId: 'S-100',
        userId: 'jdoe',
        actionTimestamp: '2026-02-02T09:00:00Z',
        actionType: 'view_results',
        targetEntityType: 'run',
        targetEntityId: 'R2',
        correlationId: 'req-v1',
      },
    },
  ],
};
