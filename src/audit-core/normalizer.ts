// src/audit-core/normalizer.ts
// Converts source-specific rows into canonical audit events.

import type { z } from 'zod';
import type { LogSeverity, RunStatus, ScenarioStatus, SourceKind, TransitionType } from '@shared/types';
import {
  assertNever,
  copyDetails,
  freezeEvent,
  type AuditEvent,
  type InputChangeEvent,
  type LifecycleField,
  type LogEntryEvent,
  type RunCompletedEvent,
  type RunFailedEvent,
  type RunStartedEvent,
  type StateChangeEvent,
  type UserActionEvent,
} from './events';
import { anomalyFromError, fail, succeed, type AuditResult, type NormalizationAnomaly } from './errors';
import { categorizeError, DEFAULT_CATEGORY_RULES, type CategoryRule } from './error-categorizer';
import {
  inputChangeRecordSchema,
  logRecordSchema,
  runRecordSchema,
  scenarioRecordSchema,
  userActionRecordSchema,
  type ParsedScenarioRecord,
  type RawSourceRecord,
} from './records';
import { classifyHashChange } from './input-history';
import { resolveTimestamp } from './timestamps';

// ---------------------------------------------------------------------------
// Public interface
// ---------------------------------------------------------------------------

export interface NormalizedRecord {
  events: AuditEvent[];
  /** Problems that did not prevent normalization (reported, not corrected). */
  anomalies: NormalizationAnomaly[];
}

export interface NormalizeOptions {
  categoryRules?: readonly CategoryRule[];
}

export function normalizeRecord(
  input: RawSourceRecord,
  options: NormalizeOptions = {},
): AuditResult<NormalizedRecord> {
  switch (input.source) {
    case 'scenario':
      return normalizeScenario(input.record);
    case 'input_change':
      return normalizeInputChange(input.record);
    case 'run':
      return normalizeRun(input.record);
    case 'log':
      return normalizeLog(input.record, options.categoryRules ?? DEFAULT_CATEGORY_RULES);
    case 'user_action':
      return normalizeUserAction(input.record);
    default:
      return assertNever(input.source);
  }
}

export interface NormalizedRecords {
  events: AuditEvent[];
  anomalies: NormalizationAnomaly[];
  normalizedCount: number;
  rejectedCount: number;
}

/**
 * Normalizes every record. A bad record is skipped and recorded as an anomaly;
 * the rest of the input still goes through.
 */
export function normalizeRecords(
  inputs: readonly RawSourceRecord[],
  options: NormalizeOptions = {},
): NormalizedRecords {
  const events: AuditEvent[] = [];
  const anomalies: NormalizationAnomaly[] = [];
  let normalizedCount = 0;
  let rejectedCount = 0;

  for (const input of inputs) {
    const result = normalizeRecord(input, options);
    if (!result.ok) {
      rejectedCount += 1;
      anomalies.push(anomalyFromError(input.source, result.error, scenarioIdOf(input.record)));
      continue;
    }
    normalizedCount += 1;
    events.push(...result.value.events);
    anomalies.push(...result.value.anomalies);
  }

  return { events, anomalies, normalizedCount, rejectedCount };
}

export function normalizeSeverity(raw: string | null): LogSeverity {
  const upper = (raw ?? '').trim().toUpperCase();
  if (upper === 'ERROR' || upper === 'WARN') return upper;
  if (upper === 'WARNING') return 'WARN';
  return 'INFO';
}

// ---------------------------------------------------------------------------
// Shared helpers
// ---------------------------------------------------------------------------

function parseRecord<S extends z.ZodTypeAny>(
  schema: S,
  source: SourceKind,
  record: unknown,
): AuditResult<z.output<S>> {
  const parsed = schema.safeParse(record);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    return fail('MalformedRecord', `Invalid ${source} record${where}: ${issue?.message ?? 'unparseable'}`);
  }
  return succeed(parsed.data);
}

function scenarioIdOf(record: unknown): string | undefined {
  if (typeof record !== 'object' || record === null || !('scenarioId' in record)) return undefined;
  const value = record.scenarioId;
  return typeof value === 'string' && value !== '' ? value : undefined;
}

// ---------------------------------------------------------------------------
// Scenario lifecycle
// ---------------------------------------------------------------------------

interface LifecycleStep {
  field: LifecycleField;
  by: 'createdBy' | 'submittedBy' | 'lockedBy' | 'withdrawBy' | 'deleteBy';
  reqId: 'createdReqId' | 'submittedReqId' | 'lockedReqId' | 'withdrawReqId' | 'deleteReqId';
  transitionType: TransitionType;
  newStatus: ScenarioStatus;
  ordinal: number;
  /** Terminal alternatives must follow every main-sequence field. */
  terminal: boolean;
}

const LIFECYCLE: readonly LifecycleStep[] = [
  { field: 'createdAt', by: 'createdBy', reqId: 'createdReqId', transitionType: 'created', newStatus: 'draft', ordinal: 0, terminal: false },
  { field: 'submittedAt', by: 'submittedBy', reqId: 'submittedReqId', transitionType: 'submitted', newStatus: 'submitted', ordinal: 1, terminal: false },
  { field: 'lockedAt', by: 'lockedBy', reqId: 'lockedReqId', transitionType: 'locked', newStatus: 'locked', ordinal: 2, terminal: false },
  { field: 'withdrawAt', by: 'withdrawBy', reqId: 'withdrawReqId', transitionType: 'withdrawn', newStatus: 'withdrawn', ordinal: 3, terminal: true },
  { field: 'deleteAt', by: 'deleteBy', reqId: 'deleteReqId', transitionType: 'deleted', newStatus: 'deleted', ordinal: 4, terminal: true },
];

interface PresentStep {
  step: LifecycleStep;
  iso: string;
  ms: number;
}

function previousStatusFor(step: LifecycleStep, present: readonly PresentStep[]): ScenarioStatus | null {
  switch (step.transitionType) {
    case 'created':
      return null;
    case 'submitted':
      return 'draft';
    case 'locked':
      return 'submitted';
    case 'withdrawn':
    case 'deleted': {
      if (step.transitionType === 'deleted' && present.some((p) => p.step.transitionType === 'withdrawn')) {
        return 'withdrawn';
      }
      let status: ScenarioStatus = 'draft';
      for (const p of present) {
        if (!p.step.terminal) status = p.step.newStatus;
      }
      return status;
    }
    default:
      return assertNever(step.transitionType);
  }
}

/** Fields that should come before `target` in the lifecycle but carry a later timestamp. */
function fieldsPreceded(target: PresentStep, present: readonly PresentStep[]): LifecycleField[] {
  const preceded: LifecycleField[] = [];
  for (const other of present) {
    if (other === target || other.step.terminal) continue;
    const shouldBeEarlier = target.step.terminal || other.step.ordinal < target.step.ordinal;
    if (shouldBeEarlier && target.ms < other.ms) {
      preceded.push(other.step.field);
    }
  }
  return preceded;
}

function normalizeScenario(record: unknown): AuditResult<NormalizedRecord> {
  const parsed = parseRecord(scenarioRecordSchema, 'scenario', record);
  if (!parsed.ok) return parsed;
  const row: ParsedScenarioRecord = parsed.value;

  const scenarioId = row.scenarioId;
  if (scenarioId === null) {
    return fail('MalformedRecord', 'Scenario record is missing scenarioId');
  }

  const anomalies: NormalizationAnomaly[] = [];
  const present: PresentStep[] = [];

  for (const step of LIFECYCLE) {
    const resolved = resolveTimestamp(row[step.field]);
    if (resolved.state === 'absent') continue;
    if (resolved.state === 'invalid') {
      anomalies.push({
        kind: 'UnparseableTimestamp',
        source: 'scenario',
        message: `Unparseable ${step.field} "${resolved.raw}"`,
        scenarioId,
        field: step.field,
      });
      continue;
    }
    present.push({ step, iso: resolved.iso, ms: resolved.ms });
  }

  if (present.length === 0) {
    return fail('MalformedRecord', `Scenario ${scenarioId} has no resolvable lifecycle timestamp`, { scenarioId });
  }

  const outOfOrder: string[] = [];
  const events: AuditEvent[] = present.map((p) => {
    const preceded = fieldsPreceded(p, present);
    if (preceded.length > 0) {
      outOfOrder.push(`${p.step.field} precedes ${preceded.join(', ')}`);
    }

    const event: StateChangeEvent = {
      eventType: 'state_change',
      scenarioId,
      timestamp: p.iso,
      actor: row[p.step.by],
      correlationId: row[p.step.reqId],
      runId: null,
      nodeId: null,
      sequenceHint: p.step.ordinal,
      payload: {
        transitionType: p.step.transitionType,
        previousStatus: previousStatusFor(p.step, present),
        newStatus: p.step.newStatus,
        ...(preceded.length > 0 ? { lifecycleAnomaly: { precedes: preceded } } : {}),
      },
    };
    return freezeEvent(event);
  });

  if (outOfOrder.length > 0) {
    anomalies.push({
      kind: 'OutOfOrderLifecycle',
      source: 'scenario',
      message: `Out-of-order lifecycle: ${outOfOrder.join('; ')}`,
      scenarioId,
    });
  }

  return succeed({ events, anomalies });
}

// ---------------------------------------------------------------------------
// Input changes
// ---------------------------------------------------------------------------

function normalizeInputChange(record: unknown): AuditResult<NormalizedRecord> {
  const parsed = parseRecord(inputChangeRecordSchema, 'input_change', record);
  if (!parsed.ok) return parsed;
  const row = parsed.value;

  if (row.scenarioId === null) {
    return fail('MalformedRecord', 'Input change record is missing scenarioId');
  }
  if (row.nodeId === null) {
    return fail('MalformedRecord', 'Input change record is missing nodeId', { scenarioId: row.scenarioId });
  }
  if (row.inputHash === null) {
    return fail('MalformedRecord', `Input change for node ${row.nodeId} is missing inputHash`, {
      scenarioId: row.scenarioId,
    });
  }

  const changedAt = resolveTimestamp(row.changedAt);
  if (changedAt.state !== 'valid') {
    return fail('MalformedRecord', `Input change for node ${row.nodeId} has no resolvable changedAt`, {
      scenarioId: row.scenarioId,
    });
  }

  const event: InputChangeEvent = {
    eventType: 'input_change',
    scenarioId: row.scenarioId,
    timestamp: changedAt.iso,
    actor: row.changedBy,
    correlationId: row.correlationId,
    runId: null,
    nodeId: row.nodeId,
    sequenceHint: row.changeSequence ?? null,
    payload: {
      previousHash: row.previousHash,
      newHash: row.inputHash,
      change: classifyHashChange(row.previousHash, row.inputHash),
    },
  };

  return succeed({ events: [freezeEvent(event)], anomalies: [] });
}

// ---------------------------------------------------------------------------
// Runs
// ---------------------------------------------------------------------------

function normalizeRun(record: unknown): AuditResult<NormalizedRecord> {
  const parsed = parseRecord(runRecordSchema, 'run', record);
  if (!parsed.ok) return parsed;
  const row = parsed.value;

  if (row.scenarioId === null) {
    return fail('MalformedRecord', 'Run record is missing scenarioId');
  }
  if (row.runId === null) {
    return fail('MalformedRecord', 'Run record is missing runId', { scenarioId: row.scenarioId });
  }
  const scenarioId = row.scenarioId;
  const runId = row.runId;

  const anomalies: NormalizationAnomaly[] = [];
  const started = resolveTimestamp(row.startedAt);
  let ended = resolveTimestamp(row.endedAt);

  if (ended.state === 'invalid') {
    anomalies.push({
      kind: 'UnparseableTimestamp',
      source: 'run',
      message: `Run ${runId} has unparseable endedAt "${ended.raw}"`,
      scenarioId,
      field: 'endedAt',
    });
    ended = { state: 'absent' };
  }

  if (started.state !== 'valid') {
    if (ended.state === 'valid') {
      return fail('AmbiguousTimestamp', `Run ${runId} has endedAt but no resolvable startedAt`, { scenarioId, runId });
    }
    return fail('MalformedRecord', `Run ${runId} has no resolvable startedAt`, { scenarioId, runId });
  }

  const status: RunStatus = row.status ?? 'running';
  const correlationId = row.correlationId ?? runId;
  const base = {
    scenarioId,
    actor: row.runBy,
    correlationId,
    runId,
    nodeId: null,
    sequenceHint: null,
  };

  const startedEvent: RunStartedEvent = {
    ...base,
    eventType: 'run_started',
    timestamp: started.iso,
    payload: { status },
  };
  const events: AuditEvent[] = [freezeEvent(startedEvent)];

  if (ended.state === 'valid' && status !== 'running') {
    const durationSeconds = (ended.ms - started.ms) / 1000;
    const endedBeforeStarted = durationSeconds < 0;
    if (endedBeforeStarted) {
      anomalies.push({
        kind: 'AmbiguousTimestamp',
        source: 'run',
        message: `Run ${runId} ended (${ended.iso}) before it started (${started.iso})`,
        scenarioId,
        field: 'endedAt',
      });
    }
    const flag = endedBeforeStarted ? { anomaly: 'ended_before_started' as const } : {};

    if (status === 'success') {
      const completed: RunCompletedEvent = {
        ...base,
        eventType: 'run_completed',
        timestamp: ended.iso,
        payload: { status, durationSeconds, ...flag },
      };
      events.push(freezeEvent(completed));
    } else {
      const failed: RunFailedEvent = {
        ...base,
        eventType: 'run_failed',
        timestamp: ended.iso,
        payload: {
          status,
          durationSeconds,
          failReason: row.failReason,
          failedNodeIds: [...(row.failedNodeIds ?? [])],
          ...flag,
        },
      };
      events.push(freezeEvent(failed));
    }
  }

  return succeed({ events, anomalies });
}

// ---------------------------------------------------------------------------
// Log lines
// ---------------------------------------------------------------------------

function normalizeLog(record: unknown, rules: readonly CategoryRule[]): AuditResult<NormalizedRecord> {
  const parsed = parseRecord(logRecordSchema, 'log', record);
  if (!parsed.ok) return parsed;
  const row = parsed.value;

  if (row.scenarioId === null) {
    return fail('MalformedRecord', 'Log record cannot be attributed to a scenario', {
      correlationId: row.correlationId,
    });
  }
  if (row.message === null) {
    return fail('MalformedRecord', 'Log record has no message', { scenarioId: row.scenarioId });
  }
  const timestamp = resolveTimestamp(row.timestamp);
  if (timestamp.state !== 'valid') {
    return fail('MalformedRecord', 'Log record has no resolvable timestamp', { scenarioId: row.scenarioId });
  }

  const hasStackTrace =
    typeof row.stackTrace === 'string' ? row.stackTrace.trim() !== '' : row.stackTrace === true;

  const event: LogEntryEvent = {
    eventType: 'log_entry',
    scenarioId: row.scenarioId,
    timestamp: timestamp.iso,
    actor: row.userId,
    correlationId: row.correlationId,
    runId: row.runId,
    nodeId: row.nodeId,
    sequenceHint: null,
    payload: {
      severity: normalizeSeverity(row.severity),
      message: row.message,
      errorCategory: categorizeError(row.message, rules),
      hasStackTrace,
      logStream: row.logStream,
    },
  };

  return succeed({ events: [freezeEvent(event)], anomalies: [] });
}

// ---------------------------------------------------------------------------
// User actions
// ---------------------------------------------------------------------------

function normalizeUserAction(record: unknown): AuditResult<NormalizedRecord> {
  const parsed = parseRecord(userActionRecordSchema, 'user_action', record);
  if (!parsed.ok) return parsed;
  const row = parsed.value;

  if (row.scenarioId === null) {
    return fail('MalformedRecord', 'User action record is missing scenarioId');
  }
  if (row.actionType === null) {
    return fail('MalformedRecord', 'User action record is missing actionType', { scenarioId: row.scenarioId });
  }
  const timestamp = resolveTimestamp(row.actionTimestamp);
  if (timestamp.state !== 'valid') {
    return fail('MalformedRecord', `User action ${row.actionType} has no resolvable timestamp`, {
      scenarioId: row.scenarioId,
    });
  }

  const event: UserActionEvent = {
    eventType: 'user_action',
    scenarioId: row.scenarioId,
    timestamp: timestamp.iso,
    actor: row.userId,
    correlationId: row.correlationId,
    runId: row.targetEntityType === 'run' ? row.targetEntityId : null,
    nodeId: null,
    sequenceHint: null,
    payload: {
      actionType: row.actionType,
      actionCategory: row.actionCategory ?? 'other',
      targetEntityType: row.targetEntityType,
      targetEntityId: row.targetEntityId,
      success: row.success ?? true,
      details: copyDetails(row.details ?? {}),
    },
  };

  return succeed({ events: [freezeEvent(event)], anomalies: [] });
}
