// src/audit-core/events.ts
// Canonical audit event: a closed union discriminated by `eventType`.

import type {
  ErrorCategory,
  EventType,
  LogSeverity,
  RunStatus,
  ScenarioStatus,
  SourceKind,
  TransitionType,
} from '@shared/types';

// ── Payloads ─────────────────────────────────────────────────────────────────

export type LifecycleField = 'createdAt' | 'submittedAt' | 'lockedAt' | 'withdrawAt' | 'deleteAt';

export interface LifecycleAnomaly {
  /** Fields this transition's timestamp precedes although it should follow them. */
  precedes: LifecycleField[];
}

export interface StateChangePayload {
  transitionType: TransitionType;
  previousStatus: ScenarioStatus | null;
  newStatus: ScenarioStatus;
  lifecycleAnomaly?: LifecycleAnomaly;
}

export type HashChange = 'initial' | 'modified' | 'unchanged';

export interface InputChangePayload {
  previousHash: string | null;
  newHash: string;
  change: HashChange;
}

export interface RunStartedPayload {
  status: RunStatus;
}

export interface RunCompletedPayload {
  status: 'success';
  durationSeconds: number;
  anomaly?: 'ended_before_started';
}

export interface RunFailedPayload {
  status: 'failed' | 'timeout';
  durationSeconds: number;
  failReason: string | null;
  failedNodeIds: string[];
  anomaly?: 'ended_before_started';
}

export interface UserActionPayload {
  actionType: string;
  actionCategory: string;
  targetEntityType: string | null;
  targetEntityId: string | null;
  success: boolean;
  details: Record<string, unknown>;
}

export interface LogEntryPayload {
  severity: LogSeverity;
  message: string;
  errorCategory: ErrorCategory;
  hasStackTrace: boolean;
  logStream: string | null;
}

// ── Events ───────────────────────────────────────────────────────────────────

interface EventBase {
  scenarioId: string;
  /** ISO-8601, always UTC (`Date#toISOString`). */
  timestamp: string;
  actor: string | null;
  correlationId: string | null;
  runId: string | null;
  nodeId: string | null;
  sequenceHint: number | null;
}

export interface StateChangeEvent extends EventBase {
  eventType: 'state_change';
  payload: StateChangePayload;
}

export interface InputChangeEvent extends EventBase {
  eventType: 'input_change';
  nodeId: string;
  payload: InputChangePayload;
}

export interface RunStartedEvent extends EventBase {
  eventType: 'run_started';
  runId: string;
  payload: RunStartedPayload;
}

export interface RunCompletedEvent extends EventBase {
  eventType: 'run_completed';
  runId: string;
  payload: RunCompletedPayload;
}

export interface RunFailedEvent extends EventBase {
  eventType: 'run_failed';
  runId: string;
  payload: RunFailedPayload;
}

export interface UserActionEvent extends EventBase {
  eventType: 'user_action';
  payload: UserActionPayload;
}

export interface LogEntryEvent extends EventBase {
  eventType: 'log_entry';
  payload: LogEntryPayload;
}

export type AuditEvent =
  | StateChangeEvent
  | InputChangeEvent
  | RunStartedEvent
  | RunCompletedEvent
  | RunFailedEvent
  | UserActionEvent
  | LogEntryEvent;

export type RunEvent = RunStartedEvent | RunCompletedEvent | RunFailedEvent;

// ── Static tables ────────────────────────────────────────────────────────────

/** The source each event type is produced from. */
export const EVENT_SOURCE: Record<EventType, SourceKind> = {
  state_change: 'scenario',
  input_change: 'input_change',
  run_started: 'run',
  run_completed: 'run',
  run_failed: 'run',
  user_action: 'user_action',
  log_entry: 'log',
};

/**
 * Tie-break priority for equal timestamps. State and input changes come first
 * because they trigger the runs and logs that follow them.
 */
export const EVENT_TYPE_PRIORITY: Record<EventType, number> = {
  state_change: 0,
  input_change: 1,
  run_started: 2,
  log_entry: 3,
  user_action: 4,
  run_completed: 5,
  run_failed: 5,
};

// ── Helpers ──────────────────────────────────────────────────────────────────

export function isRunEvent(event: AuditEvent): event is RunEvent {
  return (
    event.eventType === 'run_started' ||
    event.eventType === 'run_completed' ||
    event.eventType === 'run_failed'
  );
}

export function isUserActionEvent(event: AuditEvent): event is UserActionEvent {
  return event.eventType === 'user_action';
}

/** Milliseconds since epoch, or NaN when the timestamp does not parse. */
export function eventTime(event: Pick<AuditEvent, 'timestamp'>): number {
  return Date.parse(event.timestamp);
}

/** Natural identity used for deduplication: (scenarioId, eventType, timestamp, correlationId). */
export function eventIdentityKey(event: AuditEvent): string {
  return JSON.stringify([event.scenarioId, event.eventType, event.timestamp, event.correlationId]);
}

export function sameEventIdentity(a: AuditEvent, b: AuditEvent): boolean {
  return eventIdentityKey(a) === eventIdentityKey(b);
}

/** Keeps the first event of every identity, preserving order. */
export function dedupeEvents(events: readonly AuditEvent[]): AuditEvent[] {
  const seen = new Set<string>();
  const out: AuditEvent[] = [];
  for (const event of events) {
    const key = eventIdentityKey(event);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(event);
  }
  return out;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function copyPlain(value: unknown, seen: WeakSet<object>): unknown {
  if (typeof value !== 'object' || value === null || seen.has(value)) return value;
  if (Array.isArray(value)) {
    seen.add(value);
    return value.map((item) => copyPlain(item, seen));
  }
  if (!isPlainObject(value)) return value;
  seen.add(value);
  return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, copyPlain(item, seen)]));
}

/**
 * Copies nested plain objects and arrays out of a caller-owned record, so
 * freezing the event leaves the caller's values untouched.
 */
export function copyDetails(details: Record<string, unknown>): Record<string, unknown> {
  const seen = new WeakSet<object>([details]);
  return Object.fromEntries(Object.entries(details).map(([key, item]) => [key, copyPlain(item, seen)]));
}

function deepFreeze(value: unknown): void {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) return;
  if (!Array.isArray(value) && !isPlainObject(value)) return;
  Object.freeze(value);
  for (const child of Object.values(value)) deepFreeze(child);
}

/**
 * Freezes an event and everything reachable through its payload's plain
 * objects and arrays. Normalized events are never patched in place.
 */
export function freezeEvent<E extends AuditEvent>(event: E): E {
  deepFreeze(event.payload);
  return Object.freeze(event);
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
