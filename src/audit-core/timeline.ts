// src/audit-core/timeline.ts
// Deterministic per-scenario timeline: stable k-way merge of per-source sequences.

import { SOURCE_KINDS } from '@shared/constants';
import type { EventType, SourceKind } from '@shared/types';
import type { NormalizationAnomaly } from './errors';
import {
  EVENT_SOURCE,
  EVENT_TYPE_PRIORITY,
  eventIdentityKey,
  eventTime,
  type AuditEvent,
} from './events';
import { MinHeap } from './heap';

// ── Types ────────────────────────────────────────────────────────────────────

export type TimelineSources = Partial<Record<SourceKind, readonly AuditEvent[]>>;

export interface TimelineResult {
  events: AuditEvent[];
  anomalies: NormalizationAnomaly[];
}

export interface TimelineFilter {
  /** Inclusive lower bound (ISO-8601). */
  from?: string;
  /** Inclusive upper bound (ISO-8601). */
  to?: string;
  eventTypes?: readonly EventType[];
  correlationId?: string;
}

// ── Ordering ─────────────────────────────────────────────────────────────────

/**
 * Timeline order without the ingestion fallback:
 *   1. timestamp ascending
 *   2. sequenceHint ascending, when both events carry one and share a source
 *   3. event-type priority
 * Returns 0 when only ingestion order can separate the two events.
 */
export function compareEvents(a: AuditEvent, b: AuditEvent): number {
  const byTime = eventTime(a) - eventTime(b);
  if (byTime !== 0) return byTime;

  if (
    a.sequenceHint !== null &&
    b.sequenceHint !== null &&
    EVENT_SOURCE[a.eventType] === EVENT_SOURCE[b.eventType] &&
    a.sequenceHint !== b.sequenceHint
  ) {
    return a.sequenceHint - b.sequenceHint;
  }

  return EVENT_TYPE_PRIORITY[a.eventType] - EVENT_TYPE_PRIORITY[b.eventType];
}

function canonicalKey(event: AuditEvent): string {
  return JSON.stringify([
    event.correlationId,
    event.runId,
    event.nodeId,
    event.actor,
    event.sequenceHint,
    event.payload,
  ]);
}

/** Total order used to canonicalize a single source's events regardless of arrival order. */
function compareCanonical(a: AuditEvent, b: AuditEvent): number {
  const primary = compareEvents(a, b);
  if (primary !== 0) return primary;
  const ka = canonicalKey(a);
  const kb = canonicalKey(b);
  return ka < kb ? -1 : ka > kb ? 1 : 0;
}

export function isSortedSequence(events: readonly AuditEvent[]): boolean {
  for (let i = 1; i < events.length; i++) {
    if (compareEvents(events[i - 1], events[i]) > 0) return false;
  }
  return true;
}

/** Puts one source's events into canonical order. */
export function sortSourceSequence(events: readonly AuditEvent[]): AuditEvent[] {
  return [...events].sort(compareCanonical);
}

// ── Merge ────────────────────────────────────────────────────────────────────

interface Cursor {
  sequence: readonly AuditEvent[];
  position: number;
  rank: number;
}

function head(cursor: Cursor): AuditEvent {
  return cursor.sequence[cursor.position];
}

function compareCursors(a: Cursor, b: Cursor): number {
  return compareEvents(head(a), head(b)) || a.rank - b.rank || a.position - b.position;
}

function splitUntimed(
  kind: SourceKind,
  events: readonly AuditEvent[],
  anomalies: NormalizationAnomaly[],
): readonly AuditEvent[] {
  if (events.every((e) => !Number.isNaN(eventTime(e)))) return events;
  const timed: AuditEvent[] = [];
  for (const event of events) {
    if (Number.isNaN(eventTime(event))) {
      anomalies.push({
        kind: 'UnparseableTimestamp',
        source: kind,
        message: `Excluded ${event.eventType} with unparseable timestamp "${event.timestamp}"`,
        scenarioId: event.scenarioId,
        field: 'timestamp',
      });
      continue;
    }
    timed.push(event);
  }
  return timed;
}

/**
 * Stable k-way merge over per-source sequences, O(n log k).
 *
 * Each sequence is expected in timeline order already; a sequence that is not
 * gets sorted on its own before the merge. Equal events keep ingestion order:
 * source order from SOURCE_KINDS, then position within the source.
 */
export function mergeTimeline(sources: TimelineSources): TimelineResult {
  const anomalies: NormalizationAnomaly[] = [];
  const heap = new MinHeap<Cursor>(compareCursors);
  let total = 0;

  SOURCE_KINDS.forEach((kind, rank) => {
    const raw = sources[kind];
    if (!raw || raw.length === 0) return;
    const timed = splitUntimed(kind, raw, anomalies);
    const sequence = isSortedSequence(timed) ? timed : sortSourceSequence(timed);
    total += sequence.length;
    if (sequence.length > 0) heap.push({ sequence, position: 0, rank });
  });

  const events: AuditEvent[] = new Array<AuditEvent>(total);
  let written = 0;
  for (let cursor = heap.pop(); cursor !== undefined; cursor = heap.pop()) {
    events[written++] = head(cursor);
    if (cursor.position + 1 < cursor.sequence.length) {
      heap.push({ ...cursor, position: cursor.position + 1 });
    }
  }

  return { events, anomalies };
}

export function groupBySource(events: readonly AuditEvent[]): Record<SourceKind, AuditEvent[]> {
  const grouped: Record<SourceKind, AuditEvent[]> = {
    scenario: [],
    input_change: [],
    run: [],
    log: [],
    user_action: [],
  };
  for (const event of events) {
    grouped[EVENT_SOURCE[event.eventType]].push(event);
  }
  return grouped;
}

/**
 * Builds one scenario's timeline from an unordered event set. Each source is
 * canonicalized first, so the result is identical for any input permutation.
 */
export function buildScenarioTimeline(events: readonly AuditEvent[]): TimelineResult {
  const grouped = groupBySource(events);
  const sources: TimelineSources = {};
  for (const kind of SOURCE_KINDS) {
    sources[kind] = sortSourceSequence(grouped[kind]);
  }
  return mergeTimeline(sources);
}

/**
 * Merges a new batch into an already-sorted source sequence without
 * re-sorting the whole. Events whose identity is already present are dropped.
 */
export function appendToSource(
  sequence: readonly AuditEvent[],
  batch: readonly AuditEvent[],
): AuditEvent[] {
  const seen = new Set(sequence.map(eventIdentityKey));
  const incoming: AuditEvent[] = [];
  for (const event of sortSourceSequence(batch)) {
    const key = eventIdentityKey(event);
    if (seen.has(key)) continue;
    seen.add(key);
    incoming.push(event);
  }

  const merged: AuditEvent[] = [];
  let i = 0;
  let j = 0;
  while (i < sequence.length && j < incoming.length) {
    // Existing events win ties so earlier ingestion stays first.
    if (compareEvents(incoming[j], sequence[i]) < 0) {
      merged.push(incoming[j++]);
    } else {
      merged.push(sequence[i++]);
    }
  }
  while (i < sequence.length) merged.push(sequence[i++]);
  while (j < incoming.length) merged.push(incoming[j++]);
  return merged;
}

// ── Views ────────────────────────────────────────────────────────────────────

export function groupByScenario(events: readonly AuditEvent[]): Map<string, AuditEvent[]> {
  const grouped = new Map<string, AuditEvent[]>();
  for (const event of events) {
    const bucket = grouped.get(event.scenarioId);
    if (bucket) bucket.push(event);
    else grouped.set(event.scenarioId, [event]);
  }
  return grouped;
}

/** Events sharing a correlation id, in timeline order. Uncorrelated events are left out. */
export function groupByCorrelation(timeline: readonly AuditEvent[]): Map<string, AuditEvent[]> {
  const grouped = new Map<string, AuditEvent[]>();
  for (const event of timeline) {
    if (event.correlationId === null) continue;
    const bucket = grouped.get(event.correlationId);
    if (bucket) bucket.push(event);
    else grouped.set(event.correlationId, [event]);
  }
  return grouped;
}

export function filterTimeline(timeline: readonly AuditEvent[], filter: TimelineFilter): AuditEvent[] {
  const from = filter.from !== undefined ? Date.parse(filter.from) : Number.NEGATIVE_INFINITY;
  const to = filter.to !== undefined ? Date.parse(filter.to) : Number.POSITIVE_INFINITY;
  const types = filter.eventTypes && filter.eventTypes.length > 0 ? new Set(filter.eventTypes) : null;

  return timeline.filter((event) => {
    const t = eventTime(event);
    if (t < from || t > to) return false;
    if (types && !types.has(event.eventType)) return false;
    if (filter.correlationId !== undefined && event.correlationId !== filter.correlationId) return false;
    return true;
  });
}
