import type { AuditEvent, HashChange } from './events';

export interface InputChangeRecord {
  nodeId: string;
  changedAt: string;
  actor: string | null;
  /** null marks the first known value for the node. */
  previousHash: string | null;
  newHash: string;
  sequenceHint: number | null;
  correlationId: string | null;
}

/** Pure classification of a content-addressed version transition. */
export function classifyHashChange(previousHash: string | null, newHash: string): HashChange {
  if (previousHash === null) return 'initial';
  return previousHash === newHash ? 'unchanged' : 'modified';
}

function changedAtMs(change: InputChangeRecord): number {
  return Date.parse(change.changedAt);
}

export function compareChanges(a: InputChangeRecord, b: InputChangeRecord): number {
  const byTime = changedAtMs(a) - changedAtMs(b);
  if (byTime !== 0) return byTime;
  if (a.nodeId === b.nodeId && a.sequenceHint !== null && b.sequenceHint !== null) {
    return a.sequenceHint - b.sequenceHint;
  }
  return 0;
}

/** Extracts input change records from normalized events, ordered by changedAt. */
export function toInputChangeRecords(events: readonly AuditEvent[]): InputChangeRecord[] {
  const records: InputChangeRecord[] = [];
  for (const event of events) {
    if (event.eventType !== 'input_change') continue;
    records.push({
      nodeId: event.nodeId,
      changedAt: event.timestamp,
      actor: event.actor,
      previousHash: event.payload.previousHash,
      newHash: event.payload.newHash,
      sequenceHint: event.sequenceHint,
      correlationId: event.correlationId,
    });
  }
  return records.sort(compareChanges);
}

/**
 * Index of the first change whose changedAt is strictly after `ms`.
 * `changes` must be ordered by changedAt.
 */
export function upperBound(changes: readonly InputChangeRecord[], ms: number): number {
  let lo = 0;
  let hi = changes.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (changedAtMs(changes[mid]) <= ms) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/**
 * Per-node version history. Answers "which hash was in effect at time T"
 * by binary search over the node's changes.
 */
export class InputHistory {
  private readonly byNode = new Map<string, InputChangeRecord[]>();

  constructor(changes: readonly InputChangeRecord[]) {
    for (const change of [...changes].sort(compareChanges)) {
      const versions = this.byNode.get(change.nodeId);
      if (versions) versions.push(change);
      else this.byNode.set(change.nodeId, [change]);
    }
  }

  nodeIds(): string[] {
    return [...this.byNode.keys()].sort();
  }

  versions(nodeId: string): readonly InputChangeRecord[] {
    return this.byNode.get(nodeId) ?? [];
  }

  /** The last change made at or before `at`, or null if the node had no value yet. */
  latestAt(nodeId: string, at: string): InputChangeRecord | null {
    const versions = this.byNode.get(nodeId);
    if (!versions) return null;
    const index = upperBound(versions, Date.parse(at)) - 1;
    return index >= 0 ? versions[index] : null;
  }

  valueAt(nodeId: string, at: string): string | null {
    return this.latestAt(nodeId, at)?.newHash ?? null;
  }

  /** Hash in effect for every node that had a value at `at`. */
  snapshotAt(at: string): Map<string, string> {
    const snapshot = new Map<string, string>();
    for (const nodeId of this.nodeIds()) {
      const value = this.valueAt(nodeId, at);
      if (value !== null) snapshot.set(nodeId, value);
    }
    return snapshot;
  }
}
