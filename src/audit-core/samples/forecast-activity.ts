// ---------------------------------------------------------------------------
// Seeded activity generator: forecast scenarios
// ---------------------------------------------------------------------------
//
// Produces raw source rows (scenario lifecycle, input edits, runs, log lines,
// user actions) in the shape the normalizer accepts. The same seed and
// profile always produce the same batch.

import type { RunStatus, ScenarioStatus } from '@shared/types';
import type { SourceRecord } from '../records';
import pools from './activity-pools.json';

export type SampleProfileName = 'standard' | 'heavy_editor' | 'flaky_runs' | 'clean';

export interface SampleProfile {
  scenarios: number;
  nodesMin: number;
  nodesMax: number;
  runsMin: number;
  runsMax: number;
  editsPerRunMin: number;
  editsPerRunMax: number;
  successRate: number;
  timeoutRate: number;
  /** Share of ERROR lines shipped without a scenario id (attributed later by correlation). */
  orphanLogRate: number;
}

export const SAMPLE_PROFILES: Record<SampleProfileName, SampleProfile> = {
  standard: {
    scenarios: 4,
    nodesMin: 3,
    nodesMax: 6,
    runsMin: 3,
    runsMax: 6,
    editsPerRunMin: 1,
    editsPerRunMax: 4,
    successRate: 0.8,
    timeoutRate: 0.05,
    orphanLogRate: 0.25,
  },
  heavy_editor: {
    scenarios: 3,
    nodesMin: 5,
    nodesMax: 8,
    runsMin: 4,
    runsMax: 8,
    editsPerRunMin: 6,
    editsPerRunMax: 12,
    successRate: 0.8,
    timeoutRate: 0.05,
    orphanLogRate: 0.25,
  },
  flaky_runs: {
    scenarios: 4,
    nodesMin: 3,
    nodesMax: 6,
    runsMin: 4,
    runsMax: 8,
    editsPerRunMin: 1,
    editsPerRunMax: 3,
    successRate: 0.4,
    timeoutRate: 0.15,
    orphanLogRate: 0.5,
  },
  clean: {
    scenarios: 3,
    nodesMin: 2,
    nodesMax: 4,
    runsMin: 2,
    runsMax: 4,
    editsPerRunMin: 1,
    editsPerRunMax: 2,
    successRate: 1,
    timeoutRate: 0,
    orphanLogRate: 0,
  },
};

export interface SampleBatchOptions {
  seed: number;
  profile?: SampleProfileName;
  /** Overrides the profile's scenario count. */
  scenarioCount?: number;
  /** ISO timestamp of the first scenario's creation. */
  startAt?: string;
}

export interface SampleBatch {
  batchId: string;
  records: SourceRecord[];
}

const DEFAULT_START = '2026-01-05T08:00:00.000Z';
const MINUTE = 60_000;
const HOUR = 60 * MINUTE;

// ---------------------------------------------------------------------------
// Seeded PRNG -- mulberry32
// ---------------------------------------------------------------------------

function mulberry32(seed: number) {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

type Rand = () => number;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function pick<T>(arr: readonly T[], rand: Rand): T {
  return arr[Math.floor(rand() * arr.length)];
}

/** Inclusive integer range. */
function between(min: number, max: number, rand: Rand): number {
  return min + Math.floor(rand() * (max - min + 1));
}

function shuffle<T>(arr: T[], rand: Rand): T[] {
  for (let i = arr.length - 1; i > 0; i--) {
    const j = Math.floor(rand() * (i + 1));
    [arr[i], arr[j]] = [arr[j], arr[i]];
  }
  return arr;
}

function fakeHash(rand: Rand): string {
  const hi = Math.floor(rand() * 0x100000000).toString(16).padStart(8, '0');
  const lo = Math.floor(rand() * 0x100000000).toString(16).padStart(8, '0');
  return hi + lo;
}

function iso(ms: number): string {
  return new Date(ms).toISOString();
}

function pickRunStatus(profile: SampleProfile, rand: Rand): Exclude<RunStatus, 'running'> {
  const r = rand();
  if (r < profile.successRate) return 'success';
  if (r < profile.successRate + profile.timeoutRate) return 'timeout';
  return 'failed';
}

// ---------------------------------------------------------------------------
// Per-scenario generation
// ---------------------------------------------------------------------------

interface ScenarioContext {
  seed: number;
  index: number;
  createdAtMs: number;
  profile: SampleProfile;
  rand: Rand;
}

function generateScenario(ctx: ScenarioContext): SourceRecord[] {
  const { profile, rand } = ctx;
  const scenarioId = `SCN-${String(ctx.seed).padStart(4, '0')}-${String(ctx.index + 1).padStart(3, '0')}`;
  const owner = pick(pools.users, rand);
  const nodes = shuffle([...pools.inputNodes], rand).slice(0, between(profile.nodesMin, profile.nodesMax, rand));
  const records: SourceRecord[] = [];

  const hashes = new Map<string, string>();
  const sequences = new Map<string, number>();
  let requestCounter = 0;
  const nextRequestId = () => `req-${scenarioId}-${++requestCounter}`;

  const editInput = (nodeId: string, atMs: number, userId: string) => {
    const previousHash = hashes.get(nodeId) ?? null;
    const inputHash = fakeHash(rand);
    const changeSequence = (sequences.get(nodeId) ?? 0) + 1;
    hashes.set(nodeId, inputHash);
    sequences.set(nodeId, changeSequence);
    const correlationId = nextRequestId();

    records.push({
      source: 'input_change',
      record: {
        scenarioId,
        nodeId,
        changedAt: iso(atMs),
        changedBy: userId,
        previousHash,
        inputHash,
        changeSequence,
        correlationId,
      },
    });
    records.push({
      source: 'user_action',
      record: {
        scenarioId,
        userId,
        actionTimestamp: iso(atMs),
        actionType: 'edit_input',
        actionCategory: 'edit',
        targetEntityType: 'node',
        targetEntityId: nodeId,
        correlationId,
        success: true,
        details: { changeSequence },
      },
    });
  };

  // ── Creation and initial inputs ────────────────────────────────────────
  let clock = ctx.createdAtMs;
  const createdReqId = nextRequestId();
  records.push({
    source: 'user_action',
    record: {
      scenarioId,
      userId: owner,
      actionTimestamp: iso(clock),
      actionType: 'create_scenario',
      actionCategory: 'lifecycle',
      targetEntityType: 'scenario',
      targetEntityId: scenarioId,
      correlationId: createdReqId,
      success: true,
    },
  });
  for (const nodeId of nodes) {
    clock += between(1, 4, rand) * MINUTE;
    editInput(nodeId, clock, owner);
  }

  // ── Edit/run cycles ────────────────────────────────────────────────────
  const runCount = between(profile.runsMin, profile.runsMax, rand);
  for (let r = 0; r < runCount; r++) {
    const user = rand() < 0.7 ? owner : pick(pools.users, rand);
    if (r > 0) {
      clock += between(2, 48, rand) * HOUR;
      const edits = between(profile.editsPerRunMin, profile.editsPerRunMax, rand);
      for (let e = 0; e < edits; e++) {
        clock += between(1, 10, rand) * MINUTE;
        editInput(pick(nodes, rand), clock, user);
      }
    }
    clock += between(1, 5, rand) * MINUTE;

    const runId = `${scenarioId}-R${r + 1}`;
    const correlationId = nextRequestId();
    const status = pickRunStatus(profile, rand);
    const durationSeconds =
      status === 'timeout'
        ? between(280, 320, rand)
        : status === 'success'
          ? between(10, 120, rand)
          : between(5, 200, rand);
    const startedAt = clock;
    const endedAt = startedAt + durationSeconds * 1000;
    const failedNodeIds =
      status === 'failed' ? shuffle([...nodes], rand).slice(0, between(1, Math.min(2, nodes.length), rand)) : [];
    const failReason =
      status === 'failed'
        ? pick(pools.failureMessages, rand)
        : status === 'timeout'
          ? pick(pools.timeoutMessages, rand)
          : null;
    const logStream = pick(pools.logStreams, rand);

    records.push({
      source: 'run',
      record: {
        runId,
        scenarioId,
        runBy: user,
        startedAt: iso(startedAt),
        endedAt: iso(endedAt),
        status,
        failReason,
        failedNodeIds,
        correlationId,
      },
    });
    records.push({
      source: 'user_action',
      record: {
        scenarioId,
        userId: user,
        actionTimestamp: iso(startedAt),
        actionType: 'trigger_run',
        actionCategory: 'run',
        targetEntityType: 'run',
        targetEntityId: runId,
        correlationId,
        success: true,
      },
    });
    records.push({
      source: 'log',
      record: {
        timestamp: iso(startedAt + 1000),
        severity: 'INFO',
        message: pick(pools.infoMessages, rand),
        correlationId,
        scenarioId,
        runId,
        logStream,
      },
    });
    if (rand() < 0.3) {
      records.push({
        source: 'log',
        record: {
          timestamp: iso(startedAt + 2000),
          severity: 'WARNING',
          message: pick(pools.warnMessages, rand),
          correlationId,
          scenarioId,
          runId,
          logStream,
        },
      });
    }

    // ERROR lines land just before the run ends, one per failed node.
    if (status === 'failed') {
      failedNodeIds.forEach((nodeId, k) => {
        const orphan = rand() < profile.orphanLogRate;
        records.push({
          source: 'log',
          record: {
            timestamp: iso(endedAt - (k + 1) * 1000),
            severity: 'ERROR',
            message: k === 0 && failReason !== null ? failReason : pick(pools.failureMessages, rand),
            correlationId,
            scenarioId: orphan ? null : scenarioId,
            runId,
            nodeId,
            stackTrace: `at evaluateNode (${nodeId})`,
            logStream,
          },
        });
      });
    } else if (status === 'timeout') {
      records.push({
        source: 'log',
        record: {
          timestamp: iso(endedAt - 1000),
          severity: 'ERROR',
          message: failReason,
          correlationId,
          scenarioId: rand() < profile.orphanLogRate ? null : scenarioId,
          runId,
          stackTrace: false,
          logStream,
        },
      });
    }

    clock = endedAt + between(1, 5, rand) * MINUTE;
    records.push({
      source: 'user_action',
      record: {
        scenarioId,
        userId: user,
        actionTimestamp: iso(clock),
        actionType: 'view_results',
        actionCategory: 'view',
        targetEntityType: 'run',
        targetEntityId: runId,
        correlationId: nextRequestId(),
        success: true,
      },
    });
  }

  // ── Lifecycle ──────────────────────────────────────────────────────────
  let status: ScenarioStatus = 'draft';
  let submittedAt: string | null = null;
  let submittedReqId: string | null = null;
  let lockedAt: string | null = null;
  let lockedReqId: string | null = null;
  let withdrawAt: string | null = null;
  let withdrawReqId: string | null = null;

  const transition = (actionType: string, next: ScenarioStatus): { at: string; reqId: string } => {
    clock += between(1, 24, rand) * HOUR;
    const at = iso(clock);
    const reqId = nextRequestId();
    records.push({
      source: 'user_action',
      record: {
        scenarioId,
        userId: owner,
        actionTimestamp: at,
        actionType,
        actionCategory: 'lifecycle',
        targetEntityType: 'scenario',
        targetEntityId: scenarioId,
        correlationId: reqId,
        success: true,
      },
    });
    status = next;
    return { at, reqId };
  };

  if (rand() < 0.6) {
    ({ at: submittedAt, reqId: submittedReqId } = transition('submit_scenario', 'submitted'));
    if (rand() < 0.5) {
      ({ at: lockedAt, reqId: lockedReqId } = transition('lock_scenario', 'locked'));
    }
  } else if (rand() < 0.2) {
    ({ at: withdrawAt, reqId: withdrawReqId } = transition('withdraw_scenario', 'withdrawn'));
  }

  records.unshift({
    source: 'scenario',
    record: {
      scenarioId,
      status,
      createdAt: iso(ctx.createdAtMs),
      createdBy: owner,
      createdReqId,
      submittedAt,
      submittedBy: submittedAt ? owner : null,
      submittedReqId,
      lockedAt,
      lockedBy: lockedAt ? owner : null,
      lockedReqId,
      withdrawAt,
      withdrawBy: withdrawAt ? owner : null,
      withdrawReqId,
    },
  });

  return records;
}

// ---------------------------------------------------------------------------
// Public entry point
// ---------------------------------------------------------------------------

export function generateSampleBatch(options: SampleBatchOptions): SampleBatch {
  const profileName = options.profile ?? 'standard';
  const profile = SAMPLE_PROFILES[profileName];
  const rand = mulberry32(options.seed);
  const scenarioCount = options.scenarioCount ?? profile.scenarios;
  const startMs = Date.parse(options.startAt ?? DEFAULT_START);

  const records: SourceRecord[] = [];
  let createdAtMs = startMs;
  for (let index = 0; index < scenarioCount; index++) {
    records.push(...generateScenario({ seed: options.seed, index, createdAtMs, profile, rand }));
    createdAtMs += between(1, 6, rand) * HOUR;
  }

  return { batchId: `sample-${options.seed}-${profileName}`, records };
}
