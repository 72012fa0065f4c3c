import { z } from 'zod';
import { RUN_STATUSES, SOURCE_KINDS } from '@shared/constants';
import type { SourceKind } from '@shared/types';

// ---------------------------------------------------------------------------
// Raw source records
// ---------------------------------------------------------------------------
//
// Rows arrive flat, with nullable timestamps and string identifiers. Schemas
// stay permissive on shape (unknown keys are stripped, ids may be missing) so
// that the normalizer can report *why* a row is unusable instead of zod
// rejecting it wholesale.

const rawTimestamp = z.union([z.string(), z.number(), z.date()]).nullish();
const rawId = z.union([z.string(), z.number()]).nullish().transform((v) =>
  v === null || v === undefined || v === '' ? null : String(v),
);
const rawText = z.string().nullish().transform((v) => (v === undefined || v === '' ? null : v));

export type RawTimestamp = z.infer<typeof rawTimestamp>;

export const scenarioRecordSchema = z.object({
  scenarioId: rawId,
  status: rawText,
  createdAt: rawTimestamp,
  createdBy: rawText,
  createdReqId: rawId,
  submittedAt: rawTimestamp,
  submittedBy: rawText,
  submittedReqId: rawId,
  lockedAt: rawTimestamp,
  lockedBy: rawText,
  lockedReqId: rawId,
  withdrawAt: rawTimestamp,
  withdrawBy: rawText,
  withdrawReqId: rawId,
  deleteAt: rawTimestamp,
  deleteBy: rawText,
  deleteReqId: rawId,
});

export const inputChangeRecordSchema = z.object({
  scenarioId: rawId,
  nodeId: rawId,
  changedAt: rawTimestamp,
  changedBy: rawText,
  previousHash: rawText,
  inputHash: rawText,
  changeSequence: z.number().int().nullish(),
  correlationId: rawId,
});

export const runRecordSchema = z.object({
  runId: rawId,
  scenarioId: rawId,
  runBy: rawText,
  startedAt: rawTimestamp,
  endedAt: rawTimestamp,
  status: z.enum(RUN_STATUSES).nullish(),
  failReason: rawText,
  failedNodeIds: z.array(z.string()).nullish(),
  correlationId: rawId,
});

export const logRecordSchema = z.object({
  timestamp: rawTimestamp,
  severity: rawText,
  message: rawText,
  correlationId: rawId,
  scenarioId: rawId,
  runId: rawId,
  nodeId: rawId,
  userId: rawText,
  stackTrace: z.union([z.boolean(), z.string()]).nullish(),
  logStream: rawText,
});

export const userActionRecordSchema = z.object({
  scenarioId: rawId,
  userId: rawText,
  actionTimestamp: rawTimestamp,
  actionType: rawText,
  actionCategory: rawText,
  targetEntityType: rawText,
  targetEntityId: rawId,
  correlationId: rawId,
  success: z.boolean().nullish(),
  details: z.record(z.string(), z.unknown()).nullish(),
});

export type ScenarioRecord = z.input<typeof scenarioRecordSchema>;
export type InputChangeRecordRow = z.input<typeof inputChangeRecordSchema>;
export type RunRecord = z.input<typeof runRecordSchema>;
export type LogRecord = z.input<typeof logRecordSchema>;
export type UserActionRecord = z.input<typeof userActionRecordSchema>;

export type ParsedScenarioRecord = z.output<typeof scenarioRecordSchema>;
export type ParsedInputChangeRecord = z.output<typeof inputChangeRecordSchema>;
export type ParsedRunRecord = z.output<typeof runRecordSchema>;
export type ParsedLogRecord = z.output<typeof logRecordSchema>;
export type ParsedUserActionRecord = z.output<typeof userActionRecordSchema>;

/** One raw row tagged with the source it came from. */
export type SourceRecord =
  | { source: 'scenario'; record: ScenarioRecord }
  | { source: 'input_change'; record: InputChangeRecordRow }
  | { source: 'run'; record: RunRecord }
  | { source: 'log'; record: LogRecord }
  | { source: 'user_action'; record: UserActionRecord };

/** Untyped form accepted at the boundary; the normalizer validates `record`. */
export interface RawSourceRecord {
  source: SourceKind;
  record: unknown;
}

export const sourceRecordSchema = z.object({
  source: z.enum(SOURCE_KINDS),
  record: z.record(z.string(), z.unknown()),
});

export const auditBatchSchema = z.object({
  batchId: z.string().min(1).optional(),
  records: z.array(sourceRecordSchema),
});

export type AuditBatchInput = z.infer<typeof auditBatchSchema>;
