import type { AnomalyKind, AuditErrorKind, SourceKind } from '@shared/types';

// ---------------------------------------------------------------------------
// Error values
// ---------------------------------------------------------------------------
//
// Core operations never throw for bad input. They return `{ ok: false, error }`
// and leave the decision (skip, 404, retry the batch) to the caller.

export interface AuditError {
  kind: AuditErrorKind;
  message: string;
  detail?: Record<string, unknown>;
}

export interface Success<T> {
  ok: true;
  value: T;
}

export interface Failure {
  ok: false;
  error: AuditError;
}

export type AuditResult<T> = Success<T> | Failure;

export function succeed<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function fail(
  kind: AuditErrorKind,
  message: string,
  detail?: Record<string, unknown>,
): Failure {
  return { ok: false, error: detail ? { kind, message, detail } : { kind, message } };
}

// ---------------------------------------------------------------------------
// Normalization anomalies
// ---------------------------------------------------------------------------

/** A problem observed while normalizing that is surfaced to the caller, not fixed. */
export interface NormalizationAnomaly {
  kind: AnomalyKind;
  source: SourceKind;
  message: string;
  scenarioId?: string;
  field?: string;
}

export function anomalyFromError(
  source: SourceKind,
  error: AuditError,
  scenarioId?: string,
): NormalizationAnomaly {
  // RunNotFound/NoRunsForScenario never come out of normalization; map anything
  // that is not a timestamp ambiguity to MalformedRecord.
  const kind: AnomalyKind = error.kind === 'AmbiguousTimestamp' ? 'AmbiguousTimestamp' : 'MalformedRecord';
  return scenarioId
    ? { kind, source, message: error.message, scenarioId }
    : { kind, source, message: error.message };
}
