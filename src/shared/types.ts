import type {
  ANOMALY_KINDS,
  AUDIT_ERROR_KINDS,
  ERROR_CATEGORIES,
  EVENT_TYPES,
  LOG_SEVERITIES,
  RUN_STATUSES,
  SCENARIO_STATUSES,
  SOURCE_KINDS,
  TRANSITION_TYPES,
} from './constants';

export type EventType = (typeof EVENT_TYPES)[number];
export type SourceKind = (typeof SOURCE_KINDS)[number];
export type ScenarioStatus = (typeof SCENARIO_STATUSES)[number];
export type TransitionType = (typeof TRANSITION_TYPES)[number];
export type RunStatus = (typeof RUN_STATUSES)[number];
export type LogSeverity = (typeof LOG_SEVERITIES)[number];
export type ErrorCategory = (typeof ERROR_CATEGORIES)[number];
export type AuditErrorKind = (typeof AUDIT_ERROR_KINDS)[number];
export type AnomalyKind = (typeof ANOMALY_KINDS)[number];

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  kind?: AuditErrorKind;
}

export interface AnomalySummary {
  anomalyCount: number;
  anomaliesByKind: Partial<Record<AnomalyKind, number>>;
  samples: {
    kind: AnomalyKind;
    source: SourceKind;
    message: string;
    scenarioId?: string;
    field?: string;
  }[];
}

export interface BatchReport {
  batchId: string;
  recordsReceived: number;
  recordsNormalized: number;
  eventsProduced: number;
  scenariosProcessed: number;
  scenarioFailures: { scenarioId: string; error: string }[];
  anomalies: AnomalySummary;
}
