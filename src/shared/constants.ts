export const API_PREFIX = '/api';

export const EVENT_TYPES = [
  'state_change',
  'input_change',
  'run_started',
  'run_completed',
  'run_failed',
  'user_action',
  'log_entry',
] as const;

// Source kinds in ingestion order. The merger uses this order as the final tie-break.
export const SOURCE_KINDS = [
  'scenario',
  'input_change',
  'run',
  'log',
  'user_action',
] as const;

export const SCENARIO_STATUSES = [
  'draft',
  'submitted',
  'locked',
  'withdrawn',
  'deleted',
] as const;

export const TRANSITION_TYPES = [
  'created',
  'submitted',
  'locked',
  'withdrawn',
  'deleted',
] as const;

export const RUN_STATUSES = ['running', 'success', 'failed', 'timeout'] as const;

export const LOG_SEVERITIES = ['INFO', 'WARN', 'ERROR'] as const;

export const ERROR_CATEGORIES = [
  'validation',
  'timeout',
  'database',
  'calculation',
  'uncategorized',
] as const;

export const AUDIT_ERROR_KINDS = [
  'MalformedRecord',
  'RunNotFound',
  'NoRunsForScenario',
  'AmbiguousTimestamp',
] as const;

export const ANOMALY_KINDS = [
  'MalformedRecord',
  'AmbiguousTimestamp',
  'OutOfOrderLifecycle',
  'UnparseableTimestamp',
] as const;

export const DEFAULT_SESSION_GAP_MINUTES = 30;
