// audit-worker: batch reconciliation
// Normalizes one fetched batch, builds per-scenario timelines and hands the
// result to the reporting store in one transaction.

export const AUDIT_WORKER_VERSION = '0.1.0';

export * from './pipeline';
export * from './etl';
