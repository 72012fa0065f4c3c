// audit-core: pure logic for normalization, timeline merge, sessions, run diff and metrics
// No HTTP, no I/O. Every function is deterministic and testable in isolation.

export const AUDIT_CORE_VERSION = '0.1.0';

export * from './errors';
export * from './events';
export * from './records';
export * from './timestamps';
export * from './error-categorizer';
export * from './normalizer';
export * from './timeline';
export * from './sessions';
export * from './input-history';
export * from './run-context';
export * from './metrics';
export * from './diagnostics';
export * from './samples/forecast-activity';
