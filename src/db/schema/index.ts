export { auditEvents } from './audit-events';
export { normalizationAnomalies } from './anomalies';
export { etlWatermarks } from './watermarks';
