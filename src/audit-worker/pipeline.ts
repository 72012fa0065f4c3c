import type { AnomalySummary, BatchReport } from '@shared/types';
import {
  buildScenarioTimeline,
  dedupeEvents,
  groupByScenario,
  normalizeRecords,
  runRecordSchema,
  type AuditEvent,
  type CategoryRule,
  type NormalizationAnomaly,
  type RawSourceRecord,
} from '@core/index';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export interface AuditBatch {
  batchId: string;
  records: readonly RawSourceRecord[];
}

export interface PipelineOptions {
  categoryRules?: readonly CategoryRule[];
  /** Maximum anomalies kept verbatim in the report. */
  anomalySampleSize?: number;
}

export interface ScenarioTimeline {
  scenarioId: string;
  events: AuditEvent[];
}

export interface ProcessedBatch {
  report: BatchReport;
  /** One entry per scenario that built successfully, ordered by scenarioId. */
  timelines: ScenarioTimeline[];
  /** Every timeline's events, concatenated. */
  events: AuditEvent[];
  anomalies: NormalizationAnomaly[];
}

export const DEFAULT_ANOMALY_SAMPLE_SIZE = 20;

// ---------------------------------------------------------------------------
// Orphan log attribution
// ---------------------------------------------------------------------------

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function idValue(value: unknown): string | null {
  if (typeof value === 'string' && value !== '') return value;
  if (typeof value === 'number') return String(value);
  return null;
}

/**
 * Maps run ids and run correlation ids to the scenario that owns the run.
 * Log lines shipped without a scenario id are attributed through it.
 */
export function buildCorrelationIndex(records: readonly RawSourceRecord[]): Map<string, string> {
  const index = new Map<string, string>();
  for (const { source, record } of records) {
    if (source !== 'run') continue;
    const parsed = runRecordSchema.safeParse(record);
    if (!parsed.success) continue;
    const { scenarioId, runId, correlationId } = parsed.data;
    if (scenarioId === null) continue;
    if (runId !== null) index.set(runId, scenarioId);
    if (correlationId !== null) index.set(correlationId, scenarioId);
  }
  return index;
}

export function attributeOrphanLogs(
  records: readonly RawSourceRecord[],
  index: ReadonlyMap<string, string>,
): RawSourceRecord[] {
  return records.map((input) => {
    if (input.source !== 'log' || !isPlainRecord(input.record)) return input;
    if (idValue(input.record.scenarioId) !== null) return input;

    const correlationId = idValue(input.record.correlationId);
    const runId = idValue(input.record.runId);
    const scenarioId =
      (correlationId !== null ? index.get(correlationId) : undefined) ??
      (runId !== null ? index.get(runId) : undefined);
    if (scenarioId === undefined) return input;
    return { source: input.source, record: { ...input.record, scenarioId } };
  });
}

// ---------------------------------------------------------------------------
// Anomaly summary
// ---------------------------------------------------------------------------

export function summarizeAnomalies(
  anomalies: readonly NormalizationAnomaly[],
  sampleSize: number = DEFAULT_ANOMALY_SAMPLE_SIZE,
): AnomalySummary {
  const anomaliesByKind: AnomalySummary['anomaliesByKind'] = {};
  for (const anomaly of anomalies) {
    anomaliesByKind[anomaly.kind] = (anomaliesByKind[anomaly.kind] ?? 0) + 1;
  }
  return {
    anomalyCount: anomalies.length,
    anomaliesByKind,
    samples: anomalies.slice(0, Math.max(0, sampleSize)).map((a) => ({ ...a })),
  };
}

// ---------------------------------------------------------------------------
// Batch processing
// ---------------------------------------------------------------------------

/**
 * Runs one batch through normalization and per-scenario timeline building.
 * Bad records are skipped and reported; a scenario whose timeline cannot be
 * built is reported in `scenarioFailures` while the others proceed.
 */
export function processAuditBatch(batch: AuditBatch, options: PipelineOptions = {}): ProcessedBatch {
  const attributed = attributeOrphanLogs(batch.records, buildCorrelationIndex(batch.records));
  const normalized = normalizeRecords(
    attributed,
    options.categoryRules ? { categoryRules: options.categoryRules } : {},
  );

  const anomalies: NormalizationAnomaly[] = [...normalized.anomalies];
  const timelines: ScenarioTimeline[] = [];
  const scenarioFailures: BatchReport['scenarioFailures'] = [];

  const byScenario = groupByScenario(normalized.events);
  const scenarioIds = [...byScenario.keys()].sort();

  for (const scenarioId of scenarioIds) {
    const events = byScenario.get(scenarioId) ?? [];
    try {
      const timeline = buildScenarioTimeline(events);
      anomalies.push(...timeline.anomalies);
      timelines.push({ scenarioId, events: dedupeEvents(timeline.events) });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.warn(`[ETL] Scenario ${scenarioId} failed: ${message}`);
      scenarioFailures.push({ scenarioId, error: message });
    }
  }

  const events = timelines.flatMap((t) => t.events);

  return {
    report: {
      batchId: batch.batchId,
      recordsReceived: batch.records.length,
      recordsNormalized: normalized.normalizedCount,
      eventsProduced: events.length,
      scenariosProcessed: timelines.length,
      scenarioFailures,
      anomalies: summarizeAnomalies(anomalies, options.anomalySampleSize),
    },
    timelines,
    events,
    anomalies,
  };
}
