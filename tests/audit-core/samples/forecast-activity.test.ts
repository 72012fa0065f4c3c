import { describe, it, expect } from 'vitest';
import {
  generateSampleBatch,
  SAMPLE_PROFILES,
  type SampleProfileName,
} from '@core/samples/forecast-activity';
import { processAuditBatch } from '@worker/index';

const PROFILES: SampleProfileName[] = ['standard', 'heavy_editor', 'flaky_runs', 'clean'];

function scenarioIds(records: ReturnType<typeof generateSampleBatch>['records']): string[] {
  return records.flatMap((r) => (r.source === 'scenario' && typeof r.record.scenarioId === 'string' ? [r.record.scenarioId] : []));
}

describe('generateSampleBatch', () => {
  it('is deterministic with the same seed and profile', () => {
    expect(generateSampleBatch({ seed: 42 })).toEqual(generateSampleBatch({ seed: 42 }));
  });

  it('produces different batches with different seeds', () => {
    const a = generateSampleBatch({ seed: 111 });
    const b = generateSampleBatch({ seed: 222 });
    expect(JSON.stringify(a.records)).not.toBe(JSON.stringify(b.records));
  });

  it('names the batch after seed and profile', () => {
    expect(generateSampleBatch({ seed: 7 }).batchId).toBe('sample-7-standard');
    expect(generateSampleBatch({ seed: 7, profile: 'flaky_runs' }).batchId).toBe('sample-7-flaky_runs');
  });

  it.each(PROFILES)('creates the profile scenario count for %s', (profile) => {
    const batch = generateSampleBatch({ seed: 5, profile });
    const ids = scenarioIds(batch.records);
    expect(ids).toHaveLength(SAMPLE_PROFILES[profile].scenarios);
    expect(ids[0]).toBe('SCN-0005-001');
  });

  it('honours a scenario count override and start time', () => {
    const batch = generateSampleBatch({ seed: 3, scenarioCount: 2, startAt: '2026-03-01T00:00:00Z' });
    expect(scenarioIds(batch.records)).toEqual(['SCN-0003-001', 'SCN-0003-002']);
    const [first] = batch.records;
    expect(first.source === 'scenario' && first.record.createdAt).toBe('2026-03-01T00:00:00.000Z');
  });

  it('only produces successful runs for the clean profile', () => {
    const batch = generateSampleBatch({ seed: 9, profile: 'clean' });
    const statuses = batch.records.flatMap((r) => (r.source === 'run' ? [r.record.status] : []));
    expect(statuses.length).toBeGreaterThan(0);
    expect(new Set(statuses)).toEqual(new Set(['success']));
  });

  it.each(PROFILES)('normalizes every %s record without anomalies', (profile) => {
    const batch = generateSampleBatch({ seed: 21, profile });
    const { report } = processAuditBatch(batch);

    expect(report.recordsReceived).toBe(batch.records.length);
    expect(report.recordsNormalized).toBe(batch.records.length);
    expect(report.anomalies.anomalyCount).toBe(0);
    expect(report.scenarioFailures).toEqual([]);
    expect(report.scenariosProcessed).toBe(SAMPLE_PROFILES[profile].scenarios);
  });
});
