import { readFile } from 'fs/promises';
import { randomUUID } from 'crypto';
import type { BatchReport } from '@shared/types';
import { auditBatchSchema, generateSampleBatch, SAMPLE_PROFILES, type SampleProfileName } from '@core/index';
import type { AuditRepository, SaveResult } from '@db/repository';
import { processAuditBatch, type AuditBatch, type PipelineOptions } from './pipeline';

export const BATCH_WATERMARK = 'audit_batch';

export const ETL_USAGE =
  'usage: npm run etl -- (--file <batch.json> | --sample <seed> [--profile <name>]) [--dry-run]';

export interface EtlArgs {
  file?: string;
  sample?: number;
  profile?: SampleProfileName;
  dryRun: boolean;
}

function isProfileName(value: string | undefined): value is SampleProfileName {
  return value !== undefined && Object.prototype.hasOwnProperty.call(SAMPLE_PROFILES, value);
}

export function parseEtlArgs(argv: readonly string[]): EtlArgs {
  let file: string | undefined;
  let sample: number | undefined;
  let profile: SampleProfileName | undefined;
  let dryRun = false;

  for (let i = 2; i < argv.length; i += 1) {
    const token = argv[i];
    if (token === '--dry-run') {
      dryRun = true;
      continue;
    }
    if (token === '--file') {
      const value = argv[i + 1];
      if (typeof value === 'string' && value.length > 0) {
        file = value;
      }
      i += 1;
      continue;
    }
    if (token === '--sample') {
      const value = Number(argv[i + 1]);
      if (Number.isInteger(value)) {
        sample = value;
      }
      i += 1;
      continue;
    }
    if (token === '--profile') {
      const value = argv[i + 1];
      if (isProfileName(value)) {
        profile = value;
      }
      i += 1;
      continue;
    }
  }

  return {
    ...(file !== undefined ? { file } : {}),
    ...(sample !== undefined ? { sample } : {}),
    ...(profile !== undefined ? { profile } : {}),
    dryRun,
  };
}

/** Reads the batch named by the arguments. Throws on an unreadable or invalid file. */
export async function loadBatch(args: EtlArgs): Promise<AuditBatch> {
  if (args.file !== undefined) {
    const raw: unknown = JSON.parse(await readFile(args.file, 'utf8'));
    const parsed = auditBatchSchema.parse(raw);
    return { batchId: parsed.batchId ?? randomUUID(), records: parsed.records };
  }
  if (args.sample !== undefined) {
    return generateSampleBatch({ seed: args.sample, ...(args.profile ? { profile: args.profile } : {}) });
  }
  throw new Error(ETL_USAGE);
}

export interface EtlResult {
  report: BatchReport;
  previousWatermark: string | null;
  /** null on a dry run. */
  saved: SaveResult | null;
}

export async function runEtl(
  batch: AuditBatch,
  repository: AuditRepository,
  options: PipelineOptions & { dryRun?: boolean } = {},
): Promise<EtlResult> {
  const previousWatermark = await repository.getWatermark(BATCH_WATERMARK);
  if (previousWatermark === batch.batchId) {
    console.warn(`[ETL] Batch ${batch.batchId} matches the current watermark; events already stored are skipped`);
  }

  const processed = processAuditBatch(batch, options);
  const { report } = processed;
  console.warn(
    `[ETL] Batch ${report.batchId}: ${report.recordsNormalized}/${report.recordsReceived} records normalized, ` +
      `${report.eventsProduced} events across ${report.scenariosProcessed} scenarios, ` +
      `${report.anomalies.anomalyCount} anomalies`,
  );
  for (const failure of report.scenarioFailures) {
    console.warn(`[ETL] Scenario ${failure.scenarioId} skipped: ${failure.error}`);
  }

  if (options.dryRun) {
    return { report, previousWatermark, saved: null };
  }

  const saved = await repository.saveBatch({
    batchId: batch.batchId,
    events: processed.events,
    anomalies: processed.anomalies,
    watermark: { name: BATCH_WATERMARK, value: batch.batchId },
  });
  console.warn(
    `[ETL] Stored ${saved.eventsInserted} events (${saved.duplicatesSkipped} duplicates skipped), ` +
      `${saved.anomaliesRecorded} anomalies`,
  );

  return { report, previousWatermark, saved };
}
