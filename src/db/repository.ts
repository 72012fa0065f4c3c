import { and, asc, eq, gte, lt, type SQL } from 'drizzle-orm';
import { eventIdentityKey, type AuditEvent } from '@core/events';
import type { NormalizationAnomaly } from '@core/errors';
import type { AuditDb } from './connection';
import { auditEvents, etlWatermarks, normalizationAnomalies } from './schema/index';

// ---------------------------------------------------------------------------
// Public interface
// ---------------------------------------------------------------------------

export interface StoredBatch {
  batchId: string;
  events: readonly AuditEvent[];
  anomalies: readonly NormalizationAnomaly[];
  /** Written in the same transaction as the events. */
  watermark?: { name: string; value: string };
}

export interface SaveResult {
  eventsInserted: number;
  duplicatesSkipped: number;
  anomaliesRecorded: number;
}

export interface EventRange {
  /** Inclusive. */
  from?: string;
  /** Exclusive. */
  to?: string;
}

export interface AuditRepository {
  /** Stores a batch atomically. Events already stored under the same identity key are skipped. */
  saveBatch(batch: StoredBatch): Promise<SaveResult>;
  scenarioEvents(scenarioId: string): Promise<AuditEvent[]>;
  userEvents(userId: string, range?: EventRange): Promise<AuditEvent[]>;
  eventsInRange(range: EventRange): Promise<AuditEvent[]>;
  getWatermark(name: string): Promise<string | null>;
  setWatermark(name: string, value: string): Promise<void>;
  close(): Promise<void>;
}

const INSERT_CHUNK_SIZE = 500;

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

// ---------------------------------------------------------------------------
// PostgreSQL (Drizzle)
// ---------------------------------------------------------------------------

export class DrizzleAuditRepository implements AuditRepository {
  constructor(
    private readonly db: AuditDb,
    private readonly onClose: () => Promise<void> = async () => {},
  ) {}

  async saveBatch(batch: StoredBatch): Promise<SaveResult> {
    return this.db.transaction(async (tx) => {
      let eventsInserted = 0;
      for (const events of chunk(batch.events, INSERT_CHUNK_SIZE)) {
        const inserted = await tx
          .insert(auditEvents)
          .values(
            events.map((event) => ({
              identityKey: eventIdentityKey(event),
              scenarioId: event.scenarioId,
              eventType: event.eventType,
              occurredAt: new Date(event.timestamp),
              actor: event.actor,
              correlationId: event.correlationId,
              runId: event.runId,
              nodeId: event.nodeId,
              batchId: batch.batchId,
              event,
            })),
          )
          .onConflictDoNothing({ target: auditEvents.identityKey })
          .returning({ id: auditEvents.id });
        eventsInserted += inserted.length;
      }

      for (const anomalies of chunk(batch.anomalies, INSERT_CHUNK_SIZE)) {
        await tx.insert(normalizationAnomalies).values(
          anomalies.map((a) => ({
            batchId: batch.batchId,
            kind: a.kind,
            source: a.source,
            scenarioId: a.scenarioId ?? null,
            field: a.field ?? null,
            message: a.message,
          })),
        );
      }

      if (batch.watermark) {
        await tx
          .insert(etlWatermarks)
          .values({ name: batch.watermark.name, value: batch.watermark.value })
          .onConflictDoUpdate({
            target: etlWatermarks.name,
            set: { value: batch.watermark.value, updatedAt: new Date() },
          });
      }

      return {
        eventsInserted,
        duplicatesSkipped: batch.events.length - eventsInserted,
        anomaliesRecorded: batch.anomalies.length,
      };
    });
  }

  async scenarioEvents(scenarioId: string): Promise<AuditEvent[]> {
    const rows = await this.db
      .select({ event: auditEvents.event })
      .from(auditEvents)
      .where(eq(auditEvents.scenarioId, scenarioId))
      .orderBy(asc(auditEvents.occurredAt));
    return rows.map((r) => r.event);
  }

  async userEvents(userId: string, range: EventRange = {}): Promise<AuditEvent[]> {
    const rows = await this.db
      .select({ event: auditEvents.event })
      .from(auditEvents)
      .where(and(eq(auditEvents.actor, userId), ...rangeConditions(range)))
      .orderBy(asc(auditEvents.occurredAt));
    return rows.map((r) => r.event);
  }

  async eventsInRange(range: EventRange): Promise<AuditEvent[]> {
    const rows = await this.db
      .select({ event: auditEvents.event })
      .from(auditEvents)
      .where(and(...rangeConditions(range)))
      .orderBy(asc(auditEvents.occurredAt));
    return rows.map((r) => r.event);
  }

  async getWatermark(name: string): Promise<string | null> {
    const [row] = await this.db
      .select({ value: etlWatermarks.value })
      .from(etlWatermarks)
      .where(eq(etlWatermarks.name, name))
      .limit(1);
    return row ? row.value : null;
  }

  async setWatermark(name: string, value: string): Promise<void> {
    await this.db
      .insert(etlWatermarks)
      .values({ name, value })
      .onConflictDoUpdate({ target: etlWatermarks.name, set: { value, updatedAt: new Date() } });
  }

  async close(): Promise<void> {
    await this.onClose();
  }
}

function rangeConditions(range: EventRange): SQL[] {
  const conditions: SQL[] = [];
  if (range.from !== undefined) conditions.push(gte(auditEvents.occurredAt, new Date(range.from)));
  if (range.to !== undefined) conditions.push(lt(auditEvents.occurredAt, new Date(range.to)));
  return conditions;
}

// ---------------------------------------------------------------------------
// In-memory
// ---------------------------------------------------------------------------

function inRange(event: AuditEvent, range: EventRange): boolean {
  const t = Date.parse(event.timestamp);
  if (range.from !== undefined && t < Date.parse(range.from)) return false;
  if (range.to !== undefined && t >= Date.parse(range.to)) return false;
  return true;
}

/** Same contract as the PostgreSQL store, kept in process. Used by tests and `AUDIT_STORE=memory`. */
export class InMemoryAuditRepository implements AuditRepository {
  private readonly events = new Map<string, AuditEvent>();
  private readonly anomalies: (NormalizationAnomaly & { batchId: string })[] = [];
  private readonly watermarks = new Map<string, string>();

  async saveBatch(batch: StoredBatch): Promise<SaveResult> {
    let eventsInserted = 0;
    for (const event of batch.events) {
      const key = eventIdentityKey(event);
      if (this.events.has(key)) continue;
      this.events.set(key, event);
      eventsInserted += 1;
    }
    for (const anomaly of batch.anomalies) {
      this.anomalies.push({ ...anomaly, batchId: batch.batchId });
    }
    if (batch.watermark) {
      this.watermarks.set(batch.watermark.name, batch.watermark.value);
    }
    return {
      eventsInserted,
      duplicatesSkipped: batch.events.length - eventsInserted,
      anomaliesRecorded: batch.anomalies.length,
    };
  }

  async scenarioEvents(scenarioId: string): Promise<AuditEvent[]> {
    return this.sorted((e) => e.scenarioId === scenarioId);
  }

  async userEvents(userId: string, range: EventRange = {}): Promise<AuditEvent[]> {
    return this.sorted((e) => e.actor === userId && inRange(e, range));
  }

  async eventsInRange(range: EventRange): Promise<AuditEvent[]> {
    return this.sorted((e) => inRange(e, range));
  }

  async getWatermark(name: string): Promise<string | null> {
    return this.watermarks.get(name) ?? null;
  }

  async setWatermark(name: string, value: string): Promise<void> {
    this.watermarks.set(name, value);
  }

  async close(): Promise<void> {}

  /** Anomalies recorded so far, oldest first. */
  recordedAnomalies(): readonly (NormalizationAnomaly & { batchId: string })[] {
    return this.anomalies;
  }

  private sorted(predicate: (event: AuditEvent) => boolean): AuditEvent[] {
    return [...this.events.values()]
      .filter(predicate)
      .sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
  }
}
