import type { AuditStoreKind } from '@api/config';
import { createDb, createPool } from './connection';
import { DrizzleAuditRepository, InMemoryAuditRepository, type AuditRepository } from './repository';

export * from './repository';

/** Opens the configured store. The PostgreSQL pool is closed by `repository.close()`. */
export function createAuditRepository(kind: AuditStoreKind, databaseUrl?: string): AuditRepository {
  if (kind === 'memory') {
    return new InMemoryAuditRepository();
  }
  const pool = createPool(databaseUrl);
  return new DrizzleAuditRepository(createDb(pool), () => pool.end());
}
