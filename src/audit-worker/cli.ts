import { config } from '@api/config';
import { createAuditRepository } from '@db/index';
import { ETL_USAGE, loadBatch, parseEtlArgs, runEtl } from './etl';

async function main(): Promise<void> {
  const args = parseEtlArgs(process.argv);
  if (args.file === undefined && args.sample === undefined) {
    process.stderr.write(`${ETL_USAGE}\n`);
    process.exitCode = 2;
    return;
  }

  const batch = await loadBatch(args);
  const repository = createAuditRepository(config.store);
  try {
    await runEtl(batch, repository, {
      anomalySampleSize: config.audit.anomalySampleSize,
      dryRun: args.dryRun,
    });
  } finally {
    await repository.close();
  }
}

main().catch((err) => {
  console.error('[ETL] Failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
