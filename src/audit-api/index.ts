import { createServer } from 'http';
import { API_PREFIX } from '@shared/constants';
import { createAuditRepository } from '@db/index';
import { createApp } from './app';
import { config } from './config';

const repository = createAuditRepository(config.store);
const app = createApp({
  repository,
  settings: config.audit,
  now: () => new Date(),
});
const server = createServer(app);

function shutdown(signal: string) {
  console.warn(`[SERVER] ${signal} received, shutting down`);
  server.close(() => {
    repository
      .close()
      .then(() => process.exit(0))
      .catch((err) => {
        console.error('[SERVER] Failed to close store:', err);
        process.exit(1);
      });
  });
  setTimeout(() => process.exit(1), 5000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

server.listen(config.port, () => {
  console.warn(`[SERVER] Scenario Audit Trail API on port ${config.port} (${config.store} store)`);
  console.warn(`[SERVER] Health: http://localhost:${config.port}${API_PREFIX}/health`);
});

export { app, server };
