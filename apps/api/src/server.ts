import { buildApp, buildHttpServer } from './app.js';
import { loadChaosConfig } from './config/chaos.js';

function main(): void {
  const { port, seed } = loadChaosConfig();
  const app = buildApp();
  const { httpServer } = buildHttpServer(app);

  httpServer.listen(port, () => {
    console.log(`[server] listening on http://0.0.0.0:${port}`);
    if (seed !== null) console.log(`[server] fault RNG seeded with ${seed}`);
  });

  const shutdown = () => {
    console.log('[server] shutting down...');
    httpServer.close(() => process.exit(0));
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

try {
  main();
} catch (err) {
  console.error('[server] fatal startup error', err);
  process.exit(1);
}
