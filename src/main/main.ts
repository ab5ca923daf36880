#!/usr/bin/env node
import { ServiceContainer } from './services/service-container';
import { createLogger } from './services/logger';

const log = createLogger('Main');

// ─── Global error handlers ───
process.on('unhandledRejection', (reason) => {
  log.error('Unhandled promise rejection:', reason);
});

process.on('uncaughtException', (error) => {
  log.error('Uncaught exception:', error);
  // Keep running; the history must survive a stray error
});

const container = new ServiceContainer();
let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;

  log.info(`Received ${signal}, shutting down`);
  await container.shutdown();
  process.exit(0);
}

async function main(): Promise<void> {
  await container.init();

  const status = await container.get('clipboard').getStatus();
  log.info(
    `ClipTrail running: ${status.totalEntries} entries (${status.pinnedEntries} pinned), monitoring ${status.monitoring ? 'on' : 'off'}`,
  );

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        log.error('Shutdown failed:', err);
        process.exit(1);
      });
    });
  }
}

main().catch(async (err: unknown) => {
  log.error('Failed to start ClipTrail:', err);
  await container.shutdown();
  process.exit(1);
});
