/**
 * Server entry point
 *
 * Initializes the database, starts the categorization worker and the sync
 * scheduler, then listens for HTTP requests.
 */

import { config } from './config/env';
import { closeDatabase } from './database/connection';
import { initializeDatabase } from './database/database';
import { createApp } from './server';
import { getServices } from './services';

function main(): void {
  initializeDatabase();

  const services = getServices();
  services.worker.start();
  services.scheduler.start();

  const server = createApp().listen(config.port, () => {
    console.log(`Server running on port ${config.port} (${config.banking.mode} banking)`);
  });

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    services.scheduler.stop();
    server.close();
    services.worker.stop()
      .then(() => services.events.close())
      .catch(error => console.error('[Server] Worker did not stop cleanly:', error))
      .finally(() => {
        closeDatabase();
        process.exit(0);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main();
