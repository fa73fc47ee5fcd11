import type { Server } from 'http';

import type { CatalogDatabase } from '../config/database.js';

/**
 * Signal handler that stops accepting connections, then closes the catalog
 * store. Runs once; repeated signals while closing are ignored.
 */
export function createShutdown(
  server: Server,
  db: CatalogDatabase,
  exit: (code: number) => void = (code) => process.exit(code)
) {
  let shuttingDown = false;

  return function shutdown(signal: NodeJS.Signals) {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    console.log(`Received ${signal}, closing the catalog store.`);
    server.close((error) => {
      db.close();
      if (error) {
        console.error('Error closing the server:', error);
        exit(1);
        return;
      }
      exit(0);
    });
  };
}
