import { CONFIG } from '../config';
import { startServer } from './api';
import { destroyPool } from '../engine/simulator';
import { closeDatabase } from '../storage/database';

const running = startServer(CONFIG.PORT);

function shutdown(): void {
  running.close()
    .then(() => destroyPool())
    .catch(err => console.error('Shutdown failed:', err instanceof Error ? err.message : err))
    .finally(() => {
      closeDatabase();
      process.exit(0);
    });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
