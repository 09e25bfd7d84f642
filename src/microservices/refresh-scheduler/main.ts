import type { Server } from 'node:http';
import { config } from '../../config.js';
import { logger } from '../../logger.js';
import { ImapTransport, mailboxIdentity } from '../../connectors/imap/imapConnector.js';
import { createServer } from '../../server/httpServer.js';
import { AppDb } from '../../storage/db.js';
import { defaultSchedulerOptions, RefreshScheduler } from './service.js';

const db = new AppDb(config.dbPath);
const scheduler = new RefreshScheduler(db, new ImapTransport(), defaultSchedulerOptions());
let server: Server | null = null;
let stopping = false;

if (config.httpPort > 0) {
  server = createServer(db, () => mailboxIdentity(db.getMailbox()));
  server.listen(config.httpPort, () => {
    logger.info({ port: config.httpPort }, 'Status server listening');
  });
}

const shutdown = (signal: string): void => {
  if (stopping) {
    return;
  }
  stopping = true;
  logger.info({ signal }, 'Shutdown signal received');
  scheduler.stop();
  server?.close();
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

scheduler
  .runForever()
  .catch((error) => {
    logger.error({ err: error }, 'Refresh scheduler crashed');
    process.exitCode = 1;
  })
  .finally(() => {
    db.close();
  });
