#!/usr/bin/env node
import fs from 'node:fs/promises';
import path from 'node:path';
import { Command } from 'commander';
import { config } from '../config.js';
import { logger } from '../logger.js';
import { describeError, isMailboxError } from '../errors.js';
import { isServiceType, type MailboxSettings } from '../types.js';
import { AppDb } from '../storage/db.js';
import {
  ImapTransport,
  mailboxIdentity,
  resolveMailboxSettings,
  verifyMailbox,
} from '../connectors/imap/imapConnector.js';
import { classifyService } from '../pipeline/classify/classifier.js';
import { ServiceDetectionService } from '../pipeline/detectServices.js';
import { extractAttributes } from '../pipeline/extract/index.js';
import { buildExportRows, defaultExportPath, exportRowsToXlsx } from '../pipeline/export/xlsxExporter.js';
import { parseMessage } from '../pipeline/normalize/index.js';
import { presentStatus } from '../pipeline/present/state.js';
import { defaultSchedulerOptions, RefreshScheduler } from '../microservices/refresh-scheduler/service.js';

async function withDb<T>(fn: (db: AppDb) => Promise<T> | T): Promise<T> {
  const db = new AppDb(config.dbPath);
  try {
    return await fn(db);
  } finally {
    db.close();
  }
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Expected a positive integer, received: ${value}`);
  }
  return parsed;
}

const program = new Command();
program.name('billwatch').description('Utility bill detection and extraction over IMAP').version('0.1.0');

program
  .command('mailbox:set')
  .description('Verify IMAP credentials and store them')
  .requiredOption('--host <host>', 'IMAP server')
  .requiredOption('--user <user>', 'mailbox login')
  .option('--password <password>', 'mailbox password (defaults to IMAP_PASSWORD)')
  .option('--port <port>', 'IMAP port', String(config.imapPort))
  .option('--mailbox <mailbox>', 'folder to scan', config.imapMailbox)
  .option('--no-secure', 'connect without TLS')
  .action(
    async (opts: { host: string; user: string; password?: string; port: string; mailbox: string; secure: boolean }) => {
      const settings: MailboxSettings = {
        host: opts.host,
        port: parsePositiveInt(opts.port),
        secure: opts.secure,
        user: opts.user,
        password: opts.password ?? config.imapPassword,
        mailbox: opts.mailbox,
      };
      await verifyMailbox(new ImapTransport(), settings);
      await withDb((db) => db.saveMailbox(settings));
      logger.info({ host: settings.host, user: settings.user }, 'Mailbox verified and saved');
    },
  );

program
  .command('mailbox:verify')
  .description('Check that the configured mailbox accepts the stored credentials')
  .action(async () => {
    const settings = await withDb((db) => resolveMailboxSettings(db.getMailbox()));
    await verifyMailbox(new ImapTransport(), settings);
    logger.info({ host: settings.host, user: settings.user }, 'Mailbox reachable');
  });

program
  .command('detect')
  .description('Scan recent messages and list billing senders')
  .option('--limit <limit>', 'messages to scan', String(config.detectScanLimit))
  .action(async (opts: { limit: string }) => {
    await withDb(async (db) => {
      const settings = resolveMailboxSettings(db.getMailbox());
      const detected = await new ServiceDetectionService(db, new ImapTransport()).detect(
        settings,
        parsePositiveInt(opts.limit),
      );
      logger.info({ services: detected }, 'Detection done');
    });
  });

program
  .command('services:list')
  .description('List configured services')
  .action(async () => {
    await withDb((db) => {
      logger.info({ services: db.listServices() }, 'Configured services');
    });
  });

program
  .command('services:add')
  .description('Start monitoring a service found by the last detection run')
  .argument('<serviceId>', 'detected service id')
  .option('--name <name>', 'display name override')
  .action(async (serviceId: string, opts: { name?: string }) => {
    await withDb((db) => {
      const detected = db.listDetectedServices().find((service) => service.serviceId === serviceId);
      if (!detected) {
        throw new Error(`No detected service with id ${serviceId}; run detect first`);
      }
      const added = db.addService({
        serviceId: detected.serviceId,
        serviceName: opts.name ?? detected.serviceName,
        serviceType: detected.serviceType,
        sampleFrom: detected.sampleFrom,
        sampleSubject: detected.sampleSubject,
      });
      if (!added) {
        throw new Error(`Service ${serviceId} is already configured`);
      }
      logger.info({ serviceId }, 'Service added');
    });
  });

program
  .command('services:rename')
  .description('Change the display name of a configured service')
  .argument('<serviceId>')
  .argument('<name>')
  .action(async (serviceId: string, name: string) => {
    await withDb((db) => {
      if (!db.renameService(serviceId, name)) {
        throw new Error(`Unknown service: ${serviceId}`);
      }
      logger.info({ serviceId, name }, 'Service renamed');
    });
  });

program
  .command('services:remove')
  .description('Stop monitoring a service')
  .argument('<serviceId>')
  .action(async (serviceId: string) => {
    await withDb((db) => {
      if (!db.removeService(serviceId)) {
        throw new Error(`Unknown service: ${serviceId}`);
      }
      logger.info({ serviceId }, 'Service removed');
    });
  });

program
  .command('refresh')
  .description('Run one refresh cycle now')
  .action(async () => {
    await withDb(async (db) => {
      const scheduler = new RefreshScheduler(db, new ImapTransport(), defaultSchedulerOptions());
      const outcome = await scheduler.runCycle();
      const snapshot = db.getRefreshSnapshot();
      if (outcome === 'problem') {
        throw new Error(`Refresh failed (${snapshot.errorKind ?? 'unknown'}): ${snapshot.errorMessage ?? ''}`);
      }
      logger.info({ outcome, checkedAt: snapshot.checkedAt }, 'Refresh done');
    });
  });

program
  .command('status')
  .description('Show connection state and the latest attributes per service')
  .action(async () => {
    await withDb((db) => {
      const status = presentStatus(db.getRefreshSnapshot(), db.listServices(), mailboxIdentity(db.getMailbox()));
      logger.info(status, 'Status');
    });
  });

program
  .command('extract')
  .description('Extract billing attributes from a saved .eml file')
  .requiredOption('--file <file>', 'raw RFC 822 message')
  .option('--type <type>', 'water|gas|electricity|telecom|unknown (classified from headers when omitted)')
  .action(async (opts: { file: string; type?: string }) => {
    if (opts.type !== undefined && !isServiceType(opts.type)) {
      throw new Error(`Unknown service type: ${opts.type}`);
    }
    const message = await parseMessage(await fs.readFile(path.resolve(opts.file)));
    const serviceType = isServiceType(opts.type) ? opts.type : classifyService(message.from, message.subject);
    const attributes = extractAttributes(message.subject, message.body, serviceType);
    logger.info({ from: message.from, subject: message.subject, serviceType, attributes }, 'Extraction done');
  });

program
  .command('export:xlsx')
  .description('Export the latest refresh results to xlsx')
  .option('--out <out>', 'output xlsx path (defaults to a dated file under OUTPUT_DIR)')
  .action(async (opts: { out?: string }) => {
    await withDb(async (db) => {
      const rows = buildExportRows(db.listServices(), db.getRefreshSnapshot());
      if (!rows.length) {
        throw new Error('No configured services to export');
      }
      const out = path.resolve(opts.out ?? defaultExportPath());
      await exportRowsToXlsx(rows, out);
      logger.info({ out, rows: rows.length }, 'Export completed');
    });
  });

program.parseAsync().catch((error) => {
  if (isMailboxError(error)) {
    const hint =
      error.kind === 'auth'
        ? 'Mailbox rejected the credentials; check user and password'
        : 'Cannot reach the mailbox server; check host, port and TLS';
    logger.error({ kind: error.kind, err: describeError(error) }, hint);
  } else {
    logger.error({ err: error }, 'CLI failed');
  }
  process.exitCode = 1;
});
