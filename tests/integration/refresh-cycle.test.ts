import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MailboxAuthError } from '../../src/errors.js';
import { RefreshScheduler } from '../../src/microservices/refresh-scheduler/service.js';
import { createServer } from '../../src/server/httpServer.js';
import { AppDb } from '../../src/storage/db.js';
import { FakeMailbox, TEST_SETTINGS } from '../helpers/fakeMailbox.js';
import { buildRawEmail } from '../helpers/rawEmail.js';

const AGUAS_FROM = 'Aguas Andinas <boletas@aguasandinas.cl>';

function fixtureMailbox(): FakeMailbox {
  return new FakeMailbox([
    buildRawEmail({
      from: AGUAS_FROM,
      subject: 'Boleta de agua',
      date: 'Fri, 02 Jan 2026 10:00:00 +0000',
      text: 'Total a pagar: $10.000',
      attachment: true,
    }),
    buildRawEmail({
      from: AGUAS_FROM,
      subject: 'Boleta de agua',
      date: 'Mon, 02 Feb 2026 10:00:00 +0000',
      text: 'Total a pagar: $12.013',
      attachment: true,
    }),
    buildRawEmail({
      from: AGUAS_FROM,
      subject: 'Boleta de agua',
      date: 'Tue, 03 Feb 2026 10:00:00 +0000',
      text: 'Total a pagar: $99.999',
    }),
  ]);
}

describe('refresh cycle', () => {
  let tempDir: string;
  let db: AppDb;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'billwatch-'));
    db = new AppDb(path.join(tempDir, 'app.db'));
    db.saveMailbox(TEST_SETTINGS);
    db.addService({
      serviceId: 'aguas_andinas',
      serviceName: 'Aguas Andinas',
      serviceType: 'water',
      sampleFrom: AGUAS_FROM,
      sampleSubject: 'Boleta de agua',
    });
    db.addService({
      serviceId: 'gas',
      serviceName: 'Gas',
      serviceType: 'gas',
      sampleFrom: 'boletas@metrogas.cl',
      sampleSubject: 'Boleta Metrogas',
    });
  });

  afterEach(() => {
    db.close();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('stores the newest matching message with an attachment per service', async () => {
    const mailbox = fixtureMailbox();
    const scheduler = new RefreshScheduler(db, mailbox, { intervalSec: 1800, scanLimit: 100 });

    expect(await scheduler.runCycle()).toBe('ok');

    const snapshot = db.getRefreshSnapshot();
    expect(snapshot.connectionStatus).toBe('OK');
    expect(snapshot.errorKind).toBeNull();
    expect(snapshot.services.aguas_andinas).toEqual({
      lastUpdated: '2026-02-02T10:00:00.000Z',
      attributes: { total_amount: '12.013' },
    });
    expect(snapshot.services.gas).toEqual({ lastUpdated: null, attributes: {} });
    expect(mailbox.opened).toBe(1);
    expect(mailbox.closed).toBe(1);
  });

  it('keeps the previous results when the mailbox rejects the login', async () => {
    const mailbox = fixtureMailbox();
    const scheduler = new RefreshScheduler(db, mailbox, { intervalSec: 1800, scanLimit: 100 });
    await scheduler.runCycle();

    mailbox.failOpen = new MailboxAuthError('rejected');
    expect(await scheduler.runCycle()).toBe('problem');

    const snapshot = db.getRefreshSnapshot();
    expect(snapshot.connectionStatus).toBe('Problem');
    expect(snapshot.errorKind).toBe('auth');
    expect(snapshot.errorMessage).toBe('rejected');
    expect(snapshot.services.aguas_andinas.lastUpdated).toBe('2026-02-02T10:00:00.000Z');
  });

  it('closes the session when a scan fails midway', async () => {
    const mailbox = fixtureMailbox();
    mailbox.failList = new MailboxAuthError('session expired');
    const scheduler = new RefreshScheduler(db, mailbox, { intervalSec: 1800, scanLimit: 100 });

    expect(await scheduler.runCycle()).toBe('problem');
    expect(mailbox.closed).toBe(1);
  });

  it('serves the stored state over http', async () => {
    await new RefreshScheduler(db, fixtureMailbox(), { intervalSec: 1800, scanLimit: 100 }).runCycle();
    const server = createServer(db, () => ({ user: TEST_SETTINGS.user, host: TEST_SETTINGS.host, port: 993 }));
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));

    try {
      const address = server.address();
      if (!address || typeof address === 'string') {
        throw new Error('server is not listening on a port');
      }
      const { port } = address;
      const status = await fetch(`http://127.0.0.1:${port}/services/aguas_andinas`);
      expect(status.status).toBe(200);
      expect(await status.json()).toEqual({
        state: '2026-02-02',
        attributes: {
          service_id: 'aguas_andinas',
          service_name: 'Aguas Andinas',
          service_type: 'water',
          last_updated_datetime: '2026-02-02T10:00:00.000Z',
          total_amount: '12.013',
          attributes_extracted_count: 1,
        },
      });

      const missing = await fetch(`http://127.0.0.1:${port}/services/nope`);
      expect(missing.status).toBe(404);
    } finally {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });
});
