import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AppDb } from '../../src/storage/db.js';
import type { DetectedService, ServiceRecord } from '../../src/types.js';
import { TEST_SETTINGS } from '../helpers/fakeMailbox.js';

const detected: DetectedService = {
  serviceName: 'Aguas Andinas',
  serviceId: 'aguas_andinas',
  serviceType: 'water',
  sampleSubject: 'Boleta',
  sampleFrom: 'boletas@aguasandinas.cl',
  emailCount: 3,
};

const record: ServiceRecord = {
  serviceId: 'aguas_andinas',
  serviceName: 'Aguas Andinas',
  serviceType: 'water',
  sampleFrom: 'boletas@aguasandinas.cl',
  sampleSubject: 'Boleta',
};

describe('AppDb', () => {
  let tempDir: string;
  let db: AppDb;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'billwatch-db-'));
    db = new AppDb(path.join(tempDir, 'app.db'));
  });

  afterEach(() => {
    db.close();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('replaces detected services as a whole', () => {
    db.replaceDetectedServices([detected]);
    const gas: DetectedService = { ...detected, serviceId: 'gas', serviceName: 'Gas', serviceType: 'gas', emailCount: 1 };
    db.replaceDetectedServices([gas]);

    expect(db.listDetectedServices()).toEqual([gas]);
  });

  it('refuses a duplicate service and supports rename and removal', () => {
    expect(db.addService(record)).toBe(true);
    expect(db.addService(record)).toBe(false);

    expect(db.renameService('aguas_andinas', 'Agua casa')).toBe(true);
    expect(db.getService('aguas_andinas')?.serviceName).toBe('Agua casa');

    db.replaceRefreshSnapshot('2026-02-03T08:00:00.000Z', {
      aguas_andinas: { lastUpdated: null, attributes: {} },
    });
    expect(db.removeService('aguas_andinas')).toBe(true);
    expect(db.listServices()).toEqual([]);
    expect(db.getRefreshSnapshot().services).toEqual({});
  });

  it('stores the mailbox settings', () => {
    expect(db.getMailbox()).toBeNull();
    db.saveMailbox(TEST_SETTINGS);
    expect(db.getMailbox()).toEqual(TEST_SETTINGS);
  });

  it('clears the error once a refresh succeeds', () => {
    db.markConnectionProblem('connection', 'timeout', '2026-02-03T08:00:00.000Z');
    expect(db.getRefreshSnapshot().errorKind).toBe('connection');

    db.replaceRefreshSnapshot('2026-02-03T09:00:00.000Z', {});
    expect(db.getRefreshSnapshot()).toEqual({
      connectionStatus: 'OK',
      checkedAt: '2026-02-03T09:00:00.000Z',
      errorKind: null,
      errorMessage: null,
      services: {},
    });
  });
});
