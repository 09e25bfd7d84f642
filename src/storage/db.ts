import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import type { MailboxErrorKind } from '../errors.js';
import {
  isServiceType,
  type DetectedService,
  type ExtractedAttributes,
  type MailboxSettings,
  type RefreshResult,
  type RefreshSnapshot,
  type ServiceRecord,
} from '../types.js';

interface ServiceRow {
  serviceId: string;
  serviceName: string;
  serviceType: string;
  sampleFrom: string;
  sampleSubject: string;
}

interface DetectedRow extends ServiceRow {
  emailCount: number;
}

interface MailboxRow {
  host: string;
  port: number;
  secure: number;
  user: string;
  password: string;
  mailbox: string;
}

interface RefreshRow {
  serviceId: string;
  lastUpdated: string | null;
  attributesJson: string;
}

const META_STATUS = 'connection_status';
const META_CHECKED_AT = 'checked_at';
const META_ERROR_KIND = 'error_kind';
const META_ERROR_MESSAGE = 'error_message';

function parseAttributes(value: string): ExtractedAttributes {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return {};
  }
  const out: ExtractedAttributes = {};
  if (typeof parsed !== 'object' || parsed === null) {
    return out;
  }
  for (const [key, item] of Object.entries(parsed)) {
    if (typeof item === 'string') {
      out[key] = item;
    } else if (Array.isArray(item) && item.every((entry): entry is string => typeof entry === 'string')) {
      out[key] = item;
    }
  }
  return out;
}

function toServiceRecord(row: ServiceRow): ServiceRecord {
  return {
    serviceId: row.serviceId,
    serviceName: row.serviceName,
    serviceType: isServiceType(row.serviceType) ? row.serviceType : 'unknown',
    sampleFrom: row.sampleFrom,
    sampleSubject: row.sampleSubject,
  };
}

export class AppDb {
  readonly db: Database.Database;

  constructor(dbPath: string) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.init();
  }

  close(): void {
    this.db.close();
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS services (
        serviceId TEXT PRIMARY KEY,
        serviceName TEXT NOT NULL,
        serviceType TEXT NOT NULL,
        sampleFrom TEXT NOT NULL DEFAULT '',
        sampleSubject TEXT NOT NULL DEFAULT '',
        createdAt TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
      );

      CREATE TABLE IF NOT EXISTS detected_services (
        serviceId TEXT PRIMARY KEY,
        serviceName TEXT NOT NULL,
        serviceType TEXT NOT NULL,
        sampleFrom TEXT NOT NULL DEFAULT '',
        sampleSubject TEXT NOT NULL DEFAULT '',
        emailCount INTEGER NOT NULL,
        position INTEGER NOT NULL,
        detectedAt TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
      );

      CREATE TABLE IF NOT EXISTS mailbox (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        host TEXT NOT NULL,
        port INTEGER NOT NULL,
        secure INTEGER NOT NULL,
        user TEXT NOT NULL,
        password TEXT NOT NULL,
        mailbox TEXT NOT NULL,
        updatedAt TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
      );

      CREATE TABLE IF NOT EXISTS refresh_results (
        serviceId TEXT PRIMARY KEY,
        lastUpdated TEXT,
        attributesJson TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS metadata (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updatedAt TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
      );
    `);
  }

  /** Returns false when a service with the same id is already configured. */
  addService(record: ServiceRecord): boolean {
    const result = this.db
      .prepare(`
        INSERT INTO services (serviceId, serviceName, serviceType, sampleFrom, sampleSubject)
        VALUES (@serviceId, @serviceName, @serviceType, @sampleFrom, @sampleSubject)
        ON CONFLICT(serviceId) DO NOTHING
      `)
      .run(record);
    return result.changes > 0;
  }

  renameService(serviceId: string, serviceName: string): boolean {
    const result = this.db
      .prepare('UPDATE services SET serviceName = ? WHERE serviceId = ?')
      .run(serviceName, serviceId);
    return result.changes > 0;
  }

  removeService(serviceId: string): boolean {
    const remove = this.db.transaction((id: string) => {
      this.db.prepare('DELETE FROM refresh_results WHERE serviceId = ?').run(id);
      return this.db.prepare('DELETE FROM services WHERE serviceId = ?').run(id).changes;
    });
    return remove(serviceId) > 0;
  }

  listServices(): ServiceRecord[] {
    return this.db
      .prepare<[], ServiceRow>('SELECT * FROM services ORDER BY createdAt ASC, serviceId ASC')
      .all()
      .map(toServiceRecord);
  }

  getService(serviceId: string): ServiceRecord | null {
    const row = this.db.prepare<[string], ServiceRow>('SELECT * FROM services WHERE serviceId = ?').get(serviceId);
    return row ? toServiceRecord(row) : null;
  }

  /** The previous detection run is discarded as a whole. */
  replaceDetectedServices(services: DetectedService[]): void {
    const insert = this.db.prepare(`
      INSERT INTO detected_services (serviceId, serviceName, serviceType, sampleFrom, sampleSubject, emailCount, position)
      VALUES (@serviceId, @serviceName, @serviceType, @sampleFrom, @sampleSubject, @emailCount, @position)
    `);

    const trx = this.db.transaction((rows: DetectedService[]) => {
      this.db.prepare('DELETE FROM detected_services').run();
      rows.forEach((row, position) => {
        insert.run({ ...row, position });
      });
    });

    trx(services);
  }

  listDetectedServices(): DetectedService[] {
    return this.db
      .prepare<[], DetectedRow>('SELECT * FROM detected_services ORDER BY position ASC')
      .all()
      .map((row) => ({ ...toServiceRecord(row), emailCount: row.emailCount }));
  }

  saveMailbox(settings: MailboxSettings): void {
    this.db
      .prepare(`
        INSERT INTO mailbox (id, host, port, secure, user, password, mailbox)
        VALUES (1, @host, @port, @secure, @user, @password, @mailbox)
        ON CONFLICT(id) DO UPDATE SET
          host=excluded.host,
          port=excluded.port,
          secure=excluded.secure,
          user=excluded.user,
          password=excluded.password,
          mailbox=excluded.mailbox,
          updatedAt=CURRENT_TIMESTAMP
      `)
      .run({ ...settings, secure: settings.secure ? 1 : 0 });
  }

  getMailbox(): MailboxSettings | null {
    const row = this.db.prepare<[], MailboxRow>('SELECT * FROM mailbox WHERE id = 1').get();
    if (!row) {
      return null;
    }
    return {
      host: row.host,
      port: row.port,
      secure: row.secure === 1,
      user: row.user,
      password: row.password,
      mailbox: row.mailbox,
    };
  }

  /** Swaps every stored refresh result and marks the connection healthy, in one transaction. */
  replaceRefreshSnapshot(checkedAt: string, results: Record<string, RefreshResult>): void {
    const insert = this.db.prepare(
      'INSERT INTO refresh_results (serviceId, lastUpdated, attributesJson) VALUES (?, ?, ?)',
    );

    const trx = this.db.transaction(() => {
      this.db.prepare('DELETE FROM refresh_results').run();
      for (const [serviceId, result] of Object.entries(results)) {
        insert.run(serviceId, result.lastUpdated, JSON.stringify(result.attributes));
      }
      this.setMetadata(META_STATUS, 'OK');
      this.setMetadata(META_CHECKED_AT, checkedAt);
      this.deleteMetadata(META_ERROR_KIND);
      this.deleteMetadata(META_ERROR_MESSAGE);
    });

    trx();
  }

  /** Flags the connection; stored refresh results stay as they are. */
  markConnectionProblem(kind: MailboxErrorKind, message: string, checkedAt: string): void {
    const trx = this.db.transaction(() => {
      this.setMetadata(META_STATUS, 'Problem');
      this.setMetadata(META_CHECKED_AT, checkedAt);
      this.setMetadata(META_ERROR_KIND, kind);
      this.setMetadata(META_ERROR_MESSAGE, message);
    });
    trx();
  }

  getRefreshSnapshot(): RefreshSnapshot {
    const read = this.db.transaction((): RefreshSnapshot => {
      const rows = this.db.prepare<[], RefreshRow>('SELECT * FROM refresh_results').all();
      const services: Record<string, RefreshResult> = {};
      for (const row of rows) {
        services[row.serviceId] = { lastUpdated: row.lastUpdated, attributes: parseAttributes(row.attributesJson) };
      }

      const errorKind = this.getMetadata(META_ERROR_KIND);
      return {
        connectionStatus: this.getMetadata(META_STATUS) === 'Problem' ? 'Problem' : 'OK',
        checkedAt: this.getMetadata(META_CHECKED_AT),
        errorKind: errorKind === 'auth' || errorKind === 'connection' ? errorKind : null,
        errorMessage: this.getMetadata(META_ERROR_MESSAGE),
        services,
      };
    });
    return read();
  }

  setMetadata(key: string, value: string): void {
    this.db
      .prepare(
        `INSERT INTO metadata (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value, updatedAt = CURRENT_TIMESTAMP`,
      )
      .run(key, value);
  }

  getMetadata(key: string): string | null {
    const row = this.db.prepare<[string], { value: string }>('SELECT value FROM metadata WHERE key = ?').get(key);
    return row?.value ?? null;
  }

  deleteMetadata(key: string): void {
    this.db.prepare('DELETE FROM metadata WHERE key = ?').run(key);
  }
}
