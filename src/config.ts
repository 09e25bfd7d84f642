import path from 'node:path';
import dotenv from 'dotenv';

dotenv.config();

const cwd = process.cwd();

function asNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function asBool(value: string | undefined, fallback: boolean): boolean {
  if (value == null) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
}

export const config = {
  dbPath: process.env.DB_PATH ?? path.join(cwd, 'data', 'billwatch.db'),
  outputDir: process.env.OUTPUT_DIR ?? path.join(cwd, 'out'),
  logLevel: process.env.LOG_LEVEL ?? 'info',

  imapHost: process.env.IMAP_HOST ?? '',
  imapPort: asNumber(process.env.IMAP_PORT, 993),
  imapSecure: asBool(process.env.IMAP_SECURE, true),
  imapUser: process.env.IMAP_USER ?? '',
  imapPassword: process.env.IMAP_PASSWORD ?? '',
  imapMailbox: process.env.IMAP_MAILBOX ?? 'INBOX',

  detectScanLimit: asNumber(process.env.DETECT_SCAN_LIMIT, 100),
  refreshScanLimit: asNumber(process.env.REFRESH_SCAN_LIMIT, 100),
  refreshIntervalSec: asNumber(process.env.REFRESH_INTERVAL_SEC, 30 * 60),
  httpPort: asNumber(process.env.HTTP_PORT, 0),
};

export function requireEnv(value: string, name: string): string {
  if (!value) {
    throw new Error(`Missing required env var: ${name}`);
  }
  return value;
}
