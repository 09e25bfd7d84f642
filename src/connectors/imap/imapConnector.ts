import { ImapFlow } from 'imapflow';
import { config, requireEnv } from '../../config.js';
import { MailboxAuthError, MailboxConnectionError, describeError } from '../../errors.js';
import { logger } from '../../logger.js';
import type { MailboxSettings } from '../../types.js';
import type { MailboxSession, MailboxTransport } from '../types.js';

export function envMailboxSettings(): MailboxSettings {
  return {
    host: requireEnv(config.imapHost, 'IMAP_HOST'),
    port: config.imapPort,
    secure: config.imapSecure,
    user: requireEnv(config.imapUser, 'IMAP_USER'),
    password: requireEnv(config.imapPassword, 'IMAP_PASSWORD'),
    mailbox: config.imapMailbox,
  };
}

function isAuthenticationFailure(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'authenticationFailed' in error &&
    error.authenticationFailed === true
  );
}

type MailboxLock = Awaited<ReturnType<ImapFlow['getMailboxLock']>>;

class ImapSession implements MailboxSession {
  private lock: MailboxLock | null = null;
  private lockedMailbox: string | null = null;

  constructor(private readonly client: ImapFlow) {}

  async listMessageIds(mailbox: string): Promise<number[]> {
    try {
      await this.selectMailbox(mailbox);
      const uids = await this.client.search({ all: true }, { uid: true });
      return (Array.isArray(uids) ? uids : []).sort((a, b) => a - b);
    } catch (error) {
      throw new MailboxConnectionError(`IMAP search failed in ${mailbox}: ${describeError(error)}`, error);
    }
  }

  async fetchRaw(id: number): Promise<Buffer> {
    // library failures are session-level; a missing source is the only per-message error
    const msg = await this.client
      .fetchOne(String(id), { uid: true, source: true }, { uid: true })
      .catch((error: unknown) => {
        throw new MailboxConnectionError(`IMAP fetch of ${id} failed: ${describeError(error)}`, error);
      });
    if (!msg || !msg.source) {
      throw new Error(`Message ${id} has no source`);
    }
    return msg.source;
  }

  async close(): Promise<void> {
    this.lock?.release();
    this.lock = null;
    this.lockedMailbox = null;
    try {
      await this.client.logout();
    } catch (error) {
      logger.debug({ err: error }, 'IMAP logout failed');
      this.client.close();
    }
  }

  private async selectMailbox(mailbox: string): Promise<void> {
    if (this.lockedMailbox === mailbox) {
      return;
    }
    this.lock?.release();
    this.lock = await this.client.getMailboxLock(mailbox);
    this.lockedMailbox = mailbox;
  }
}

export class ImapTransport implements MailboxTransport {
  async open(settings: MailboxSettings): Promise<MailboxSession> {
    const client = new ImapFlow({
      host: settings.host,
      port: settings.port,
      secure: settings.secure,
      auth: {
        user: settings.user,
        pass: settings.password,
      },
      logger: false,
    });
    // socket failures are emitted here; pending calls reject on their own
    client.on('error', (error: unknown) => {
      logger.warn({ host: settings.host, err: describeError(error) }, 'IMAP connection error');
    });

    try {
      await client.connect();
    } catch (error) {
      if (isAuthenticationFailure(error)) {
        throw new MailboxAuthError(`IMAP login rejected for ${settings.user}`, error);
      }
      throw new MailboxConnectionError(
        `Cannot connect to ${settings.host}:${settings.port}: ${describeError(error)}`,
        error,
      );
    }

    return new ImapSession(client);
  }
}

/** Opens and closes a session; used to validate credentials before they are saved. */
export async function verifyMailbox(transport: MailboxTransport, settings: MailboxSettings): Promise<void> {
  const session = await transport.open(settings);
  await session.close();
}

/** Settings saved through the CLI win over the environment. */
export function resolveMailboxSettings(stored: MailboxSettings | null): MailboxSettings {
  return stored ?? envMailboxSettings();
}

/** Account details safe to display; never includes the password. */
export function mailboxIdentity(stored: MailboxSettings | null): Pick<MailboxSettings, 'user' | 'host' | 'port'> {
  return stored
    ? { user: stored.user, host: stored.host, port: stored.port }
    : { user: config.imapUser, host: config.imapHost, port: config.imapPort };
}
