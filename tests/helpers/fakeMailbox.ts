import type { MailboxSession, MailboxTransport } from '../../src/connectors/types.js';
import type { MailboxSettings } from '../../src/types.js';

export const TEST_SETTINGS: MailboxSettings = {
  host: 'imap.test.local',
  port: 993,
  secure: true,
  user: 'user@test.local',
  password: 'test-secret',
  mailbox: 'INBOX',
};

/** In-memory mailbox; message ids are 1-based positions in `messages`. */
export class FakeMailbox implements MailboxTransport {
  opened = 0;
  closed = 0;
  fetched: number[] = [];
  failOpen: Error | null = null;
  failList: Error | null = null;
  readonly brokenIds = new Set<number>();

  constructor(public messages: Buffer[]) {}

  async open(_settings: MailboxSettings): Promise<MailboxSession> {
    if (this.failOpen) {
      throw this.failOpen;
    }
    this.opened += 1;

    return {
      listMessageIds: async () => {
        if (this.failList) {
          throw this.failList;
        }
        return this.messages.map((_, index) => index + 1);
      },
      fetchRaw: async (id: number) => {
        this.fetched.push(id);
        const raw = this.messages[id - 1];
        if (!raw || this.brokenIds.has(id)) {
          throw new Error(`cannot fetch ${id}`);
        }
        return raw;
      },
      close: async () => {
        this.closed += 1;
      },
    };
  }
}
