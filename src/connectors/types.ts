import type { MailboxSettings } from '../types.js';

/**
 * One authenticated mailbox session. Not safe for concurrent use: callers
 * run one operation at a time and close the session when done.
 */
export interface MailboxSession {
  /** Message ids of `mailbox` in ascending (oldest-first) order. */
  listMessageIds(mailbox: string): Promise<number[]>;
  fetchRaw(id: number): Promise<Buffer>;
  close(): Promise<void>;
}

export interface MailboxTransport {
  /**
   * Connects and authenticates. Rejects with `MailboxConnectionError` or
   * `MailboxAuthError`.
   */
  open(settings: MailboxSettings): Promise<MailboxSession>;
}
