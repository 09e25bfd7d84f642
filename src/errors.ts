export type MailboxErrorKind = 'connection' | 'auth';

export class MailboxError extends Error {
  readonly kind: MailboxErrorKind;

  constructor(kind: MailboxErrorKind, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'MailboxError';
    this.kind = kind;
  }
}

/** Server unreachable, TLS failure, dropped or timed-out session. */
export class MailboxConnectionError extends MailboxError {
  constructor(message: string, cause?: unknown) {
    super('connection', message, cause);
    this.name = 'MailboxConnectionError';
  }
}

/** The server answered but rejected the credentials. */
export class MailboxAuthError extends MailboxError {
  constructor(message: string, cause?: unknown) {
    super('auth', message, cause);
    this.name = 'MailboxAuthError';
  }
}

export function isMailboxError(error: unknown): error is MailboxError {
  return error instanceof MailboxError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
