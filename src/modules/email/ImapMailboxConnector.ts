/**
 * IMAP mailbox access
 * Opens mailboxes read-only: no flags or labels are changed.
 */

import { ImapFlow } from 'imapflow';
import { EmailCredentials } from '../../types';
import { AuthenticationError, TransientError, toErrorMessage } from '../../utils/errors';
import { AppLogger } from '../../utils/logger';

/**
 * A message as fetched from the server, before MIME parsing
 */
export interface RawMailMessage {
  uid: number;
  /** Envelope date, falling back to the server's internal date */
  date?: Date;
  source: Buffer;
}

export interface MailboxSession {
  /** Messages received on or after the given day (IMAP SINCE is day-granular) */
  fetchSince(since: Date): AsyncIterable<RawMailMessage>;
  close(): Promise<void>;
}

export interface MailboxConnector {
  connect(credentials: EmailCredentials): Promise<MailboxSession>;
}

function toDate(value: unknown): Date | undefined {
  if (value instanceof Date) {
    return value;
  }
  if (typeof value === 'string' || typeof value === 'number') {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? undefined : date;
  }
  return undefined;
}

function isAuthenticationFailure(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'authenticationFailed' in error &&
    error.authenticationFailed === true
  );
}

class ImapMailboxSession implements MailboxSession {
  constructor(
    private readonly client: ImapFlow,
    private readonly mailbox: string
  ) {}

  async *fetchSince(since: Date): AsyncIterable<RawMailMessage> {
    const lock = await this.client.getMailboxLock(this.mailbox, { readOnly: true });
    try {
      const query = { uid: true, envelope: true, internalDate: true, source: true };
      for await (const message of this.client.fetch({ since }, query)) {
        if (!message.source) {
          AppLogger.warn(`[Email] Message ${message.uid} has no source, skipping`);
          continue;
        }
        yield {
          uid: message.uid,
          date: toDate(message.envelope?.date) ?? toDate(message.internalDate),
          source: message.source,
        };
      }
    } finally {
      lock.release();
    }
  }

  async close(): Promise<void> {
    try {
      await this.client.logout();
    } catch (error) {
      AppLogger.warn(`[Email] Logout failed: ${toErrorMessage(error)}`);
    }
  }
}

/**
 * Connector backed by imapflow
 */
export class ImapMailboxConnector implements MailboxConnector {
  async connect(credentials: EmailCredentials): Promise<MailboxSession> {
    const client = new ImapFlow({
      host: credentials.imapHost,
      port: credentials.imapPort,
      secure: credentials.imapPort === 993,
      auth: {
        user: credentials.address,
        pass: credentials.password,
      },
      logger: false,
    });

    AppLogger.info(`[Email] Connecting to ${credentials.imapHost}:${credentials.imapPort} as ${credentials.address}`);

    try {
      await client.connect();
    } catch (error) {
      if (isAuthenticationFailure(error)) {
        throw new AuthenticationError(`IMAP login rejected for ${credentials.address}`, { cause: error });
      }
      throw new TransientError(`IMAP connection to ${credentials.imapHost} failed: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }

    return new ImapMailboxSession(client, credentials.mailbox);
  }
}
