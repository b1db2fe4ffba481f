/**
 * Email invoice retrieval
 *
 * Lists messages in the lookback window and yields their document attachments
 * one by one. A message that cannot be parsed is logged and skipped.
 */

import { simpleParser } from 'mailparser';
import { EmailCredentials } from '../../types';
import { isWithinRange } from '../../utils/dateUtils';
import { toErrorMessage } from '../../utils/errors';
import { AppLogger } from '../../utils/logger';
import { withRetry } from '../../utils/retry';
import { AttachmentExtractor, EmailAttachment, MailAttachment } from './AttachmentExtractor';
import { MailboxConnector, RawMailMessage } from './ImapMailboxConnector';

export interface ParsedMessage {
  date?: Date;
  attachments: MailAttachment[];
}

export type MessageParser = (source: Buffer) => Promise<ParsedMessage>;

export const parseWithMailparser: MessageParser = async source => {
  const parsed = await simpleParser(source);
  return {
    date: parsed.date,
    attachments: parsed.attachments.map(attachment => ({
      filename: attachment.filename,
      contentType: attachment.contentType,
      content: attachment.content,
      related: attachment.related,
    })),
  };
};

export interface EmailRetrieverOptions {
  parser?: MessageParser;
  extractor?: AttachmentExtractor;
  retryDelayMs?: number;
}

export class EmailRetriever {
  private readonly connector: MailboxConnector;
  private readonly parser: MessageParser;
  private readonly extractor: AttachmentExtractor;
  private readonly retryDelayMs: number;

  /** Messages skipped because they failed to parse, for the last fetch */
  skippedMessages = 0;

  constructor(connector: MailboxConnector, options: EmailRetrieverOptions = {}) {
    this.connector = connector;
    this.parser = options.parser ?? parseWithMailparser;
    this.extractor = options.extractor ?? new AttachmentExtractor();
    this.retryDelayMs = options.retryDelayMs ?? 2000;
  }

  /**
   * Yield document attachments of messages dated within [since, until]
   * @throws AuthenticationError when the server rejects the credentials
   */
  async *fetchInvoices(
    credentials: EmailCredentials,
    since: Date,
    until: Date = new Date()
  ): AsyncGenerator<EmailAttachment> {
    this.skippedMessages = 0;

    const session = await withRetry(() => this.connector.connect(credentials), {
      label: `IMAP connect (${credentials.address})`,
      delayMs: this.retryDelayMs,
    });

    let messageCount = 0;
    let attachmentCount = 0;

    try {
      for await (const message of session.fetchSince(since)) {
        messageCount++;
        const documents = await this.extractFromMessage(message, since, until);
        for (const document of documents) {
          attachmentCount++;
          yield document;
        }
      }
    } finally {
      await session.close();
      AppLogger.info(
        `[Email] ${credentials.address}: ${messageCount} message(s) scanned, ${attachmentCount} document(s) found, ${this.skippedMessages} skipped`
      );
    }
  }

  private async extractFromMessage(message: RawMailMessage, since: Date, until: Date): Promise<EmailAttachment[]> {
    let parsed: ParsedMessage;
    try {
      parsed = await this.parser(message.source);
    } catch (error) {
      this.skippedMessages++;
      AppLogger.warn(`[Email] Could not parse message ${message.uid}: ${toErrorMessage(error)}`);
      return [];
    }

    const receivedAt = parsed.date ?? message.date;
    if (!receivedAt) {
      this.skippedMessages++;
      AppLogger.warn(`[Email] Message ${message.uid} has no date, skipping`);
      return [];
    }
    if (!isWithinRange(receivedAt, since, until)) {
      AppLogger.debug(`[Email] Message ${message.uid} dated ${receivedAt.toISOString()} is outside the window`);
      return [];
    }

    return this.extractor.extractDocuments(parsed.attachments, message.uid, receivedAt);
  }
}
