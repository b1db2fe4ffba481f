import { EmailRetriever, MessageParser, ParsedMessage } from '../src/modules/email/EmailRetriever';
import { MailboxConnector, MailboxSession, RawMailMessage } from '../src/modules/email/ImapMailboxConnector';
import { EmailAttachment } from '../src/modules/email/AttachmentExtractor';
import { EmailCredentials } from '../src/types';
import { AuthenticationError, TransientError } from '../src/utils/errors';

jest.mock('../src/utils/logger');

const credentials: EmailCredentials = {
  address: 'billing@acme.test',
  password: 'test-secret',
  imapHost: 'imap.acme.test',
  imapPort: 993,
  mailbox: 'INBOX',
};

class FakeSession implements MailboxSession {
  closed = false;
  requestedSince?: Date;

  constructor(private readonly messages: RawMailMessage[]) {}

  async *fetchSince(since: Date): AsyncIterable<RawMailMessage> {
    this.requestedSince = since;
    for (const message of this.messages) {
      yield message;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

class FakeConnector implements MailboxConnector {
  calls = 0;

  constructor(
    private readonly session: FakeSession,
    private readonly failures: Error[] = []
  ) {}

  async connect(): Promise<MailboxSession> {
    this.calls++;
    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }
    return this.session;
  }
}

/** Parser reading a JSON description instead of MIME */
const jsonParser: MessageParser = async source => {
  const description: {
    date?: string;
    attachments: { filename?: string; contentType: string; body: string }[];
  } = JSON.parse(source.toString('utf8'));
  const parsed: ParsedMessage = {
    attachments: description.attachments.map(a => ({
      filename: a.filename,
      contentType: a.contentType,
      content: Buffer.from(a.body),
    })),
  };
  if (description.date) {
    parsed.date = new Date(description.date);
  }
  return parsed;
};

function message(uid: number, body: object): RawMailMessage {
  return { uid, source: Buffer.from(JSON.stringify(body)) };
}

async function collect(iterable: AsyncIterable<EmailAttachment>): Promise<EmailAttachment[]> {
  const items: EmailAttachment[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

describe('EmailRetriever', () => {
  const since = new Date('2026-09-19T00:00:00Z');
  const until = new Date('2026-10-19T12:00:00Z');

  test('should yield document attachments of messages in the window', async () => {
    const session = new FakeSession([
      message(1, {
        date: '2026-10-01T09:00:00Z',
        attachments: [
          { filename: 'invoice.pdf', contentType: 'application/pdf', body: 'pdf-1' },
          { filename: 'logo.png', contentType: 'image/png', body: 'png' },
        ],
      }),
      message(2, {
        date: '2026-10-02T09:00:00Z',
        attachments: [{ filename: 'statement.xlsx', contentType: 'application/octet-stream', body: 'xlsx' }],
      }),
    ]);
    const retriever = new EmailRetriever(new FakeConnector(session), { parser: jsonParser });

    const documents = await collect(retriever.fetchInvoices(credentials, since, until));

    expect(documents.map(d => [d.messageUid, d.filename])).toEqual([
      [1, 'invoice.pdf'],
      [2, 'statement.xlsx'],
    ]);
    expect(documents[0].receivedAt).toEqual(new Date('2026-10-01T09:00:00Z'));
    expect(session.requestedSince).toBe(since);
    expect(session.closed).toBe(true);
  });

  test('should ignore messages outside the window', async () => {
    const session = new FakeSession([
      message(1, {
        date: '2026-09-18T23:00:00Z',
        attachments: [{ filename: 'old.pdf', contentType: 'application/pdf', body: 'old' }],
      }),
      message(2, {
        date: '2026-10-20T00:00:00Z',
        attachments: [{ filename: 'future.pdf', contentType: 'application/pdf', body: 'future' }],
      }),
    ]);
    const retriever = new EmailRetriever(new FakeConnector(session), { parser: jsonParser });

    await expect(collect(retriever.fetchInvoices(credentials, since, until))).resolves.toEqual([]);
    expect(retriever.skippedMessages).toBe(0);
  });

  test('should skip messages that fail to parse', async () => {
    const session = new FakeSession([
      { uid: 1, source: Buffer.from('not json') },
      message(2, {
        date: '2026-10-05T10:00:00Z',
        attachments: [{ filename: 'invoice.pdf', contentType: 'application/pdf', body: 'ok' }],
      }),
    ]);
    const retriever = new EmailRetriever(new FakeConnector(session), { parser: jsonParser });

    const documents = await collect(retriever.fetchInvoices(credentials, since, until));

    expect(documents.map(d => d.messageUid)).toEqual([2]);
    expect(retriever.skippedMessages).toBe(1);
  });

  test('should fall back to the server date', async () => {
    const session = new FakeSession([
      {
        uid: 3,
        date: new Date('2026-10-07T08:00:00Z'),
        source: Buffer.from(
          JSON.stringify({ attachments: [{ filename: 'a.pdf', contentType: 'application/pdf', body: 'a' }] })
        ),
      },
      message(4, { attachments: [{ filename: 'b.pdf', contentType: 'application/pdf', body: 'b' }] }),
    ]);
    const retriever = new EmailRetriever(new FakeConnector(session), { parser: jsonParser });

    const documents = await collect(retriever.fetchInvoices(credentials, since, until));

    expect(documents.map(d => [d.messageUid, d.receivedAt])).toEqual([[3, new Date('2026-10-07T08:00:00Z')]]);
    expect(retriever.skippedMessages).toBe(1);
  });

  test('should retry the connection once on a transient failure', async () => {
    const connector = new FakeConnector(new FakeSession([]), [new TransientError('ECONNRESET')]);
    const retriever = new EmailRetriever(connector, { parser: jsonParser, retryDelayMs: 0 });

    await expect(collect(retriever.fetchInvoices(credentials, since, until))).resolves.toEqual([]);
    expect(connector.calls).toBe(2);
  });

  test('should fail on rejected credentials without retrying', async () => {
    const connector = new FakeConnector(new FakeSession([]), [new AuthenticationError('IMAP login rejected')]);
    const retriever = new EmailRetriever(connector, { parser: jsonParser, retryDelayMs: 0 });

    await expect(collect(retriever.fetchInvoices(credentials, since, until))).rejects.toBeInstanceOf(
      AuthenticationError
    );
    expect(connector.calls).toBe(1);
  });

  test('should parse real MIME messages with mailparser', async () => {
    const mime = [
      'From: Supplier <billing@supplier.test>',
      'To: billing@acme.test',
      'Subject: Your invoice',
      'Date: Mon, 05 Oct 2026 10:00:00 +0000',
      'MIME-Version: 1.0',
      'Content-Type: multipart/mixed; boundary="BOUNDARY"',
      '',
      '--BOUNDARY',
      'Content-Type: text/plain; charset=utf-8',
      '',
      'Invoice attached.',
      '--BOUNDARY',
      'Content-Type: application/pdf; name="INV-7.pdf"',
      'Content-Disposition: attachment; filename="INV-7.pdf"',
      'Content-Transfer-Encoding: base64',
      '',
      Buffer.from('%PDF-1.4 test').toString('base64'),
      '--BOUNDARY--',
      '',
    ].join('\r\n');
    const session = new FakeSession([{ uid: 9, source: Buffer.from(mime) }]);
    const retriever = new EmailRetriever(new FakeConnector(session));

    const documents = await collect(retriever.fetchInvoices(credentials, since, until));

    expect(documents).toHaveLength(1);
    expect(documents[0].filename).toBe('INV-7.pdf');
    expect(documents[0].contentType).toBe('application/pdf');
    expect(documents[0].content.toString('latin1')).toBe('%PDF-1.4 test');
    expect(documents[0].receivedAt).toEqual(new Date('2026-10-05T10:00:00Z'));
  });
});
