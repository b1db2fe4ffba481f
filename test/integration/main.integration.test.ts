/**
 * Integration tests for the collection run
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { Page } from 'puppeteer-core';
import { CellReporter, InvoiceOrchestrator, formatSummary } from '../../src/main';
import { BrowserHandle, BrowserProvider } from '../../src/modules/browser/BrowserLauncher';
import { EmailAttachment } from '../../src/modules/email/AttachmentExtractor';
import { AuthenticatedSession } from '../../src/modules/session/PortalSessionManager';
import { FileOrganizer } from '../../src/modules/storage/FileOrganizer';
import { PortalDownloadResult } from '../../src/modules/portal/InvoiceDownloader';
import { CellResult, Channel, CompanyConfig, EmailCredentials, LoginMode, Portal, RunSummary } from '../../src/types';
import { AuthenticationError, ChallengeTimeoutError } from '../../src/utils/errors';
import { createMockPage } from '../helpers/mockPage';

jest.mock('../../src/utils/logger');
jest.mock('../../src/modules/browser/BrowserLauncher', () => ({ ChromeLauncher: jest.fn() }));

const acme: CompanyConfig = {
  name: 'Acme',
  email: {
    address: 'billing@acme.test',
    password: 'test-secret',
    imapHost: 'imap.acme.test',
    imapPort: 993,
    mailbox: 'INBOX',
  },
};

const globex: CompanyConfig = {
  name: 'Globex',
  walmart: { username: 'buyer@globex.test', password: 'test-secret' },
  amazon: { username: 'buyer@globex.test', password: 'test-secret' },
};

const initech: CompanyConfig = {
  name: 'Initech',
  walmart: { username: 'buyer@initech.test', password: 'test-secret' },
};

class FakeEmailRetriever {
  calls: EmailCredentials[] = [];
  skippedMessages = 0;

  constructor(
    private readonly attachments: EmailAttachment[],
    private readonly failure?: Error,
    private readonly unparsable = 0
  ) {}

  async *fetchInvoices(credentials: EmailCredentials): AsyncGenerator<EmailAttachment> {
    this.calls.push(credentials);
    this.skippedMessages = this.unparsable;
    if (this.failure) {
      throw this.failure;
    }
    for (const attachment of this.attachments) {
      yield attachment;
    }
  }
}

class FakeBrowser implements BrowserProvider {
  opened: string[] = [];
  closed = 0;

  async openPage(company: string): Promise<BrowserHandle> {
    this.opened.push(company);
    return {
      page: createMockPage().page,
      close: async () => {
        this.closed++;
      },
    };
  }
}

class FakeSessions {
  calls: { company: string; portal: Portal; mode: LoginMode }[] = [];

  constructor(private readonly failures: Map<string, Error> = new Map()) {}

  async acquireSession(company: CompanyConfig, portal: Portal, mode: LoginMode, page: Page): Promise<AuthenticatedSession> {
    this.calls.push({ company: company.name, portal, mode });
    const failure = this.failures.get(`${company.name}/${portal}`);
    if (failure) {
      throw failure;
    }
    return {
      company,
      portal,
      page,
      restored: false,
      vendor: {
        portal,
        portalName: portal,
        loginUrl: 'https://portal.test/login',
        openLoginPage: async () => undefined,
        submitCredentials: async () => undefined,
        detectLoginState: async () => 'logged-in',
        verifySession: async () => true,
        listOrders: async () => [],
        fetchInvoice: async () => {
          throw new Error('not used');
        },
      },
    };
  }
}

class FakeDownloader {
  async downloadInvoices(session: AuthenticatedSession): Promise<PortalDownloadResult> {
    return {
      files: [{ path: `/downloads/${session.company.name}/${session.portal}.pdf`, fingerprint: 'f', status: 'written' }],
      failures: session.portal === 'amazon' ? 1 : 0,
    };
  }
}

class RecordingReporter implements CellReporter {
  started: string[] = [];
  finished: CellResult[] = [];

  cellStarted(company: string, channel: Channel): void {
    this.started.push(`${company}/${channel}`);
  }

  cellFinished(result: CellResult): void {
    this.finished.push(result);
  }
}

const pdf = (label: string) => Buffer.concat([Buffer.from('%PDF-1.7\n'), Buffer.from(label.padEnd(1200, ' '))]);

describe('InvoiceOrchestrator', () => {
  let baseDir: string;
  let organizer: FileOrganizer;
  let browser: FakeBrowser;
  let reporter: RecordingReporter;

  const since = new Date(2026, 8, 19);
  const until = new Date(2026, 9, 19, 12);

  const attachments: EmailAttachment[] = [
    {
      filename: 'INV-1001.pdf',
      contentType: 'application/pdf',
      content: pdf('INV-1001'),
      receivedAt: new Date(2026, 9, 2),
      messageUid: 11,
    },
    {
      filename: 'statement.xlsx',
      contentType: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
      content: Buffer.from('xlsx-bytes'),
      receivedAt: new Date(2026, 8, 25),
      messageUid: 12,
    },
  ];

  const createOrchestrator = (
    emailRetriever: FakeEmailRetriever,
    sessions: FakeSessions = new FakeSessions()
  ) =>
    new InvoiceOrchestrator({
      organizer,
      emailRetriever,
      browser,
      sessions,
      downloader: new FakeDownloader(),
      reporter,
    });

  beforeEach(async () => {
    baseDir = await fs.mkdtemp(path.join(os.tmpdir(), 'orchestrator-'));
    organizer = new FileOrganizer(path.join(baseDir, 'downloads'));
    browser = new FakeBrowser();
    reporter = new RecordingReporter();
  });

  afterEach(async () => {
    await fs.rm(baseDir, { recursive: true, force: true });
  });

  test('should file email attachments of a company with only email credentials', async () => {
    const orchestrator = createOrchestrator(new FakeEmailRetriever(attachments));

    const summary = await orchestrator.run({ companies: [acme], channels: ['email'], since, until, mode: 'automatic' });

    expect(summary).toMatchObject({ succeeded: 1, failed: 0, skipped: 0 });
    expect(summary.cells[0].files.map(file => path.relative(baseDir, file.path))).toEqual([
      path.join('downloads', 'Acme', '2026-10', 'email_INV-1001.pdf'),
      path.join('downloads', 'Acme', '2026-09', 'email_statement.xlsx'),
    ]);
    await expect(fs.readFile(path.join(baseDir, 'downloads', 'Acme', '2026-10', 'email_INV-1001.pdf'))).resolves.toEqual(
      pdf('INV-1001')
    );
  });

  test('should count messages the retriever skipped as item failures', async () => {
    const orchestrator = createOrchestrator(new FakeEmailRetriever(attachments.slice(0, 1), undefined, 2));

    const summary = await orchestrator.run({ companies: [acme], channels: ['email'], since, until, mode: 'automatic' });

    expect(summary.cells[0]).toMatchObject({ status: 'success', itemFailures: 2 });
    expect(summary.cells[0].files).toHaveLength(1);
    expect(formatSummary(summary).split('\n')[2]).toBe('Acme     email    success  1 saved, 2 failed');
  });

  test('should skip a portal the company has no credentials for', async () => {
    const orchestrator = createOrchestrator(new FakeEmailRetriever(attachments));

    const summary = await orchestrator.run({ companies: [acme], channels: ['walmart'], since, until, mode: 'automatic' });

    expect(summary.cells).toEqual([
      {
        company: 'Acme',
        channel: 'walmart',
        status: 'skipped',
        files: [],
        itemFailures: 0,
        message: 'no walmart credentials',
      },
    ]);
    expect(summary).toMatchObject({ succeeded: 0, failed: 0, skipped: 1 });
    expect(browser.opened).toEqual([]);
  });

  test('should run every channel for every company in order', async () => {
    const orchestrator = createOrchestrator(new FakeEmailRetriever(attachments));

    const summary = await orchestrator.run({
      companies: [acme, globex],
      channels: ['email', 'walmart', 'amazon'],
      since,
      until,
      mode: 'automatic',
    });

    expect(summary.cells.map(cell => `${cell.company}/${cell.channel}:${cell.status}`)).toEqual([
      'Acme/email:success',
      'Acme/walmart:skipped',
      'Acme/amazon:skipped',
      'Globex/email:skipped',
      'Globex/walmart:success',
      'Globex/amazon:success',
    ]);
    expect(reporter.started).toEqual(['Acme/email', 'Globex/walmart', 'Globex/amazon']);
    expect(reporter.finished).toHaveLength(6);
    expect(summary.cells[5].itemFailures).toBe(1);
  });

  test('should open and close one browser per portal cell', async () => {
    const orchestrator = createOrchestrator(new FakeEmailRetriever([]));

    await orchestrator.run({ companies: [globex], channels: ['walmart', 'amazon'], since, until, mode: 'automatic' });

    expect(browser.opened).toEqual(['Globex', 'Globex']);
    expect(browser.closed).toBe(2);
  });

  test('should confine a manual-assist timeout to its cell', async () => {
    const sessions = new FakeSessions(
      new Map([['Globex/walmart', new ChallengeTimeoutError('Manual Walmart login not completed within 60s')]])
    );
    const orchestrator = createOrchestrator(new FakeEmailRetriever([]), sessions);

    const summary = await orchestrator.run({
      companies: [globex, initech],
      channels: ['walmart', 'amazon'],
      since,
      until,
      mode: 'manual-assist',
    });

    expect(summary.cells.map(cell => `${cell.company}/${cell.channel}:${cell.status}`)).toEqual([
      'Globex/walmart:failed',
      'Globex/amazon:success',
      'Initech/walmart:success',
      'Initech/amazon:skipped',
    ]);
    expect(summary.cells[0]).toMatchObject({
      errorCode: 'CHALLENGE_TIMEOUT',
      message: 'Manual Walmart login not completed within 60s',
    });
    expect(sessions.calls.map(call => call.mode)).toEqual(['manual-assist', 'manual-assist', 'manual-assist']);
    expect(browser.closed).toBe(3);
  });

  test('should fail the email cell on rejected credentials', async () => {
    const orchestrator = createOrchestrator(
      new FakeEmailRetriever([], new AuthenticationError('IMAP login rejected for billing@acme.test'))
    );

    const summary = await orchestrator.run({ companies: [acme], channels: ['email'], since, until, mode: 'automatic' });

    expect(summary.cells[0]).toMatchObject({ status: 'failed', errorCode: 'AUTHENTICATION' });
    expect(summary.failed).toBe(1);
  });

  test('should report unexpected errors as UNKNOWN', async () => {
    const sessions = new FakeSessions(new Map([['Initech/walmart', new Error('Protocol error: Target closed')]]));
    const orchestrator = createOrchestrator(new FakeEmailRetriever([]), sessions);

    const summary = await orchestrator.run({ companies: [initech], channels: ['walmart'], since, until, mode: 'automatic' });

    expect(summary.cells[0]).toMatchObject({
      status: 'failed',
      errorCode: 'UNKNOWN',
      message: 'Protocol error: Target closed',
    });
  });
});

describe('formatSummary', () => {
  test('should render a table and totals', () => {
    const summary: RunSummary = {
      cells: [
        {
          company: 'Acme',
          channel: 'email',
          status: 'success',
          files: [
            { path: '/a', fingerprint: '1', status: 'written' },
            { path: '/b', fingerprint: '2', status: 'duplicate' },
          ],
          itemFailures: 0,
        },
        {
          company: 'Acme',
          channel: 'walmart',
          status: 'skipped',
          files: [],
          itemFailures: 0,
          message: 'no walmart credentials',
        },
        {
          company: 'Globex',
          channel: 'amazon',
          status: 'failed',
          files: [],
          itemFailures: 0,
          message: 'rejected',
          errorCode: 'AUTHENTICATION',
        },
      ],
      succeeded: 1,
      failed: 1,
      skipped: 1,
    };

    expect(formatSummary(summary).split('\n')).toEqual([
      'Company  Channel  Status   Details',
      '-------  -------  -------  --------------------------',
      'Acme     email    success  1 saved, 1 already present',
      'Acme     walmart  skipped  no walmart credentials',
      'Globex   amazon   failed   AUTHENTICATION: rejected',
      '',
      'Total: 1 succeeded, 1 failed, 1 skipped',
    ]);
  });
});
