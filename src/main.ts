/**
 * Invoice Organizer - collection run
 *
 * Runs every selected channel for every selected company. Each
 * (company, channel) cell succeeds, fails or is skipped on its own; a failure
 * never stops the cells after it.
 */

import ora from 'ora';
import { FileOrganizer } from './modules/storage/FileOrganizer';
import { EmailRetriever } from './modules/email/EmailRetriever';
import { ImapMailboxConnector } from './modules/email/ImapMailboxConnector';
import { BrowserProvider, ChromeLauncher } from './modules/browser/BrowserLauncher';
import { InvoiceDownloader } from './modules/portal/InvoiceDownloader';
import { PortalSessionManager } from './modules/session/PortalSessionManager';
import { SessionStore } from './modules/session/SessionStore';
import { LoginSettings } from './options';
import {
  AppConfig,
  CellResult,
  Channel,
  CompanyConfig,
  DownloadTask,
  FileRecord,
  LoginMode,
  Portal,
  RunOptions,
  RunSummary,
} from './types';
import { isCollectorError, toErrorMessage } from './utils/errors';
import { AppLogger } from './utils/logger';
import { createVendor } from './vendors';

/**
 * Receives cell outcomes as the run progresses
 */
export interface CellReporter {
  cellStarted(company: string, channel: Channel): void;
  cellFinished(result: CellResult): void;
}

/**
 * Reports each finished cell with an ora status symbol
 */
export class SpinnerReporter implements CellReporter {
  cellStarted(company: string, channel: Channel): void {
    AppLogger.info(`--- ${company} / ${channel} ---`);
  }

  cellFinished(result: CellResult): void {
    const label = `${result.company} / ${result.channel}`;
    const spinner = ora();
    switch (result.status) {
      case 'success':
        spinner.succeed(`${label}: ${describeFiles(result)}`);
        break;
      case 'skipped':
        spinner.info(`${label}: skipped (${result.message ?? 'not configured'})`);
        break;
      case 'failed':
        spinner.fail(`${label}: ${result.errorCode ?? 'UNKNOWN'} ${result.message ?? ''}`.trim());
        break;
    }
  }
}

export interface OrchestratorDeps {
  organizer: FileOrganizer;
  emailRetriever: Pick<EmailRetriever, 'fetchInvoices' | 'skippedMessages'>;
  browser: BrowserProvider;
  sessions: Pick<PortalSessionManager, 'acquireSession'>;
  downloader: Pick<InvoiceDownloader, 'downloadInvoices'>;
  reporter?: CellReporter;
}

interface CellOutcome {
  files: FileRecord[];
  itemFailures: number;
}

function describeFiles(result: CellResult): string {
  const saved = result.files.filter(file => file.status !== 'duplicate').length;
  const duplicates = result.files.length - saved;
  const parts = [`${saved} saved`];
  if (duplicates > 0) parts.push(`${duplicates} already present`);
  if (result.itemFailures > 0) parts.push(`${result.itemFailures} failed`);
  return parts.join(', ');
}

export class InvoiceOrchestrator {
  private readonly deps: OrchestratorDeps;
  private readonly reporter: CellReporter;

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
    this.reporter = deps.reporter ?? new SpinnerReporter();
  }

  async run(options: RunOptions): Promise<RunSummary> {
    const cells: CellResult[] = [];

    for (const company of options.companies) {
      for (const channel of options.channels) {
        const task: DownloadTask = {
          company,
          channel,
          targetDir: this.deps.organizer.companyDirectory(company.name),
          since: options.since,
          until: options.until,
        };
        const result = await this.runCell(task, options.mode);
        this.reporter.cellFinished(result);
        cells.push(result);
      }
    }

    return {
      cells,
      succeeded: cells.filter(cell => cell.status === 'success').length,
      failed: cells.filter(cell => cell.status === 'failed').length,
      skipped: cells.filter(cell => cell.status === 'skipped').length,
    };
  }

  private async runCell(task: DownloadTask, mode: LoginMode): Promise<CellResult> {
    const { company, channel } = task;
    const base = { company: company.name, channel };

    if (!this.hasCredentials(company, channel)) {
      AppLogger.info(`[${company.name}] No ${channel} credentials configured, skipping`);
      return { ...base, status: 'skipped', files: [], itemFailures: 0, message: `no ${channel} credentials` };
    }

    this.reporter.cellStarted(company.name, channel);
    try {
      const outcome = channel === 'email' ? await this.runEmail(task) : await this.runPortal(task, channel, mode);
      AppLogger.info(`[${company.name}] ${channel} done, files under ${task.targetDir}`);
      return { ...base, status: 'success', ...outcome };
    } catch (error) {
      AppLogger.error(`[${company.name}] ${channel} failed: ${toErrorMessage(error)}`, error);
      return {
        ...base,
        status: 'failed',
        files: [],
        itemFailures: 0,
        message: toErrorMessage(error),
        errorCode: isCollectorError(error) ? error.code : 'UNKNOWN',
      };
    }
  }

  private hasCredentials(company: CompanyConfig, channel: Channel): boolean {
    return channel === 'email' ? company.email !== undefined : company[channel] !== undefined;
  }

  private async runEmail(task: DownloadTask): Promise<CellOutcome> {
    const { company } = task;
    if (!company.email) {
      return { files: [], itemFailures: 0 };
    }

    const files: FileRecord[] = [];
    let itemFailures = 0;

    const retriever = this.deps.emailRetriever;
    for await (const attachment of retriever.fetchInvoices(company.email, task.since, task.until)) {
      try {
        files.push(
          await this.deps.organizer.store(company.name, 'email', attachment.filename, attachment.content, attachment.receivedAt)
        );
      } catch (error) {
        itemFailures++;
        AppLogger.warn(`[Email] Could not store ${attachment.filename}: ${toErrorMessage(error)}`);
      }
    }

    // Messages the retriever could not parse or date
    return { files, itemFailures: itemFailures + retriever.skippedMessages };
  }

  private async runPortal(task: DownloadTask, portal: Portal, mode: LoginMode): Promise<CellOutcome> {
    const handle = await this.deps.browser.openPage(task.company.name);
    try {
      const session = await this.deps.sessions.acquireSession(task.company, portal, mode, handle.page);
      const result = await this.deps.downloader.downloadInvoices(session, task.since, task.until);
      return { files: result.files, itemFailures: result.failures };
    } finally {
      await handle.close();
    }
  }
}

/**
 * Summary table printed after a run
 */
export function formatSummary(summary: RunSummary): string {
  const rows = summary.cells.map(cell => [
    cell.company,
    cell.channel,
    cell.status,
    cell.status === 'success' ? describeFiles(cell) : (cell.errorCode ? `${cell.errorCode}: ` : '') + (cell.message ?? ''),
  ]);
  const header = ['Company', 'Channel', 'Status', 'Details'];
  const widths = header.map((title, column) =>
    Math.max(title.length, ...rows.map(row => row[column].length))
  );
  const formatRow = (row: string[]) =>
    row.map((value, column) => (column === row.length - 1 ? value : value.padEnd(widths[column]))).join('  ');

  return [
    formatRow(header),
    widths.map(width => '-'.repeat(width)).join('  '),
    ...rows.map(formatRow),
    '',
    `Total: ${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.skipped} skipped`,
  ].join('\n');
}

export interface CollectSettings extends LoginSettings {
  incognito: boolean;
  persistentBrowser: boolean;
}

/**
 * Wire the production collaborators for a run
 */
export function createOrchestrator(config: AppConfig, settings: CollectSettings): InvoiceOrchestrator {
  const organizer = new FileOrganizer(config.downloadsDir);

  return new InvoiceOrchestrator({
    organizer,
    emailRetriever: new EmailRetriever(new ImapMailboxConnector()),
    browser: new ChromeLauncher({
      headless: settings.headless,
      incognito: settings.incognito,
      persistentProfile: settings.persistentBrowser,
      profilesDir: config.profilesDir,
      timeoutMs: settings.timeoutMs,
      chromePath: config.chromePath,
    }),
    sessions: new PortalSessionManager({
      store: new SessionStore(config.sessionsDir),
      createVendor: portal => createVendor(portal, { timeoutMs: settings.timeoutMs }),
      timeouts: {
        loginTimeoutMs: settings.timeoutMs,
        manualTimeoutMs: settings.manualTimeoutMs,
      },
    }),
    downloader: new InvoiceDownloader(organizer),
  });
}
