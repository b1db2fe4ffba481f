#!/usr/bin/env node

import { Command, Option } from 'commander';
import {
  DEFAULT_LOOKBACK_DAYS,
  DEFAULT_MANUAL_TIMEOUT_SECONDS,
  DEFAULT_TIMEOUT_SECONDS,
  loadConfig,
  loadEnvFile,
} from './config';
import { SessionStore, describeAge } from './modules/session/SessionStore';
import { createOrchestrator, formatSummary } from './main';
import {
  parseNonNegativeInt,
  parsePositiveInt,
  resolveChannels,
  resolveLoginSettings,
  selectCompanies,
} from './options';
import { LOGIN_MODES, PORTALS, Portal, isPortal } from './types';
import { lookbackStart } from './utils/dateUtils';
import { ConfigurationError, isCollectorError, toErrorMessage } from './utils/errors';
import { AppLogger } from './utils/logger';

interface CollectCommandOptions {
  company?: string;
  all?: boolean;
  emailOnly?: boolean;
  webOnly?: boolean;
  walmartOnly?: boolean;
  amazonOnly?: boolean;
  days: number;
  timeout: number;
  manualTimeout: number;
  loginMode?: string;
  manualMode?: boolean;
  pureManual?: boolean;
  headless?: boolean;
  persistentBrowser?: boolean;
  incognito: boolean;
}

interface ClearCommandOptions {
  company?: string;
  portal?: string;
}

const program = new Command();

program
  .name('invoice-organizer')
  .description('Collect invoices from company inboxes and the Walmart and Amazon portals')
  .version('1.0.0')
  .option('--env-file <path>', 'Load settings from this .env file (default: ./.env)')
  .option('--verbose', 'Show debug output')
  .hook('preAction', command => {
    const options = command.opts<{ envFile?: string; verbose?: boolean }>();
    loadEnvFile(options.envFile);
    if (options.verbose || process.env.LOG_LEVEL === 'debug') {
      AppLogger.setDebug(true);
    }
  });

program
  .command('list')
  .description('List configured companies and their channels')
  .action(() => {
    const config = loadConfig();
    if (config.companies.length === 0) {
      console.log('No companies configured. Set COMPANY_COUNT and the COMPANY_<n>_ settings.');
      return;
    }

    for (const company of config.companies) {
      const channels = [
        company.email ? `email (${company.email.address})` : null,
        company.walmart ? 'walmart' : null,
        company.amazon ? 'amazon' : null,
      ].filter((channel): channel is string => channel !== null);
      console.log(`${company.name}: ${channels.join(', ') || 'no channels configured'}`);
    }
  });

program
  .command('collect')
  .description('Collect invoices for one company or all of them')
  .addOption(new Option('--company <name>', 'Company to collect for').conflicts('all'))
  .addOption(new Option('--all', 'Collect for every configured company').conflicts('company'))
  .addOption(new Option('--email-only', 'Only email attachments').conflicts(['webOnly', 'walmartOnly', 'amazonOnly']))
  .addOption(new Option('--web-only', 'Only the web portals').conflicts(['emailOnly', 'walmartOnly', 'amazonOnly']))
  .addOption(new Option('--walmart-only', 'Only Walmart').conflicts(['emailOnly', 'webOnly', 'amazonOnly']))
  .addOption(new Option('--amazon-only', 'Only Amazon').conflicts(['emailOnly', 'webOnly', 'walmartOnly']))
  .option('--days <n>', 'Lookback window in days', parsePositiveInt, DEFAULT_LOOKBACK_DAYS)
  .option('--timeout <seconds>', 'Timeout for web operations', parsePositiveInt, DEFAULT_TIMEOUT_SECONDS)
  .option(
    '--manual-timeout <seconds>',
    'Time allowed for manual login steps, 0 waits indefinitely',
    parseNonNegativeInt,
    DEFAULT_MANUAL_TIMEOUT_SECONDS
  )
  .addOption(new Option('--login-mode <mode>', 'Portal login mode').choices(LOGIN_MODES))
  .option('--manual-mode', 'Manual-assist login, waiting until you confirm')
  .option('--pure-manual', 'Log in yourself in the browser window')
  .option('--headless', 'Run the browser headless (automatic login only)')
  .option('--persistent-browser', 'Reuse a Chrome profile per company')
  .option('--no-incognito', 'Use the default browser context')
  .action(async (options: CollectCommandOptions) => {
    const config = loadConfig();
    const companies = selectCompanies(config, options);
    const channels = resolveChannels(options);
    const login = resolveLoginSettings(options);

    const until = new Date();
    const since = lookbackStart(options.days, until);
    AppLogger.info(
      `Collecting ${channels.join(', ')} for ${companies.map(c => c.name).join(', ')} since ${since.toDateString()}`
    );

    const orchestrator = createOrchestrator(config, {
      ...login,
      incognito: options.incognito,
      persistentBrowser: options.persistentBrowser === true,
    });
    const summary = await orchestrator.run({ companies, channels, since, until, mode: login.mode });

    console.log('');
    console.log(formatSummary(summary));
    if (summary.failed > 0) {
      process.exitCode = 1;
    }
  });

const sessions = program.command('sessions').description('Manage stored portal sessions');

sessions
  .command('list')
  .description('Show stored portal sessions and their age')
  .action(async () => {
    const config = loadConfig();
    const stored = await new SessionStore(config.sessionsDir).list();
    if (stored.length === 0) {
      console.log(`No stored sessions in ${config.sessionsDir}`);
      return;
    }

    for (const session of stored) {
      const verified = session.lastVerifiedAt ? `, verified ${describeAge(session.lastVerifiedAt)}` : '';
      console.log(`${session.company} / ${session.portal}: saved ${describeAge(session.savedAt)}${verified}`);
    }
  });

sessions
  .command('clear')
  .description('Delete stored portal sessions')
  .option('--company <name>', 'Only this company')
  .addOption(new Option('--portal <portal>', 'Only this portal').choices(PORTALS))
  .action(async (options: ClearCommandOptions) => {
    const config = loadConfig();
    let portal: Portal | undefined;
    if (options.portal !== undefined) {
      if (!isPortal(options.portal)) {
        throw new ConfigurationError(`Unknown portal: ${options.portal}`);
      }
      portal = options.portal;
    }

    const removed = await new SessionStore(config.sessionsDir).clear({ company: options.company, portal });
    console.log(`Removed ${removed} session(s)`);
  });

program.parseAsync().catch((error: unknown) => {
  if (isCollectorError(error)) {
    AppLogger.error(`${error.name}: ${error.message}`);
  } else {
    AppLogger.error(`Unexpected error: ${toErrorMessage(error)}`, error);
  }
  process.exitCode = 1;
});
