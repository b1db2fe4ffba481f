/**
 * Resolution of collect command options
 */

import { InvalidArgumentError } from 'commander';
import { findCompany } from './config';
import { AppConfig, Channel, CHANNELS, CompanyConfig, LoginMode, LOGIN_MODES } from './types';
import { ConfigurationError } from './utils/errors';

export interface ChannelFlags {
  emailOnly?: boolean;
  webOnly?: boolean;
  walmartOnly?: boolean;
  amazonOnly?: boolean;
}

export interface LoginFlags {
  loginMode?: string;
  manualMode?: boolean;
  pureManual?: boolean;
  headless?: boolean;
  /** Seconds */
  timeout: number;
  /** Seconds, 0 = unbounded */
  manualTimeout: number;
}

export interface LoginSettings {
  mode: LoginMode;
  headless: boolean;
  timeoutMs: number;
  manualTimeoutMs: number | null;
}

export interface CompanySelection {
  company?: string;
  all?: boolean;
}

/**
 * commander argument parser for non-negative integers
 */
export function parseNonNegativeInt(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return Number(value);
}

/**
 * commander argument parser for positive integers
 */
export function parsePositiveInt(value: string): number {
  const parsed = parseNonNegativeInt(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('Must be greater than zero.');
  }
  return parsed;
}

export function parseLoginMode(value: string): LoginMode {
  const mode = LOGIN_MODES.find(candidate => candidate === value.trim().toLowerCase());
  if (!mode) {
    throw new InvalidArgumentError(`Expected one of: ${LOGIN_MODES.join(', ')}.`);
  }
  return mode;
}

/**
 * Channels to run, in run order
 */
export function resolveChannels(flags: ChannelFlags): Channel[] {
  const selected: [boolean | undefined, Channel[]][] = [
    [flags.emailOnly, ['email']],
    [flags.webOnly, ['walmart', 'amazon']],
    [flags.walmartOnly, ['walmart']],
    [flags.amazonOnly, ['amazon']],
  ];
  const active = selected.filter(([flag]) => flag === true);

  if (active.length > 1) {
    throw new ConfigurationError(
      'Only one of --email-only, --web-only, --walmart-only, --amazon-only can be given'
    );
  }
  return active.length === 1 ? active[0][1] : [...CHANNELS];
}

/**
 * Login mode and timeouts from the flags
 * --manual-mode is manual-assist with an unbounded wait.
 */
export function resolveLoginSettings(flags: LoginFlags): LoginSettings {
  const requested: LoginMode[] = [];
  if (flags.loginMode) requested.push(parseLoginMode(flags.loginMode));
  if (flags.manualMode) requested.push('manual-assist');
  if (flags.pureManual) requested.push('pure-manual');

  const distinct = [...new Set(requested)];
  if (distinct.length > 1) {
    throw new ConfigurationError(`Conflicting login modes: ${distinct.join(', ')}`);
  }
  const mode = distinct[0] ?? 'automatic';
  const headless = flags.headless === true;

  if (headless && mode !== 'automatic') {
    throw new ConfigurationError(`--headless cannot be combined with ${mode} login, which needs a visible browser`);
  }

  const unbounded = flags.manualMode === true || flags.manualTimeout === 0;
  return {
    mode,
    headless,
    timeoutMs: flags.timeout * 1000,
    manualTimeoutMs: unbounded ? null : flags.manualTimeout * 1000,
  };
}

/**
 * Companies a collect run covers
 * @throws ConfigurationError for an unknown company or when neither option is given
 */
export function selectCompanies(config: AppConfig, selection: CompanySelection): CompanyConfig[] {
  if (selection.company && selection.all) {
    throw new ConfigurationError('--company and --all cannot be combined');
  }

  if (selection.company) {
    const company = findCompany(config, selection.company);
    if (!company) {
      const known = config.companies.map(c => c.name).join(', ') || 'none';
      throw new ConfigurationError(`Unknown company: ${selection.company} (configured: ${known})`);
    }
    return [company];
  }

  if (selection.all) {
    if (config.companies.length === 0) {
      throw new ConfigurationError('No companies configured; set COMPANY_COUNT and the COMPANY_<n>_ blocks');
    }
    return [...config.companies];
  }

  throw new ConfigurationError('Specify --company <name> or --all');
}
