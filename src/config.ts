/**
 * Configuration loading
 *
 * Companies are declared as numbered blocks in the environment (usually a .env file):
 *
 *   COMPANY_COUNT=2
 *   COMPANY_1_NAME=Acme
 *   COMPANY_1_EMAIL=billing@acme.example
 *   COMPANY_1_EMAIL_PASSWORD=...
 *   COMPANY_1_WALMART_USERNAME=...
 *
 * A channel is configured when its first key is set; the remaining keys of that
 * block are then required.
 */

import * as dotenv from 'dotenv';
import { z } from 'zod';
import { FileNamingService } from './modules/naming/FileNamingService';
import { AppConfig, CompanyConfig, EmailCredentials, PortalCredentials } from './types';
import { ConfigurationError } from './utils/errors';
import { AppLogger } from './utils/logger';

export const DEFAULT_IMAP_HOST = 'imap.gmail.com';
export const DEFAULT_IMAP_PORT = 993;
export const DEFAULT_MAILBOX = 'INBOX';
export const DEFAULT_DOWNLOADS_DIR = './downloads';
export const DEFAULT_SESSIONS_DIR = './sessions';
export const DEFAULT_PROFILES_DIR = './browser-profiles';

export const DEFAULT_LOOKBACK_DAYS = 30;
export const DEFAULT_TIMEOUT_SECONDS = 30;
export const DEFAULT_MANUAL_TIMEOUT_SECONDS = 60;

type Env = Record<string, string | undefined>;

const companyNameSchema = z
  .string()
  .trim()
  .min(1, 'must not be empty')
  .refine(name => !/[\\/]/.test(name) && name !== '.' && name !== '..', {
    message: 'must not contain path separators',
  });

const emailSchema = z.object({
  address: z.string().trim().email('must be an email address'),
  password: z.string().min(1, 'is required'),
  imapHost: z.string().trim().min(1, 'is required'),
  imapPort: z.coerce.number().int('must be an integer').min(1).max(65535),
  mailbox: z.string().trim().min(1, 'is required'),
});

const portalSchema = z.object({
  username: z.string().trim().min(1, 'is required'),
  password: z.string().min(1, 'is required'),
});

const countSchema = z.coerce.number().int('must be an integer').min(0, 'must not be negative');

/**
 * Load a .env file into process.env (existing variables win)
 */
export function loadEnvFile(path?: string): void {
  const result = dotenv.config(path ? { path } : {});
  if (result.error) {
    AppLogger.debug(`No env file loaded: ${result.error.message}`);
  }
}

/** Treat empty strings as unset, the way .env templates leave them */
function read(env: Env, key: string): string | undefined {
  const value = env[key];
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value;
}

function formatIssues(prefix: string, error: z.ZodError): string {
  return error.issues
    .map(issue => `${prefix}${issue.path.join('.') || 'value'} ${issue.message}`)
    .join('; ');
}

function parseEmail(env: Env, prefix: string): EmailCredentials | undefined {
  const address = read(env, `${prefix}EMAIL`);
  if (!address) {
    return undefined;
  }

  const parsed = emailSchema.safeParse({
    address,
    password: read(env, `${prefix}EMAIL_PASSWORD`) ?? '',
    imapHost: read(env, `${prefix}IMAP_SERVER`) ?? DEFAULT_IMAP_HOST,
    imapPort: read(env, `${prefix}IMAP_PORT`) ?? DEFAULT_IMAP_PORT,
    mailbox: read(env, `${prefix}IMAP_MAILBOX`) ?? DEFAULT_MAILBOX,
  });

  if (!parsed.success) {
    throw new ConfigurationError(`Invalid email settings: ${formatIssues(`${prefix}email.`, parsed.error)}`);
  }
  return parsed.data;
}

function parsePortal(env: Env, prefix: string, key: 'WALMART' | 'AMAZON'): PortalCredentials | undefined {
  const username = read(env, `${prefix}${key}_USERNAME`);
  if (!username) {
    return undefined;
  }

  const parsed = portalSchema.safeParse({
    username,
    password: read(env, `${prefix}${key}_PASSWORD`) ?? '',
  });

  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid ${key.toLowerCase()} settings: ${formatIssues(`${prefix}${key.toLowerCase()}.`, parsed.error)}`
    );
  }
  return parsed.data;
}

function parseCompany(env: Env, index: number): CompanyConfig {
  const prefix = `COMPANY_${index}_`;
  const name = companyNameSchema.safeParse(read(env, `${prefix}NAME`) ?? `Company_${index}`);
  if (!name.success) {
    throw new ConfigurationError(`Invalid company name: ${formatIssues(`${prefix}NAME `, name.error)}`);
  }

  const email = parseEmail(env, prefix);
  const walmart = parsePortal(env, prefix, 'WALMART');
  const amazon = parsePortal(env, prefix, 'AMAZON');

  return Object.freeze({
    name: name.data,
    ...(email && { email: Object.freeze(email) }),
    ...(walmart && { walmart: Object.freeze(walmart) }),
    ...(amazon && { amazon: Object.freeze(amazon) }),
  });
}

/**
 * Build the application configuration from environment variables
 * @throws ConfigurationError when a company block is missing or malformed
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const count = countSchema.safeParse(read(env, 'COMPANY_COUNT') ?? '0');
  if (!count.success) {
    throw new ConfigurationError(`Invalid COMPANY_COUNT: ${formatIssues('', count.error)}`);
  }

  const companies: CompanyConfig[] = [];
  const naming = new FileNamingService();
  // Keyed the way session files and download folders are named
  const seen = new Map<string, string>();

  for (let i = 1; i <= count.data; i++) {
    const company = parseCompany(env, i);
    const key = naming.sanitizeSegment(company.name).toLowerCase();
    const previous = seen.get(key);
    if (previous !== undefined) {
      throw new ConfigurationError(
        previous.toLowerCase() === company.name.toLowerCase()
          ? `Duplicate company name: ${company.name}`
          : `Company names ${previous} and ${company.name} map to the same folder`
      );
    }
    seen.set(key, company.name);
    companies.push(company);
  }

  const chromePath = read(env, 'CHROME_PATH');

  return {
    companies,
    downloadsDir: read(env, 'BASE_DOWNLOAD_PATH') ?? DEFAULT_DOWNLOADS_DIR,
    sessionsDir: read(env, 'SESSIONS_PATH') ?? DEFAULT_SESSIONS_DIR,
    profilesDir: read(env, 'BROWSER_PROFILES_PATH') ?? DEFAULT_PROFILES_DIR,
    ...(chromePath ? { chromePath } : {}),
  };
}

/**
 * Find a company by name, case-insensitively
 */
export function findCompany(config: AppConfig, name: string): CompanyConfig | undefined {
  const wanted = name.trim().toLowerCase();
  return config.companies.find(company => company.name.toLowerCase() === wanted);
}
