/**
 * Type definitions for the Invoice Organizer
 */

import type { ErrorCode } from '../utils/errors';

/** Invoice source */
export type Channel = 'email' | 'walmart' | 'amazon';

/** Web portal requiring an authenticated browser session */
export type Portal = Exclude<Channel, 'email'>;

export const CHANNELS: readonly Channel[] = ['email', 'walmart', 'amazon'];

export const PORTALS: readonly Portal[] = ['walmart', 'amazon'];

export function isPortal(value: string): value is Portal {
  return PORTALS.some(portal => portal === value);
}

export type LoginMode = 'automatic' | 'manual-assist' | 'pure-manual';

export const LOGIN_MODES: readonly LoginMode[] = ['automatic', 'manual-assist', 'pure-manual'];

export interface EmailCredentials {
  address: string;
  /** App password; never logged */
  password: string;
  imapHost: string;
  imapPort: number;
  mailbox: string;
}

export interface PortalCredentials {
  username: string;
  password: string;
}

export interface CompanyConfig {
  readonly name: string;
  readonly email?: Readonly<EmailCredentials>;
  readonly walmart?: Readonly<PortalCredentials>;
  readonly amazon?: Readonly<PortalCredentials>;
}

export interface AppConfig {
  readonly companies: readonly CompanyConfig[];
  readonly downloadsDir: string;
  readonly sessionsDir: string;
  readonly profilesDir: string;
  readonly chromePath?: string;
}

/**
 * One unit of work: a channel for a company over a date range
 */
export interface DownloadTask {
  company: CompanyConfig;
  channel: Channel;
  /** downloads/<company> */
  targetDir: string;
  since: Date;
  until: Date;
}

export type FileRecordStatus = 'written' | 'renamed' | 'duplicate';

export interface FileRecord {
  path: string;
  /** SHA-256 of the content, hex encoded */
  fingerprint: string;
  status: FileRecordStatus;
}

export type CellStatus = 'success' | 'failed' | 'skipped';

export interface CellResult {
  company: string;
  channel: Channel;
  status: CellStatus;
  files: FileRecord[];
  /** Attachments or orders that were logged and skipped */
  itemFailures: number;
  message?: string;
  errorCode?: ErrorCode | 'UNKNOWN';
}

export interface RunSummary {
  cells: CellResult[];
  succeeded: number;
  failed: number;
  skipped: number;
}

export interface RunOptions {
  companies: readonly CompanyConfig[];
  channels: readonly Channel[];
  since: Date;
  until: Date;
  mode: LoginMode;
}
