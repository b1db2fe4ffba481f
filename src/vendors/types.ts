/**
 * Portal automation types
 */
import { Page } from 'puppeteer-core';
import { Portal, PortalCredentials } from '../types';

/**
 * What the login page currently shows
 */
export type LoginState = 'logged-in' | 'credentials-rejected' | 'challenge' | 'pending';

/**
 * An order found on the portal's order history
 */
export interface OrderSummary {
  orderId: string;
  orderDate: Date;
  /** Order details page, when the portal links one */
  detailUrl?: string;
}

/**
 * Downloaded file information
 */
export interface DownloadedFile {
  filename: string;
  data: Buffer;
  mimeType: string;
}

export interface VendorOptions {
  /** Timeout for page operations (ms) */
  timeoutMs?: number;
  /** Wait after navigation (ms) */
  navigationWaitMs?: number;
  /** Backoff before retrying a failed navigation (ms) */
  retryDelayMs?: number;
}

/**
 * Portal automation interface
 * Each portal implementation must implement this interface
 */
export interface PortalAutomation {
  /** Portal identifier */
  portal: Portal;

  /** Display name */
  portalName: string;

  /** Login page URL */
  loginUrl: string;

  /**
   * Open the login page without touching the form
   */
  openLoginPage(page: Page): Promise<void>;

  /**
   * Open the login page and submit the credentials
   */
  submitCredentials(page: Page, credentials: PortalCredentials): Promise<void>;

  /**
   * Inspect the current page for the login outcome
   */
  detectLoginState(page: Page): Promise<LoginState>;

  /**
   * Open the account area and check the session is accepted
   */
  verifySession(page: Page): Promise<boolean>;

  /**
   * Orders placed within [since, until]
   */
  listOrders(page: Page, since: Date, until: Date): Promise<OrderSummary[]>;

  /**
   * Retrieve the invoice document of one order
   * @throws ExtractionError when no invoice can be located
   */
  fetchInvoice(page: Page, order: OrderSummary): Promise<DownloadedFile>;
}
