/**
 * Base class for portal automation implementations
 */
import { Page, HTTPResponse } from 'puppeteer-core';
import { Portal, PortalCredentials } from '../types';
import { toErrorMessage } from '../utils/errors';
import { AppLogger } from '../utils/logger';
import { withRetry } from '../utils/retry';
import {
  PortalAutomation,
  LoginState,
  OrderSummary,
  DownloadedFile,
  VendorOptions,
} from './types';

/**
 * Download interception configuration
 */
interface DownloadInterceptConfig {
  /** URL patterns to intercept */
  urlPatterns: RegExp[];
  /** MIME types to capture */
  mimeTypes: string[];
  /** Timeout in milliseconds */
  timeout: number;
}

/**
 * Abstract base class for portal automation
 * Provides common functionality for login, navigation, and download
 */
export abstract class BaseVendor implements PortalAutomation {
  abstract portal: Portal;
  abstract portalName: string;
  abstract loginUrl: string;
  abstract ordersUrl: string;

  /** Timeout for page operations (ms) */
  protected readonly defaultTimeout: number;

  /** Wait after navigation (ms) */
  protected readonly navigationWait: number;

  private readonly retryDelay: number;

  constructor(options: VendorOptions = {}) {
    this.defaultTimeout = options.timeoutMs ?? 30000;
    this.navigationWait = options.navigationWaitMs ?? 2000;
    this.retryDelay = options.retryDelayMs ?? 2000;
  }

  abstract submitCredentials(page: Page, credentials: PortalCredentials): Promise<void>;
  abstract detectLoginState(page: Page): Promise<LoginState>;
  abstract listOrders(page: Page, since: Date, until: Date): Promise<OrderSummary[]>;
  abstract fetchInvoice(page: Page, order: OrderSummary): Promise<DownloadedFile>;

  async openLoginPage(page: Page): Promise<void> {
    await this.navigateTo(page, this.loginUrl);
  }

  /**
   * Open the order history and check the portal still treats us as logged in
   */
  async verifySession(page: Page): Promise<boolean> {
    await this.navigateTo(page, this.ordersUrl);
    const state = await this.detectLoginState(page);
    this.log(`Session check: ${state}`);
    return state === 'logged-in';
  }

  /**
   * Navigate to a URL and wait for network to settle
   * Transient network failures are retried once.
   */
  protected async navigateTo(page: Page, url: string): Promise<void> {
    this.log(`Navigating to: ${url}`);
    await withRetry(
      async () => {
        await page.goto(url, {
          waitUntil: 'networkidle2',
          timeout: this.defaultTimeout,
        });
      },
      { label: `[${this.portalName}] navigation`, delayMs: this.retryDelay }
    );
    await this.wait(this.navigationWait);
  }

  /**
   * Wait for specified milliseconds
   */
  protected async wait(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  /**
   * Wait for a selector to appear on the page
   */
  protected async waitForSelector(
    page: Page,
    selector: string,
    options: { visible?: boolean; timeout?: number } = {}
  ): Promise<void> {
    const { visible = true, timeout = this.defaultTimeout } = options;
    await page.waitForSelector(selector, { visible, timeout });
  }

  /**
   * Type text into an input field with human-like delay
   */
  protected async typeWithDelay(
    page: Page,
    selector: string,
    text: string,
    delay: number = 50
  ): Promise<void> {
    await this.waitForSelector(page, selector);
    await page.type(selector, text, { delay });
  }

  /**
   * Click an element and wait for navigation
   */
  protected async clickAndWait(
    page: Page,
    selector: string,
    waitForNavigation: boolean = true
  ): Promise<void> {
    await this.waitForSelector(page, selector);

    if (waitForNavigation) {
      await Promise.all([
        page.waitForNavigation({ waitUntil: 'networkidle2', timeout: this.defaultTimeout }),
        page.click(selector),
      ]);
    } else {
      await page.click(selector);
      await this.wait(this.navigationWait);
    }
  }

  /**
   * Check if an element exists on the page
   */
  protected async elementExists(page: Page, selector: string): Promise<boolean> {
    try {
      const element = await page.$(selector);
      return element !== null;
    } catch {
      return false;
    }
  }

  /**
   * First selector of the list present on the page
   */
  protected async firstExisting(page: Page, selectors: readonly string[]): Promise<string | null> {
    for (const selector of selectors) {
      if (await this.elementExists(page, selector)) {
        return selector;
      }
    }
    return null;
  }

  /**
   * Get text content of an element
   */
  protected async getTextContent(page: Page, selector: string): Promise<string | null> {
    try {
      return await page.$eval(selector, el => el.textContent ?? '');
    } catch {
      return null;
    }
  }

  /**
   * Visible text of the whole page
   */
  protected async getPageText(page: Page): Promise<string> {
    return page.evaluate(() => (document.body ? document.body.innerText : ''));
  }

  /**
   * Intercept and capture a file download triggered by a click
   * Useful for portals that serve invoices as PDF responses
   */
  protected async interceptDownload(
    page: Page,
    triggerAction: () => Promise<void>,
    config: Partial<DownloadInterceptConfig> = {}
  ): Promise<DownloadedFile | null> {
    const {
      urlPatterns = [/\.pdf(\?|$)/i],
      mimeTypes = ['application/pdf'],
      timeout = this.defaultTimeout,
    } = config;

    let timeoutId: NodeJS.Timeout | undefined;
    let responseHandler: ((response: HTTPResponse) => void) | undefined;

    const captured = new Promise<DownloadedFile | null>(resolve => {
      timeoutId = setTimeout(() => {
        this.log('Download timeout', 'warn');
        resolve(null);
      }, timeout);

      responseHandler = (response: HTTPResponse) => {
        const url = response.url();
        const contentType = response.headers()['content-type'] || '';

        const urlMatches = urlPatterns.some(pattern => pattern.test(url));
        const mimeMatches = mimeTypes.some(mime => contentType.includes(mime));
        if (!urlMatches && !mimeMatches) {
          return;
        }

        response.buffer().then(
          buffer => resolve(this.toDownloadedFile(response, buffer)),
          (error: unknown) => {
            this.log(`Error capturing download: ${toErrorMessage(error)}`, 'error');
            resolve(null);
          }
        );
      };

      page.on('response', responseHandler);
    });

    try {
      await triggerAction();
      return await captured;
    } finally {
      clearTimeout(timeoutId);
      if (responseHandler) {
        page.off('response', responseHandler);
      }
    }
  }

  private toDownloadedFile(response: HTTPResponse, buffer: Buffer): DownloadedFile {
    const headers = response.headers();
    const contentType = headers['content-type'] || '';

    // Extract filename from Content-Disposition header or URL
    let filename = 'download.pdf';
    const filenameMatch = (headers['content-disposition'] || '').match(/filename[^;=\n]*=((['"]).*?\2|[^;\n]*)/);
    if (filenameMatch) {
      filename = filenameMatch[1].replace(/['"]/g, '');
    } else {
      const urlFilename = response.url().split('/').pop()?.split('?')[0];
      if (urlFilename) filename = urlFilename;
    }

    return {
      filename,
      data: buffer,
      mimeType: contentType.split(';')[0] || 'application/pdf',
    };
  }

  /**
   * Print the current page to PDF
   * Used where the portal shows invoices as HTML
   */
  protected async pageToPdf(page: Page, filename: string): Promise<DownloadedFile> {
    const pdf = await page.pdf({
      format: 'Letter',
      printBackground: true,
      margin: { top: '0.5in', right: '0.5in', bottom: '0.5in', left: '0.5in' },
    });

    return {
      filename,
      data: Buffer.from(pdf),
      mimeType: 'application/pdf',
    };
  }

  /**
   * Log portal activity
   */
  protected log(message: string, level: 'debug' | 'info' | 'warn' | 'error' = 'info'): void {
    const line = `[${this.portalName}] ${message}`;
    switch (level) {
      case 'debug':
        AppLogger.debug(line);
        break;
      case 'warn':
        AppLogger.warn(line);
        break;
      case 'error':
        AppLogger.error(line);
        break;
      default:
        AppLogger.info(line);
    }
  }
}
