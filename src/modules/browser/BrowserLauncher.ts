/**
 * Chrome launcher for the portal channels
 *
 * Chrome runs through puppeteer-extra with the stealth plugin, which hides the
 * automation markers the portals' bot checks look for.
 */

import * as fs from 'fs';
import * as path from 'path';
import ora from 'ora';
import puppeteerCore, { Browser, Page } from 'puppeteer-core';
import { addExtra } from 'puppeteer-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import { ConfigurationError } from '../../utils/errors';
import { AppLogger } from '../../utils/logger';
import { FileNamingService } from '../naming/FileNamingService';

const puppeteer = addExtra(puppeteerCore);
puppeteer.use(StealthPlugin());

const CHROME_CANDIDATES: { [platform: string]: string[] } = {
  darwin: [
    '/Applications/Google Chrome.app/Contents/MacOS/Google Chrome',
    '/Applications/Google Chrome Canary.app/Contents/MacOS/Google Chrome Canary',
    '/Applications/Chromium.app/Contents/MacOS/Chromium',
    '/Applications/Microsoft Edge.app/Contents/MacOS/Microsoft Edge',
  ],
  linux: [
    '/usr/bin/google-chrome',
    '/usr/bin/google-chrome-stable',
    '/usr/bin/chromium',
    '/usr/bin/chromium-browser',
    '/snap/bin/chromium',
  ],
  win32: [
    'C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe',
    'C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe',
    'C:\\Program Files (x86)\\Microsoft\\Edge\\Application\\msedge.exe',
  ],
};

export interface BrowserOptions {
  headless: boolean;
  /** Fresh browser context per cell, no state shared with the profile */
  incognito: boolean;
  /** Reuse a Chrome profile per company under profilesDir */
  persistentProfile: boolean;
  profilesDir: string;
  /** Default timeout for page operations (ms) */
  timeoutMs: number;
  chromePath?: string;
}

export interface BrowserHandle {
  page: Page;
  close(): Promise<void>;
}

/**
 * Opens one browser page per portal cell
 */
export interface BrowserProvider {
  openPage(company: string): Promise<BrowserHandle>;
}

/**
 * Locate a Chrome executable
 * @throws ConfigurationError when none is installed
 */
export function findChromePath(
  configured: string | undefined,
  platform: string = process.platform,
  exists: (file: string) => boolean = fs.existsSync
): string {
  if (configured) {
    if (!exists(configured)) {
      throw new ConfigurationError(`CHROME_PATH does not exist: ${configured}`);
    }
    return configured;
  }

  for (const candidate of CHROME_CANDIDATES[platform] ?? []) {
    if (exists(candidate)) {
      return candidate;
    }
  }

  throw new ConfigurationError(
    'Chrome not found. Install Google Chrome or set CHROME_PATH to a Chrome or Chromium executable'
  );
}

export class ChromeLauncher implements BrowserProvider {
  private readonly options: BrowserOptions;
  private readonly naming = new FileNamingService();

  constructor(options: BrowserOptions) {
    this.options = options;
  }

  async openPage(company: string): Promise<BrowserHandle> {
    const spinner = ora('Launching browser...').start();

    let chromePath: string;
    let browser: Browser;
    try {
      chromePath = findChromePath(this.options.chromePath);
      browser = await puppeteer.launch({
        executablePath: chromePath,
        headless: this.options.headless,
        args: [
          '--no-sandbox',
          '--disable-blink-features=AutomationControlled',
          '--disable-infobars',
          '--window-size=1280,800',
        ],
        defaultViewport: { width: 1280, height: 750 },
        ignoreDefaultArgs: ['--enable-automation'],
        ...(this.options.persistentProfile ? { userDataDir: this.profileDir(company) } : {}),
      });
    } catch (error) {
      spinner.fail('Browser launch failed');
      throw error;
    }
    spinner.succeed(`Browser launched (${path.basename(chromePath)})`);

    try {
      const page = await this.newPage(browser);
      page.setDefaultTimeout(this.options.timeoutMs);
      page.setDefaultNavigationTimeout(this.options.timeoutMs);
      return { page, close: () => browser.close() };
    } catch (error) {
      await browser.close();
      throw error;
    }
  }

  private async newPage(browser: Browser): Promise<Page> {
    // A persistent profile is only useful in the default context
    if (this.options.incognito && !this.options.persistentProfile) {
      const context = await browser.createBrowserContext();
      return context.newPage();
    }
    if (this.options.incognito) {
      AppLogger.debug('[Browser] Persistent profile in use, incognito context skipped');
    }
    return browser.newPage();
  }

  private profileDir(company: string): string {
    const dir = path.resolve(this.options.profilesDir, this.naming.sanitizeSegment(company));
    fs.mkdirSync(dir, { recursive: true });
    AppLogger.info(`[Browser] Using Chrome profile: ${dir}`);
    return dir;
  }
}
