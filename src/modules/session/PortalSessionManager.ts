/**
 * Acquires an authenticated portal session for a company
 *
 * A stored session is tried first. When it is missing or rejected, an
 * interactive login runs in the requested mode and the resulting state is
 * saved for later runs.
 */

import { Page } from 'puppeteer-core';
import { CompanyConfig, LoginMode, Portal, PortalCredentials } from '../../types';
import {
  AuthenticationError,
  ChallengeTimeoutError,
  ConfigurationError,
  toErrorMessage,
} from '../../utils/errors';
import { AppLogger } from '../../utils/logger';
import { isTransientError, sleep } from '../../utils/retry';
import { PortalAutomation } from '../../vendors/types';
import { SessionStateAdapter, CookieSessionState } from './BrowserSessionState';
import { OperatorPrompt, ConsoleOperatorPrompt } from './OperatorPrompt';
import { SessionStore } from './SessionStore';

export interface AuthenticatedSession {
  company: CompanyConfig;
  portal: Portal;
  page: Page;
  vendor: PortalAutomation;
  /** True when a stored session was reused without logging in */
  restored: boolean;
}

export interface LoginTimeouts {
  /** Automatic login budget, including any CAPTCHA the stealth plugin clears */
  loginTimeoutMs: number;
  /** Operator wait; null waits until the operator confirms */
  manualTimeoutMs: number | null;
  pollIntervalMs?: number;
}

export interface PortalSessionManagerOptions {
  store: SessionStore;
  createVendor: (portal: Portal) => PortalAutomation;
  timeouts: LoginTimeouts;
  stateAdapter?: SessionStateAdapter;
  prompt?: OperatorPrompt;
}

export class PortalSessionManager {
  private readonly store: SessionStore;
  private readonly createVendor: (portal: Portal) => PortalAutomation;
  private readonly timeouts: LoginTimeouts;
  private readonly stateAdapter: SessionStateAdapter;
  private readonly prompt: OperatorPrompt;
  private readonly pollIntervalMs: number;

  constructor(options: PortalSessionManagerOptions) {
    this.store = options.store;
    this.createVendor = options.createVendor;
    this.timeouts = options.timeouts;
    this.stateAdapter = options.stateAdapter ?? new CookieSessionState();
    this.prompt = options.prompt ?? new ConsoleOperatorPrompt();
    this.pollIntervalMs = options.timeouts.pollIntervalMs ?? 2000;
  }

  async acquireSession(
    company: CompanyConfig,
    portal: Portal,
    mode: LoginMode,
    page: Page
  ): Promise<AuthenticatedSession> {
    const vendor = this.createVendor(portal);
    const tag = `[${vendor.portalName}:${company.name}]`;

    if (await this.restoreSession(company, portal, vendor, page, tag)) {
      return { company, portal, page, vendor, restored: true };
    }

    AppLogger.info(`${tag} Logging in (${mode})`);
    switch (mode) {
      case 'automatic':
        await this.automaticLogin(vendor, page, this.requireCredentials(company, portal), tag);
        break;
      case 'manual-assist':
        await this.manualAssistLogin(company, vendor, page, this.requireCredentials(company, portal), tag);
        break;
      case 'pure-manual':
        await this.pureManualLogin(company, vendor, page, tag);
        break;
    }

    const state = await this.stateAdapter.capture(page);
    await this.store.save(company.name, portal, state);
    AppLogger.info(`${tag} Logged in`);

    return { company, portal, page, vendor, restored: false };
  }

  /**
   * Reuse the stored session if the portal still accepts it
   * A rejected or undecodable session is deleted.
   */
  private async restoreSession(
    company: CompanyConfig,
    portal: Portal,
    vendor: PortalAutomation,
    page: Page,
    tag: string
  ): Promise<boolean> {
    const stored = await this.store.load(company.name, portal);
    if (!stored) {
      AppLogger.debug(`${tag} No stored session`);
      return false;
    }

    try {
      await this.stateAdapter.restore(page, stored.state);
      if (await vendor.verifySession(page)) {
        await this.store.markVerified(stored);
        AppLogger.info(`${tag} Reusing stored session`);
        return true;
      }
      AppLogger.info(`${tag} Stored session is no longer accepted`);
    } catch (error) {
      // The portal could not be reached; the session may still be good
      if (isTransientError(error)) {
        throw error;
      }
      AppLogger.warn(`${tag} Stored session unusable: ${toErrorMessage(error)}`);
    }

    await this.store.invalidate(company.name, portal);
    return false;
  }

  private requireCredentials(company: CompanyConfig, portal: Portal): PortalCredentials {
    const credentials = company[portal];
    if (!credentials) {
      throw new ConfigurationError(`${company.name} has no ${portal} credentials`);
    }
    return credentials;
  }

  private async automaticLogin(
    vendor: PortalAutomation,
    page: Page,
    credentials: PortalCredentials,
    tag: string
  ): Promise<void> {
    await vendor.submitCredentials(page, credentials);

    const deadline = Date.now() + this.timeouts.loginTimeoutMs;
    for (;;) {
      const state = await vendor.detectLoginState(page);
      if (state === 'logged-in') {
        return;
      }
      if (state === 'credentials-rejected') {
        throw new AuthenticationError(`${vendor.portalName} rejected the credentials`);
      }
      if (Date.now() >= deadline) {
        const seconds = Math.round(this.timeouts.loginTimeoutMs / 1000);
        throw new ChallengeTimeoutError(
          state === 'challenge'
            ? `${vendor.portalName} verification challenge not cleared within ${seconds}s; rerun with --manual-mode`
            : `${vendor.portalName} login did not complete within ${seconds}s`
        );
      }
      AppLogger.debug(`${tag} Login state: ${state}`);
      await sleep(this.pollIntervalMs);
    }
  }

  private async manualAssistLogin(
    company: CompanyConfig,
    vendor: PortalAutomation,
    page: Page,
    credentials: PortalCredentials,
    tag: string
  ): Promise<void> {
    await vendor.submitCredentials(page, credentials);

    const state = await vendor.detectLoginState(page);
    if (state === 'credentials-rejected') {
      throw new AuthenticationError(`${vendor.portalName} rejected the credentials`);
    }
    if (state === 'logged-in') {
      AppLogger.info(`${tag} No verification needed`);
      return;
    }

    await this.waitForOperator(company, vendor, page, [
      'Credentials have been entered in the browser window',
      'Solve the CAPTCHA or enter the verification code if asked',
      'Finish any remaining login step in the browser',
    ]);
  }

  private async pureManualLogin(
    company: CompanyConfig,
    vendor: PortalAutomation,
    page: Page,
    tag: string
  ): Promise<void> {
    await vendor.openLoginPage(page);
    AppLogger.debug(`${tag} Login page opened for the operator`);

    await this.waitForOperator(company, vendor, page, [
      `Log in to ${vendor.portalName} in the browser window`,
      'Solve the CAPTCHA or enter the verification code if asked',
      'Leave the browser open once the account page shows',
    ]);
  }

  private async waitForOperator(
    company: CompanyConfig,
    vendor: PortalAutomation,
    page: Page,
    instructions: string[]
  ): Promise<void> {
    const { manualTimeoutMs } = this.timeouts;
    const deadline = manualTimeoutMs === null ? null : new Date(Date.now() + manualTimeoutMs);

    const completed = await this.prompt.waitForOperator({
      title: `${vendor.portalName} login for ${company.name}`,
      instructions,
      isComplete: async () => (await vendor.detectLoginState(page)) === 'logged-in',
      deadline,
    });

    if (!completed) {
      const seconds = Math.round((manualTimeoutMs ?? 0) / 1000);
      throw new ChallengeTimeoutError(`Manual ${vendor.portalName} login not completed within ${seconds}s`);
    }
  }
}
