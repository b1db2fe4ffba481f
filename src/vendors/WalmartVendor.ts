/**
 * Walmart Vendor Implementation
 * Login and invoice download for walmart.com customer accounts
 *
 * Portal Information:
 * - Login URL: https://www.walmart.com/account/login
 * - Orders URL: https://www.walmart.com/orders
 *
 * Authentication Flow:
 * 1. Enter email (some variants show a Continue step first)
 * 2. Enter password and submit
 * 3. PerimeterX "press and hold" or a one-time code may follow;
 *    these are reported as a challenge for the operator
 *
 * Invoices are reached from the order details page. The invoice control
 * either serves a PDF or opens a printable view.
 */
import { Page } from 'puppeteer-core';
import { PortalCredentials } from '../types';
import { isWithinRange, parseOrderDate } from '../utils/dateUtils';
import { ExtractionError } from '../utils/errors';
import { AppLogger } from '../utils/logger';
import { BaseVendor } from './BaseVendor';
import { LoginState, OrderSummary, DownloadedFile } from './types';

const ORDER_DETAIL_BASE = 'https://www.walmart.com/orders/';

/**
 * Walmart-specific selectors
 */
const SELECTORS = {
  // Login page
  emailInput: ['#email-input', 'input[type="email"]', 'input[name="email"]'],
  continueButton: ['button[data-automation-id="continue-button"]', 'button::-p-text(Continue)'],
  passwordInput: ['#password-input', 'input[type="password"]', 'input[name="password"]'],
  submitButton: ['#sign-in-form-submit-btn', 'button[data-automation-id="signin-submit-btn"]', 'button[type="submit"]'],
  loginError: ['[data-automation-id="signin-error"]', '.error-message', '[role="alert"]'],

  // CAPTCHA / verification
  challenge: [
    '#px-captcha',
    'iframe[src*="captcha"]',
    'input[name="otp"]',
    '#verification-code',
    '[data-automation-id="otp-input"]',
  ],

  // Elements that only show for a signed-in account
  accountIndicator: [
    '[data-automation-id="purchase-history"]',
    '[data-testid="order-card"]',
    '[data-automation-id="account-menu-signout"]',
  ],

  // Order history
  orderCard: '[data-testid="order-card"], [data-automation-id="order-card"], [data-testid^="order-"]',

  // Order details page
  invoice: [
    '[data-automation-id*="invoice"]',
    '[data-testid*="invoice"]',
    'button::-p-text(Print invoice)',
    'button::-p-text(Download invoice)',
    'a::-p-text(Print invoice)',
    'a::-p-text(Download invoice)',
    'button::-p-text(Invoice)',
    'a::-p-text(Invoice)',
  ],
};

const LOGIN_PATH = /\/account\/(login|signin)|identity\.walmart\.com/i;
const BLOCKED_PATH = /\/blocked|captcha/i;

/**
 * Raw order card as read from the order history page
 */
export interface RawOrderCard {
  text: string;
  href: string | null;
}

/**
 * Turn order cards into orders within [since, until]
 * Cards without an order number or a date are skipped.
 */
export function parseWalmartOrderCards(cards: RawOrderCard[], since: Date, until: Date): OrderSummary[] {
  const orders = new Map<string, OrderSummary>();

  for (const card of cards) {
    const orderId = card.href?.match(/\/orders\/(\d+)/)?.[1] ?? card.text.match(/Order\s*#\s*(\d{6,})/i)?.[1];
    const orderDate = parseOrderDate(card.text);
    if (!orderId || !orderDate) {
      AppLogger.debug(`[Walmart] Ignoring order card without number or date: ${card.text.slice(0, 80)}`);
      continue;
    }
    if (!isWithinRange(orderDate, since, until) || orders.has(orderId)) {
      continue;
    }
    orders.set(orderId, {
      orderId,
      orderDate,
      detailUrl: `${ORDER_DETAIL_BASE}${orderId}`,
    });
  }

  return [...orders.values()];
}

/**
 * Walmart vendor automation implementation
 */
export class WalmartVendor extends BaseVendor {
  portal = 'walmart' as const;
  portalName = 'Walmart';
  loginUrl = 'https://www.walmart.com/account/login';
  ordersUrl = 'https://www.walmart.com/orders';

  async submitCredentials(page: Page, credentials: PortalCredentials): Promise<void> {
    this.log('Submitting credentials');
    await this.openLoginPage(page);

    const emailInput = await this.firstExisting(page, SELECTORS.emailInput);
    if (!emailInput) {
      // Already signed in, or a challenge is shown before the form
      this.log('Login form not found', 'warn');
      return;
    }
    await this.typeWithDelay(page, emailInput, credentials.username);

    let passwordInput = await this.firstExisting(page, SELECTORS.passwordInput);
    if (!passwordInput) {
      const continueButton = await this.firstExisting(page, SELECTORS.continueButton);
      if (continueButton) {
        await this.clickAndWait(page, continueButton, false);
      }
      passwordInput = await this.firstExisting(page, SELECTORS.passwordInput);
    }
    if (!passwordInput) {
      this.log('Password field not shown, leaving the page to the login check', 'warn');
      return;
    }
    await this.typeWithDelay(page, passwordInput, credentials.password);

    const submit = await this.firstExisting(page, SELECTORS.submitButton);
    if (submit) {
      await this.clickAndWait(page, submit, false);
    } else {
      await page.keyboard.press('Enter');
      await this.wait(this.navigationWait);
    }
  }

  async detectLoginState(page: Page): Promise<LoginState> {
    const url = page.url();

    if (BLOCKED_PATH.test(url) || (await this.firstExisting(page, SELECTORS.challenge))) {
      return 'challenge';
    }

    if (LOGIN_PATH.test(url)) {
      const errorSelector = await this.firstExisting(page, SELECTORS.loginError);
      if (errorSelector) {
        const message = (await this.getTextContent(page, errorSelector))?.trim();
        if (message) {
          this.log(`Login error shown: ${message}`, 'warn');
          return 'credentials-rejected';
        }
      }
      return 'pending';
    }

    if (await this.firstExisting(page, SELECTORS.accountIndicator)) {
      return 'logged-in';
    }

    // Off the login pages on walmart.com without being redirected back
    return url.includes('walmart.com') ? 'logged-in' : 'pending';
  }

  async listOrders(page: Page, since: Date, until: Date): Promise<OrderSummary[]> {
    await this.navigateTo(page, this.ordersUrl);

    try {
      await this.waitForSelector(page, SELECTORS.orderCard, { visible: false });
    } catch {
      const text = await this.getPageText(page);
      if (/no (recent )?orders|haven't placed any orders/i.test(text)) {
        this.log('No orders on the account');
        return [];
      }
      throw new ExtractionError('Order list not found on the purchase history page');
    }

    const cards = await page.evaluate((selector: string) => {
      return Array.from(document.querySelectorAll(selector)).map(card => {
        const link = card.querySelector('a[href*="/orders/"]');
        return {
          text: (card.textContent || '').replace(/\s+/g, ' ').trim().slice(0, 500),
          href: link ? link.getAttribute('href') : null,
        };
      });
    }, SELECTORS.orderCard);

    const orders = parseWalmartOrderCards(cards, since, until);
    this.log(`Found ${orders.length} order(s) in range out of ${cards.length} card(s)`);
    return orders;
  }

  async fetchInvoice(page: Page, order: OrderSummary): Promise<DownloadedFile> {
    const filename = `invoice_${order.orderId}.pdf`;
    await this.navigateTo(page, order.detailUrl ?? `${ORDER_DETAIL_BASE}${order.orderId}`);

    const control = await this.firstExisting(page, SELECTORS.invoice);
    if (!control) {
      throw new ExtractionError(`No invoice control on order ${order.orderId}`);
    }
    this.log(`Invoice control found for order ${order.orderId}: ${control}`, 'debug');

    const captured = await this.interceptDownload(page, () => page.click(control));
    if (captured) {
      return { ...captured, filename };
    }

    this.log(`No PDF served for order ${order.orderId}, printing the page instead`, 'warn');
    return this.pageToPdf(page, filename);
  }
}
