/**
 * Amazon Vendor Implementation
 * Login and invoice download for amazon.com customer accounts
 *
 * Portal Information:
 * - Login URL: https://www.amazon.com/ap/signin (returns to the order history)
 * - Orders URL: https://www.amazon.com/gp/css/order-history
 *
 * Authentication Flow:
 * 1. Enter email, Continue
 * 2. Enter password, Sign in
 * 3. Image CAPTCHA, OTP or "verify it's you" (/ap/cvf, /ap/mfa) may follow
 *
 * Invoices are printed from the printable order summary page.
 */
import { Page } from 'puppeteer-core';
import { PortalCredentials } from '../types';
import { isWithinRange, parseOrderDate } from '../utils/dateUtils';
import { ExtractionError } from '../utils/errors';
import { AppLogger } from '../utils/logger';
import { BaseVendor } from './BaseVendor';
import { LoginState, OrderSummary, DownloadedFile } from './types';

const PRINT_INVOICE_URL = 'https://www.amazon.com/gp/css/summary/print.html?orderID=';

/** Order history pages visited per time filter */
const MAX_PAGES = 10;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Amazon-specific selectors
 */
const SELECTORS = {
  // Login page
  emailInput: '#ap_email',
  continueButton: '#continue',
  passwordInput: '#ap_password',
  signInButton: '#signInSubmit',
  loginError: '#auth-error-message-box',

  // CAPTCHA / 2FA
  challenge: [
    '#auth-captcha-image',
    '#captchacharacters',
    'form[action*="validateCaptcha"]',
    '#auth-mfa-otpcode',
    'input[name="cvf_captcha_input"]',
  ],

  // Order history
  ordersContainer: ['#ordersContainer', '.your-orders-content-container'],
  orderCard: '.order-card, .js-order-card',
  nextPage: '.a-pagination .a-last a',

  // Header greeting ("Hello, sign in" when signed out)
  accountGreeting: '#nav-link-accountList-nav-line-1',
};

const SIGNIN_PATH = /\/ap\/(signin|register)/;
const CHALLENGE_PATH = /\/ap\/(cvf|mfa|challenge)|\/errors\/validateCaptcha/;
const ORDER_ID = /\b((?:\d{3}|D\d{2})-\d{7}-\d{7})\b/;

/**
 * Order history time filters covering [since, now]
 * Ranges beyond three months are covered year by year.
 */
export function amazonTimeFilters(since: Date, now: Date = new Date()): string[] {
  const days = Math.ceil((now.getTime() - since.getTime()) / DAY_MS);
  if (days <= 30) {
    return ['last30'];
  }
  if (days <= 90) {
    return ['months-3'];
  }

  const filters: string[] = [];
  for (let year = now.getFullYear(); year >= since.getFullYear(); year--) {
    filters.push(`year-${year}`);
  }
  return filters;
}

/**
 * Turn order card texts into orders within [since, until]
 * The first date on a card is the order placement date.
 */
export function parseAmazonOrderCards(cards: string[], since: Date, until: Date): OrderSummary[] {
  const orders = new Map<string, OrderSummary>();

  for (const text of cards) {
    const orderId = text.match(ORDER_ID)?.[1];
    const orderDate = parseOrderDate(text);
    if (!orderId || !orderDate) {
      AppLogger.debug(`[Amazon] Ignoring order card without number or date: ${text.slice(0, 80)}`);
      continue;
    }
    if (isWithinRange(orderDate, since, until) && !orders.has(orderId)) {
      orders.set(orderId, { orderId, orderDate });
    }
  }

  return [...orders.values()];
}

/**
 * Amazon vendor automation implementation
 */
export class AmazonVendor extends BaseVendor {
  portal = 'amazon' as const;
  portalName = 'Amazon';
  loginUrl =
    'https://www.amazon.com/ap/signin?openid.pape.max_auth_age=0' +
    '&openid.return_to=https%3A%2F%2Fwww.amazon.com%2Fgp%2Fcss%2Forder-history' +
    '&openid.identity=http%3A%2F%2Fspecs.openid.net%2Fauth%2F2.0%2Fidentifier_select' +
    '&openid.assoc_handle=usflex&openid.mode=checkid_setup' +
    '&openid.claimed_id=http%3A%2F%2Fspecs.openid.net%2Fauth%2F2.0%2Fidentifier_select' +
    '&openid.ns=http%3A%2F%2Fspecs.openid.net%2Fauth%2F2.0';
  ordersUrl = 'https://www.amazon.com/gp/css/order-history';

  async submitCredentials(page: Page, credentials: PortalCredentials): Promise<void> {
    this.log('Submitting credentials');
    await this.openLoginPage(page);

    if (!(await this.elementExists(page, SELECTORS.emailInput))) {
      this.log('Email field not found', 'warn');
      return;
    }
    await this.typeWithDelay(page, SELECTORS.emailInput, credentials.username);

    // Email and password are on separate steps unless the account is remembered
    if (!(await this.elementExists(page, SELECTORS.passwordInput))) {
      await this.clickAndWait(page, SELECTORS.continueButton, false);
    }
    if (!(await this.elementExists(page, SELECTORS.passwordInput))) {
      this.log('Password field not shown, leaving the page to the login check', 'warn');
      return;
    }

    await this.typeWithDelay(page, SELECTORS.passwordInput, credentials.password);
    await this.clickAndWait(page, SELECTORS.signInButton, false);
  }

  async detectLoginState(page: Page): Promise<LoginState> {
    const url = page.url();

    if (CHALLENGE_PATH.test(url) || (await this.firstExisting(page, SELECTORS.challenge))) {
      return 'challenge';
    }

    if (SIGNIN_PATH.test(url)) {
      if (await this.elementExists(page, SELECTORS.loginError)) {
        const message = (await this.getTextContent(page, SELECTORS.loginError))?.trim() ?? '';
        this.log(`Login error shown: ${message.replace(/\s+/g, ' ')}`, 'warn');
        return 'credentials-rejected';
      }
      return 'pending';
    }

    if (await this.firstExisting(page, SELECTORS.ordersContainer)) {
      return 'logged-in';
    }

    const greeting = await this.getTextContent(page, SELECTORS.accountGreeting);
    if (greeting && !/sign in/i.test(greeting)) {
      return 'logged-in';
    }
    return 'pending';
  }

  async listOrders(page: Page, since: Date, until: Date): Promise<OrderSummary[]> {
    const found = new Map<string, OrderSummary>();

    for (const filter of amazonTimeFilters(since)) {
      await this.navigateTo(page, `${this.ordersUrl}?timeFilter=${filter}`);
      if (!(await this.firstExisting(page, SELECTORS.ordersContainer))) {
        throw new ExtractionError(`Order history not shown for filter ${filter}`);
      }

      for (let pageNumber = 1; pageNumber <= MAX_PAGES; pageNumber++) {
        const cards = await page.$$eval(SELECTORS.orderCard, elements =>
          elements.map(el => (el.textContent || '').replace(/\s+/g, ' ').trim())
        );
        for (const order of parseAmazonOrderCards(cards, since, until)) {
          if (!found.has(order.orderId)) {
            found.set(order.orderId, order);
          }
        }
        this.log(`Filter ${filter}, page ${pageNumber}: ${cards.length} card(s)`, 'debug');

        const next = await page.$$eval(SELECTORS.nextPage, links =>
          links.length > 0 ? links[0].getAttribute('href') : null
        );
        if (!next) {
          break;
        }
        await this.navigateTo(page, new URL(next, this.ordersUrl).toString());
      }
    }

    const orders = [...found.values()];
    this.log(`Found ${orders.length} order(s) in range`);
    return orders;
  }

  async fetchInvoice(page: Page, order: OrderSummary): Promise<DownloadedFile> {
    await this.navigateTo(page, `${PRINT_INVOICE_URL}${encodeURIComponent(order.orderId)}`);

    if (SIGNIN_PATH.test(page.url())) {
      throw new ExtractionError(`Redirected to sign-in while opening the invoice of order ${order.orderId}`);
    }

    const text = await this.getPageText(page);
    if (!text.includes(order.orderId)) {
      throw new ExtractionError(`Invoice page does not show order ${order.orderId}`);
    }

    return this.pageToPdf(page, `invoice_${order.orderId}.pdf`);
  }
}
