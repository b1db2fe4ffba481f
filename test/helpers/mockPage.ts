/**
 * Puppeteer Page stand-in driven by a small mutable state
 */
import { Page } from 'puppeteer-core';

export interface MockPageState {
  url: string;
  /** Selectors that resolve to an element */
  selectors: Set<string>;
  /** textContent by selector */
  texts: Map<string, string>;
  /** Where goto(url) ends up, for redirects */
  redirects: Map<string, string>;
}

export interface FakeResponse {
  url(): string;
  headers(): Record<string, string>;
  buffer(): Promise<Buffer>;
}

function timeoutError(selector: string): Error {
  const error = new Error(`Waiting for selector \`${selector}\` failed`);
  error.name = 'TimeoutError';
  return error;
}

export function createMockPage(url = 'about:blank') {
  const state: MockPageState = {
    url,
    selectors: new Set<string>(),
    texts: new Map<string, string>(),
    redirects: new Map<string, string>(),
  };
  const responseHandlers = new Set<(response: FakeResponse) => void>();

  const mock = {
    goto: jest.fn(async (target: string) => {
      state.url = state.redirects.get(target) ?? target;
      return null;
    }),
    url: jest.fn(() => state.url),
    $: jest.fn(async (selector: string) => (state.selectors.has(selector) ? {} : null)),
    $eval: jest.fn(async (selector: string) => {
      const text = state.texts.get(selector);
      if (text === undefined) {
        throw new Error(`Error: failed to find element matching selector "${selector}"`);
      }
      return text;
    }),
    $$eval: jest.fn(async (): Promise<unknown> => []),
    evaluate: jest.fn(async (): Promise<unknown> => ''),
    waitForSelector: jest.fn(async (selector: string) => {
      if (!state.selectors.has(selector)) {
        throw timeoutError(selector);
      }
      return {};
    }),
    waitForNavigation: jest.fn(async () => null),
    type: jest.fn(async () => undefined),
    click: jest.fn(async () => undefined),
    keyboard: { press: jest.fn(async () => undefined) },
    pdf: jest.fn(async () => Buffer.from('%PDF-1.7 printed page')),
    screenshot: jest.fn(async () => Buffer.from('png-bytes')),
    cookies: jest.fn(async (): Promise<unknown[]> => []),
    setCookie: jest.fn(async () => undefined),
    on: jest.fn((event: string, handler: (response: FakeResponse) => void) => {
      if (event === 'response') responseHandlers.add(handler);
    }),
    off: jest.fn((event: string, handler: (response: FakeResponse) => void) => {
      if (event === 'response') responseHandlers.delete(handler);
    }),
  };

  /** Deliver a network response to the registered listeners */
  const emitResponse = (response: FakeResponse) => {
    responseHandlers.forEach(handler => handler(response));
  };

  return {
    page: mock as unknown as Page,
    mock,
    state,
    emitResponse,
    listenerCount: () => responseHandlers.size,
  };
}
