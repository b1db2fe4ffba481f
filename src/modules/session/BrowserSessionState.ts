/**
 * Capture and restore of browser session state
 */

import { Page } from 'puppeteer-core';
import { z } from 'zod';
import { ExtractionError } from '../../utils/errors';

/**
 * Turns a logged-in page into an opaque blob and back
 */
export interface SessionStateAdapter {
  capture(page: Page): Promise<string>;
  /**
   * @throws ExtractionError when the blob cannot be decoded
   */
  restore(page: Page, state: string): Promise<void>;
}

const cookieSchema = z.object({
  name: z.string(),
  value: z.string(),
  domain: z.string().optional(),
  path: z.string().optional(),
  expires: z.number().optional(),
  httpOnly: z.boolean().optional(),
  secure: z.boolean().optional(),
  sameSite: z.enum(['Strict', 'Lax', 'None']).optional(),
});

const cookieStateSchema = z.object({
  version: z.literal(1),
  cookies: z.array(cookieSchema),
});

type StoredCookie = z.infer<typeof cookieSchema>;

/**
 * Session state as the page's cookies
 */
export class CookieSessionState implements SessionStateAdapter {
  async capture(page: Page): Promise<string> {
    const cookies = await page.cookies();
    const stored: StoredCookie[] = cookies.map(cookie => ({
      name: cookie.name,
      value: cookie.value,
      domain: cookie.domain,
      path: cookie.path,
      // Session cookies report -1
      ...(cookie.expires > 0 ? { expires: cookie.expires } : {}),
      httpOnly: cookie.httpOnly,
      secure: cookie.secure,
      ...(cookie.sameSite ? { sameSite: cookie.sameSite } : {}),
    }));

    return JSON.stringify({ version: 1, cookies: stored });
  }

  async restore(page: Page, state: string): Promise<void> {
    let json: unknown;
    try {
      json = JSON.parse(state);
    } catch (error) {
      throw new ExtractionError('Stored session is not valid JSON', { cause: error });
    }

    const parsed = cookieStateSchema.safeParse(json);
    if (!parsed.success) {
      throw new ExtractionError(`Stored session has an unexpected shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    if (parsed.data.cookies.length > 0) {
      await page.setCookie(...parsed.data.cookies);
    }
  }
}
