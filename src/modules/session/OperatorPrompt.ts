/**
 * Waiting on the operator during manual login
 */

import * as readlineSync from 'readline-sync';
import { sleep } from '../../utils/retry';

export interface OperatorWaitRequest {
  /** Banner title, e.g. "Walmart login for Acme" */
  title: string;
  instructions: string[];
  /** Whether the operator's part is done */
  isComplete: () => Promise<boolean>;
  /** null waits until the operator confirms */
  deadline: Date | null;
}

export interface OperatorPrompt {
  /**
   * Block until the request completes; false when the deadline passed first
   */
  waitForOperator(request: OperatorWaitRequest): Promise<boolean>;
}

/**
 * Terminal prompt
 *
 * With a deadline the page is polled until it reports completion. Without one
 * the operator presses Enter when done, and the page is checked then.
 */
export class ConsoleOperatorPrompt implements OperatorPrompt {
  private readonly pollIntervalMs: number;

  constructor(pollIntervalMs: number = 2000) {
    this.pollIntervalMs = pollIntervalMs;
  }

  async waitForOperator(request: OperatorWaitRequest): Promise<boolean> {
    this.printBanner(request);

    if (request.deadline === null) {
      return this.waitForConfirmation(request);
    }
    return this.pollUntil(request, request.deadline);
  }

  private printBanner(request: OperatorWaitRequest): void {
    console.log('');
    console.log('='.repeat(60));
    console.log(`MANUAL ACTION REQUIRED: ${request.title}`);
    request.instructions.forEach((line, index) => console.log(`${index + 1}. ${line}`));
    if (request.deadline) {
      const seconds = Math.max(0, Math.round((request.deadline.getTime() - Date.now()) / 1000));
      console.log(`(You have ${seconds} seconds)`);
    }
    console.log('='.repeat(60));
    console.log('');
  }

  private async waitForConfirmation(request: OperatorWaitRequest): Promise<boolean> {
    for (;;) {
      readlineSync.question('Press Enter once you are logged in... ');
      if (await request.isComplete()) {
        return true;
      }
      console.log('The portal does not show a logged-in page yet.');
    }
  }

  private async pollUntil(request: OperatorWaitRequest, deadline: Date): Promise<boolean> {
    while (Date.now() < deadline.getTime()) {
      if (await request.isComplete()) {
        return true;
      }
      await sleep(this.pollIntervalMs);
    }
    return request.isComplete();
  }
}
