/**
 * Error taxonomy for collection runs
 *
 * Each error carries a code that the orchestrator records per cell, and a flag
 * telling the operator whether rerunning may succeed.
 */

export type ErrorCode =
  | 'CONFIGURATION'
  | 'AUTHENTICATION'
  | 'CHALLENGE_TIMEOUT'
  | 'TRANSIENT'
  | 'EXTRACTION';

export class CollectorError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;

  constructor(code: ErrorCode, message: string, retryable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.retryable = retryable;
  }
}

/** Missing or malformed configuration; reported before any work starts */
export class ConfigurationError extends CollectorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION', message, false, options);
  }
}

/** Credentials rejected by the mail server or portal */
export class AuthenticationError extends CollectorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('AUTHENTICATION', message, false, options);
  }
}

/** CAPTCHA / 2FA / manual login not completed before the deadline */
export class ChallengeTimeoutError extends CollectorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CHALLENGE_TIMEOUT', message, true, options);
  }
}

/** Network-level failure worth one more attempt */
export class TransientError extends CollectorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSIENT', message, true, options);
  }
}

/** A single attachment or invoice could not be extracted */
export class ExtractionError extends CollectorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EXTRACTION', message, false, options);
  }
}

export function isCollectorError(error: unknown): error is CollectorError {
  return error instanceof CollectorError;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
