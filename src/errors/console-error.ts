/**
 * Console Error - Base error class for Feeder Console
 */

import {
  ErrorCategory,
  ErrorCode,
  getErrorCategory,
  getErrorMessage,
  getRemediationHint,
} from './error-codes';

/**
 * Base error class for Feeder Console
 */
export class ConsoleError extends Error {
  public readonly code: ErrorCode;
  public readonly category: ErrorCategory;
  public readonly context?: string;
  public readonly hint: string;
  public readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, context?: string, details?: Record<string, unknown>) {
    const baseMessage = getErrorMessage(code);
    const fullMessage = context
      ? `[${code}] ${baseMessage}: ${context}`
      : `[${code}] ${baseMessage}`;

    super(fullMessage);
    this.name = 'ConsoleError';
    this.code = code;
    this.category = getErrorCategory(code);
    this.context = context;
    this.hint = getRemediationHint(code);
    this.details = details;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, ConsoleError.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConsoleError);
    }
  }
}

/**
 * Check whether an unknown thrown value is a ConsoleError with the given code
 */
export function isConsoleError(error: unknown, code?: ErrorCode): error is ConsoleError {
  if (!(error instanceof ConsoleError)) {
    return false;
  }
  return code === undefined || error.code === code;
}

/**
 * Normalize any thrown value to an Error message
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
