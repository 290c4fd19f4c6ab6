/**
 * Error types raised by locators, collections and tables.
 *
 * Navigation failures and wait timeouts are not errors: they resolve to false.
 * Faults raised by the automation engine are never wrapped in these types.
 */

export class WebAutomationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WebAutomationError';
  }
}

/**
 * A locator was built from a blank value or chained across locator families.
 */
export class InvalidLocatorError extends WebAutomationError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidLocatorError';
  }
}

export class InvalidArgumentError extends WebAutomationError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Raised by an iterator's next() once there is no record to return.
 */
export class NoSuchElementError extends WebAutomationError {
  constructor(message = 'No more records') {
    super(message);
    this.name = 'NoSuchElementError';
  }
}

export class UnsupportedOperationError extends WebAutomationError {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedOperationError';
  }
}

export function isWebAutomationError(error: unknown): error is WebAutomationError {
  return error instanceof WebAutomationError;
}
