import { WAIT_DEFAULTS } from '../common/constants';
import { InvalidArgumentError } from '../common/errors';
import { getWebConfig, type WebConfig } from '../config/web.config';

/**
 * Timeouts applied while scanning a collection
 */
export interface WaitPolicy {
  /** Wait for index 0, in seconds */
  readonly firstTimeoutSeconds: number;
  /** Wait for every other index, in seconds */
  readonly otherTimeoutSeconds: number;
  readonly pollIntervalMs: number;
}

function checkNumber(field: string, value: number | undefined): void {
  if (value !== undefined && !Number.isFinite(value)) {
    throw new InvalidArgumentError(`${field} must be a finite number, got ${value}`);
  }
}

/**
 * Builds a frozen policy. Both timeouts are clamped to at least one second.
 */
export function createWaitPolicy(
  overrides: Partial<WaitPolicy> = {},
  config: WebConfig = getWebConfig(),
): WaitPolicy {
  checkNumber('firstTimeoutSeconds', overrides.firstTimeoutSeconds);
  checkNumber('otherTimeoutSeconds', overrides.otherTimeoutSeconds);
  checkNumber('pollIntervalMs', overrides.pollIntervalMs);

  return Object.freeze({
    firstTimeoutSeconds: Math.max(
      WAIT_DEFAULTS.MIN_TIMEOUT_SECONDS,
      overrides.firstTimeoutSeconds ?? config.defaultTimeoutSeconds,
    ),
    otherTimeoutSeconds: Math.max(
      WAIT_DEFAULTS.MIN_TIMEOUT_SECONDS,
      overrides.otherTimeoutSeconds ?? config.otherTimeoutSeconds,
    ),
    pollIntervalMs: Math.max(1, overrides.pollIntervalMs ?? config.pollIntervalMs),
  });
}
