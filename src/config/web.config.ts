/**
 * Environment Configuration for collections and tables
 *
 * Centralizes all environment variable access with validation and defaults.
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { WAIT_DEFAULTS } from '../common/constants';
import { InvalidArgumentError } from '../common/errors';

// Load environment variables
dotenv.config();

const webEnvSchema = z.object({
  WEB_DEFAULT_TIMEOUT_SECONDS: z.coerce
    .number()
    .int()
    .min(0)
    .default(WAIT_DEFAULTS.FIRST_ELEMENT_TIMEOUT_SECONDS),
  WEB_OTHER_TIMEOUT_SECONDS: z.coerce
    .number()
    .int()
    .min(0)
    .default(WAIT_DEFAULTS.OTHER_ELEMENT_TIMEOUT_SECONDS),
  WEB_POLL_INTERVAL_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(WAIT_DEFAULTS.POLL_INTERVAL_MS),
  WEB_MAX_PAGE_ITERATIONS: z.coerce
    .number()
    .int()
    .positive()
    .default(WAIT_DEFAULTS.MAX_PAGE_ITERATIONS),
  WEB_PAGE_CHANGE_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .min(0)
    .default(WAIT_DEFAULTS.PAGE_CHANGE_TIMEOUT_MS),
});

export interface WebConfig {
  /** Wait for the first element of a collection, in seconds */
  defaultTimeoutSeconds: number;
  /** Wait for every following element, in seconds */
  otherTimeoutSeconds: number;
  pollIntervalMs: number;
  maxPageIterations: number;
  /** How long a navigation click may take to change the page token */
  pageChangeTimeoutMs: number;
}

/**
 * Validates the WEB_* variables of `env`. Empty strings count as unset.
 */
export function loadWebConfig(
  env: Record<string, string | undefined> = process.env,
): WebConfig {
  const raw = Object.fromEntries(
    Object.keys(webEnvSchema.shape).map((key) => {
      const value = env[key];
      return [key, value === undefined || value.trim() === '' ? undefined : value];
    }),
  );

  const parsed = webEnvSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new InvalidArgumentError(`Invalid web configuration: ${details}`);
  }

  return {
    defaultTimeoutSeconds: parsed.data.WEB_DEFAULT_TIMEOUT_SECONDS,
    otherTimeoutSeconds: parsed.data.WEB_OTHER_TIMEOUT_SECONDS,
    pollIntervalMs: parsed.data.WEB_POLL_INTERVAL_MS,
    maxPageIterations: parsed.data.WEB_MAX_PAGE_ITERATIONS,
    pageChangeTimeoutMs: parsed.data.WEB_PAGE_CHANGE_TIMEOUT_MS,
  };
}

let cachedConfig: WebConfig | undefined;

/**
 * Process-wide configuration, read once on first use
 */
export function getWebConfig(): WebConfig {
  if (!cachedConfig) {
    cachedConfig = loadWebConfig();
  }
  return cachedConfig;
}

export function resetWebConfig(): void {
  cachedConfig = undefined;
}
