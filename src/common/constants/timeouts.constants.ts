/**
 * Wait and navigation defaults used across collections and tables
 * Overridable through the WEB_* environment variables (see config/web.config.ts)
 */

export const WAIT_DEFAULTS = {
  // Element waits (in seconds)
  FIRST_ELEMENT_TIMEOUT_SECONDS: 10, // initial render of a list or table
  OTHER_ELEMENT_TIMEOUT_SECONDS: 1, // siblings of an already rendered element
  MIN_TIMEOUT_SECONDS: 1,

  // Polling
  POLL_INTERVAL_MS: 100,

  // Pagination
  MAX_PAGE_ITERATIONS: 100,
  PAGE_CHANGE_TIMEOUT_MS: 1000, // how long a click may take to change the page token
} as const;
