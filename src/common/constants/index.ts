/**
 * Central export for all library constants
 */

export * from './timeouts.constants';
