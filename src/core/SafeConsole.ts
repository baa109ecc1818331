/**
 * SafeConsole - Development-only logging
 *
 * Outside development, log/info/debug/warn calls are no-ops.
 * Errors always reach the console.
 *
 * Call through the SafeConsole object (not the bare functions) from game
 * code so tests can spy on individual levels.
 */

import { isDevelopment } from './env.ts'

/**
 * Log message (dev only)
 */
export function log(...args: unknown[]): void {
  if (isDevelopment()) {
    console.log(...args)
  }
}

/**
 * Warning message (dev only)
 */
export function warn(...args: unknown[]): void {
  if (isDevelopment()) {
    console.warn(...args)
  }
}

/**
 * Error message (always logs)
 */
export function error(...args: unknown[]): void {
  console.error(...args)
}

/**
 * Info message (dev only)
 */
export function info(...args: unknown[]): void {
  if (isDevelopment()) {
    console.info(...args)
  }
}

/**
 * Debug message (dev only)
 */
export function debug(...args: unknown[]): void {
  if (isDevelopment()) {
    console.debug(...args)
  }
}

export const SafeConsole = {
  log,
  warn,
  error,
  info,
  debug,
}
