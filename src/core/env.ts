/**
 * Environment Detection Utilities
 *
 * Reads NODE_ENV (and VITEST, set by the test runner) once per call.
 *
 * Environments are mutually exclusive:
 * - development: local play, verbose logging
 * - test: automated test runner (Vitest)
 * - production: quiet, errors only
 */

export type Environment = 'development' | 'test' | 'production'

/**
 * Get the current environment name.
 */
export function getEnvironment(): Environment {
  const env = typeof process !== 'undefined' ? process.env : {}

  // Test environment (checked first - highest priority)
  if (env.NODE_ENV === 'test' || env.VITEST === 'true') {
    return 'test'
  }

  if (env.NODE_ENV === 'production') {
    return 'production'
  }

  return 'development'
}

/** Check if running in test environment (Vitest). */
export function isTest(): boolean {
  return getEnvironment() === 'test'
}

/** Check if running in development environment. */
export function isDevelopment(): boolean {
  return getEnvironment() === 'development'
}

/** Check if running in production environment. */
export function isProduction(): boolean {
  return getEnvironment() === 'production'
}
