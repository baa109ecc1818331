/**
 * Thrown by createGameConfig when an override is out of range.
 */
export class ConfigError extends Error {
  constructor(
    public readonly field: string,
    message: string
  ) {
    super(`Invalid game config "${field}": ${message}`)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when the frame loop is driven after it has been disposed.
 */
export class EngineError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'EngineError'
  }
}
