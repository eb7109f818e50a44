/** Indicates a configuration problem detected while constructing a client. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/**
 * Indicates a response body that was declared as JSON for a known status
 * but could not be parsed, or did not have the documented shape.
 */
export class ResponseDecodeError extends Error {
  readonly statusCode: number

  constructor(message: string, statusCode: number, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ResponseDecodeError'
    this.statusCode = statusCode
  }
}
