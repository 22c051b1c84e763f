/** Malformed or inconsistent group/sample/well declarations. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(`Configuration Error: ${message}`)
    this.name = 'ConfigurationError'
  }
}

export class TimeFormatError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'TimeFormatError'
  }
}

export class TimeLengthError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'TimeLengthError'
  }
}

/** Unreadable or unwritable data/summary/layout file; `cause` keeps the underlying error. */
export class IOError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'IOError'
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}
