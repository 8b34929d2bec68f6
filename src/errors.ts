/**
 * Error types raised by the conversion pipeline.
 * Every fatal failure surfaces as a ConversionError; unreadable images never do.
 */

export class ConversionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * Bad invocation: missing input or an input without the .md extension.
 */
export class UsageError extends ConversionError {}

export class InputReadError extends ConversionError {
  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(`failed to read input file: ${describeError(cause)}`, { cause })
  }
}

export class OutputWriteError extends ConversionError {
  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(`failed to write output file: ${describeError(cause)}`, { cause })
  }
}

/**
 * Message text of an unknown thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
