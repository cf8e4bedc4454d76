/**
 * Error taxonomy
 *
 * Degenerate (empty) input is not an error: the statistical tests return an
 * inapplicable result for it instead of throwing.
 */

export type QrngErrorCode = 'SOURCE_UNAVAILABLE' | 'INVALID_PARAMETER' | 'EXTRACTION_STALLED'

export class QrngError extends Error {
  readonly code: QrngErrorCode

  constructor(code: QrngErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

/** Raw-bit acquisition failed. Propagated as-is, never retried here. */
export class SourceUnavailableError extends QrngError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SOURCE_UNAVAILABLE', message, options)
  }
}

/** Rejected before any work begins */
export class InvalidParameterError extends QrngError {
  constructor(message: string) {
    super('INVALID_PARAMETER', message)
  }
}

/** Adaptive extraction exceeded its iteration bound */
export class ExtractionStalledError extends QrngError {
  readonly iterations: number
  readonly extractedLength: number

  constructor(iterations: number, extractedLength: number, target: number) {
    super(
      'EXTRACTION_STALLED',
      `Extraction stalled after ${iterations} iterations (${extractedLength}/${target} bits)`,
    )
    this.iterations = iterations
    this.extractedLength = extractedLength
  }
}

/** Throw unless `n` is an integer >= min */
export function requireInteger(name: string, n: number, min = 0): void {
  if (!Number.isInteger(n) || n < min) {
    throw new InvalidParameterError(`${name} must be an integer >= ${min}, got ${n}`)
  }
}
