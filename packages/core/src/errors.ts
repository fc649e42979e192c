/**
 * Error taxonomy
 *
 * - {@link PreconditionError}: programming errors that abort before a session starts
 * - {@link GenerationError} / {@link TokenizationError}: contained within a single turn
 * - {@link ConfigError}: invalid configuration, raised while loading
 *
 * Budget exhaustion and cancellation are normal termination, not errors.
 *
 * @module errors
 */

/**
 * Thrown when a caller violates an API precondition
 * (fewer than two participants, empty scheduler candidate set).
 */
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'PreconditionError'
  }
}

/**
 * A participant failed to produce a response. Recoverable: the turn is discarded.
 */
export class GenerationError extends Error {
  readonly participant: string

  constructor(participant: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause)
    super(`${participant} failed to generate a response: ${detail}`, { cause })
    this.name = 'GenerationError'
    this.participant = participant
  }
}

/**
 * The tokenizer could not count a text. Recoverable: handled like {@link GenerationError}.
 */
export class TokenizationError extends Error {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause)
    super(`Tokenization failed: ${detail}`, { cause })
    this.name = 'TokenizationError'
  }
}

export class ConfigError extends Error {
  readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

/**
 * Errors a turn recovers from by backing off and trying again.
 */
export function isTurnRecoverable(error: unknown): error is GenerationError | TokenizationError {
  return error instanceof GenerationError || error instanceof TokenizationError
}
