/**
 * Error handling utilities
 */

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Normalize a thrown value into an Error instance */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * A progress handle was used against the wrong registry, or after the
 * output coordinator was shut down. Indicates a lifetime bug in the caller.
 */
export class InvalidHandleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidHandleError';
  }
}

/** A prompt was requested while the prompt policy forbids prompting */
export class PromptNotAllowedError extends Error {
  constructor(readonly promptText: string) {
    super(`prompt not allowed in non-interactive mode: ${promptText}`);
    this.name = 'PromptNotAllowedError';
  }
}

/** Configuration file or environment override could not be used */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
