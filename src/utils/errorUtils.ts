/**
 * Error Utilities
 *
 * Helpers for type-safe handling of `unknown` errors, plus the error type
 * raised by the agent framework itself.
 */

export const FrameworkErrorCodes = {
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
  MISSING_FIELD: 'MISSING_FIELD',
  TOKEN_INVALID: 'TOKEN_INVALID',
} as const;

export type FrameworkErrorCode = typeof FrameworkErrorCodes[keyof typeof FrameworkErrorCodes];

export class AgentFrameworkError extends Error {
  readonly code: FrameworkErrorCode;

  constructor(code: FrameworkErrorCode, message: string) {
    super(message);
    this.name = 'AgentFrameworkError';
    this.code = code;
  }
}

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

/**
 * Ensure error is an Error instance
 */
export function ensureError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(getErrorMessage(error));
}
