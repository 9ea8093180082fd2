// MARK: - Error Types
// Distinguishes the failures the engine reacts to from fatal ones

/**
 * The target message does not exist at the requested timestamp.
 * Surfaced verbatim to the requester.
 */
export class MessageNotFoundError extends Error {
  constructor(message = 'Message not found at that timestamp.') {
    super(message);
    this.name = 'MessageNotFoundError';
  }
}

/**
 * An API-level rejection on the direct reaction lookup.
 * Only this error triggers the message-body fallback.
 */
export class RecoverableApiError extends Error {
  readonly apiError: string;

  constructor(apiError: string, options?: { cause?: unknown }) {
    super(`Reaction lookup rejected: ${apiError}`, options);
    this.name = 'RecoverableApiError';
    this.apiError = apiError;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
