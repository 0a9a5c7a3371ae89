/**
 * Centralized error handling utilities
 */

export class AppError extends Error {
  code: string;
  statusCode?: number;
  isOperational: boolean;

  constructor(
    message: string,
    code: string,
    statusCode?: number,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
  }
}

/** Network failure or timeout; no HTTP response arrived. */
export class TransportError extends AppError {
  constructor(message: string) {
    super(message, 'TRANSPORT_ERROR');
    this.name = 'TransportError';
  }
}

/**
 * A well-formed response that signals failure: a non-2xx status, or a
 * 200 carrying `success: false`.
 */
export class ApiLogicError extends AppError {
  constructor(message: string, statusCode?: number) {
    super(message, 'API_LOGIC_ERROR', statusCode);
    this.name = 'ApiLogicError';
  }
}

/** Raised by the caller once the retry budget for one call is spent. */
export class ApiError extends AppError {
  context: string;
  lastMessage: string;
  attempts: number;
  lastError: AppError;

  constructor(context: string, lastError: AppError, attempts: number) {
    super(`${context} failed - ${lastError.message}`, 'API_ERROR', lastError.statusCode);
    this.name = 'ApiError';
    this.context = context;
    this.lastMessage = lastError.message;
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

export class NoProfilesError extends AppError {
  constructor(message: string) {
    super(message, 'NO_PROFILES');
    this.name = 'NoProfilesError';
  }
}

export class FileSystemError extends AppError {
  constructor(message: string) {
    super(message, 'FILESYSTEM_ERROR');
    this.name = 'FileSystemError';
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Replace every occurrence of a secret in a message. Used on anything
 * printed at the top level.
 */
export const redact = (message: string, secret?: string): string => {
  if (!secret) return message;
  return message.split(secret).join('<redacted>');
};

/**
 * User-facing explanation for a run-terminating failure, telling a bad
 * username, missing SkyBlock data and a service problem apart.
 */
export const describeFailure = (error: unknown, operation: string): string[] => {
  if (error instanceof NotFoundError) {
    return [
      error.message,
      'Make sure the username is spelled correctly and the player exists.'
    ];
  }

  if (error instanceof NoProfilesError) {
    return [
      error.message,
      'The player has never joined SkyBlock, or their profiles are not visible to the API.'
    ];
  }

  if (error instanceof ApiError) {
    const cause = error.lastError;
    if (cause.statusCode === 403) {
      return [error.message, 'The API key was rejected. Check it and try again.'];
    }
    if (cause instanceof TransportError || cause.statusCode === 429 || (cause.statusCode ?? 0) >= 500) {
      return [error.message, 'This looks like a network or service problem. Try again in a moment.'];
    }
    return [error.message];
  }

  if (error instanceof FileSystemError || error instanceof ConfigError) {
    return [error.message];
  }

  return [`${operation} failed: ${errorMessage(error)}`];
};
