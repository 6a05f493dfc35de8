/**
 * Error hierarchy for the Shopline CLI
 *
 * Provides categorized errors with:
 * - Error codes for tracking
 * - Process exit codes for the CLI entry point
 * - Optional structured context for debug logging
 */

import { logger } from './logger.js';

let isExiting = false;

const onUncaughtException = (error: unknown) => {
  const cliError = toCliError(error);
  shutdownWithError(`Fatal error: ${getUserMessage(cliError)}`);
};

const onUnhandledRejection = (reason: unknown) => {
  shutdownWithError(`Unhandled error: ${getUserMessage(toCliError(reason))}`);
};

function shutdownWithError(message: string): void {
  logger.error(message, { exitReason: 'fatal' });
  if (isExiting) {
    return;
  }
  isExiting = true;
  process.exitCode = 1;
  setImmediate(() => {
    process.exit(1);
  });
}

/**
 * Base error class for all CLI errors
 */
export class CliError extends Error {
  readonly code: string;
  readonly exitCode: number;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, exitCode: number = 1, context?: Record<string, unknown>) {
    super(message);
    this.name = 'CliError';
    this.code = code;
    this.exitCode = exitCode;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to JSON-serializable object
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      exitCode: this.exitCode,
      ...(this.context && { context: this.context }),
    };
  }
}

/**
 * Validation errors - bad input data or conflicting flags
 */
export class ValidationError extends CliError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 2, context);
    this.name = 'ValidationError';
  }
}

/**
 * Configuration errors - missing or invalid config
 */
export class ConfigurationError extends CliError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', 1, context);
    this.name = 'ConfigurationError';
  }
}

export class AuthenticationError extends CliError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'AUTH_ERROR', 1, context);
    this.name = 'AuthenticationError';
  }
}

export class AuthorizationError extends CliError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'FORBIDDEN', 1, context);
    this.name = 'AuthorizationError';
  }
}

/**
 * Not found errors - API resource doesn't exist
 */
export class NotFoundError extends CliError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', 1, context);
    this.name = 'NotFoundError';
  }
}

export class RateLimitError extends CliError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'RATE_LIMIT', 1, context);
    this.name = 'RateLimitError';
  }
}

/**
 * Network errors - connection failures
 */
export class NetworkError extends CliError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', 1, context);
    this.name = 'NetworkError';
  }
}

export class TimeoutError extends CliError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'TIMEOUT', 1, context);
    this.name = 'TimeoutError';
  }
}

export class ServiceUnavailableError extends CliError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'SERVICE_UNAVAILABLE', 1, context);
    this.name = 'ServiceUnavailableError';
  }
}

/**
 * Internal errors - unexpected failures
 */
export class InternalError extends CliError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INTERNAL_ERROR', 1, context);
    this.name = 'InternalError';
  }
}

/**
 * No configured profile matches the requested store token
 */
export class ProfileNotFoundError extends CliError {
  readonly requested: string;

  constructor(requested: string) {
    super(
      `profile not found: ${requested}; run 'spl auth ls' to list profiles or 'spl auth login' to add one`,
      'PROFILE_NOT_FOUND',
      1,
      { requested },
    );
    this.name = 'ProfileNotFoundError';
    this.requested = requested;
  }
}

export const MAX_AMBIGUOUS_CANDIDATES = 5;

/**
 * More than one configured profile matches the requested store token
 */
export class AmbiguousProfileError extends CliError {
  readonly requested: string;
  readonly candidates: string[];

  constructor(requested: string, candidates: string[]) {
    const shown = candidates.slice(0, MAX_AMBIGUOUS_CANDIDATES);
    super(
      `profile not found: ${requested} (multiple matches: ${shown.join(', ')}); ` +
        "use --store with an exact profile name and run 'spl auth ls' to list profiles or 'spl auth login' to add one",
      'PROFILE_AMBIGUOUS',
      1,
      { requested, candidates: shown },
    );
    this.name = 'AmbiguousProfileError';
    this.requested = requested;
    this.candidates = shown;
  }
}

/**
 * The credential backend itself could not be opened or read
 */
export class CredentialStoreError extends CliError {
  constructor(cause: string, context?: Record<string, unknown>) {
    super(`failed to open credential store: ${cause}`, 'CREDENTIAL_STORE', 1, context);
    this.name = 'CredentialStoreError';
  }
}

// ============================================================================
// Error Classification Helpers
// ============================================================================

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

/**
 * Convert unknown error to CliError
 */
export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }

  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    if (code && ['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'ENOTFOUND'].includes(code)) {
      return new NetworkError(error.message, { originalCode: code });
    }
    return new InternalError(error.message);
  }

  return new InternalError(String(error));
}

/**
 * Install global process error handlers for uncaught exceptions
 * and unhandled promise rejections. Call once at startup.
 */
export function installGlobalErrorHandlers(): void {
  if (!process.listeners('uncaughtException').includes(onUncaughtException)) {
    process.on('uncaughtException', onUncaughtException);
  }
  if (!process.listeners('unhandledRejection').includes(onUnhandledRejection)) {
    process.on('unhandledRejection', onUnhandledRejection);
  }
}

/**
 * Get user-friendly error message
 */
export function getUserMessage(error: unknown): string {
  if (error instanceof CliError) {
    switch (error.code) {
      case 'AUTH_ERROR':
        return `Authentication failed: ${error.message}. Check the access token or run \`spl auth login\`.`;
      case 'FORBIDDEN':
        return `You do not have permission to perform this action: ${error.message}`;
      case 'RATE_LIMIT':
        return 'Too many requests. Please wait a moment and try again.';
      case 'NETWORK_ERROR':
        return `Unable to reach the Shopline API: ${error.message}`;
      case 'TIMEOUT':
        return `The request timed out: ${error.message}`;
      case 'CONFIG_ERROR':
        return `Configuration error: ${error.message}`;
      case 'VALIDATION_ERROR':
        return `Invalid input: ${error.message}`;
      default:
        return error.message;
    }
  }

  if (error instanceof Error) {
    return error.message;
  }

  return 'An unexpected error occurred.';
}
