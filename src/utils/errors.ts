import { DevshellError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes for the devshell CLI
 */

export class UnknownPlatformError extends DevshellError {
  constructor(platform: string) {
    super(
      `Unknown platform '${platform}': expected one of macos, linux, other`,
      ErrorCodes.UNKNOWN_PLATFORM,
      { platform }
    );
    this.name = 'UnknownPlatformError';
  }
}

export class MissingTemplateSourceError extends DevshellError {
  constructor(rule: string, source: string) {
    super(
      `Rule '${rule}' references '${source}', which is not resolved by an earlier rule`,
      ErrorCodes.MISSING_TEMPLATE_SOURCE,
      { rule, source }
    );
    this.name = 'MissingTemplateSourceError';
  }
}

export class UnresolvedExternalDependencyError extends DevshellError {
  constructor(dependency: string, repository: string) {
    super(
      `Dependency '${dependency}' could not be located in ${repository}`,
      ErrorCodes.UNRESOLVED_EXTERNAL_DEPENDENCY,
      { dependency, repository }
    );
    this.name = 'UnresolvedExternalDependencyError';
  }
}

export class FileSystemError extends DevshellError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
  }
}

export class ValidationError extends DevshellError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
  }
}

export class ConfigError extends DevshellError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
  }
}

export class UserCancellationError extends Error {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancellationError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof DevshellError) {
    // Details only surface in verbose mode
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      if (error instanceof UserCancellationError) {
        process.exit(0);
      }

      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
