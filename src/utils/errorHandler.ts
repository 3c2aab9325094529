/**
 * @fileOverview: Centralized error handling for the query service
 * @module: ErrorHandler
 * @keyFunctions:
 *   - createError(): Normalize any thrown value into a ServiceError record
 *   - handleError(): Log an error at the chosen level and optionally rethrow
 *   - toHttpStatus(): Map an error code onto the HTTP status the server answers with
 * @dependencies:
 *   - logger: Logging utilities for error tracking
 * @context: Recovery is local wherever a fallback exists (parse, generation, retrieval); the codes here name the failures that survive to a response or to the process boundary
 */

import { logger } from './logger';

export enum ErrorCode {
  // Configuration errors
  MISSING_CONFIG = 'MISSING_CONFIG',
  INVALID_CONFIG = 'INVALID_CONFIG',

  // Request validation
  VALIDATION_ERROR = 'VALIDATION_ERROR',

  // Generation errors
  GENERATION_FAILED = 'GENERATION_FAILED',
  GENERATION_TIMEOUT = 'GENERATION_TIMEOUT',
  RATE_LIMIT_ERROR = 'RATE_LIMIT_ERROR',
  NETWORK_ERROR = 'NETWORK_ERROR',
  PARSE_FAILED = 'PARSE_FAILED',

  // Retrieval / index errors
  RETRIEVAL_FAILED = 'RETRIEVAL_FAILED',
  INDEX_ERROR = 'INDEX_ERROR',

  // Patch errors
  PATCH_FAILED = 'PATCH_FAILED',
  APPLY_DISABLED = 'APPLY_DISABLED',

  // Generic errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export interface ServiceError {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  originalError?: Error;
  timestamp?: string;
  context?: Record<string, unknown>;
}

export interface ErrorHandlingOptions {
  logLevel?: 'error' | 'warn' | 'info';
  includeStack?: boolean;
  includeContext?: boolean;
  rethrow?: boolean;
}

export class RepoQueryError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;
  public readonly context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RepoQueryError';
    this.code = code;
    this.details = details;
    this.context = context;
  }
}

export class ValidationError extends RepoQueryError {
  public readonly field: string;

  constructor(field: string, message: string, context?: Record<string, unknown>) {
    super(ErrorCode.VALIDATION_ERROR, `Validation error for ${field}: ${message}`, { field }, context);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export class GenerationError extends RepoQueryError {
  public readonly role: string;

  constructor(code: ErrorCode, role: string, message: string, details?: Record<string, unknown>) {
    super(code, message, { role, ...details });
    this.name = 'GenerationError';
    this.role = role;
  }
}

export class PatchError extends RepoQueryError {
  public readonly exitCode: number | null;
  public readonly output: string;

  constructor(message: string, exitCode: number | null, output: string) {
    super(ErrorCode.PATCH_FAILED, message, { exitCode, output });
    this.name = 'PatchError';
    this.exitCode = exitCode;
    this.output = output;
  }
}

const HTTP_STATUS: Partial<Record<ErrorCode, number>> = {
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.APPLY_DISABLED]: 403,
  [ErrorCode.PATCH_FAILED]: 422,
  [ErrorCode.RATE_LIMIT_ERROR]: 429,
  [ErrorCode.GENERATION_FAILED]: 502,
  [ErrorCode.RETRIEVAL_FAILED]: 503,
  [ErrorCode.INDEX_ERROR]: 503,
  [ErrorCode.GENERATION_TIMEOUT]: 504,
};

function fromMessage(
  code: ErrorCode,
  message: string,
  error: Error,
  timestamp: string,
  context?: Record<string, unknown>
): ServiceError {
  return {
    code,
    message,
    details: { originalError: error.message },
    originalError: error,
    timestamp,
    context,
  };
}

export class ErrorHandler {
  /**
   * Create a standardized error record from any thrown value
   */
  static createError(error: unknown, context?: Record<string, unknown>): ServiceError {
    const timestamp = new Date().toISOString();

    if (error instanceof RepoQueryError) {
      return {
        code: error.code,
        message: error.message,
        details: error.details,
        originalError: error,
        timestamp,
        context: { ...error.context, ...context },
      };
    }

    if (error instanceof Error) {
      const msg = error.message;

      if (msg.includes('OPENAI_API_KEY')) {
        return fromMessage(
          ErrorCode.MISSING_CONFIG,
          'Required configuration is missing. Please check environment variables.',
          error,
          timestamp,
          context
        );
      }
      if (msg.includes('ECONNREFUSED') || msg.toLowerCase().includes('network')) {
        return fromMessage(ErrorCode.NETWORK_ERROR, 'Network connection failed', error, timestamp, context);
      }
      if (msg.toLowerCase().includes('timeout') || msg.toLowerCase().includes('timed out')) {
        return fromMessage(ErrorCode.GENERATION_TIMEOUT, 'Operation timed out', error, timestamp, context);
      }
      if (msg.toLowerCase().includes('rate limit') || msg.includes('429')) {
        return fromMessage(
          ErrorCode.RATE_LIMIT_ERROR,
          'Rate limit exceeded, please try again later',
          error,
          timestamp,
          context
        );
      }
      if (error instanceof SyntaxError) {
        return fromMessage(ErrorCode.PARSE_FAILED, 'Malformed structured output', error, timestamp, context);
      }

      return fromMessage(ErrorCode.INTERNAL_ERROR, 'An internal error occurred', error, timestamp, context);
    }

    return {
      code: ErrorCode.UNKNOWN_ERROR,
      message: 'An unknown error occurred',
      details: { error: String(error) },
      timestamp,
      context,
    };
  }

  /**
   * Log an error and rethrow it unless told otherwise
   */
  static handleError(
    error: unknown,
    context?: Record<string, unknown>,
    options: ErrorHandlingOptions = {}
  ): ServiceError {
    const {
      logLevel = 'error',
      includeStack = true,
      includeContext = true,
      rethrow = true,
    } = options;

    const serviceError = ErrorHandler.createError(error, context);

    const logContext = {
      code: serviceError.code,
      ...(includeContext && serviceError.context),
      ...(includeStack &&
        serviceError.originalError?.stack && { stack: serviceError.originalError.stack }),
    };

    switch (logLevel) {
      case 'warn':
        logger.warn(serviceError.message, logContext);
        break;
      case 'info':
        logger.info(serviceError.message, logContext);
        break;
      default:
        logger.error(serviceError.message, logContext);
    }

    if (rethrow) {
      if (error instanceof Error) {
        throw error;
      }
      throw new RepoQueryError(
        serviceError.code,
        serviceError.message,
        serviceError.details,
        serviceError.context
      );
    }

    return serviceError;
  }

  static toHttpStatus(code: ErrorCode): number {
    return HTTP_STATUS[code] ?? 500;
  }
}

