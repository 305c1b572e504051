/**
 * Error Handling Utilities
 *
 * Standardized handling for catch blocks: unknown → message / log object,
 * and unknown → FetchResult failure for the market data boundary.
 */

import { FetchResult } from '../types';

/**
 * Extract error message from unknown error object
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error === null || error === undefined) {
    return 'Unknown error (null/undefined)';
  }
  if (typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

/**
 * Create standardized error log object for LoggerService
 */
export function createErrorLogObject(error: unknown): {
  errorMessage: string;
  errorType?: string;
  stack?: string;
} {
  if (error instanceof Error) {
    return {
      errorMessage: error.message,
      errorType: error.constructor.name,
      stack: error.stack,
    };
  }

  let errorType: string | undefined;
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    errorType = `Error(${error.code})`;
  }

  return { errorMessage: getErrorMessage(error), errorType };
}

/**
 * Failed fetch result from a caught error
 */
export function toFetchError<T>(error: unknown): FetchResult<T> {
  return { ok: false, reason: 'ERROR', error: getErrorMessage(error) };
}

/**
 * Empty fetch result (endpoint answered, nothing to analyze)
 */
export function emptyResult<T>(detail?: string): FetchResult<T> {
  return { ok: false, reason: 'EMPTY', error: detail };
}
