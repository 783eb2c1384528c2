/**
 * Error Handler - user-facing messages without secrets
 */

import { handleError as logError } from '@stratlab/utils';

const SENSITIVE_PATTERNS = [/password/i, /secret/i, /token/i, /postgres(ql)?:\/\/\S+/i];

function sanitizeErrorMessage(message: string): string {
  if (SENSITIVE_PATTERNS.some((pattern) => pattern.test(message))) {
    return 'An error occurred. Please check your configuration and try again.';
  }
  return message;
}

/**
 * One-line message for stderr
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return sanitizeErrorMessage(error.message);
  }
  if (typeof error === 'string') {
    return sanitizeErrorMessage(error);
  }
  return 'An unexpected error occurred';
}

/**
 * Log the error with its context and return the message to print
 */
export function handleError(error: unknown): string {
  logError(error, { source: 'cli' });
  return formatError(error);
}
