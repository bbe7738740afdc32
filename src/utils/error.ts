import { ADBCommandError } from '../types';

const FATAL_ERROR_CODES = new Set([
  'ADB_NOT_FOUND',
  'CATALOGUE_LOAD_FAILED',
  'DEVICE_WAIT_FAILED',
  'NO_DEVICES_FOUND',
  'FAILED_TO_LIST_PACKAGES',
]);

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Format error for terminal output
export function formatError(error: unknown): string {
  if (error instanceof ADBCommandError) {
    let message = `${error.code}: ${error.message}`;

    if (error.suggestion) {
      message += `\n\nSuggestion: ${error.suggestion}`;
    }

    return message;
  }

  return errorMessage(error);
}

// Fatal errors end the process with exit status 1; unknown errors count as fatal
export function isFatalError(error: unknown): boolean {
  if (error instanceof ADBCommandError) {
    return FATAL_ERROR_CODES.has(error.code);
  }

  return true;
}

// Raised by readline and timers/promises when the operator cancels with Ctrl+C
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
