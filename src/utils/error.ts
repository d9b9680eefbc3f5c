import { ZodError } from 'zod';
import { ADBCommandError, InvalidPortError, SessionStartError } from '../types';

// Shape checks: Node's own errors may come from another realm, where `instanceof Error` fails.
export function isErrorLike(error: unknown): error is { message: string; code?: unknown } {
  return typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string';
}

export function errorCode(error: unknown): unknown {
  return typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
}

// Format error for an HTTP response or a log line
export function formatErrorForResponse(error: unknown): string {
  if (error instanceof ADBCommandError || error instanceof InvalidPortError || error instanceof SessionStartError) {
    let message = `${error.code}: ${error.message}`;

    if (error.suggestion) {
      message += `\n\nSuggestion: ${error.suggestion}`;
    }

    return message;
  }

  if (error instanceof ZodError) {
    return error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
  }

  if (isErrorLike(error)) {
    return error.message;
  }

  return String(error);
}

// Plain cause message, used inside ActionResult messages
export function errorMessage(error: unknown): string {
  return isErrorLike(error) ? error.message : String(error);
}

// Get error suggestion
export function getErrorSuggestion(error: unknown): string | undefined {
  if (error instanceof ADBCommandError || error instanceof InvalidPortError || error instanceof SessionStartError) {
    return error.suggestion;
  }

  return undefined;
}
