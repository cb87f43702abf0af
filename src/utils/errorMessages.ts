import { ApiError, isTrackerError } from './errors';

export function mapTrackerError(error: unknown): string {
  if (isTrackerError(error)) {
    switch (error.kind) {
      case 'authentication':
        return 'Invalid credentials. Check your email and API token.';
      case 'network':
        return 'Cannot reach Jira. Check your internet connection.';
      case 'validation':
        return `Invalid input: ${error.message}`;
      case 'parse':
        return 'Invalid response from Jira. Please try again.';
      case 'config':
        return `Configuration error: ${error.message}`;
      case 'io':
        return `I/O error: ${error.message}`;
      case 'internal':
        return `Internal error: ${error.message}`;
      case 'api':
        if (error instanceof ApiError) {
          return mapApiStatus(error.status);
        }
        return error.message;
    }
  }

  if (error instanceof Error && error.message) {
    return error.message;
  }

  return 'An unexpected error occurred. Please try again.';
}

function mapApiStatus(status: number): string {
  if (status === 404) {
    return 'Resource not found. Check if the issue or project exists.';
  }
  if (status === 429) {
    return 'Too many requests. Please wait a moment and try again.';
  }
  if (status >= 500) {
    return 'Jira server error. Please try again later.';
  }
  if (status === 400 || status === 422) {
    return 'Jira rejected the request. Check the submitted values.';
  }
  return `Jira returned an unexpected status (${status}).`;
}
