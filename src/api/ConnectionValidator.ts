import { mapTrackerError } from '../utils/errorMessages';
import { isTrackerError } from '../utils/errors';
import { logger } from '../utils/logger';
import type { ConnectionStatus, IssueTrackerApi } from './types';

const PROBE_JQL = 'assignee = currentUser() ORDER BY updated DESC';

/**
 * Startup check: resolves the current user and runs a one-row search, so both
 * the credentials and the search endpoint are exercised before the UI opens.
 */
export async function validateConnection(api: IssueTrackerApi): Promise<ConnectionStatus> {
  try {
    const user = await api.getCurrentUser();
    await api.searchIssues(PROBE_JQL, 0, 1);
    logger.info(`Connected to Jira as ${user.displayName}`);
    return { state: 'connected', user };
  } catch (error) {
    const message = mapTrackerError(error);
    logger.debug(`Connection check failed: ${error instanceof Error ? error.message : String(error)}`);

    if (isTrackerError(error)) {
      switch (error.kind) {
        case 'authentication':
          return { state: 'authenticationFailed', message };
        case 'network':
        case 'io':
          return { state: 'networkError', message };
        case 'config':
        case 'validation':
          return { state: 'configurationError', message };
        default:
          break;
      }
    }
    return { state: 'unknownError', message };
  }
}

export function describeConnectionStatus(status: ConnectionStatus): string {
  switch (status.state) {
    case 'connected':
      return `Connected as ${status.user.displayName}`;
    case 'authenticationFailed':
      return `Authentication failed: ${status.message}`;
    case 'networkError':
      return `Network error: ${status.message}`;
    case 'configurationError':
      return `Configuration error: ${status.message}`;
    case 'unknownError':
      return `Connection failed: ${status.message}`;
  }
}
