import type { AppSettings } from '../types';

export const DEFAULT_JQL = 'assignee = currentUser() ORDER BY updated DESC';

export const DEFAULT_SETTINGS: AppSettings = {
  instance: {
    baseUrl: '',
    email: '',
    apiToken: '',
  },
  search: {
    jql: DEFAULT_JQL,
    pageSize: 50,
    api: 'current',
  },
  advanced: {
    requestTimeoutMs: 30_000,
    maxRetries: 3,
    logLevel: 'info',
    rateLimitPenaltyMs: 1000,
  },
};

export const CONFIG_DIR_NAME = 'jira-deck';
export const CONFIG_FILE_NAME = 'config.json';
