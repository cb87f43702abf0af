import type { LogLevel } from '../utils/logger';
import type { JiraInstance } from './jira.types';

export type SearchApiVersion = 'legacy' | 'current';

export interface SearchSettings {
  jql: string;
  pageSize: number;
  api: SearchApiVersion;
}

export interface AdvancedSettings {
  requestTimeoutMs: number;
  maxRetries: number;
  logLevel: LogLevel;
  logFile?: string;
  rateLimitPenaltyMs: number;
}

export interface AppSettings {
  instance: JiraInstance;
  search: SearchSettings;
  advanced: AdvancedSettings;
}
