import type {
  CreateIssueRequest,
  JiraComment,
  JiraIssue,
  JiraTransition,
  JiraUser,
  SearchResult,
  UpdateIssueRequest,
} from '../types';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface HttpRequest {
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  timeoutMs?: number;
}

export interface HttpResponse {
  status: number;
  text: string;
}

/** Sends one request. Rejects only when no response was received. */
export type RequestFn = (request: HttpRequest) => Promise<HttpResponse>;

/**
 * Operations the terminal app needs from an issue tracker. `JiraClient` is the
 * production implementation; tests substitute their own.
 */
export interface IssueTrackerApi {
  getIssue(key: string): Promise<JiraIssue>;
  searchIssues(jql: string, startAt: number, maxResults: number): Promise<SearchResult>;
  createIssue(data: CreateIssueRequest): Promise<JiraIssue>;
  updateIssue(key: string, changes: UpdateIssueRequest): Promise<void>;
  getTransitions(key: string): Promise<JiraTransition[]>;
  transitionIssue(key: string, transitionId: string, comment?: string): Promise<void>;
  addComment(key: string, text: string): Promise<void>;
  getComments(key: string): Promise<JiraComment[]>;
  getCurrentUser(): Promise<JiraUser>;
}

export type ConnectionStatus =
  | { state: 'connected'; user: JiraUser }
  | { state: 'authenticationFailed'; message: string }
  | { state: 'networkError'; message: string }
  | { state: 'configurationError'; message: string }
  | { state: 'unknownError'; message: string };
