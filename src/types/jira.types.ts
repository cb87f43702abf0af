export interface JiraInstance {
  baseUrl: string;
  email: string;
  apiToken: string;
}

export type StatusCategory = 'todo' | 'inProgress' | 'done';

export const PRIORITIES = ['Lowest', 'Low', 'Medium', 'High', 'Highest', 'Critical'] as const;

export type Priority = (typeof PRIORITIES)[number];

export interface JiraStatus {
  readonly id: string;
  readonly name: string;
  readonly category: StatusCategory;
}

export interface JiraUser {
  readonly accountId: string;
  readonly displayName: string;
  readonly emailAddress?: string;
}

export interface JiraIssue {
  readonly id: string;
  readonly key: string;
  readonly summary: string;
  readonly status: JiraStatus;
  readonly assignee?: JiraUser;
  readonly priority: Priority;
  readonly issueType: string;
  readonly projectKey: string;
  readonly description?: string;
  readonly created: Date;
  readonly updated: Date;
}

export interface JiraComment {
  readonly id: string;
  readonly author: JiraUser;
  readonly body: string;
  readonly created: Date;
  readonly updated?: Date;
}

export interface JiraTransition {
  readonly id: string;
  readonly name: string;
  readonly toStatus: string;
}

export interface SearchResult {
  startAt: number;
  maxResults: number;
  /** Advisory only; servers report it inconsistently. */
  total: number;
  issues: JiraIssue[];
  isLast?: boolean;
}

export interface CreateIssueRequest {
  projectKey: string;
  issueType: string;
  summary: string;
  description?: string;
  assigneeAccountId?: string;
  priority?: Priority;
}

export interface UpdateIssueRequest {
  summary?: string;
  description?: string;
  priority?: Priority;
  /** `null` unassigns the issue. */
  assigneeAccountId?: string | null;
  fields?: Record<string, unknown>;
}

export function comparePriority(a: Priority, b: Priority): number {
  return PRIORITIES.indexOf(a) - PRIORITIES.indexOf(b);
}

export function isPriority(value: string): value is Priority {
  return PRIORITIES.some(priority => priority === value);
}
