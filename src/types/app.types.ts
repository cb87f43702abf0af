import type { JiraComment, JiraIssue, JiraTransition } from './jira.types';

export type ViewMode = 'list' | 'detail' | 'transitions' | 'createTicket';

export interface ListState {
  issues: JiraIssue[];
  focusedIndex: number;
  selectedKeys: Set<string>;
  loading: boolean;
  /** Offset of the next page to request. */
  nextStartAt: number;
  total: number;
  hasMore: boolean;
}

export interface DetailState {
  issueKey: string | null;
  issue: JiraIssue | null;
  comments: JiraComment[];
  loading: boolean;
}

export interface TransitionsState {
  items: JiraTransition[];
  focusedIndex: number;
  loading: boolean;
}

export interface AppState {
  view: ViewMode;
  running: boolean;
  list: ListState;
  detail: DetailState;
  transitions: TransitionsState;
  lastError: string | null;
  statusMessage: string | null;
}

export type AppEvent =
  | { type: 'quit' }
  | { type: 'moveUp' }
  | { type: 'moveDown' }
  | { type: 'select' }
  | { type: 'back' }
  | { type: 'refresh' }
  | { type: 'loadMore' }
  | { type: 'toggleSelection' }
  | { type: 'showTransitions' }
  | { type: 'startProgress' }
  | { type: 'resolve' }
  | { type: 'assignToMe' }
  | { type: 'createTicket' };

export type AppEventType = AppEvent['type'];
