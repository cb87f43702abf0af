import type { AppState, DetailState, JiraIssue, TransitionsState } from '../types';

export function createDetailState(): DetailState {
  return { issueKey: null, issue: null, comments: [], loading: false };
}

export function createTransitionsState(): TransitionsState {
  return { items: [], focusedIndex: 0, loading: false };
}

export function createInitialState(): AppState {
  return {
    view: 'list',
    running: true,
    list: {
      issues: [],
      focusedIndex: 0,
      selectedKeys: new Set(),
      loading: false,
      nextStartAt: 0,
      total: 0,
      hasMore: false,
    },
    detail: createDetailState(),
    transitions: createTransitionsState(),
    lastError: null,
    statusMessage: null,
  };
}

/** Drops everything scoped to the issue that was open, so the next one starts clean. */
export function clearDetailScope(state: AppState): void {
  state.detail = createDetailState();
  state.transitions = createTransitionsState();
}

export function focusedIssue(state: AppState): JiraIssue | undefined {
  return state.list.issues[state.list.focusedIndex];
}

export function clampIndex(index: number, length: number): number {
  if (length === 0) return 0;
  return Math.min(Math.max(index, 0), length - 1);
}

/** Swaps the snapshot of one issue in the list, keeping its position. */
export function replaceListIssue(state: AppState, issue: JiraIssue): void {
  const index = state.list.issues.findIndex(existing => existing.key === issue.key);
  if (index >= 0) {
    state.list.issues = state.list.issues.map((existing, i) => (i === index ? issue : existing));
  }
}
