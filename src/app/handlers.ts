import { hasMore, nextStartAt } from '../api/pagination';
import type { IssueTrackerApi } from '../api/types';
import type { AppEvent, AppState, JiraIssue, JiraTransition, SearchResult, SearchSettings } from '../types';
import { mapTrackerError } from '../utils/errorMessages';
import { logger } from '../utils/logger';
import { clampIndex, clearDetailScope, focusedIssue, replaceListIssue } from './AppState';

/**
 * Everything a handler may touch. The runner builds one per session and hands
 * it to every event; handlers never reach for shared globals.
 */
export interface HandlerContext {
  state: AppState;
  api: IssueTrackerApi;
  search: SearchSettings;
  /** Publishes intermediate state, e.g. a loading flag before a fetch. */
  render: () => Promise<void>;
}

type TransitionMatcher = (transition: JiraTransition) => boolean;

const isStartProgress: TransitionMatcher = transition =>
  transition.name.toLowerCase().includes('start') || transition.toStatus.toLowerCase().includes('progress');

const isResolve: TransitionMatcher = transition => {
  const name = transition.name.toLowerCase();
  return name.includes('resolve') || name.includes('done') || transition.toStatus.toLowerCase().includes('done');
};

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function handleEvent(context: HandlerContext, event: AppEvent): Promise<void> {
  const { state } = context;
  state.lastError = null;
  state.statusMessage = null;

  switch (event.type) {
    case 'quit':
      state.running = false;
      return;
    case 'moveUp':
      moveFocus(state, -1);
      return;
    case 'moveDown':
      moveFocus(state, 1);
      return;
    case 'select':
      return handleSelect(context);
    case 'back':
      handleBack(state);
      return;
    case 'refresh':
      return handleRefresh(context);
    case 'loadMore':
      return loadNextPage(context);
    case 'toggleSelection':
      toggleSelection(state);
      return;
    case 'showTransitions':
      return showTransitions(context);
    case 'startProgress':
      return quickTransition(context, isStartProgress, 'start progress');
    case 'resolve':
      return quickTransition(context, isResolve, 'resolve');
    case 'assignToMe':
      return assignToMe(context);
    case 'createTicket':
      if (state.view === 'list') {
        state.view = 'createTicket';
      }
      return;
    default: {
      const unhandled: never = event;
      throw new Error(`Unhandled event: ${JSON.stringify(unhandled)}`);
    }
  }
}

function moveFocus(state: AppState, delta: number): void {
  if (state.view === 'list') {
    state.list.focusedIndex = clampIndex(state.list.focusedIndex + delta, state.list.issues.length);
  } else if (state.view === 'transitions') {
    state.transitions.focusedIndex = clampIndex(state.transitions.focusedIndex + delta, state.transitions.items.length);
  }
}

function toggleSelection(state: AppState): void {
  if (state.view !== 'list') return;
  const issue = focusedIssue(state);
  if (!issue) return;

  const selected = new Set(state.list.selectedKeys);
  if (selected.has(issue.key)) {
    selected.delete(issue.key);
  } else {
    selected.add(issue.key);
  }
  state.list.selectedKeys = selected;
}

function handleBack(state: AppState): void {
  if (state.view === 'list') return;
  state.view = 'list';
  clearDetailScope(state);
}

async function handleSelect(context: HandlerContext): Promise<void> {
  const { state } = context;
  if (state.view === 'list') {
    const issue = focusedIssue(state);
    if (issue) {
      await openDetail(context, issue);
    }
  } else if (state.view === 'transitions') {
    await confirmTransition(context);
  }
}

async function handleRefresh(context: HandlerContext): Promise<void> {
  const { state } = context;
  if (state.view === 'list') {
    await loadFirstPage(context, { resetFocus: true });
  } else if (state.view === 'detail' && state.detail.issue) {
    await openDetail(context, state.detail.issue);
  }
}

/**
 * Fetches the issue and its comments together and merges once both settled.
 * A failed issue fetch keeps the snapshot we already had; failed comments
 * leave the list empty.
 */
async function openDetail(context: HandlerContext, known: JiraIssue): Promise<void> {
  const { state, api } = context;

  state.view = 'detail';
  state.detail = { issueKey: known.key, issue: known, comments: [], loading: true };
  state.transitions = { items: [], focusedIndex: 0, loading: false };
  await context.render();

  const [issueResult, commentsResult] = await Promise.allSettled([api.getIssue(known.key), api.getComments(known.key)]);

  if (issueResult.status === 'fulfilled') {
    state.detail.issue = issueResult.value;
    replaceListIssue(state, issueResult.value);
  } else {
    logger.warn(`Falling back to cached ${known.key}: ${describeError(issueResult.reason)}`);
    state.lastError = mapTrackerError(issueResult.reason);
  }

  if (commentsResult.status === 'fulfilled') {
    state.detail.comments = commentsResult.value;
  } else {
    logger.warn(`Could not load comments for ${known.key}: ${describeError(commentsResult.reason)}`);
    state.detail.comments = [];
  }

  state.detail.loading = false;
}

async function loadFirstPage(context: HandlerContext, options: { resetFocus: boolean }): Promise<void> {
  const { state, api, search } = context;

  state.list.loading = true;
  await context.render();

  try {
    applyFirstPage(state, await api.searchIssues(search.jql, 0, search.pageSize), options);
  } catch (error) {
    logger.error(`Failed to load issues: ${describeError(error)}`);
    state.lastError = mapTrackerError(error);
  } finally {
    state.list.loading = false;
  }
}

function applyFirstPage(state: AppState, result: SearchResult, options: { resetFocus: boolean }): void {
  state.list.issues = result.issues;
  state.list.total = result.total;
  state.list.hasMore = hasMore(result);
  state.list.nextStartAt = nextStartAt(result);

  if (options.resetFocus) {
    state.list.focusedIndex = 0;
    state.list.selectedKeys = new Set();
  } else {
    state.list.focusedIndex = clampIndex(state.list.focusedIndex, result.issues.length);
    const keys = new Set(result.issues.map(issue => issue.key));
    state.list.selectedKeys = new Set([...state.list.selectedKeys].filter(key => keys.has(key)));
  }
}

async function loadNextPage(context: HandlerContext): Promise<void> {
  const { state, api, search } = context;
  if (state.view !== 'list' || !state.list.hasMore || state.list.loading) return;

  state.list.loading = true;
  await context.render();

  try {
    const result = await api.searchIssues(search.jql, state.list.nextStartAt, search.pageSize);
    const known = new Set(state.list.issues.map(issue => issue.key));
    const fresh = result.issues.filter(issue => !known.has(issue.key));

    state.list.issues = [...state.list.issues, ...fresh];
    state.list.total = result.total;
    state.list.hasMore = hasMore(result) && result.issues.length > 0;
    state.list.nextStartAt = nextStartAt(result);
  } catch (error) {
    logger.error(`Failed to load more issues: ${describeError(error)}`);
    state.lastError = mapTrackerError(error);
  } finally {
    state.list.loading = false;
  }
}

async function showTransitions(context: HandlerContext): Promise<void> {
  const { state, api } = context;
  const key = state.detail.issueKey;
  if (state.view !== 'detail' || !key) return;

  state.view = 'transitions';
  state.transitions = { items: [], focusedIndex: 0, loading: true };
  await context.render();

  try {
    state.transitions.items = await api.getTransitions(key);
  } catch (error) {
    logger.warn(`Could not load transitions for ${key}: ${describeError(error)}`);
    state.transitions.items = [];
    state.lastError = mapTrackerError(error);
  } finally {
    state.transitions.loading = false;
  }
}

async function confirmTransition(context: HandlerContext): Promise<void> {
  const { state } = context;
  const key = state.detail.issueKey;
  const transition = state.transitions.items[state.transitions.focusedIndex];
  if (!key || !transition || state.transitions.loading) return;

  if (await applyTransition(context, key, transition)) {
    state.view = 'detail';
    state.transitions = { items: [], focusedIndex: 0, loading: false };
    await reloadAfterChange(context, key);
  }
}

async function quickTransition(context: HandlerContext, matches: TransitionMatcher, label: string): Promise<void> {
  const { state, api } = context;
  const key = state.detail.issueKey;
  if (state.view !== 'detail' || !key) return;

  let transitions: JiraTransition[];
  try {
    transitions = await api.getTransitions(key);
  } catch (error) {
    state.lastError = mapTrackerError(error);
    return;
  }

  const transition = transitions.find(matches);
  if (!transition) {
    state.lastError = `No ${label} transition available for ${key}`;
    return;
  }

  if (await applyTransition(context, key, transition)) {
    await reloadAfterChange(context, key);
  }
}

/** Returns false, with `lastError` set and nothing else touched, when the server refuses. */
async function applyTransition(context: HandlerContext, key: string, transition: JiraTransition): Promise<boolean> {
  const { state, api } = context;
  try {
    await api.transitionIssue(key, transition.id);
  } catch (error) {
    logger.warn(`Transition '${transition.name}' on ${key} failed: ${describeError(error)}`);
    state.lastError = mapTrackerError(error);
    return false;
  }

  logger.info(`${key}: ${transition.name} -> ${transition.toStatus}`);
  state.statusMessage = `${key} moved to ${transition.toStatus}`;
  return true;
}

async function assignToMe(context: HandlerContext): Promise<void> {
  const { state, api } = context;
  const key = state.detail.issueKey;
  if (state.view !== 'detail' || !key) return;

  try {
    const user = await api.getCurrentUser();
    await api.updateIssue(key, { assigneeAccountId: user.accountId });
    state.statusMessage = `${key} assigned to ${user.displayName}`;
  } catch (error) {
    logger.warn(`Could not assign ${key}: ${describeError(error)}`);
    state.lastError = mapTrackerError(error);
    return;
  }

  await refetchDetailIssue(context, key);
}

/**
 * Refetches the open issue and the first page behind it concurrently, then
 * merges both once they have settled: the page first, the fresh issue on top,
 * so the list row and the detail view agree.
 */
async function reloadAfterChange(context: HandlerContext, key: string): Promise<void> {
  const { state, api, search } = context;

  const [issueResult, pageResult] = await Promise.allSettled([
    api.getIssue(key),
    api.searchIssues(search.jql, 0, search.pageSize),
  ]);

  if (pageResult.status === 'fulfilled') {
    applyFirstPage(state, pageResult.value, { resetFocus: false });
  } else {
    logger.error(`Failed to reload issues: ${describeError(pageResult.reason)}`);
    state.lastError = mapTrackerError(pageResult.reason);
  }

  if (issueResult.status === 'fulfilled') {
    mergeIssue(state, issueResult.value);
  } else {
    logger.warn(`Keeping previous snapshot of ${key}: ${describeError(issueResult.reason)}`);
  }
}

async function refetchDetailIssue(context: HandlerContext, key: string): Promise<void> {
  try {
    mergeIssue(context.state, await context.api.getIssue(key));
  } catch (error) {
    logger.warn(`Keeping previous snapshot of ${key}: ${describeError(error)}`);
  }
}

function mergeIssue(state: AppState, issue: JiraIssue): void {
  if (state.detail.issueKey === issue.key) {
    state.detail.issue = issue;
  }
  replaceListIssue(state, issue);
}
