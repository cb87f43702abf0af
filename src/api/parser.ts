import type { z } from 'zod';
import type {
  JiraComment,
  JiraIssue,
  JiraStatus,
  JiraTransition,
  JiraUser,
  Priority,
  SearchResult,
  StatusCategory,
} from '../types';
import { isPriority } from '../types';
import { adfToPlainText } from '../utils/adf';
import { ParseError } from '../utils/errors';
import { logger } from '../utils/logger';
import {
  jiraCommentSchema,
  jiraCommentsResponseSchema,
  jiraCreatedIssueSchema,
  jiraIssueReferenceSchema,
  jiraIssueSchema,
  jiraSearchPageSchema,
  jiraTransitionSchema,
  jiraTransitionsResponseSchema,
  jiraUserSchema,
  type JiraPriorityResponse,
  type JiraUserResponse,
} from './schemas';

const STATUS_CATEGORIES: Record<string, StatusCategory> = {
  new: 'todo',
  indeterminate: 'inProgress',
  done: 'done',
};

const PRIORITY_BY_ID: Record<string, Priority> = {
  '1': 'Lowest',
  '2': 'Low',
  '3': 'Medium',
  '4': 'High',
  '5': 'Highest',
};

const OFFSET_TIMESTAMP = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?)([+-]\d{2}):?(\d{2})$/;
const ZONELESS_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?$/;

export interface PageRequest {
  startAt?: number;
  maxResults?: number;
}

export interface SearchPage {
  startAt: number;
  maxResults: number;
  total: number;
  isLast?: boolean;
  entries: unknown[];
}

export interface IssueReferencePage extends Omit<SearchPage, 'entries'> {
  references: string[];
}

function toParseError(error: z.ZodError, context: string): ParseError {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : context;
  const missing = issue?.code === 'invalid_type' && issue.received === 'undefined';
  const message = missing ? `Missing '${field}' field` : `Invalid '${field}' field: ${issue?.message ?? 'unexpected value'}`;
  return new ParseError(message, field);
}

function parseWith<S extends z.ZodTypeAny>(schema: S, json: unknown, context: string): z.output<S> {
  const result = schema.safeParse(json);
  if (!result.success) {
    throw toParseError(result.error, context);
  }
  return result.data;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Accepts the service's offset format (`2024-01-15T10:30:00.000+0000`), the
 * same without a zone (read as UTC), then anything `Date` understands.
 */
export function parseTimestamp(value: string, field: string): Date {
  const offset = OFFSET_TIMESTAMP.exec(value);
  if (offset) {
    const date = new Date(`${offset[1]}${offset[2]}:${offset[3]}`);
    if (!Number.isNaN(date.getTime())) return date;
  }

  if (ZONELESS_TIMESTAMP.test(value)) {
    const date = new Date(`${value}Z`);
    if (!Number.isNaN(date.getTime())) return date;
  }

  const fallback = Date.parse(value);
  if (!Number.isNaN(fallback)) {
    return new Date(fallback);
  }

  throw new ParseError(`Failed to parse ${field} datetime '${value}'`, field, value);
}

function toUser(user: JiraUserResponse): JiraUser {
  return {
    accountId: user.accountId,
    displayName: user.displayName ?? 'Unknown',
    ...(user.emailAddress ? { emailAddress: user.emailAddress } : {}),
  };
}

function toPriority(priority: JiraPriorityResponse | null | undefined): Priority {
  if (!priority) return 'Medium';

  if (priority.name !== undefined && isPriority(priority.name)) return priority.name;

  const id = priority.id ?? '';
  return Object.hasOwn(PRIORITY_BY_ID, id) ? PRIORITY_BY_ID[id] : 'Medium';
}

function toStatusCategory(key: string): StatusCategory {
  if (!Object.hasOwn(STATUS_CATEGORIES, key)) {
    throw new ParseError(`Unknown status category: ${key}`, 'fields.status.statusCategory.key', key);
  }
  return STATUS_CATEGORIES[key];
}

function toDescription(description: unknown): string | undefined {
  if (typeof description === 'string') {
    return description === '' ? undefined : description;
  }
  return adfToPlainText(description);
}

export function parseIssue(json: unknown): JiraIssue {
  const raw = parseWith(jiraIssueSchema, json, 'issue');
  const { fields } = raw;

  const status: JiraStatus = {
    id: fields.status.id,
    name: fields.status.name,
    category: toStatusCategory(fields.status.statusCategory.key),
  };
  const description = toDescription(fields.description);

  return {
    id: raw.id,
    key: raw.key,
    summary: fields.summary,
    status,
    ...(fields.assignee ? { assignee: toUser(fields.assignee) } : {}),
    priority: toPriority(fields.priority),
    issueType: fields.issuetype.name,
    projectKey: fields.project.key,
    ...(description !== undefined ? { description } : {}),
    created: parseTimestamp(fields.created, 'created'),
    updated: parseTimestamp(fields.updated, 'updated'),
  };
}

export function parseUser(json: unknown): JiraUser {
  return toUser(parseWith(jiraUserSchema, json, 'user'));
}

export function parseComment(json: unknown): JiraComment {
  const raw = parseWith(jiraCommentSchema, json, 'comment');
  const body = typeof raw.body === 'string' ? raw.body : (adfToPlainText(raw.body) ?? '');

  let updated: Date | undefined;
  if (raw.updated) {
    try {
      updated = parseTimestamp(raw.updated, 'updated');
    } catch (error) {
      logger.debug(`Ignoring unparsable 'updated' on comment ${raw.id}: ${describeError(error)}`);
    }
  }

  return {
    id: raw.id,
    author: toUser(raw.author),
    body,
    created: parseTimestamp(raw.created, 'created'),
    ...(updated ? { updated } : {}),
  };
}

/**
 * Accepts both a bare array and `{ comments: [...] }`. Malformed entries are
 * skipped with a warning.
 */
export function parseComments(json: unknown): JiraComment[] {
  const entries = parseWith(jiraCommentsResponseSchema, json, 'comments');

  const comments: JiraComment[] = [];
  entries.forEach((entry, index) => {
    try {
      comments.push(parseComment(entry));
    } catch (error) {
      logger.warn(`Skipping comment at index ${index}: ${describeError(error)}`);
    }
  });
  return comments;
}

export function parseSearchPage(json: unknown, request: PageRequest = {}): SearchPage {
  const page = parseWith(jiraSearchPageSchema, json, 'search');
  const entries = page.issues ?? page.values;

  if (!entries) {
    const keys = typeof json === 'object' && json !== null ? Object.keys(json).join(', ') : typeof json;
    throw new ParseError(`Missing 'issues' or 'values' array. Available keys: ${keys}`, 'issues');
  }

  return {
    startAt: page.startAt ?? request.startAt ?? 0,
    maxResults: page.maxResults ?? request.maxResults ?? 0,
    total: page.total ?? 0,
    ...(page.isLast !== undefined ? { isLast: page.isLast } : {}),
    entries,
  };
}

export function parseSearchResults(json: unknown, request: PageRequest = {}): SearchResult {
  const { entries, ...paging } = parseSearchPage(json, request);

  const issues: JiraIssue[] = [];
  entries.forEach((entry, index) => {
    try {
      issues.push(parseIssue(entry));
    } catch (error) {
      logger.warn(`Dropping issue at index ${index} of page ${paging.startAt}: ${describeError(error)}`);
    }
  });

  return { ...paging, issues };
}

export function parseIssueReferences(json: unknown, request: PageRequest = {}): IssueReferencePage {
  const { entries, ...paging } = parseSearchPage(json, request);

  const references: string[] = [];
  entries.forEach((entry, index) => {
    const result = jiraIssueReferenceSchema.safeParse(entry);
    if (!result.success) {
      logger.warn(`Dropping issue reference at index ${index}: ${toParseError(result.error, 'issue').message}`);
      return;
    }
    const reference = result.data.id ?? result.data.key;
    if (reference !== undefined) references.push(reference);
  });

  return { ...paging, references };
}

export function parseTransitions(json: unknown): JiraTransition[] {
  const { transitions } = parseWith(jiraTransitionsResponseSchema, json, 'transitions');

  const parsed: JiraTransition[] = [];
  transitions.forEach((entry, index) => {
    const result = jiraTransitionSchema.safeParse(entry);
    if (!result.success) {
      logger.warn(`Skipping transition at index ${index}: ${toParseError(result.error, 'transition').message}`);
      return;
    }
    parsed.push({ id: result.data.id, name: result.data.name, toStatus: result.data.to.name });
  });
  return parsed;
}

export function parseCreatedIssueKey(json: unknown): string {
  return parseWith(jiraCreatedIssueSchema, json, 'issue').key;
}
