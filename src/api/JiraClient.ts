import type {
  CreateIssueRequest,
  JiraComment,
  JiraInstance,
  JiraIssue,
  JiraTransition,
  JiraUser,
  SearchApiVersion,
  SearchResult,
  UpdateIssueRequest,
} from '../types';
import { textToAdf } from '../utils/adf';
import {
  ApiError,
  AuthenticationError,
  NetworkError,
  ParseError,
  ValidationError,
  isTrackerError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { sleep as defaultSleep, type SleepFn } from '../utils/sleep';
import { validateCommentText, validateCreateIssue, validateIssueKey } from '../utils/validation';
import {
  parseComments,
  parseCreatedIssueKey,
  parseIssue,
  parseIssueReferences,
  parseSearchResults,
  parseTransitions,
  parseUser,
} from './parser';
import { RateLimiter } from './RateLimiter';
import { DEFAULT_RETRY_CONFIG, retryWithBackoff, type RetryConfig } from './retry';
import { fetchRequest } from './transport';
import type { HttpMethod, HttpResponse, IssueTrackerApi, RequestFn } from './types';

const API_PREFIX = '/rest/api/3';
const DEFAULT_RATE_LIMIT_PENALTY_MS = 1000;
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export interface JiraClientOptions {
  request?: RequestFn;
  rateLimiter?: RateLimiter;
  retryConfig?: RetryConfig;
  searchApi?: SearchApiVersion;
  requestTimeoutMs?: number;
  /** Extra wait after a 429 before the request is retried. */
  rateLimitPenaltyMs?: number;
  sleep?: SleepFn;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class JiraClient implements IssueTrackerApi {
  private readonly request: RequestFn;
  private readonly rateLimiter: RateLimiter;
  private readonly retryConfig: RetryConfig;
  private readonly searchApi: SearchApiVersion;
  private readonly requestTimeoutMs: number;
  private readonly rateLimitPenaltyMs: number;
  private readonly sleep: SleepFn;

  constructor(
    private readonly instance: JiraInstance,
    options: JiraClientOptions = {},
  ) {
    this.request = options.request ?? fetchRequest;
    this.rateLimiter = options.rateLimiter ?? RateLimiter.forJiraCloud();
    this.retryConfig = options.retryConfig ?? DEFAULT_RETRY_CONFIG;
    this.searchApi = options.searchApi ?? 'current';
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.rateLimitPenaltyMs = options.rateLimitPenaltyMs ?? DEFAULT_RATE_LIMIT_PENALTY_MS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  private getAuthHeader(): string {
    const credentials = `${this.instance.email}:${this.instance.apiToken}`;
    return `Basic ${Buffer.from(credentials, 'utf8').toString('base64')}`;
  }

  private getHeaders(): Record<string, string> {
    return {
      Authorization: this.getAuthHeader(),
      Accept: 'application/json',
      'Content-Type': 'application/json',
      'User-Agent': 'jira-deck/0.1',
    };
  }

  private buildUrl(path: string): string {
    let baseUrl = this.instance.baseUrl.trim().replace(/\/+$/, '');
    if (!/^https?:\/\//i.test(baseUrl)) {
      baseUrl = `https://${baseUrl}`;
    }
    return `${baseUrl}${API_PREFIX}${path}`;
  }

  async getIssue(key: string): Promise<JiraIssue> {
    const issueKey = validateIssueKey(key);
    return this.execute('GET', `/issue/${encodeURIComponent(issueKey)}`, parseIssue);
  }

  async searchIssues(jql: string, startAt: number, maxResults: number): Promise<SearchResult> {
    const query = new URLSearchParams({
      jql,
      startAt: String(startAt),
      maxResults: String(maxResults),
    });

    if (this.searchApi === 'legacy') {
      return this.execute('GET', `/search?${query.toString()}`, json => parseSearchResults(json, { startAt, maxResults }));
    }

    const { references, ...paging } = await this.execute('GET', `/search/jql?${query.toString()}`, json =>
      parseIssueReferences(json, { startAt, maxResults }),
    );

    const settled = await Promise.allSettled(references.map(reference => this.getIssue(reference)));
    const issues: JiraIssue[] = [];
    settled.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        issues.push(outcome.value);
      } else {
        logger.warn(`Skipping issue ${references[index] ?? index}: ${describeError(outcome.reason)}`);
      }
    });

    return { ...paging, issues };
  }

  async createIssue(data: CreateIssueRequest): Promise<JiraIssue> {
    const valid = validateCreateIssue(data);

    const fields: Record<string, unknown> = {
      project: { key: valid.projectKey },
      issuetype: { name: valid.issueType },
      summary: valid.summary,
    };
    if (valid.description) {
      fields.description = textToAdf(valid.description);
    }
    if (valid.assigneeAccountId) {
      fields.assignee = { accountId: valid.assigneeAccountId };
    }
    if (valid.priority) {
      fields.priority = { name: valid.priority };
    }

    const key = await this.execute('POST', '/issue', parseCreatedIssueKey, { fields });
    logger.info(`Created issue ${key}`);
    return this.getIssue(key);
  }

  async updateIssue(key: string, changes: UpdateIssueRequest): Promise<void> {
    const issueKey = validateIssueKey(key);

    const fields: Record<string, unknown> = { ...changes.fields };
    if (changes.summary !== undefined) {
      if (changes.summary.trim() === '') {
        throw new ValidationError('Summary cannot be empty');
      }
      fields.summary = changes.summary.trim();
    }
    if (changes.description !== undefined) {
      fields.description = textToAdf(changes.description);
    }
    if (changes.priority !== undefined) {
      fields.priority = { name: changes.priority };
    }
    if (changes.assigneeAccountId !== undefined) {
      fields.assignee = changes.assigneeAccountId === null ? null : { accountId: changes.assigneeAccountId };
    }

    if (Object.keys(fields).length === 0) {
      throw new ValidationError('No changes to apply');
    }

    await this.execute('PUT', `/issue/${encodeURIComponent(issueKey)}`, () => undefined, { fields });
  }

  async getTransitions(key: string): Promise<JiraTransition[]> {
    const issueKey = validateIssueKey(key);
    return this.execute('GET', `/issue/${encodeURIComponent(issueKey)}/transitions`, parseTransitions);
  }

  async transitionIssue(key: string, transitionId: string, comment?: string): Promise<void> {
    const issueKey = validateIssueKey(key);
    if (transitionId.trim() === '') {
      throw new ValidationError('Transition id cannot be empty');
    }

    const body: Record<string, unknown> = { transition: { id: transitionId } };
    if (comment !== undefined && comment.trim() !== '') {
      body.update = { comment: [{ add: { body: textToAdf(comment) } }] };
    }

    await this.execute('POST', `/issue/${encodeURIComponent(issueKey)}/transitions`, () => undefined, body);
  }

  async addComment(key: string, text: string): Promise<void> {
    const issueKey = validateIssueKey(key);
    const body = validateCommentText(text);
    await this.execute('POST', `/issue/${encodeURIComponent(issueKey)}/comment`, () => undefined, {
      body: textToAdf(body),
    });
  }

  async getComments(key: string): Promise<JiraComment[]> {
    const issueKey = validateIssueKey(key);
    return this.execute('GET', `/issue/${encodeURIComponent(issueKey)}/comment`, parseComments);
  }

  async getCurrentUser(): Promise<JiraUser> {
    return this.execute('GET', '/myself', parseUser);
  }

  /**
   * One token per operation, then send + decode under the retry policy, so a
   * response that fails to decode is retried like a failed request.
   */
  private async execute<T>(method: HttpMethod, path: string, decode: (json: unknown) => T, body?: unknown): Promise<T> {
    await this.rateLimiter.acquire();

    // The 429 penalty is served before the next attempt, never after the last one.
    let penaltyDue = false;
    const runAttempt = async (): Promise<T> => {
      if (penaltyDue) {
        penaltyDue = false;
        await this.sleep(this.rateLimitPenaltyMs);
      }
      try {
        return decode(await this.send(method, path, body));
      } catch (error) {
        penaltyDue = error instanceof ApiError && error.status === 429;
        throw error;
      }
    };

    return retryWithBackoff(this.retryConfig, runAttempt, {
      sleep: this.sleep,
      onRetry: (error, attempt, delayMs) => {
        logger.warn(`${method} ${path} failed (${describeError(error)}), retry ${attempt} in ${delayMs} ms`);
      },
    });
  }

  private async send(method: HttpMethod, path: string, body?: unknown): Promise<unknown> {
    const startedAt = Date.now();
    let response: HttpResponse;
    try {
      response = await this.request({
        url: this.buildUrl(path),
        method,
        headers: this.getHeaders(),
        ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
        timeoutMs: this.requestTimeoutMs,
      });
    } catch (error) {
      if (isTrackerError(error)) throw error;
      throw new NetworkError(`${method} ${path} failed: ${describeError(error)}`, { cause: error });
    }

    logger.debug(`${method} ${path} -> ${response.status} (${Date.now() - startedAt} ms)`);
    return this.handleResponse(response);
  }

  private handleResponse(response: HttpResponse): unknown {
    const { status, text } = response;

    if (status >= 200 && status < 300) {
      if (text.trim() === '') return undefined;
      try {
        const json: unknown = JSON.parse(text);
        return json;
      } catch (error) {
        throw new ParseError('Response body is not valid JSON', 'body', text.slice(0, 200), { cause: error });
      }
    }

    if (status === 401) {
      throw new AuthenticationError('Unauthorized');
    }
    if (status === 403) {
      throw new AuthenticationError('Forbidden');
    }
    if (status === 429) {
      logger.warn(`Rate limited by Jira, backing off ${this.rateLimitPenaltyMs} ms before any retry`);
    }
    throw new ApiError(status, text);
  }
}
