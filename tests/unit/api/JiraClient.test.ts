import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { JiraClient, type JiraClientOptions } from '../../../src/api/JiraClient';
import { RateLimiter } from '../../../src/api/RateLimiter';
import type { HttpRequest, HttpResponse, RequestFn } from '../../../src/api/types';
import type { JiraInstance } from '../../../src/types';
import { textToAdf } from '../../../src/utils/adf';
import type { SleepFn } from '../../../src/utils/sleep';
import { ApiError, AuthenticationError, NetworkError, ParseError, ValidationError } from '../../../src/utils/errors';
import { rawComment, rawIssue } from '../../fixtures/jira';

const createMockInstance = (overrides?: Partial<JiraInstance>): JiraInstance => ({
  baseUrl: 'https://test.atlassian.net',
  email: 'test@example.com',
  apiToken: 'test-token',
  ...overrides,
});

const json = (status: number, body: unknown): HttpResponse => ({ status, text: JSON.stringify(body) });

const expectedHeaders = {
  Authorization: `Basic ${Buffer.from('test@example.com:test-token').toString('base64')}`,
  Accept: 'application/json',
  'Content-Type': 'application/json',
  'User-Agent': 'jira-deck/0.1',
};

function sentBody(request: HttpRequest | undefined): unknown {
  return JSON.parse(request?.body ?? 'null');
}

describe('JiraClient', () => {
  let mockRequest: Mock<RequestFn>;
  let mockSleep: Mock<SleepFn>;

  const createClient = (options: JiraClientOptions = {}, instance = createMockInstance()): JiraClient =>
    new JiraClient(instance, {
      request: mockRequest,
      sleep: mockSleep,
      rateLimiter: new RateLimiter({ maxTokens: 100, refillIntervalMs: 60_000, tokensPerRefill: 100 }),
      ...options,
    });

  beforeEach(() => {
    mockRequest = vi.fn<RequestFn>();
    mockSleep = vi.fn<SleepFn>(async () => {});
  });

  describe('getIssue', () => {
    it('should call correct URL with auth header', async () => {
      mockRequest.mockResolvedValueOnce(json(200, rawIssue()));
      const client = createClient();

      const issue = await client.getIssue('PROJ-1');

      expect(issue.key).toBe('PROJ-1');
      expect(mockRequest).toHaveBeenCalledWith({
        url: 'https://test.atlassian.net/rest/api/3/issue/PROJ-1',
        method: 'GET',
        headers: expectedHeaders,
        timeoutMs: 30_000,
      });
    });

    it('should normalise a base URL without scheme and with trailing slashes', async () => {
      mockRequest.mockResolvedValueOnce(json(200, rawIssue()));
      const client = createClient({}, createMockInstance({ baseUrl: 'test.atlassian.net//' }));

      await client.getIssue('10001');

      expect(mockRequest.mock.calls[0]?.[0].url).toBe('https://test.atlassian.net/rest/api/3/issue/10001');
    });

    it('should reject an invalid key without a request', async () => {
      const client = createClient();

      await expect(client.getIssue('not a key')).rejects.toThrow(ValidationError);
      expect(mockRequest).not.toHaveBeenCalled();
    });

    it('should fail with AuthenticationError on 401 without retrying', async () => {
      mockRequest.mockResolvedValue({ status: 401, text: '' });
      const client = createClient();

      await expect(client.getIssue('PROJ-1')).rejects.toThrow(new AuthenticationError('Unauthorized'));
      expect(mockRequest).toHaveBeenCalledTimes(1);
    });

    it('should fail with AuthenticationError on 403', async () => {
      mockRequest.mockResolvedValue({ status: 403, text: '' });
      const client = createClient();

      await expect(client.getIssue('PROJ-1')).rejects.toThrow('Forbidden');
    });

    it('should surface 404 as an ApiError carrying the body', async () => {
      const body = '{"errorMessages":["Issue does not exist or you do not have permission to see it."]}';
      mockRequest.mockResolvedValue({ status: 404, text: body });
      const client = createClient();

      const error = await client.getIssue('PROJ-404').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({ status: 404, body, message: `API error (404): ${body}` });
      expect(mockRequest).toHaveBeenCalledTimes(1);
    });

    it('should retry server errors with backoff', async () => {
      mockRequest
        .mockResolvedValueOnce({ status: 502, text: 'Bad Gateway' })
        .mockResolvedValueOnce({ status: 500, text: 'oops' })
        .mockResolvedValueOnce(json(200, rawIssue()));
      const client = createClient();

      const issue = await client.getIssue('PROJ-1');

      expect(issue.summary).toBe('Fix login redirect');
      expect(mockRequest).toHaveBeenCalledTimes(3);
      expect(mockSleep.mock.calls).toEqual([[100], [200]]);
    });

    it('should wait the rate limit penalty before retrying a 429', async () => {
      mockRequest.mockResolvedValueOnce({ status: 429, text: '' }).mockResolvedValueOnce(json(200, rawIssue()));
      const client = createClient();

      await client.getIssue('PROJ-1');

      expect(mockSleep.mock.calls).toEqual([[100], [1000]]);
    });

    it('should not wait the penalty after the last attempt', async () => {
      mockRequest.mockResolvedValue({ status: 429, text: 'Rate limit exceeded' });
      const client = createClient({ retryConfig: { maxRetries: 1, initialDelayMs: 100, maxDelayMs: 100, backoffMultiplier: 2 } });

      await expect(client.getIssue('PROJ-1')).rejects.toThrow(new ApiError(429, 'Rate limit exceeded'));

      expect(mockRequest).toHaveBeenCalledTimes(2);
      expect(mockSleep.mock.calls).toEqual([[100], [1000]]);
    });

    it('should use the configured rate limit penalty', async () => {
      mockRequest.mockResolvedValueOnce({ status: 429, text: '' }).mockResolvedValueOnce(json(200, rawIssue()));
      const client = createClient({ rateLimitPenaltyMs: 250 });

      await client.getIssue('PROJ-1');

      expect(mockSleep.mock.calls[1]).toEqual([250]);
    });

    it('should wrap transport failures in NetworkError', async () => {
      mockRequest.mockRejectedValue(new Error('socket hang up'));
      const client = createClient({ retryConfig: { maxRetries: 1, initialDelayMs: 10, maxDelayMs: 10, backoffMultiplier: 2 } });

      await expect(client.getIssue('PROJ-1')).rejects.toThrow(new NetworkError('GET /issue/PROJ-1 failed: socket hang up'));
      expect(mockRequest).toHaveBeenCalledTimes(2);
    });

    it('should pass tracker errors from the transport through', async () => {
      const error = new NetworkError('Request timed out');
      mockRequest.mockRejectedValue(error);
      const client = createClient({ retryConfig: { maxRetries: 0, initialDelayMs: 10, maxDelayMs: 10, backoffMultiplier: 2 } });

      await expect(client.getIssue('PROJ-1')).rejects.toBe(error);
    });

    it('should fail with ParseError on a body that is not JSON', async () => {
      mockRequest.mockResolvedValue({ status: 200, text: '<html>login</html>' });
      const client = createClient({ retryConfig: { maxRetries: 0, initialDelayMs: 10, maxDelayMs: 10, backoffMultiplier: 2 } });

      const error = await client.getIssue('PROJ-1').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ParseError);
      expect(error).toMatchObject({ field: 'body', value: '<html>login</html>' });
    });

    it('should take one rate limiter token per operation, not per attempt', async () => {
      const rateLimiter = new RateLimiter({ maxTokens: 10, refillIntervalMs: 60_000, tokensPerRefill: 10 });
      mockRequest.mockResolvedValueOnce({ status: 503, text: '' }).mockResolvedValueOnce(json(200, rawIssue()));
      const client = createClient({ rateLimiter });

      await client.getIssue('PROJ-1');

      expect(rateLimiter.available()).toBe(9);
    });
  });

  describe('rate limited end to end', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('should return the issue after a 429 no sooner than the penalty', async () => {
      vi.useFakeTimers();
      mockRequest.mockResolvedValueOnce({ status: 429, text: 'Rate limit exceeded' }).mockResolvedValueOnce(json(200, rawIssue()));
      const client = new JiraClient(createMockInstance(), { request: mockRequest });
      const start = Date.now();

      const pending = client.getIssue('PROJ-1');
      await vi.runAllTimersAsync();
      const issue = await pending;

      expect(issue.key).toBe('PROJ-1');
      expect(mockRequest).toHaveBeenCalledTimes(2);
      expect(Date.now() - start).toBeGreaterThanOrEqual(1000);
    });
  });

  describe('searchIssues', () => {
    it('should read full issues from the legacy endpoint', async () => {
      mockRequest.mockResolvedValueOnce(
        json(200, { startAt: 0, maxResults: 50, total: 2, issues: [rawIssue(), rawIssue({ id: '10002', key: 'PROJ-2' })] }),
      );
      const client = createClient({ searchApi: 'legacy' });

      const result = await client.searchIssues('project = PROJ', 0, 50);

      expect(mockRequest.mock.calls[0]?.[0].url).toBe(
        'https://test.atlassian.net/rest/api/3/search?jql=project+%3D+PROJ&startAt=0&maxResults=50',
      );
      expect(result.total).toBe(2);
      expect(result.issues.map(issue => issue.key)).toEqual(['PROJ-1', 'PROJ-2']);
    });

    it('should fan out issue fetches on the current endpoint and skip failures', async () => {
      mockRequest.mockImplementation(async request => {
        if (request.url.includes('/search/jql?')) {
          return json(200, { issues: [{ id: '10001' }, { id: '10002' }, { id: '10003' }], isLast: true });
        }
        if (request.url.endsWith('/issue/10002')) {
          return { status: 404, text: 'gone' };
        }
        const id = request.url.slice(request.url.lastIndexOf('/') + 1);
        return json(200, rawIssue({ id, key: `PROJ-${id.slice(-1)}` }));
      });
      const client = createClient();

      const result = await client.searchIssues('assignee = currentUser()', 0, 50);

      expect(result.issues.map(issue => issue.key)).toEqual(['PROJ-1', 'PROJ-3']);
      expect(result).toMatchObject({ startAt: 0, maxResults: 50, total: 0, isLast: true });
      expect(mockRequest.mock.calls[0]?.[0].url).toBe(
        'https://test.atlassian.net/rest/api/3/search/jql?jql=assignee+%3D+currentUser%28%29&startAt=0&maxResults=50',
      );
    });
  });

  describe('createIssue', () => {
    it('should validate before sending anything', async () => {
      const client = createClient();

      await expect(client.createIssue({ projectKey: 'PROJ', issueType: 'Task', summary: ' ' })).rejects.toThrow(
        'Summary cannot be empty',
      );
      expect(mockRequest).not.toHaveBeenCalled();
    });

    it('should post the fields and return the created issue', async () => {
      mockRequest
        .mockResolvedValueOnce(json(201, { id: '10050', key: 'PROJ-50' }))
        .mockResolvedValueOnce(json(200, rawIssue({ id: '10050', key: 'PROJ-50' })));
      const client = createClient();

      const issue = await client.createIssue({
        projectKey: 'PROJ',
        issueType: 'Task',
        summary: 'New task',
        description: 'Details',
        assigneeAccountId: 'acc-1',
        priority: 'Low',
      });

      expect(issue.key).toBe('PROJ-50');
      expect(mockRequest.mock.calls[0]?.[0]).toMatchObject({
        url: 'https://test.atlassian.net/rest/api/3/issue',
        method: 'POST',
      });
      expect(sentBody(mockRequest.mock.calls[0]?.[0])).toEqual({
        fields: {
          project: { key: 'PROJ' },
          issuetype: { name: 'Task' },
          summary: 'New task',
          description: textToAdf('Details'),
          assignee: { accountId: 'acc-1' },
          priority: { name: 'Low' },
        },
      });
      expect(mockRequest.mock.calls[1]?.[0].url).toBe('https://test.atlassian.net/rest/api/3/issue/PROJ-50');
    });
  });

  describe('updateIssue', () => {
    it('should put the changed fields', async () => {
      mockRequest.mockResolvedValueOnce({ status: 204, text: '' });
      const client = createClient();

      await client.updateIssue('PROJ-1', { assigneeAccountId: null, priority: 'Highest', fields: { labels: ['ui'] } });

      expect(mockRequest.mock.calls[0]?.[0].method).toBe('PUT');
      expect(sentBody(mockRequest.mock.calls[0]?.[0])).toEqual({
        fields: { labels: ['ui'], priority: { name: 'Highest' }, assignee: null },
      });
    });

    it('should refuse an empty update', async () => {
      const client = createClient();

      await expect(client.updateIssue('PROJ-1', {})).rejects.toThrow('No changes to apply');
    });
  });

  describe('transitions', () => {
    it('should list transitions', async () => {
      mockRequest.mockResolvedValueOnce(
        json(200, { transitions: [{ id: '31', name: 'Done', to: { name: 'Done' } }] }),
      );
      const client = createClient();

      await expect(client.getTransitions('PROJ-1')).resolves.toEqual([{ id: '31', name: 'Done', toStatus: 'Done' }]);
      expect(mockRequest.mock.calls[0]?.[0].url).toBe('https://test.atlassian.net/rest/api/3/issue/PROJ-1/transitions');
    });

    it('should execute a transition with an attached comment', async () => {
      mockRequest.mockResolvedValueOnce({ status: 204, text: '' });
      const client = createClient();

      await expect(client.transitionIssue('PROJ-1', '31', 'Shipped')).resolves.toBeUndefined();

      expect(mockRequest.mock.calls[0]?.[0].method).toBe('POST');
      expect(sentBody(mockRequest.mock.calls[0]?.[0])).toEqual({
        transition: { id: '31' },
        update: { comment: [{ add: { body: textToAdf('Shipped') } }] },
      });
    });

    it('should execute a transition without a comment', async () => {
      mockRequest.mockResolvedValueOnce({ status: 204, text: '' });
      const client = createClient();

      await client.transitionIssue('PROJ-1', '11');

      expect(sentBody(mockRequest.mock.calls[0]?.[0])).toEqual({ transition: { id: '11' } });
    });
  });

  describe('comments', () => {
    it('should send a comment as rich text', async () => {
      mockRequest.mockResolvedValueOnce(json(201, rawComment()));
      const client = createClient();

      await client.addComment('PROJ-1', '  Looks good  ');

      expect(mockRequest.mock.calls[0]?.[0].url).toBe('https://test.atlassian.net/rest/api/3/issue/PROJ-1/comment');
      expect(sentBody(mockRequest.mock.calls[0]?.[0])).toEqual({ body: textToAdf('Looks good') });
    });

    it('should refuse a blank comment', async () => {
      const client = createClient();

      await expect(client.addComment('PROJ-1', '  ')).rejects.toThrow('Comment cannot be empty');
      expect(mockRequest).not.toHaveBeenCalled();
    });

    it('should read comments from the wrapped shape', async () => {
      mockRequest.mockResolvedValueOnce(json(200, { comments: [rawComment()], startAt: 0, total: 1 }));
      const client = createClient();

      const comments = await client.getComments('PROJ-1');

      expect(comments.map(comment => comment.body)).toEqual(['Looks good']);
    });
  });

  describe('getCurrentUser', () => {
    it('should read the current user', async () => {
      mockRequest.mockResolvedValueOnce(
        json(200, { accountId: 'acc-1', displayName: 'Alex Doe', emailAddress: 'alex@example.com', active: true }),
      );
      const client = createClient();

      await expect(client.getCurrentUser()).resolves.toEqual({
        accountId: 'acc-1',
        displayName: 'Alex Doe',
        emailAddress: 'alex@example.com',
      });
      expect(mockRequest.mock.calls[0]?.[0].url).toBe('https://test.atlassian.net/rest/api/3/myself');
    });
  });
});
