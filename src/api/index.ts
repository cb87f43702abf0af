export { JiraClient, type JiraClientOptions } from './JiraClient';
export { RateLimiter, type RateLimiterOptions } from './RateLimiter';
export { DEFAULT_RETRY_CONFIG, isRetryableError, retryWithBackoff, type RetryConfig, type RetryOptions } from './retry';
export { hasMore, nextStartAt } from './pagination';
export { describeConnectionStatus, validateConnection } from './ConnectionValidator';
export { fetchRequest } from './transport';
export type { ConnectionStatus, HttpMethod, HttpRequest, HttpResponse, IssueTrackerApi, RequestFn } from './types';
