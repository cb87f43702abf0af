import { NetworkError } from '../utils/errors';
import type { HttpRequest, HttpResponse, RequestFn } from './types';

function describeFailure(error: unknown): string {
  if (error instanceof Error && error.name === 'TimeoutError') {
    return 'Request timed out';
  }
  return error instanceof Error ? error.message : String(error);
}

/** Default transport over the global `fetch`. */
export const fetchRequest: RequestFn = async (request: HttpRequest): Promise<HttpResponse> => {
  try {
    const response = await fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal: request.timeoutMs !== undefined ? AbortSignal.timeout(request.timeoutMs) : undefined,
    });
    return { status: response.status, text: await response.text() };
  } catch (error) {
    throw new NetworkError(`${request.method} ${request.url} failed: ${describeFailure(error)}`, { cause: error });
  }
};
