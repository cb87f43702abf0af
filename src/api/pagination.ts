import type { SearchResult } from '../types';

type PageInfo = Pick<SearchResult, 'startAt' | 'total' | 'isLast'> & { issues: readonly unknown[] };

/** `isLast` wins when the server reports it; `total` is only a hint otherwise. */
export function hasMore(result: PageInfo): boolean {
  if (result.isLast !== undefined) {
    return !result.isLast;
  }
  return result.startAt + result.issues.length < result.total;
}

export function nextStartAt(result: PageInfo): number {
  return result.startAt + result.issues.length;
}
