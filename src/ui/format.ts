import { comparePriority, type Priority, type StatusCategory } from '../types';

export function truncate(text: string, width: number): string {
  if (width <= 0) return '';
  if (text.length <= width) return text;
  if (width === 1) return text.slice(0, 1);
  return `${text.slice(0, width - 1)}…`;
}

export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

export const CATEGORY_LABELS: Record<StatusCategory, string> = {
  todo: 'To Do',
  inProgress: 'In Progress',
  done: 'Done',
};

/** First index of a `height`-row window that keeps `focused` visible. */
export function windowStart(focused: number, total: number, height: number): number {
  if (height <= 0 || total <= height) return 0;
  const start = focused - Math.floor(height / 2);
  return Math.min(Math.max(start, 0), total - height);
}

/** High and above is drawn in the warning colour. */
export function isUrgent(priority: Priority): boolean {
  return comparePriority(priority, 'High') >= 0;
}
