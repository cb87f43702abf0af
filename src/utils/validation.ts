import { z } from 'zod';
import { PRIORITIES, type CreateIssueRequest } from '../types';
import { ValidationError } from './errors';

const ISSUE_KEY_PATTERN = /^(?:[A-Za-z][A-Za-z0-9_]*-\d+|\d+)$/;

export const issueKeySchema = z
  .string()
  .trim()
  .min(1, 'Issue key cannot be empty')
  .regex(ISSUE_KEY_PATTERN, 'Issue key must be in format PROJECT-NUMBER or a numeric id');

export const createIssueSchema = z.object({
  projectKey: z.string().trim().min(1, 'Project key cannot be empty'),
  issueType: z.string().trim().min(1, 'Issue type cannot be empty'),
  summary: z.string().trim().min(1, 'Summary cannot be empty').max(255, 'Summary is too long'),
  description: z.string().optional(),
  assigneeAccountId: z.string().trim().min(1, 'Assignee account id cannot be empty').optional(),
  priority: z.enum(PRIORITIES).optional(),
});

export const commentTextSchema = z.string().trim().min(1, 'Comment cannot be empty');

function firstMessage(error: z.ZodError): string {
  return error.issues[0]?.message ?? 'Invalid value';
}

export function validateIssueKey(key: string): string {
  const result = issueKeySchema.safeParse(key);
  if (!result.success) {
    throw new ValidationError(firstMessage(result.error));
  }
  return result.data;
}

export function validateCreateIssue(data: CreateIssueRequest): CreateIssueRequest {
  const result = createIssueSchema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(firstMessage(result.error));
  }
  return result.data;
}

export function validateCommentText(text: string): string {
  const result = commentTextSchema.safeParse(text);
  if (!result.success) {
    throw new ValidationError(firstMessage(result.error));
  }
  return result.data;
}
