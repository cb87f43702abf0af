import { z } from 'zod';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
const SEARCH_APIS = ['legacy', 'current'] as const;

export const settingsSchema = z.object({
  instance: z.object({
    baseUrl: z
      .string()
      .trim()
      .min(1, 'Jira base URL is required')
      .regex(/^\S*$/, 'Jira base URL cannot contain spaces'),
    email: z.string().trim().min(1, 'Email is required'),
    apiToken: z.string().trim().min(1, 'API token is required'),
  }),
  search: z.object({
    jql: z.string().trim().min(1, 'JQL cannot be empty'),
    pageSize: z.number().int().min(1, 'Page size must be at least 1').max(100, 'Page size cannot exceed 100'),
    api: z.enum(SEARCH_APIS),
  }),
  advanced: z.object({
    requestTimeoutMs: z.number().int().positive('Request timeout must be positive'),
    maxRetries: z.number().int().min(0).max(10),
    logLevel: z.enum(LOG_LEVELS),
    logFile: z.string().trim().min(1).optional(),
    rateLimitPenaltyMs: z.number().int().nonnegative(),
  }),
});

/** Shape of the config file: every field optional, unknown keys ignored. */
export const settingsFileSchema = z.object({
  instance: z
    .object({
      baseUrl: z.string(),
      email: z.string(),
      apiToken: z.string(),
    })
    .partial()
    .optional(),
  search: z
    .object({
      jql: z.string(),
      pageSize: z.number(),
      api: z.string(),
    })
    .partial()
    .optional(),
  advanced: z
    .object({
      requestTimeoutMs: z.number(),
      maxRetries: z.number(),
      logLevel: z.string(),
      logFile: z.string(),
      rateLimitPenaltyMs: z.number(),
    })
    .partial()
    .optional(),
});

export type SettingsFile = z.infer<typeof settingsFileSchema>;
