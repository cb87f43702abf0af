import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import type { z } from 'zod';
import { CONFIG_DIR_NAME, CONFIG_FILE_NAME, DEFAULT_SETTINGS } from '../constants/defaults';
import type { AppSettings } from '../types';
import { ConfigError, IoError } from '../utils/errors';
import { logger } from '../utils/logger';
import { settingsFileSchema, settingsSchema, type SettingsFile } from './settingsSchema';

export interface LoadSettingsOptions {
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  /** Returns null when the file does not exist. */
  readConfigFile?: (path: string) => Promise<string | null>;
}

type Env = NodeJS.ProcessEnv;

export function resolveConfigPath(env: Env, homeDir: string): string {
  if (env.JIRA_DECK_CONFIG) {
    return env.JIRA_DECK_CONFIG;
  }
  const base = env.XDG_CONFIG_HOME || join(homeDir, '.config');
  return join(base, CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

async function readFromDisk(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return null;
    throw new IoError(`Cannot read config file ${path}: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function parseConfigFile(path: string, text: string): SettingsFile {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`${path} is not valid JSON`, { cause: error });
  }

  const result = settingsFileSchema.safeParse(json);
  if (!result.success) {
    throw new ConfigError(`${path}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function pick(entries: Record<string, string | undefined>): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const [key, value] of Object.entries(entries)) {
    if (value !== undefined && value !== '') picked[key] = value;
  }
  return picked;
}

/**
 * Defaults, then the JSON config file, then environment variables. The merged
 * result is validated as a whole; a missing config file is not an error.
 */
export async function loadSettings(options: LoadSettingsOptions = {}): Promise<AppSettings> {
  const env = options.env ?? process.env;
  const path = resolveConfigPath(env, options.homeDir ?? homedir());
  const read = options.readConfigFile ?? readFromDisk;

  const text = await read(path);
  const file: SettingsFile = text === null ? {} : parseConfigFile(path, text);
  logger.debug(text === null ? `No config file at ${path}` : `Loaded config file ${path}`);

  const merged = {
    instance: {
      ...DEFAULT_SETTINGS.instance,
      ...file.instance,
      ...pick({ baseUrl: env.JIRA_BASE_URL, email: env.JIRA_EMAIL, apiToken: env.JIRA_API_TOKEN }),
    },
    search: {
      ...DEFAULT_SETTINGS.search,
      ...file.search,
      ...pick({ jql: env.JIRA_JQL, api: env.JIRA_SEARCH_API }),
    },
    advanced: {
      ...DEFAULT_SETTINGS.advanced,
      ...file.advanced,
      ...pick({ logLevel: env.JIRA_DECK_LOG_LEVEL, logFile: env.JIRA_DECK_LOG_FILE }),
    },
  };

  const result = settingsSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(`Invalid settings: ${formatIssues(result.error)}`);
  }
  return result.data;
}
