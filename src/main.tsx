import { createWriteStream, type WriteStream } from 'node:fs';
import { render } from 'ink';
import { DEFAULT_RETRY_CONFIG, describeConnectionStatus, JiraClient, validateConnection } from './api';
import { AppRunner } from './app/AppRunner';
import { EventBus } from './core/EventBus';
import { loadSettings } from './settings/loadSettings';
import type { AppSettings } from './types';
import { App } from './ui/components/App';
import { mapTrackerError } from './utils/errorMessages';
import { createNullConsole, logger } from './utils/logger';

const stderrConsole = new console.Console({ stdout: process.stderr, stderr: process.stderr });

function createClient(settings: AppSettings): JiraClient {
  return new JiraClient(settings.instance, {
    searchApi: settings.search.api,
    requestTimeoutMs: settings.advanced.requestTimeoutMs,
    rateLimitPenaltyMs: settings.advanced.rateLimitPenaltyMs,
    retryConfig: { ...DEFAULT_RETRY_CONFIG, maxRetries: settings.advanced.maxRetries },
  });
}

async function runInteractive(client: JiraClient, settings: AppSettings): Promise<number> {
  const bus = new EventBus();
  const runner = new AppRunner({ api: client, search: settings.search, bus });

  let exitCode = 0;
  bus.once('app:exit', ({ code }) => {
    exitCode = code;
  });

  // Ctrl-C goes through the keymap so it quits like `q` does.
  const { waitUntilExit } = render(<App runner={runner} bus={bus} />, { exitOnCtrlC: false });
  await waitUntilExit();
  return exitCode;
}

async function main(): Promise<number> {
  logger.configure({ sink: stderrConsole });

  let settings: AppSettings;
  try {
    settings = await loadSettings();
  } catch (error) {
    logger.error(mapTrackerError(error));
    return 1;
  }
  logger.configure({ level: settings.advanced.logLevel });

  const client = createClient(settings);
  const status = await validateConnection(client);
  if (status.state !== 'connected') {
    logger.error(describeConnectionStatus(status));
    return 1;
  }

  let logStream: WriteStream | undefined;
  if (settings.advanced.logFile) {
    logStream = createWriteStream(settings.advanced.logFile, { flags: 'a' });
    logger.configure({ sink: new console.Console({ stdout: logStream, stderr: logStream }) });
  } else {
    logger.configure({ sink: createNullConsole() });
  }

  try {
    return await runInteractive(client, settings);
  } finally {
    logger.configure({ sink: stderrConsole });
    logStream?.end();
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    logger.configure({ sink: stderrConsole });
    logger.error(mapTrackerError(error), error);
    process.exitCode = 1;
  });
