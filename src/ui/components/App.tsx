import { useApp, useInput, useStdout } from 'ink';
import { useEffect, useState } from 'react';
import type { AppRunner } from '../../app/AppRunner';
import { keyToEvent } from '../../app/keymap';
import type { AppEventBus } from '../../types';
import { logger } from '../../utils/logger';
import { Screen } from './Screen';

const DEFAULT_COLUMNS = 80;
const DEFAULT_ROWS = 24;

interface AppProps {
  runner: AppRunner;
  bus: AppEventBus;
}

interface TerminalSize {
  width: number;
  height: number;
}

function readSize(stdout: NodeJS.WriteStream): TerminalSize {
  return {
    width: stdout.columns || DEFAULT_COLUMNS,
    // One row spare so ink redraws in place instead of clearing the terminal.
    height: Math.max((stdout.rows || DEFAULT_ROWS) - 1, 1),
  };
}

/**
 * Binds the runner to ink: keys become events, every `state:changed` redraws
 * the screen and `app:exit` unmounts, which hands the terminal back.
 */
export function App({ runner, bus }: AppProps) {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const [, setRevision] = useState(0);
  const [size, setSize] = useState(() => readSize(stdout));

  useEffect(() => bus.on('state:changed', () => setRevision(revision => revision + 1)), [bus]);

  useEffect(() => bus.once('app:exit', () => exit()), [bus, exit]);

  useEffect(() => {
    const onResize = (): void => setSize(readSize(stdout));
    stdout.on('resize', onResize);
    return () => {
      stdout.off('resize', onResize);
    };
  }, [stdout]);

  useEffect(() => {
    runner.start().catch(error => logger.error('Initial load failed', error));
  }, [runner]);

  useInput((input, key) => {
    const event = keyToEvent(input, key);
    if (!event) return;
    runner.dispatch(event).catch(error => logger.error(`Dispatch of '${event.type}' failed`, error));
  });

  return <Screen state={runner.state} width={size.width} height={size.height} />;
}
