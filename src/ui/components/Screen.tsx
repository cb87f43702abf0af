import { Box, Text } from 'ink';
import { KEY_HELP } from '../../app/keymap';
import type { AppState, ViewMode } from '../../types';
import { DetailView } from './DetailView';
import { ListView } from './ListView';
import { TransitionsView } from './TransitionsView';

const TITLES: Record<ViewMode, string> = {
  list: 'Issues',
  detail: 'Issue',
  transitions: 'Transitions',
  createTicket: 'Create ticket',
};

/** Header, spacer, status and help rows around the body. */
const CHROME_ROWS = 4;

interface BodyProps {
  state: AppState;
  height: number;
}

function Body({ state, height }: BodyProps) {
  switch (state.view) {
    case 'list':
      return <ListView list={state.list} height={height} />;
    case 'detail':
      return <DetailView detail={state.detail} height={height} />;
    case 'transitions':
      return <TransitionsView issueKey={state.detail.issueKey} transitions={state.transitions} height={height} />;
    case 'createTicket':
      return <Text>Creating tickets from the terminal is not available yet.</Text>;
  }
}

export interface ScreenProps {
  state: AppState;
  width: number;
  height: number;
}

/** The whole frame, exactly `height` rows tall. */
export function Screen({ state, width, height }: ScreenProps) {
  const bodyHeight = Math.max(height - CHROME_ROWS, 0);
  const status = state.lastError ? `Error: ${state.lastError}` : (state.statusMessage ?? '');

  return (
    <Box flexDirection="column" width={width} height={height}>
      <Text bold wrap="truncate-end">{`jira-deck | ${TITLES[state.view]}`}</Text>
      <Box flexDirection="column" height={bodyHeight} overflow="hidden">
        <Body state={state} height={bodyHeight} />
      </Box>
      <Text>{' '}</Text>
      <Text wrap="truncate-end" color={state.lastError ? 'red' : 'green'}>
        {status || ' '}
      </Text>
      <Text wrap="truncate-end" dimColor>
        {KEY_HELP[state.view]}
      </Text>
    </Box>
  );
}
