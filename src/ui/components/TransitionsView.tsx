import { Box, Text } from 'ink';
import type { TransitionsState } from '../../types';
import { windowStart } from '../format';

interface TransitionsViewProps {
  issueKey: string | null;
  transitions: TransitionsState;
  height: number;
}

function TransitionsBody({ transitions, height }: Omit<TransitionsViewProps, 'issueKey'>) {
  if (transitions.loading) {
    return <Text>Loading transitions...</Text>;
  }
  if (transitions.items.length === 0) {
    return <Text>No transitions available.</Text>;
  }

  const rows = Math.max(height - 1, 0);
  const start = windowStart(transitions.focusedIndex, transitions.items.length, rows);
  return (
    <>
      {transitions.items.slice(start, start + rows).map((transition, offset) => {
        const focused = start + offset === transitions.focusedIndex;
        return (
          <Text key={transition.id} wrap="truncate-end" color={focused ? 'cyan' : undefined}>
            {`${focused ? '>' : ' '} ${transition.name} -> ${transition.toStatus}`}
          </Text>
        );
      })}
    </>
  );
}

export function TransitionsView({ issueKey, transitions, height }: TransitionsViewProps) {
  return (
    <Box flexDirection="column">
      <Text bold wrap="truncate-end">{`Transitions for ${issueKey ?? '?'}`}</Text>
      <TransitionsBody transitions={transitions} height={height} />
    </Box>
  );
}
