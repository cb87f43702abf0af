import { Box, Text } from 'ink';
import type { JiraIssue, ListState } from '../../types';
import { isUrgent, truncate, windowStart } from '../format';

interface IssueRowProps {
  issue: JiraIssue;
  focused: boolean;
  selected: boolean;
}

function IssueRow({ issue, focused, selected }: IssueRowProps) {
  const marker = `${focused ? '>' : ' '}${selected ? '*' : ' '}`;
  return (
    <Text wrap="truncate-end" color={focused ? 'cyan' : undefined}>
      {`${marker} ${issue.key.padEnd(10)} ${truncate(issue.status.name, 14).padEnd(14)} `}
      <Text color={isUrgent(issue.priority) ? 'red' : undefined}>{issue.priority.padEnd(8)}</Text>
      {` ${issue.summary}`}
    </Text>
  );
}

interface ListViewProps {
  list: ListState;
  height: number;
}

export function ListView({ list, height }: ListViewProps) {
  if (list.issues.length === 0) {
    return <Text>{list.loading ? 'Loading issues...' : 'No issues found.'}</Text>;
  }

  const count = list.total > list.issues.length ? `${list.issues.length} of ${list.total}` : `${list.issues.length}`;
  const suffix = list.loading ? ' (loading...)' : list.hasMore ? ' (n for more)' : '';
  const rows = Math.max(height - 1, 0);
  const start = windowStart(list.focusedIndex, list.issues.length, rows);

  return (
    <Box flexDirection="column">
      <Text wrap="truncate-end">{`Issues: ${count}${suffix}`}</Text>
      {list.issues.slice(start, start + rows).map((issue, offset) => (
        <IssueRow
          key={issue.key}
          issue={issue}
          focused={start + offset === list.focusedIndex}
          selected={list.selectedKeys.has(issue.key)}
        />
      ))}
    </Box>
  );
}
