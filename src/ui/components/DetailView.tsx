import { Box, Text } from 'ink';
import type { DetailState, JiraComment, JiraIssue } from '../../types';
import { CATEGORY_LABELS, formatDate } from '../format';

function commentLines(comment: JiraComment): string[] {
  const edited = comment.updated && comment.updated.getTime() !== comment.created.getTime() ? ' (edited)' : '';
  return [
    `- ${comment.author.displayName}, ${formatDate(comment.created)}${edited}`,
    ...comment.body.split('\n').map(line => `  ${line}`),
  ];
}

function fieldLines(issue: JiraIssue): string[] {
  return [
    `Status: ${issue.status.name} (${CATEGORY_LABELS[issue.status.category]})  Priority: ${issue.priority}  Type: ${issue.issueType}`,
    `Assignee: ${issue.assignee?.displayName ?? 'Unassigned'}  Project: ${issue.projectKey}`,
    `Created: ${formatDate(issue.created)}  Updated: ${formatDate(issue.updated)}`,
    '',
    'Description:',
    ...(issue.description ? issue.description.split('\n').map(line => `  ${line}`) : ['  (no description)']),
    '',
  ];
}

interface DetailViewProps {
  detail: DetailState;
  height: number;
}

export function DetailView({ detail, height }: DetailViewProps) {
  const { issue } = detail;
  if (!issue) {
    return <Text>{detail.loading ? 'Loading issue...' : 'No issue selected.'}</Text>;
  }

  const lines = [
    ...fieldLines(issue),
    ...(detail.loading
      ? ['Loading comments...']
      : [`Comments (${detail.comments.length}):`, ...detail.comments.flatMap(commentLines)]),
  ];

  return (
    <Box flexDirection="column">
      <Text bold wrap="truncate-end">{`${issue.key}  ${issue.summary}`}</Text>
      {lines.slice(0, Math.max(height - 1, 0)).map((line, index) => (
        // Ink drops empty text nodes, so blank lines are drawn as a space.
        <Text key={index} wrap="truncate-end">
          {line || ' '}
        </Text>
      ))}
    </Box>
  );
}
