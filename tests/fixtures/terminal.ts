// Colour codes, in case the runner's stdout reports colour support.
const SGR_PATTERN = /\u001b\[[0-9;]*m/g;

export function frameLines(frame: string | undefined): string[] {
  return (frame ?? '').replace(SGR_PATTERN, '').split('\n');
}
