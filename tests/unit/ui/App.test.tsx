import { render } from 'ink-testing-library';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AppRunner } from '../../../src/app/AppRunner';
import { EventBus } from '../../../src/core/EventBus';
import type { SearchResult } from '../../../src/types';
import { App } from '../../../src/ui/components/App';
import { NetworkError } from '../../../src/utils/errors';
import { createFakeApi, makeIssue } from '../../fixtures/jira';
import { frameLines } from '../../fixtures/terminal';

const search = { jql: 'project = PROJ', pageSize: 50, api: 'current' as const };

const first = makeIssue({ id: '1', key: 'PROJ-1', summary: 'First' });
const second = makeIssue({ id: '2', key: 'PROJ-2', summary: 'Second' });

function page(): SearchResult {
  return { startAt: 0, maxResults: 50, total: 2, issues: [first, second], isLast: true };
}

describe('App', () => {
  let api: ReturnType<typeof createFakeApi>;
  let bus: EventBus;
  let runner: AppRunner;
  let app: ReturnType<typeof render>;

  const focusedRow = (): string | undefined =>
    frameLines(app.lastFrame()).find(line => line.startsWith('>'));

  beforeEach(() => {
    api = createFakeApi();
    bus = new EventBus();
    runner = new AppRunner({ api, search, bus });
  });

  afterEach(() => {
    app.unmount();
  });

  it('should load and draw the first page on mount', async () => {
    api.searchIssues.mockResolvedValue(page());

    app = render(<App runner={runner} bus={bus} />);

    await vi.waitFor(() => expect(frameLines(app.lastFrame())[1]).toBe('Issues: 2'));
    expect(api.searchIssues).toHaveBeenCalledWith('project = PROJ', 0, 50);
    expect(focusedRow()).toBe('>  PROJ-1     In Progress    High     First');
  });

  it('should move the focus on j', async () => {
    api.searchIssues.mockResolvedValue(page());
    app = render(<App runner={runner} bus={bus} />);
    await vi.waitFor(() => expect(focusedRow()).toBeDefined());

    app.stdin.write('j');

    await vi.waitFor(() => expect(focusedRow()).toBe('>  PROJ-2     In Progress    High     Second'));
    expect(runner.state.list.focusedIndex).toBe(1);
  });

  it('should open the focused issue on enter', async () => {
    api.searchIssues.mockResolvedValue(page());
    api.getIssue.mockResolvedValue(first);
    api.getComments.mockResolvedValue([]);
    app = render(<App runner={runner} bus={bus} />);
    await vi.waitFor(() => expect(focusedRow()).toBeDefined());

    app.stdin.write('\r');

    await vi.waitFor(() => expect(frameLines(app.lastFrame()).slice(0, 2)).toEqual(['jira-deck | Issue', 'PROJ-1  First']));
    expect(api.getIssue).toHaveBeenCalledWith('PROJ-1');
  });

  it('should show a failed load on the status line', async () => {
    api.searchIssues.mockRejectedValue(new NetworkError('down'));

    app = render(<App runner={runner} bus={bus} />);

    await vi.waitFor(() =>
      expect(frameLines(app.lastFrame()).at(-2)).toBe('Error: Cannot reach Jira. Check your internet connection.'),
    );
  });

  it('should quit on q and announce the exit', async () => {
    api.searchIssues.mockResolvedValue(page());
    const onExit = vi.fn();
    bus.on('app:exit', onExit);
    app = render(<App runner={runner} bus={bus} />);
    await vi.waitFor(() => expect(focusedRow()).toBeDefined());

    app.stdin.write('q');

    await vi.waitFor(() => expect(onExit).toHaveBeenCalledWith({ code: 0 }));
    expect(runner.state.running).toBe(false);
  });
});
