import type { IssueTrackerApi } from '../api/types';
import type { AppEvent, AppEventBus, AppState, SearchSettings } from '../types';
import { mapTrackerError } from '../utils/errorMessages';
import { logger } from '../utils/logger';
import { createInitialState } from './AppState';
import { handleEvent, type HandlerContext } from './handlers';

export interface AppRunnerOptions {
  api: IssueTrackerApi;
  search: SearchSettings;
  bus: AppEventBus;
  state?: AppState;
}

/**
 * Serial event loop. Events are chained in arrival order and exactly one
 * handler runs at a time, so a handler's merges never interleave with
 * another's. `state:changed` is emitted after every handled event.
 */
export class AppRunner {
  readonly state: AppState;
  private readonly bus: AppEventBus;
  private readonly context: HandlerContext;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: AppRunnerOptions) {
    this.state = options.state ?? createInitialState();
    this.bus = options.bus;
    this.context = {
      state: this.state,
      api: options.api,
      search: options.search,
      render: () => this.bus.emit('state:changed', this.state),
    };
  }

  /** Loads the first page of issues. */
  start(): Promise<void> {
    return this.dispatch({ type: 'refresh' });
  }

  /** Queues `event`; resolves once it has been handled (or dropped after quit). */
  dispatch(event: AppEvent): Promise<void> {
    const run = this.tail.then(() => this.process(event));
    this.tail = run;
    return run;
  }

  private async process(event: AppEvent): Promise<void> {
    if (!this.state.running) return;

    try {
      await handleEvent(this.context, event);
    } catch (error) {
      logger.error(`Handling '${event.type}' failed`, error);
      this.state.lastError = mapTrackerError(error);
    }

    await this.bus.emit('event:handled', event);
    await this.bus.emit('state:changed', this.state);

    if (!this.state.running) {
      await this.bus.emit('app:exit', { code: 0 });
    }
  }
}
