export * from './jira.types';
export * from './settings.types';
export * from './app.types';
export type * from './events.types';
