export type TrackerErrorKind = 'network' | 'authentication' | 'validation' | 'api' | 'config' | 'parse' | 'internal' | 'io';

export abstract class TrackerError extends Error {
  abstract readonly kind: TrackerErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NetworkError extends TrackerError {
  readonly kind = 'network';
}

export class AuthenticationError extends TrackerError {
  readonly kind = 'authentication';
}

export class ValidationError extends TrackerError {
  readonly kind = 'validation';
}

export class ApiError extends TrackerError {
  readonly kind = 'api';

  constructor(
    readonly status: number,
    readonly body: string,
    options?: ErrorOptions,
  ) {
    super(`API error (${status}): ${body}`, options);
  }
}

export class ConfigError extends TrackerError {
  readonly kind = 'config';
}

export class ParseError extends TrackerError {
  readonly kind = 'parse';

  constructor(
    message: string,
    readonly field: string,
    readonly value?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

export class InternalError extends TrackerError {
  readonly kind = 'internal';
}

export class IoError extends TrackerError {
  readonly kind = 'io';
}

export function isTrackerError(error: unknown): error is TrackerError {
  return error instanceof TrackerError;
}
