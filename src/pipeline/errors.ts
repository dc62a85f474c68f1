import type { GroupKey } from './types.js';

/** An item whose payload cannot be read; isolated, never fatal */
export class DataIntegrityError extends Error {
  readonly name = 'DataIntegrityError';

  constructor(
    readonly itemId: string,
    message: string
  ) {
    super(`Item ${itemId}: ${message}`);
  }
}

/** The publish collaborator failed or could not be reached */
export class PublishTransportError extends Error {
  readonly name = 'PublishTransportError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * The publish collaborator may or may not have applied the publish
 * (timeout, killed process, indeterminate response).
 */
export class PublishAmbiguousOutcomeError extends Error {
  readonly name = 'PublishAmbiguousOutcomeError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class LeaseUnavailableError extends Error {
  readonly name = 'LeaseUnavailableError';

  constructor(
    readonly key: string,
    message: string
  ) {
    super(message);
  }
}

export class AggregationAbortedError extends Error {
  readonly name = 'AggregationAbortedError';

  constructor(options?: { cause?: unknown }) {
    super('Aggregation aborted', options);
  }
}

export class ConfigError extends Error {
  readonly name = 'ConfigError';

  constructor(
    readonly path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class UnknownTrackError extends Error {
  readonly name = 'UnknownTrackError';

  constructor(readonly trackId: number) {
    super(`Unknown track: ${trackId}`);
  }
}

export function describeGroup(trackId: number, groupKey: GroupKey): string {
  return `${groupKey.join('/')}@${trackId}`;
}
