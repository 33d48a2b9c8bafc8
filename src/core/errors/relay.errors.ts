/**
 * Stage failure with the stage name attached
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly stage: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

/**
 * Destination rejected or could not be reached
 */
export class DeliveryError extends Error {
  constructor(
    message: string,
    public readonly destinationId: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'DeliveryError';
  }
}

/**
 * Persistence failed; the current operation is aborted
 */
export class StoreUnavailableError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'StoreUnavailableError';
  }
}

/**
 * A user-supplied regular expression does not compile
 */
export class InvalidPatternError extends Error {
  constructor(
    message: string,
    public readonly pattern: string,
  ) {
    super(message);
    this.name = 'InvalidPatternError';
  }
}

/**
 * Ad-hoc statement rejected by the read-only query capability
 */
export class ReadOnlyQueryError extends Error {
  constructor(
    message: string,
    public readonly reason: 'empty' | 'not_read_only' | 'syntax' | 'unavailable',
  ) {
    super(message);
    this.name = 'ReadOnlyQueryError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
