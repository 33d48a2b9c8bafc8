/**
 * Final classification of a single inbound message
 * Every message that reaches the pipeline gets exactly one
 */
export enum ProcessingOutcome {
  /**
   * Delivered to the destination and committed as processed
   */
  FORWARDED = 'forwarded',

  /**
   * Identity (source, message) already recorded; no-op
   */
  ALREADY_PROCESSED = 'already_processed',

  /**
   * An extracted code was already known; marked processed without delivery
   */
  DUPLICATE_CODE = 'duplicate_code',

  /**
   * Destination rejected the message; left unmarked so it can be retried
   */
  DELIVERY_FAILED = 'delivery_failed',

  /**
   * State store unavailable; operation aborted
   */
  STORE_ERROR = 'store_error',
}
