/**
 * Lifecycle status persisted in the stats file
 */
export enum ServiceStatus {
  /**
   * Default before the first persisted write
   */
  STARTING = 'starting',

  /**
   * Receive loop is live
   */
  RUNNING = 'running',

  /**
   * Graceful shutdown completed
   */
  STOPPED = 'stopped',

  /**
   * Stats file existed but could not be read; counter restarted
   */
  RESET = 'reset',

  /**
   * Observer could not parse the stats file
   */
  ERROR = 'error',

  /**
   * Observer found no stats file
   */
  UNKNOWN = 'unknown',
}

export const SERVICE_STATUSES: readonly ServiceStatus[] = Object.values(ServiceStatus);

export function isServiceStatus(value: unknown): value is ServiceStatus {
  return typeof value === 'string' && (SERVICE_STATUSES as readonly string[]).includes(value);
}
