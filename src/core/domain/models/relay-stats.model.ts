import { ServiceStatus } from '../enums';

/**
 * Snapshot persisted to the stats file; always written whole
 */
export interface RelayStats {
  messages: number;
  status: ServiceStatus;
}

export function createRelayStats(
  status: ServiceStatus = ServiceStatus.STARTING,
  messages = 0,
): RelayStats {
  return { messages, status };
}
