import * as fs from 'fs';
import * as path from 'path';
import { Logger } from '@nestjs/common';
import { ServiceStatus, isServiceStatus } from '../domain/enums';
import { RelayStats, createRelayStats } from '../domain/models';
import { OperationLock } from '../utils';

/**
 * Running forward counter and service status, persisted as one JSON object
 *
 * Every write replaces the whole file and is fsynced before returning.
 * The recorder has its own lock, independent of the store lock: a stats
 * write that is lost never causes a delivery to be retried.
 */
export class StatsRecorder {
  private readonly logger = new Logger(StatsRecorder.name);
  private readonly lock = new OperationLock();
  private stats: RelayStats = createRelayStats();

  constructor(private readonly filePath: string) {}

  /**
   * Load the persisted snapshot
   * Missing file starts fresh; an unreadable one restarts the counter as reset
   */
  load(): Promise<RelayStats> {
    return this.lock.runExclusive(async () => {
      this.stats = await readPersistedStats(this.filePath, {
        missing: ServiceStatus.STARTING,
        unreadable: ServiceStatus.RESET,
      });
      return this.snapshot();
    });
  }

  markRunning(): Promise<RelayStats> {
    return this.setStatus(ServiceStatus.RUNNING);
  }

  markStopped(): Promise<RelayStats> {
    return this.setStatus(ServiceStatus.STOPPED);
  }

  increment(by = 1): Promise<RelayStats> {
    return this.lock.runExclusive(async () => {
      this.stats = { ...this.stats, messages: this.stats.messages + by };
      await this.persist();
      return this.snapshot();
    });
  }

  snapshot(): RelayStats {
    return { ...this.stats };
  }

  private setStatus(status: ServiceStatus): Promise<RelayStats> {
    return this.lock.runExclusive(async () => {
      this.stats = { ...this.stats, status };
      await this.persist();
      this.logger.log(`Service status: ${status}`);
      return this.snapshot();
    });
  }

  private async persist(): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    const handle = await fs.promises.open(this.filePath, 'w');
    try {
      await handle.writeFile(JSON.stringify(this.stats), 'utf8');
      await handle.sync();
    } finally {
      await handle.close();
    }
  }
}

/**
 * Read the stats file the way an outside observer does
 * Missing file is unknown, unparsable file is error
 */
export function readStatsFile(filePath: string): Promise<RelayStats> {
  return readPersistedStats(filePath, {
    missing: ServiceStatus.UNKNOWN,
    unreadable: ServiceStatus.ERROR,
  });
}

async function readPersistedStats(
  filePath: string,
  fallback: { missing: ServiceStatus; unreadable: ServiceStatus },
): Promise<RelayStats> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return createRelayStats(fallback.missing);
    }
    return createRelayStats(fallback.unreadable);
  }

  try {
    return parseStats(JSON.parse(raw)) ?? createRelayStats(fallback.unreadable);
  } catch {
    return createRelayStats(fallback.unreadable);
  }
}

function parseStats(value: unknown): RelayStats | null {
  if (typeof value !== 'object' || value === null) {
    return null;
  }

  const messages = 'messages' in value ? value.messages : undefined;
  const status = 'status' in value ? value.status : undefined;
  if (typeof messages !== 'number' || !Number.isInteger(messages) || messages < 0) {
    return null;
  }

  return {
    messages,
    status: isServiceStatus(status) ? status : ServiceStatus.UNKNOWN,
  };
}
