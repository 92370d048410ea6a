import { logger } from '../../middleware/logging.js';

export type EventLevel = 'info' | 'success' | 'warning' | 'error';

export interface EventLogEntry {
  id: number;
  /** ISO 8601 */
  timestamp: string;
  level: EventLevel;
  message: string;
}

const WINSTON_LEVEL: Record<EventLevel, 'info' | 'warn' | 'error'> = {
  info: 'info',
  success: 'info',
  warning: 'warn',
  error: 'error',
};

/**
 * Bounded operational log polled by the status endpoint.
 *
 * Ids increase by one per entry for the lifetime of the instance and are
 * never reused, even after the oldest entries are evicted.
 */
export class EventLog {
  private entries: EventLogEntry[] = [];
  private lastId = 0;

  constructor(private readonly capacity: number) {
    if (capacity < 1) {
      throw new RangeError(`Event log capacity must be at least 1, got ${capacity}`);
    }
  }

  append(level: EventLevel, message: string): EventLogEntry {
    const entry: EventLogEntry = {
      id: ++this.lastId,
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.shift();
    }

    logger.log(WINSTON_LEVEL[level], `[EventLog] ${message}`, {
      service: 'EventLog',
      eventId: entry.id,
      level,
    });

    return entry;
  }

  /**
   * Entries in insertion order.
   *
   * Without `sinceId`: the most recent `limit` entries.
   * With `sinceId`: the oldest `limit` entries whose id is greater, so a
   * client can page forward by passing the last id it saw.
   */
  tail(sinceId?: number, limit = 50): EventLogEntry[] {
    if (limit <= 0) {
      return [];
    }
    if (sinceId === undefined) {
      return this.entries.slice(-limit);
    }
    return this.entries.filter(entry => entry.id > sinceId).slice(0, limit);
  }

  latestId(): number {
    return this.lastId;
  }

  size(): number {
    return this.entries.length;
  }
}
