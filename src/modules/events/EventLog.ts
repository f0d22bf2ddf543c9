import type { Logger } from 'pino';
import type { RegistryEventEmitter } from '../../core/EventEmitter.js';
import { encodeRegistryEvent } from './encoding.js';
import type {
  EventLogAdapter,
  EventLogQueryFilters,
  RegistryEvent,
  RegistryLogEntry,
} from './types.js';

/** Ledger position assigned to a committed event */
export interface LogPosition {
  blockNumber: bigint;
  timestamp: bigint;
  transactionIndex: bigint;
}

/**
 * Append-only record of committed registry events, ABI-encoded the way an
 * EVM log carries them so indexers can consume them unchanged.
 *
 * @example
 * ```typescript
 * const feedback = registry.eventLog.query({ eventName: 'FeedbackAuthorized', agentId: 2n });
 * ```
 */
export class EventLog {
  private readonly adapter: EventLogAdapter;
  private readonly events: RegistryEventEmitter;
  private readonly logger: Logger;
  private nextLogIndex = 0;

  constructor(adapter: EventLogAdapter, events: RegistryEventEmitter, logger: Logger) {
    this.adapter = adapter;
    this.events = events;
    this.logger = logger;
  }

  /**
   * Record committed events and notify subscribers.
   *
   * State has already changed when this runs, so a failing adapter is
   * reported on the `error` channel and logged rather than thrown.
   */
  publish(batch: readonly RegistryEvent[], position: LogPosition): RegistryLogEntry[] {
    const entries: RegistryLogEntry[] = [];
    for (const event of batch) {
      const entry = freezeEntry({
        ...structuredClone(event),
        ...encodeRegistryEvent(event),
        ...position,
        logIndex: this.nextLogIndex++,
      });
      try {
        this.adapter.append(entry);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.error({ eventName: entry.eventName, logIndex: entry.logIndex, err: message }, 'event log append failed');
        this.events.emit('error', { code: 'EVENT_LOG_APPEND_FAILED', message });
      }
      entries.push(entry);
    }

    for (const event of batch) {
      this.events.emitEvent(structuredClone(event));
    }
    return entries;
  }

  /**
   * Query committed events. Defaults to append order.
   *
   * Returns copies; stored history cannot be changed through them.
   */
  query(filters: EventLogQueryFilters = {}): RegistryLogEntry[] {
    return this.adapter.query(filters).map((entry) => structuredClone(entry));
  }

  /** Number of stored entries */
  size(): number {
    return this.adapter.size();
  }
}

function freezeEntry(entry: RegistryLogEntry): RegistryLogEntry {
  Object.freeze(entry.args);
  Object.freeze(entry.topics);
  return Object.freeze(entry);
}
