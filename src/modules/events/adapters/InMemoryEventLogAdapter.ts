import { agentIdsOf } from '../encoding.js';
import type { EventLogAdapter, EventLogQueryFilters, RegistryLogEntry } from '../types.js';

/**
 * In-memory event log adapter for tests and single-process deployments.
 *
 * Entries are stored in a plain array and lost when the process exits.
 *
 * @example
 * ```typescript
 * const adapter = new InMemoryEventLogAdapter();
 * const registry = new TrustRegistry({}, { eventLogAdapter: adapter });
 * ```
 */
export class InMemoryEventLogAdapter implements EventLogAdapter {
  /** @internal */
  readonly entries: RegistryLogEntry[] = [];

  append(entry: RegistryLogEntry): void {
    this.entries.push(entry);
  }

  size(): number {
    return this.entries.length;
  }

  query(filters: EventLogQueryFilters): RegistryLogEntry[] {
    let results = [...this.entries];

    if (filters.eventName) {
      const names = Array.isArray(filters.eventName) ? filters.eventName : [filters.eventName];
      results = results.filter((e) => names.includes(e.eventName));
    }
    if (filters.agentId !== undefined) {
      const agentId = filters.agentId;
      results = results.filter((e) => agentIdsOf(e).includes(agentId));
    }
    if (filters.fromBlock !== undefined) {
      const from = filters.fromBlock;
      results = results.filter((e) => e.blockNumber >= from);
    }
    if (filters.toBlock !== undefined) {
      const to = filters.toBlock;
      results = results.filter((e) => e.blockNumber <= to);
    }

    if ((filters.order ?? 'asc') === 'desc') {
      results.reverse();
    }

    if (filters.offset) {
      results = results.slice(filters.offset);
    }
    if (filters.limit !== undefined) {
      results = results.slice(0, filters.limit);
    }

    return results;
  }
}
