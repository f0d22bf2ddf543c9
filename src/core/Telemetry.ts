import type { Logger } from 'pino';
import { createLogger } from './logger.js';

/** A buffered telemetry event */
export interface TelemetryEvent {
  event: string;
  data: Record<string, unknown>;
  timestamp: number;
}

/** Receives flushed telemetry batches */
export type TelemetrySink = (events: readonly TelemetryEvent[]) => void;

/**
 * Anonymized usage counters for registry operations.
 *
 * Records operation names and coarse parameters only; never addresses,
 * DIDs or hashes. Disabled unless the config turns it on. Batches go to
 * the optional sink on {@link Telemetry.flush} or when the buffer fills.
 * A sink that throws is logged and its batch dropped, so registry calls
 * never fail because of telemetry.
 */
export class Telemetry {
  private readonly enabled: boolean;
  private readonly sink: TelemetrySink | undefined;
  private readonly logger: Logger;
  private buffer: TelemetryEvent[] = [];
  static readonly MAX_BUFFER_SIZE = 100;

  constructor(enabled: boolean, sink?: TelemetrySink, logger: Logger = createLogger('silent')) {
    this.enabled = enabled;
    this.sink = sink;
    this.logger = logger;
  }

  /**
   * Track an anonymized telemetry event.
   *
   * @param event - Event name (e.g., 'identity.register', 'validation.respond')
   * @param data - Anonymized event data
   */
  track(event: string, data?: Record<string, unknown>): void {
    if (!this.enabled) return;

    this.buffer.push({
      event,
      data: data ?? {},
      timestamp: Date.now(),
    });

    if (this.buffer.length >= Telemetry.MAX_BUFFER_SIZE) {
      this.flush();
    }
  }

  /** Number of events waiting for the next flush */
  pending(): number {
    return this.buffer.length;
  }

  /**
   * Hand buffered events to the sink and clear the buffer.
   *
   * @returns The number of events flushed
   */
  flush(): number {
    if (!this.enabled || this.buffer.length === 0) return 0;

    const events = this.buffer;
    this.buffer = [];
    try {
      this.sink?.(events);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn({ err: message, events: events.length }, 'telemetry sink failed');
    }
    return events.length;
  }
}
