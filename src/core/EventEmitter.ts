import type { Logger } from 'pino';
import type { RegistryEvent, RegistryEvents } from '../modules/events/types.js';

/** Registry events plus the emitter's own `error` channel */
export interface RegistryEmitterEvents extends RegistryEvents {
  error: { code: string; message: string };
}

/** Listener callback type */
type Listener<T> = (data: T) => void;

/**
 * Typed event emitter for committed registry events.
 *
 * Listeners run after the emitting transaction has committed, in the order
 * the events were emitted. A listener that throws does not affect other
 * listeners or the committed state; its error is re-emitted on `error`.
 *
 * @example
 * ```typescript
 * const emitter = new RegistryEventEmitter();
 * emitter.on('AgentRegistered', (e) => {
 *   console.log(`agent ${e.agentId} -> ${e.agentAddress}`);
 * });
 * ```
 */
export class RegistryEventEmitter {
  private listeners: Map<string, Set<Listener<unknown>>> = new Map();
  private readonly logger: Logger | undefined;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Subscribe to an event.
   *
   * @returns A function to unsubscribe
   */
  on<K extends keyof RegistryEmitterEvents>(
    event: K,
    listener: Listener<RegistryEmitterEvents[K]>,
  ): () => void {
    let set = this.listeners.get(event);
    if (!set) {
      set = new Set();
      this.listeners.set(event, set);
    }
    const entry = listener as Listener<unknown>;
    set.add(entry);

    return () => {
      this.remove(event, entry);
    };
  }

  /** Unsubscribe from an event. */
  off<K extends keyof RegistryEmitterEvents>(
    event: K,
    listener: Listener<RegistryEmitterEvents[K]>,
  ): void {
    this.remove(event, listener as Listener<unknown>);
  }

  /** Number of listeners attached to `event` */
  listenerCount(event: keyof RegistryEmitterEvents): number {
    return this.listeners.get(event)?.size ?? 0;
  }

  /** Emit an event to all subscribers. */
  emit<K extends keyof RegistryEmitterEvents>(event: K, data: RegistryEmitterEvents[K]): void {
    this.deliver(event, data);
  }

  /** Emit a committed registry event. */
  emitEvent(event: RegistryEvent): void {
    this.deliver(event.eventName, event.args);
  }

  private remove(event: string, listener: Listener<unknown>): void {
    const set = this.listeners.get(event);
    if (set) {
      set.delete(listener);
      if (set.size === 0) {
        this.listeners.delete(event);
      }
    }
  }

  private deliver(event: string, data: unknown): void {
    const set = this.listeners.get(event);
    if (!set) return;

    for (const listener of [...set]) {
      try {
        listener(data);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        if (event !== 'error' && this.listenerCount('error') > 0) {
          this.deliver('error', { code: 'LISTENER_ERROR', message });
        } else {
          if (this.logger) {
            this.logger.error({ event, err: message }, 'event listener threw');
          } else {
            console.error(`[registry] Unhandled listener error on "${event}":`, message);
          }
        }
      }
    }
  }
}
