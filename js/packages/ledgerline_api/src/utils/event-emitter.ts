import { createLogger } from '@ledgerline/utils';

const emitterLogger = createLogger('ledgerline:api:events');

/**
 * Event name → listener argument tuple
 */
export type EventMap = Record<string, unknown[]>;

type Listener<Args extends unknown[]> = (...args: Args) => void;

/**
 * Minimal typed event emitter used for diagnostics.
 *
 * A throwing listener is logged and skipped; it never breaks the emitter's caller.
 */
export class TypedEventEmitter<Events extends EventMap> {
  private events: { [E in keyof Events]?: Listener<Events[E]>[] } = {};

  /**
   * Register an event listener
   *
   * @returns This emitter instance for chaining
   */
  on<E extends keyof Events>(event: E, listener: Listener<Events[E]>): this {
    const listeners: Listener<Events[E]>[] = this.events[event] ?? [];
    listeners.push(listener);
    this.events[event] = listeners;
    return this;
  }

  /**
   * @returns True if the event had listeners
   */
  emit<E extends keyof Events>(event: E, ...args: Events[E]): boolean {
    const listeners = this.events[event];
    if (!listeners || listeners.length === 0) return false;

    for (const listener of [...listeners]) {
      try {
        listener(...args);
      } catch (error) {
        emitterLogger.error(
          `Error in event listener for ${String(event)}`,
          error instanceof Error ? error : { error: String(error) }
        );
      }
    }
    return true;
  }

  off<E extends keyof Events>(event: E, listener: Listener<Events[E]>): this {
    const listeners = this.events[event];
    if (listeners) {
      const index = listeners.indexOf(listener);
      if (index > -1) {
        listeners.splice(index, 1);
      }
    }
    return this;
  }

  /**
   * Remove all listeners for an event, or for every event when none is given
   */
  removeAllListeners(event?: keyof Events): this {
    if (event !== undefined) {
      delete this.events[event];
    } else {
      this.events = {};
    }
    return this;
  }

  listenerCount(event: keyof Events): number {
    return this.events[event]?.length ?? 0;
  }
}
