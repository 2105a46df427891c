export type EventMap = { [event: string]: unknown[] };
export type EventListener<A extends unknown[]> = (...args: A) => void;
export type UnsubscribeFn = () => void;

type ListenerTable<E extends EventMap> = { [K in keyof E]?: EventListener<E[K]>[] };

export class EventEmitter<E extends EventMap> {
  private _events: ListenerTable<E>;

  constructor() {
    // Use an object without a prototype to avoid prototype pollution
    this._events = Object.create(null);
  }

  on<K extends keyof E>(event: K, listener: EventListener<E[K]>): UnsubscribeFn {
    if (typeof listener !== 'function') {
      throw new TypeError('listener must be a function');
    }
    const listeners = this._events[event] ?? [];
    listeners.push(listener);
    this._events[event] = listeners;
    return () => this.removeListener(event, listener);
  }

  once<K extends keyof E>(event: K, listener: EventListener<E[K]>): UnsubscribeFn {
    if (typeof listener !== 'function') {
      throw new TypeError('listener must be a function');
    }
    const wrapped: EventListener<E[K]> = (...args) => {
      this.removeListener(event, wrapped);
      listener(...args);
    };
    return this.on(event, wrapped);
  }

  emit<K extends keyof E>(event: K, ...args: E[K]): void {
    const listeners = this._events[event];
    if (listeners) {
      // Copy listeners to avoid issues if the array is modified during emit
      [...listeners].forEach((listener) => listener(...args));
    }
  }

  listenerCount<K extends keyof E>(event: K): number {
    return this._events[event]?.length ?? 0;
  }

  removeListener<K extends keyof E>(event: K, listenerToRemove: EventListener<E[K]>): void {
    const listeners = this._events[event];
    if (listeners) {
      const remaining = listeners.filter((listener) => listener !== listenerToRemove);
      if (remaining.length === 0) {
        delete this._events[event];
      } else {
        this._events[event] = remaining;
      }
    }
  }

  removeAllListeners<K extends keyof E>(event?: K): void {
    if (event !== undefined) {
      delete this._events[event];
    } else {
      this._events = Object.create(null);
    }
  }

  // Alias for removeListener
  off<K extends keyof E>(event: K, listener: EventListener<E[K]>): void {
    return this.removeListener(event, listener);
  }
}
