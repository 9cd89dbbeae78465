import { EventEmitter } from "node:events";

// eslint-disable-next-line @typescript-eslint/no-explicit-any
type Listener = (...args: any[]) => void;

export class TypedEventEmitter<
  T extends { [K in keyof T]: Listener },
> {
  private readonly emitter = new EventEmitter();

  on<K extends string & keyof T>(event: K, listener: T[K]): this {
    this.emitter.on(event, listener);
    return this;
  }

  off<K extends string & keyof T>(event: K, listener: T[K]): this {
    this.emitter.off(event, listener);
    return this;
  }

  /** Listener exceptions are isolated so one bad observer cannot fail a turn. */
  protected emit<K extends string & keyof T>(
    event: K,
    ...args: Parameters<T[K]>
  ): boolean {
    const listeners = this.emitter.listeners(event);
    for (const listener of listeners) {
      try {
        Reflect.apply(listener, this, args);
      } catch (err) {
        this.emitter.emit("listenerError", err, event);
      }
    }
    return listeners.length > 0;
  }

  onListenerError(handler: (err: unknown, event: string) => void): this {
    this.emitter.on("listenerError", handler);
    return this;
  }

  listenerCount<K extends string & keyof T>(event: K): number {
    return this.emitter.listenerCount(event);
  }
}
