import { EventEmitter } from "node:events";

/**
 * EventEmitter that buffers events during a tick and delivers them in
 * order on {@link flushEvents}. `Events` maps each event name to its payload.
 */
export class BatchedEventEmitter<
  Events extends { [K in keyof Events]: unknown } = Record<string, unknown>,
> extends EventEmitter {
  private eventQueue: Array<{ name: string; payload: unknown }> = [];
  private batchingEnabled = true;

  constructor() {
    super();
    this.setMaxListeners(50);
  }

  /**
   * Routes through {@link queueEvent} while batching is enabled.
   */
  public emit(event: string | symbol, ...args: unknown[]): boolean {
    if (this.batchingEnabled) {
      this.queueEvent(String(event), args[0]);
      return true;
    }
    return super.emit(event, ...args);
  }

  public queueEvent(name: string, payload: unknown): void {
    if (!this.batchingEnabled) {
      super.emit(name, payload);
      return;
    }

    this.eventQueue.push({ name, payload });
  }

  /** Typed variant of {@link queueEvent}. */
  public publish<K extends keyof Events & string>(name: K, payload: Events[K]): void {
    this.queueEvent(name, payload);
  }

  /** Typed variant of `on`. Returns the unsubscribe function. */
  public subscribe<K extends keyof Events & string>(
    name: K,
    listener: (payload: Events[K]) => void,
  ): () => void {
    this.on(name, listener);
    return () => {
      this.off(name, listener);
    };
  }

  public flushEvents(): void {
    if (this.eventQueue.length === 0) return;

    const batch = this.eventQueue.splice(0);
    const wasBatchingEnabled = this.batchingEnabled;

    this.batchingEnabled = false;

    try {
      for (const event of batch) {
        super.emit(event.name, event.payload);
      }
    } finally {
      this.batchingEnabled = wasBatchingEnabled;
    }
  }

  public setBatchingEnabled(enabled: boolean): void {
    this.batchingEnabled = enabled;
    if (!enabled) {
      this.flushEvents();
    }
  }

  public clearQueue(): void {
    this.eventQueue = [];
  }

  public getQueueSize(): number {
    return this.eventQueue.length;
  }
}
