import { EventEmitter } from "node:events";

export type EventListener<P> = (payload: P) => void;

type EventName<Events> = keyof Events & string;

/**
 * Typed emitter that only queues on `emit`. Listeners run on `flushEvents()`,
 * after the operation that raised the events has finished its writes.
 * Events emitted by a listener during a flush are delivered in the same flush.
 */
export class BatchedEventEmitter<Events extends object> {
  private readonly emitter = new EventEmitter();
  private queue: Array<{ name: EventName<Events>; payload: unknown }> = [];

  constructor(maxListeners = 50) {
    this.emitter.setMaxListeners(maxListeners);
  }

  public emit<K extends EventName<Events>>(name: K, payload: Events[K]): void {
    this.queue.push({ name, payload });
  }

  public on<K extends EventName<Events>>(name: K, listener: EventListener<Events[K]>): this {
    this.emitter.on(name, listener);
    return this;
  }

  public off<K extends EventName<Events>>(name: K, listener: EventListener<Events[K]>): this {
    this.emitter.off(name, listener);
    return this;
  }

  public removeAllListeners(name?: EventName<Events>): this {
    if (name === undefined) {
      this.emitter.removeAllListeners();
    } else {
      this.emitter.removeAllListeners(name);
    }
    return this;
  }

  public listenerCount(name: EventName<Events>): number {
    return this.emitter.listenerCount(name);
  }

  public flushEvents(): void {
    let next = this.queue.shift();
    while (next) {
      this.emitter.emit(next.name, next.payload);
      next = this.queue.shift();
    }
  }

  /** Drops queued events without delivering them. */
  public clearQueue(): void {
    this.queue = [];
  }

  public getQueueSize(): number {
    return this.queue.length;
  }
}
