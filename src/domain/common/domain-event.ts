/**
 * Something that happened to an aggregate, queued for dispatch once the
 * aggregate has been persisted.
 */
export interface DomainEvent {
  readonly type: string;
  readonly aggregateId: string;
  readonly occurredOn: Date;
}

/**
 * Append-only event queue embedded in an aggregate.
 *
 * Reads always hand out a copy; the only way to empty the queue is an explicit
 * `clear()` (or `drain()`, which reads and clears in one step).
 */
export class DomainEventBuffer<E extends DomainEvent> {
  private readonly events: E[] = [];

  record(event: E): void {
    Object.freeze(event);
    this.events.push(event);
  }

  peek(): readonly E[] {
    return [...this.events];
  }

  drain(): E[] {
    const drained = [...this.events];
    this.events.length = 0;
    return drained;
  }

  clear(): void {
    this.events.length = 0;
  }

  get size(): number {
    return this.events.length;
  }
}
