import { DomainEvent, DomainEventBuffer, EntityMetadata } from '@domain/common';
import { EntityId } from '@domain/value-objects';

describe('DomainEventBuffer', () => {
  const event = (type: string): DomainEvent => ({
    type,
    aggregateId: 'ord_1',
    occurredOn: new Date('2024-03-01T08:00:00Z'),
  });

  it('should keep events in the order they were recorded', () => {
    const buffer = new DomainEventBuffer<DomainEvent>();

    buffer.record(event('First'));
    buffer.record(event('Second'));

    expect(buffer.peek().map((e) => e.type)).toEqual(['First', 'Second']);
    expect(buffer.size).toBe(2);
  });

  it('should not be emptied by changes to a peeked copy', () => {
    const buffer = new DomainEventBuffer<DomainEvent>();
    buffer.record(event('First'));

    const copy = [...buffer.peek()];
    copy.length = 0;

    expect(buffer.size).toBe(1);
  });

  it('should empty itself on drain', () => {
    const buffer = new DomainEventBuffer<DomainEvent>();
    buffer.record(event('First'));

    expect(buffer.drain()).toHaveLength(1);
    expect(buffer.size).toBe(0);
  });
});

describe('EntityMetadata', () => {
  it('should start unpersisted at version 0', () => {
    const now = new Date('2024-03-01T08:00:00Z');
    const meta = EntityMetadata.create(EntityId.fromString('order', 'ord_1'), now);

    expect(meta.version).toBe(0);
    expect(meta.createdAt).toBe(now);
    expect(meta.updatedAt).toBeNull();
  });

  it('should reject versions that do not move forward', () => {
    const meta = EntityMetadata.create(EntityId.fromString('order', 'ord_1'));

    meta.markPersisted(1);

    expect(() => meta.markPersisted(1)).toThrow(
      'Persisted version must be greater than 1, received 1',
    );
    expect(() => meta.markPersisted(1.5)).toThrow(RangeError);
  });
});
