import { EntityId, EntityKind } from '../value-objects/entity-id.vo';

/**
 * Identity, timestamps and persistence version shared by every aggregate.
 * Aggregates embed one instance instead of extending a base entity.
 */
export class EntityMetadata<K extends EntityKind> {
  private constructor(
    public readonly id: EntityId<K>,
    public readonly createdAt: Date,
    private _updatedAt: Date | null,
    private _version: number,
  ) {}

  // Never persisted: version 0
  static create<K extends EntityKind>(id: EntityId<K>, now: Date = new Date()): EntityMetadata<K> {
    return new EntityMetadata(id, now, null, 0);
  }

  static reconstitute<K extends EntityKind>(props: {
    id: EntityId<K>;
    createdAt: Date;
    updatedAt: Date | null;
    version: number;
  }): EntityMetadata<K> {
    return new EntityMetadata(props.id, props.createdAt, props.updatedAt, props.version);
  }

  get updatedAt(): Date | null {
    return this._updatedAt;
  }

  get version(): number {
    return this._version;
  }

  touch(): void {
    this._updatedAt = new Date();
  }

  /**
   * Records the version the store now holds. Versions only move forward.
   */
  markPersisted(version: number): void {
    if (!Number.isInteger(version) || version <= this._version) {
      throw new RangeError(
        `Persisted version must be greater than ${this._version}, received ${version}`,
      );
    }
    this._version = version;
  }
}
