import { EntityMetadata, requireText } from '../common';
import { BaristaId, EntityId, UserId } from '../value-objects';

/**
 * Staff member who prepares orders. Inactive baristas cannot take new orders.
 */
export class Barista {
  static readonly MAX_NAME_LENGTH = 100;

  private constructor(
    private readonly meta: EntityMetadata<'barista'>,
    public readonly userId: UserId,
    public readonly name: string,
    private _isActive: boolean,
  ) {}

  static create(props: { id?: BaristaId; userId: UserId; name: string }): Barista {
    return new Barista(
      EntityMetadata.create(props.id ?? EntityId.generate('barista')),
      props.userId,
      requireText('Barista', 'name', props.name, Barista.MAX_NAME_LENGTH),
      true,
    );
  }

  static reconstitute(props: {
    id: BaristaId;
    userId: UserId;
    name: string;
    isActive: boolean;
    createdAt: Date;
    updatedAt: Date | null;
  }): Barista {
    return new Barista(
      EntityMetadata.reconstitute({
        id: props.id,
        createdAt: props.createdAt,
        updatedAt: props.updatedAt,
        version: 1,
      }),
      props.userId,
      props.name,
      props.isActive,
    );
  }

  get id(): BaristaId {
    return this.meta.id;
  }

  get isActive(): boolean {
    return this._isActive;
  }

  get createdAt(): Date {
    return this.meta.createdAt;
  }

  get updatedAt(): Date | null {
    return this.meta.updatedAt;
  }

  activate(): void {
    if (!this._isActive) {
      this._isActive = true;
      this.meta.touch();
    }
  }

  deactivate(): void {
    if (this._isActive) {
      this._isActive = false;
      this.meta.touch();
    }
  }

  equals(other: Barista): boolean {
    return this.id.equals(other.id);
  }
}
