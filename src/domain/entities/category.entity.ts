import { EntityMetadata, optionalText, requireText } from '../common';
import { CategoryId, EntityId } from '../value-objects';

/**
 * Menu section (Espresso, Tea, Pastries...). Coffee items reference it by id.
 */
export class Category {
  static readonly MAX_NAME_LENGTH = 100;
  static readonly MAX_DESCRIPTION_LENGTH = 500;

  private constructor(
    private readonly meta: EntityMetadata<'category'>,
    public readonly name: string,
    public readonly description: string | null,
  ) {}

  static create(props: { id?: CategoryId; name: string; description?: string | null }): Category {
    return new Category(
      EntityMetadata.create(props.id ?? EntityId.generate('category')),
      requireText('Category', 'name', props.name, Category.MAX_NAME_LENGTH),
      optionalText('Category', 'description', props.description, Category.MAX_DESCRIPTION_LENGTH),
    );
  }

  static reconstitute(props: {
    id: CategoryId;
    name: string;
    description: string | null;
    createdAt: Date;
  }): Category {
    return new Category(
      EntityMetadata.reconstitute({
        id: props.id,
        createdAt: props.createdAt,
        updatedAt: null,
        version: 1,
      }),
      props.name,
      props.description,
    );
  }

  get id(): CategoryId {
    return this.meta.id;
  }

  get createdAt(): Date {
    return this.meta.createdAt;
  }

  equals(other: Category): boolean {
    return this.id.equals(other.id);
  }
}
