import { DomainEventBuffer, EntityMetadata, optionalText, requireText } from '../common';
import { CoffeeItemEvent } from '../events';
import { CategoryId, CoffeeItemId, EntityId, Money } from '../value-objects';

/**
 * Entity representing an item on the menu.
 * Every mutation re-validates the fields it touches and leaves the item unchanged on failure.
 */
export class CoffeeItem {
  static readonly MAX_NAME_LENGTH = 100;
  static readonly MAX_DESCRIPTION_LENGTH = 500;
  static readonly MAX_IMAGE_URL_LENGTH = 500;

  private readonly events = new DomainEventBuffer<CoffeeItemEvent>();

  private constructor(
    private readonly meta: EntityMetadata<'coffeeItem'>,
    private _name: string,
    private _description: string,
    private _price: Money,
    private _isAvailable: boolean,
    private _categoryId: CategoryId,
    private _imageUrl: string | null,
  ) {}

  // Factory method: create a new menu item
  static create(props: {
    id?: CoffeeItemId;
    name: string;
    description: string;
    price: number;
    categoryId: CategoryId;
    imageUrl?: string | null;
  }): CoffeeItem {
    const name = CoffeeItem.validateName(props.name);
    const description = CoffeeItem.validateDescription(props.description);
    const price = Money.price(props.price);
    const imageUrl = CoffeeItem.validateImageUrl(props.imageUrl);

    const item = new CoffeeItem(
      EntityMetadata.create(props.id ?? EntityId.generate('coffeeItem')),
      name,
      description,
      price,
      true,
      props.categoryId,
      imageUrl,
    );

    item.events.record({
      type: 'CoffeeItemCreated',
      aggregateId: item.id.toString(),
      occurredOn: new Date(),
      coffeeItemId: item.id.toString(),
      name,
      price,
    });

    return item;
  }

  // Factory method: reconstitute from persistence (database)
  static reconstitute(props: {
    id: CoffeeItemId;
    name: string;
    description: string;
    price: Money;
    isAvailable: boolean;
    categoryId: CategoryId;
    imageUrl: string | null;
    createdAt: Date;
    updatedAt: Date | null;
    version: number;
  }): CoffeeItem {
    return new CoffeeItem(
      EntityMetadata.reconstitute({
        id: props.id,
        createdAt: props.createdAt,
        updatedAt: props.updatedAt,
        version: props.version,
      }),
      props.name,
      props.description,
      props.price,
      props.isAvailable,
      props.categoryId,
      props.imageUrl,
    );
  }

  get id(): CoffeeItemId {
    return this.meta.id;
  }

  get name(): string {
    return this._name;
  }

  get description(): string {
    return this._description;
  }

  get price(): Money {
    return this._price;
  }

  get isAvailable(): boolean {
    return this._isAvailable;
  }

  get categoryId(): CategoryId {
    return this._categoryId;
  }

  get imageUrl(): string | null {
    return this._imageUrl;
  }

  get createdAt(): Date {
    return this.meta.createdAt;
  }

  get updatedAt(): Date | null {
    return this.meta.updatedAt;
  }

  get version(): number {
    return this.meta.version;
  }

  get domainEvents(): readonly CoffeeItemEvent[] {
    return this.events.peek();
  }

  clearDomainEvents(): void {
    this.events.clear();
  }

  pullDomainEvents(): CoffeeItemEvent[] {
    return this.events.drain();
  }

  markPersisted(version: number): void {
    this.meta.markPersisted(version);
  }

  /**
   * Replaces name, description and price together.
   * A price change is reported the same way changePrice reports it.
   */
  updateDetails(name: string, description: string, price: number): void {
    const validName = CoffeeItem.validateName(name);
    const validDescription = CoffeeItem.validateDescription(description);
    const newPrice = Money.price(price);

    this._name = validName;
    this._description = validDescription;
    if (!newPrice.equals(this._price)) {
      this.applyPrice(newPrice);
    }
    this.meta.touch();
  }

  changePrice(price: number): void {
    const newPrice = Money.price(price);
    if (newPrice.equals(this._price)) {
      return;
    }
    this.applyPrice(newPrice);
    this.meta.touch();
  }

  setAvailability(isAvailable: boolean): void {
    if (this._isAvailable === isAvailable) {
      return;
    }
    this._isAvailable = isAvailable;
    this.events.record({
      type: 'CoffeeItemAvailabilityChanged',
      aggregateId: this.id.toString(),
      occurredOn: new Date(),
      coffeeItemId: this.id.toString(),
      isAvailable,
    });
    this.meta.touch();
  }

  changeCategory(categoryId: CategoryId): void {
    if (this._categoryId.equals(categoryId)) {
      return;
    }
    this._categoryId = categoryId;
    this.meta.touch();
  }

  changeImage(imageUrl: string | null | undefined): void {
    const validImageUrl = CoffeeItem.validateImageUrl(imageUrl);
    if (validImageUrl === this._imageUrl) {
      return;
    }
    this._imageUrl = validImageUrl;
    this.meta.touch();
  }

  // Entity equality: compare by identity, not attributes
  equals(other: CoffeeItem): boolean {
    return this.id.equals(other.id);
  }

  toSummary(): string {
    const availability = this._isAvailable ? '' : ' (unavailable)';
    return `${this._name}: ${this._description} ${this._price.format()}${availability}`;
  }

  private applyPrice(newPrice: Money): void {
    const oldPrice = this._price;
    this._price = newPrice;
    this.events.record({
      type: 'CoffeeItemPriceChanged',
      aggregateId: this.id.toString(),
      occurredOn: new Date(),
      coffeeItemId: this.id.toString(),
      oldPrice,
      newPrice,
    });
  }

  private static validateName(name: string): string {
    return requireText('CoffeeItem', 'name', name, CoffeeItem.MAX_NAME_LENGTH);
  }

  private static validateDescription(description: string): string {
    return requireText(
      'CoffeeItem',
      'description',
      description,
      CoffeeItem.MAX_DESCRIPTION_LENGTH,
    );
  }

  private static validateImageUrl(imageUrl: string | null | undefined): string | null {
    return optionalText('CoffeeItem', 'imageUrl', imageUrl, CoffeeItem.MAX_IMAGE_URL_LENGTH);
  }
}
