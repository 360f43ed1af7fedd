import { Category, CoffeeItem } from '@domain/entities';

// ============ Input DTOs ============

export interface CreateCoffeeItemInputDto {
  readonly name: string;
  readonly description: string;

  /** Dollars, greater than 0 and at most 10000, two decimals at most */
  readonly price: number;
  readonly categoryId: string;
  readonly imageUrl?: string;
}

/**
 * Full update of a menu item. Omitted fields keep their current value.
 */
export interface UpdateCoffeeItemInputDto {
  readonly coffeeItemId: string;
  readonly name?: string;
  readonly description?: string;
  readonly price?: number;
  readonly isAvailable?: boolean;
  readonly categoryId?: string;

  /** null removes the image */
  readonly imageUrl?: string | null;
}

export interface ChangePriceInputDto {
  readonly coffeeItemId: string;
  readonly price: number;
}

export interface SetAvailabilityInputDto {
  readonly coffeeItemId: string;
  readonly isAvailable: boolean;
}

export interface ListCoffeeItemsInputDto {
  /** Unavailable items are hidden unless this is true */
  readonly includeUnavailable?: boolean;
  readonly categoryId?: string;
}

export interface CreateCategoryInputDto {
  readonly name: string;
  readonly description?: string;
}

// ============ Output DTOs ============

export interface CoffeeItemOutputDto {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly price: number;
  readonly currency: string;
  readonly isAvailable: boolean;
  readonly categoryId: string;
  readonly imageUrl: string | null;
  readonly createdAt: Date;
  readonly updatedAt: Date | null;
  readonly version: number;
}

export interface CategoryOutputDto {
  readonly id: string;
  readonly name: string;
  readonly description: string | null;
  readonly createdAt: Date;
}

export const toCoffeeItemOutput = (item: CoffeeItem): CoffeeItemOutputDto => ({
  id: item.id.toString(),
  name: item.name,
  description: item.description,
  price: item.price.dollars,
  currency: item.price.currency,
  isAvailable: item.isAvailable,
  categoryId: item.categoryId.toString(),
  imageUrl: item.imageUrl,
  createdAt: item.createdAt,
  updatedAt: item.updatedAt,
  version: item.version,
});

export const toCategoryOutput = (category: Category): CategoryOutputDto => ({
  id: category.id.toString(),
  name: category.name,
  description: category.description,
  createdAt: category.createdAt,
});
