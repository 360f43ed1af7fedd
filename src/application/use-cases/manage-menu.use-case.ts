import { Inject, Injectable, Logger } from '@nestjs/common';
import { Either, left, right } from '../common/either';
import { publishSavedEvents } from '../common/publish-saved-events';
import {
  CategoryOutputDto,
  ChangePriceInputDto,
  CoffeeItemOutputDto,
  CreateCategoryInputDto,
  CreateCoffeeItemInputDto,
  ListCoffeeItemsInputDto,
  SetAvailabilityInputDto,
  UpdateCoffeeItemInputDto,
  toCategoryOutput,
  toCoffeeItemOutput,
} from '../dtos/menu.dto';
import {
  ApplicationError,
  CategoryNotFoundError,
  CoffeeItemNotFoundError,
  DuplicateNameError,
  toApplicationError,
} from '@application/errors';
import { Category, CoffeeItem } from '@domain/entities';
import { CategoryId, EntityId } from '@domain/value-objects';
import {
  ICategoryRepositoryPort,
  ICoffeeItemRepositoryPort,
  IDomainEventPublisherPort,
} from '../ports';
import { IManageMenuPort } from '@application/ports/inbound/manage-menu.port';

/**
 * ManageMenuUseCase maintains menu items and their categories.
 * Item names and category names are unique, compared case-insensitively.
 */
@Injectable()
export class ManageMenuUseCase implements IManageMenuPort {
  private readonly logger = new Logger(ManageMenuUseCase.name);

  constructor(
    @Inject('ICoffeeItemRepository')
    private readonly coffeeItemRepository: ICoffeeItemRepositoryPort,
    @Inject('ICategoryRepository')
    private readonly categoryRepository: ICategoryRepositoryPort,
    @Inject('IDomainEventPublisher')
    private readonly eventPublisher: IDomainEventPublisherPort,
  ) {}

  async createCoffeeItem(
    input: CreateCoffeeItemInputDto,
  ): Promise<Either<ApplicationError, CoffeeItemOutputDto>> {
    try {
      const categoryResult = await this.requireCategory(input.categoryId);
      if (categoryResult.isLeft()) {
        return categoryResult;
      }

      if (await this.coffeeItemRepository.existsByName(input.name)) {
        return left(new DuplicateNameError('Coffee item', input.name));
      }

      const item = CoffeeItem.create({
        name: input.name,
        description: input.description,
        price: input.price,
        categoryId: categoryResult.value,
        imageUrl: input.imageUrl,
      });

      await this.save(item);
      return right(toCoffeeItemOutput(item));
    } catch (error) {
      return left(toApplicationError(error));
    }
  }

  /**
   * Applies a full update. Details and price go through updateDetails so a bad
   * value rejects the whole request before the item is saved.
   */
  async updateCoffeeItem(
    input: UpdateCoffeeItemInputDto,
  ): Promise<Either<ApplicationError, CoffeeItemOutputDto>> {
    try {
      const item = await this.findItem(input.coffeeItemId);
      if (!item) {
        return left(new CoffeeItemNotFoundError(input.coffeeItemId));
      }

      if (input.categoryId !== undefined) {
        const categoryResult = await this.requireCategory(input.categoryId);
        if (categoryResult.isLeft()) {
          return categoryResult;
        }
        item.changeCategory(categoryResult.value);
      }

      if (
        input.name !== undefined &&
        input.name.trim().toLowerCase() !== item.name.trim().toLowerCase() &&
        (await this.coffeeItemRepository.existsByName(input.name))
      ) {
        return left(new DuplicateNameError('Coffee item', input.name));
      }

      item.updateDetails(
        input.name ?? item.name,
        input.description ?? item.description,
        input.price ?? item.price.dollars,
      );
      if (input.isAvailable !== undefined) {
        item.setAvailability(input.isAvailable);
      }
      if (input.imageUrl !== undefined) {
        item.changeImage(input.imageUrl);
      }

      await this.save(item);
      return right(toCoffeeItemOutput(item));
    } catch (error) {
      return left(toApplicationError(error));
    }
  }

  changePrice(input: ChangePriceInputDto): Promise<Either<ApplicationError, CoffeeItemOutputDto>> {
    return this.apply(input.coffeeItemId, (item) => item.changePrice(input.price));
  }

  setAvailability(
    input: SetAvailabilityInputDto,
  ): Promise<Either<ApplicationError, CoffeeItemOutputDto>> {
    return this.apply(input.coffeeItemId, (item) => item.setAvailability(input.isAvailable));
  }

  async getCoffeeItem(
    coffeeItemId: string,
  ): Promise<Either<ApplicationError, CoffeeItemOutputDto>> {
    try {
      const item = await this.findItem(coffeeItemId);
      if (!item) {
        return left(new CoffeeItemNotFoundError(coffeeItemId));
      }
      return right(toCoffeeItemOutput(item));
    } catch (error) {
      return left(toApplicationError(error));
    }
  }

  async listCoffeeItems(
    input: ListCoffeeItemsInputDto,
  ): Promise<Either<ApplicationError, CoffeeItemOutputDto[]>> {
    try {
      const items = await this.coffeeItemRepository.findAll({
        availableOnly: input.includeUnavailable !== true,
        categoryId: input.categoryId,
      });
      return right(items.map(toCoffeeItemOutput));
    } catch (error) {
      return left(toApplicationError(error));
    }
  }

  async createCategory(
    input: CreateCategoryInputDto,
  ): Promise<Either<ApplicationError, CategoryOutputDto>> {
    try {
      const category = Category.create({ name: input.name, description: input.description });

      if (await this.categoryRepository.findByName(category.name)) {
        return left(new DuplicateNameError('Category', category.name));
      }

      await this.categoryRepository.save(category);
      return right(toCategoryOutput(category));
    } catch (error) {
      return left(toApplicationError(error));
    }
  }

  async listCategories(): Promise<Either<ApplicationError, CategoryOutputDto[]>> {
    try {
      const categories = await this.categoryRepository.findAll();
      return right(categories.map(toCategoryOutput));
    } catch (error) {
      return left(toApplicationError(error));
    }
  }

  // ============ Private Helper Methods ============

  private async apply(
    coffeeItemId: string,
    operation: (item: CoffeeItem) => void,
  ): Promise<Either<ApplicationError, CoffeeItemOutputDto>> {
    try {
      const item = await this.findItem(coffeeItemId);
      if (!item) {
        return left(new CoffeeItemNotFoundError(coffeeItemId));
      }

      operation(item);
      // Unchanged price or availability records no event and needs no write
      if (item.domainEvents.length > 0) {
        await this.save(item);
      }
      return right(toCoffeeItemOutput(item));
    } catch (error) {
      return left(toApplicationError(error));
    }
  }

  private async save(item: CoffeeItem): Promise<void> {
    await this.coffeeItemRepository.save(item);
    await publishSavedEvents(this.eventPublisher, item.pullDomainEvents(), this.logger);
  }

  private async requireCategory(
    categoryId: string,
  ): Promise<Either<ApplicationError, CategoryId>> {
    const id = EntityId.fromString('category', categoryId);
    const category = await this.categoryRepository.findById(id);
    if (!category) {
      return left(new CategoryNotFoundError(categoryId));
    }
    return right(category.id);
  }

  private findItem(coffeeItemId: string): Promise<CoffeeItem | null> {
    return this.coffeeItemRepository.findById(EntityId.fromString('coffeeItem', coffeeItemId));
  }
}
