import { Either } from '@application/common';
import { ApplicationError } from '@application/errors';
import {
  CategoryOutputDto,
  ChangePriceInputDto,
  CoffeeItemOutputDto,
  CreateCategoryInputDto,
  CreateCoffeeItemInputDto,
  ListCoffeeItemsInputDto,
  SetAvailabilityInputDto,
  UpdateCoffeeItemInputDto,
} from '@application/dtos';

export interface IManageMenuPort {
  createCoffeeItem(
    input: CreateCoffeeItemInputDto,
  ): Promise<Either<ApplicationError, CoffeeItemOutputDto>>;

  updateCoffeeItem(
    input: UpdateCoffeeItemInputDto,
  ): Promise<Either<ApplicationError, CoffeeItemOutputDto>>;

  changePrice(input: ChangePriceInputDto): Promise<Either<ApplicationError, CoffeeItemOutputDto>>;

  setAvailability(
    input: SetAvailabilityInputDto,
  ): Promise<Either<ApplicationError, CoffeeItemOutputDto>>;

  getCoffeeItem(coffeeItemId: string): Promise<Either<ApplicationError, CoffeeItemOutputDto>>;

  /**
   * Lists the menu sorted by name. Only available items unless asked otherwise.
   */
  listCoffeeItems(
    input: ListCoffeeItemsInputDto,
  ): Promise<Either<ApplicationError, CoffeeItemOutputDto[]>>;

  createCategory(
    input: CreateCategoryInputDto,
  ): Promise<Either<ApplicationError, CategoryOutputDto>>;

  listCategories(): Promise<Either<ApplicationError, CategoryOutputDto[]>>;
}
