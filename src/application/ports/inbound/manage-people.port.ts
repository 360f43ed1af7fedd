import { Either } from '@application/common';
import { ApplicationError } from '@application/errors';
import {
  BaristaOutputDto,
  CreateBaristaInputDto,
  CustomerOutputDto,
  ListBaristasInputDto,
  RegisterCustomerInputDto,
  SetBaristaActiveInputDto,
} from '@application/dtos';

export interface IManagePeoplePort {
  registerCustomer(
    input: RegisterCustomerInputDto,
  ): Promise<Either<ApplicationError, CustomerOutputDto>>;

  getCustomer(customerId: string): Promise<Either<ApplicationError, CustomerOutputDto>>;

  listCustomers(): Promise<Either<ApplicationError, CustomerOutputDto[]>>;

  /**
   * Creates the barista profile for an existing user account.
   */
  createBarista(input: CreateBaristaInputDto): Promise<Either<ApplicationError, BaristaOutputDto>>;

  setBaristaActive(
    input: SetBaristaActiveInputDto,
  ): Promise<Either<ApplicationError, BaristaOutputDto>>;

  listBaristas(input: ListBaristasInputDto): Promise<Either<ApplicationError, BaristaOutputDto[]>>;
}
