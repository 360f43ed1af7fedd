import { Inject, Injectable } from '@nestjs/common';
import { Either, left, right } from '../common/either';
import {
  BaristaOutputDto,
  CreateBaristaInputDto,
  CustomerOutputDto,
  ListBaristasInputDto,
  RegisterCustomerInputDto,
  SetBaristaActiveInputDto,
  toBaristaOutput,
  toCustomerOutput,
} from '../dtos/people.dto';
import {
  ApplicationError,
  BaristaNotFoundError,
  CustomerNotFoundError,
  DuplicateNameError,
  EmailAlreadyRegisteredError,
  UserNotFoundError,
  toApplicationError,
} from '@application/errors';
import { Barista, Customer } from '@domain/entities';
import { EntityId } from '@domain/value-objects';
import { IBaristaRepositoryPort, ICustomerRepositoryPort, IUserRepositoryPort } from '../ports';
import { IManagePeoplePort } from '@application/ports/inbound/manage-people.port';

/**
 * ManagePeopleUseCase keeps customer and barista profiles.
 */
@Injectable()
export class ManagePeopleUseCase implements IManagePeoplePort {
  constructor(
    @Inject('ICustomerRepository')
    private readonly customerRepository: ICustomerRepositoryPort,
    @Inject('IBaristaRepository')
    private readonly baristaRepository: IBaristaRepositoryPort,
    @Inject('IUserRepository')
    private readonly userRepository: IUserRepositoryPort,
  ) {}

  async registerCustomer(
    input: RegisterCustomerInputDto,
  ): Promise<Either<ApplicationError, CustomerOutputDto>> {
    try {
      const customer = Customer.create({
        name: input.name,
        email: input.email,
        phone: input.phone,
        address: input.address,
      });

      if (await this.customerRepository.findByEmail(customer.email.toString())) {
        return left(new EmailAlreadyRegisteredError(customer.email.toString()));
      }

      await this.customerRepository.save(customer);
      return right(toCustomerOutput(customer));
    } catch (error) {
      return left(toApplicationError(error));
    }
  }

  async getCustomer(customerId: string): Promise<Either<ApplicationError, CustomerOutputDto>> {
    try {
      const customer = await this.customerRepository.findById(
        EntityId.fromString('customer', customerId),
      );
      if (!customer) {
        return left(new CustomerNotFoundError(customerId));
      }
      return right(toCustomerOutput(customer));
    } catch (error) {
      return left(toApplicationError(error));
    }
  }

  async listCustomers(): Promise<Either<ApplicationError, CustomerOutputDto[]>> {
    try {
      const customers = await this.customerRepository.findAll();
      return right(customers.map(toCustomerOutput));
    } catch (error) {
      return left(toApplicationError(error));
    }
  }

  async createBarista(
    input: CreateBaristaInputDto,
  ): Promise<Either<ApplicationError, BaristaOutputDto>> {
    try {
      const userId = EntityId.fromString('user', input.userId);
      const user = await this.userRepository.findById(userId);
      if (!user) {
        return left(new UserNotFoundError(input.userId));
      }

      if (await this.baristaRepository.findByUserId(user.id)) {
        return left(new DuplicateNameError('Barista profile for user', input.userId));
      }

      const barista = Barista.create({ userId: user.id, name: input.name });
      await this.baristaRepository.save(barista);
      return right(toBaristaOutput(barista));
    } catch (error) {
      return left(toApplicationError(error));
    }
  }

  async setBaristaActive(
    input: SetBaristaActiveInputDto,
  ): Promise<Either<ApplicationError, BaristaOutputDto>> {
    try {
      const barista = await this.baristaRepository.findById(
        EntityId.fromString('barista', input.baristaId),
      );
      if (!barista) {
        return left(new BaristaNotFoundError(input.baristaId));
      }

      if (input.isActive) {
        barista.activate();
      } else {
        barista.deactivate();
      }

      await this.baristaRepository.save(barista);
      return right(toBaristaOutput(barista));
    } catch (error) {
      return left(toApplicationError(error));
    }
  }

  async listBaristas(
    input: ListBaristasInputDto,
  ): Promise<Either<ApplicationError, BaristaOutputDto[]>> {
    try {
      const baristas = await this.baristaRepository.findAll({ activeOnly: input.activeOnly });
      return right(baristas.map(toBaristaOutput));
    } catch (error) {
      return left(toApplicationError(error));
    }
  }
}
