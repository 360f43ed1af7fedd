import { Inject, Injectable, Logger } from '@nestjs/common';
import { Either, left, right } from '../common/either';
import { publishSavedEvents } from '../common/publish-saved-events';
import { CreateOrderInputDto, OrderOutputDto, toOrderOutput } from '../dtos/order.dto';
import {
  ApplicationError,
  CoffeeItemNotFoundError,
  CustomerNotFoundError,
  ValidationError,
  toApplicationError,
} from '@application/errors';
import { CoffeeItem, Order } from '@domain/entities';
import { OrderPricingService } from '@domain/services';
import { EntityId } from '@domain/value-objects';
import {
  ICoffeeItemRepositoryPort,
  ICustomerRepositoryPort,
  IDomainEventPublisherPort,
  IOrderRepositoryPort,
} from '../ports';
import { ICreateOrderPort } from '@application/ports/inbound/create-order.port';

/**
 * CreateOrderUseCase places new orders.
 *
 * Each requested item is resolved against the live menu and priced at the
 * moment of ordering; later menu changes never reach the order.
 * Events are published only once the order has been saved; a publish
 * failure after that is logged and the order is still returned.
 */
@Injectable()
export class CreateOrderUseCase implements ICreateOrderPort {
  private readonly logger = new Logger(CreateOrderUseCase.name);
  private readonly pricing = new OrderPricingService();

  constructor(
    @Inject('IOrderRepository')
    private readonly orderRepository: IOrderRepositoryPort,
    @Inject('ICoffeeItemRepository')
    private readonly coffeeItemRepository: ICoffeeItemRepositoryPort,
    @Inject('ICustomerRepository')
    private readonly customerRepository: ICustomerRepositoryPort,
    @Inject('IDomainEventPublisher')
    private readonly eventPublisher: IDomainEventPublisherPort,
  ) {}

  async execute(input: CreateOrderInputDto): Promise<Either<ApplicationError, OrderOutputDto>> {
    try {
      const validationResult = this.validateInput(input);
      if (validationResult.isLeft()) {
        return validationResult;
      }

      const customerId = EntityId.fromString('customer', input.customerId);
      const customer = await this.customerRepository.findById(customerId);
      if (!customer) {
        return left(new CustomerNotFoundError(input.customerId));
      }

      // Resolve every distinct item on the menu
      const menuResult = await this.loadMenu(input);
      if (menuResult.isLeft()) {
        return menuResult;
      }

      const lines = this.pricing.priceLines(
        input.items.map((item) => ({ ...item, coffeeItemId: item.coffeeItemId.trim() })),
        menuResult.value,
      );

      const order = Order.create({
        customerId: customer.id,
        lines,
        notes: input.notes,
      });

      await this.orderRepository.save(order);
      await publishSavedEvents(this.eventPublisher, order.pullDomainEvents(), this.logger);

      return right(toOrderOutput(order));
    } catch (error) {
      return left(toApplicationError(error));
    }
  }

  // ============ Private Helper Methods ============

  private validateInput(input: CreateOrderInputDto): Either<ApplicationError, void> {
    if (!input.customerId || input.customerId.trim().length === 0) {
      return left(new ValidationError('Customer ID is required', 'customerId'));
    }

    if (!Array.isArray(input.items) || input.items.length === 0) {
      return left(new ValidationError('Order must contain at least one item', 'items'));
    }

    const missingId = input.items.find(
      (item) => !item.coffeeItemId || item.coffeeItemId.trim().length === 0,
    );
    if (missingId) {
      return left(new ValidationError('Coffee item ID is required', 'coffeeItemId'));
    }

    return right(undefined);
  }

  private async loadMenu(
    input: CreateOrderInputDto,
  ): Promise<Either<ApplicationError, Map<string, CoffeeItem>>> {
    const requestedIds = [...new Set(input.items.map((item) => item.coffeeItemId.trim()))];
    const items = await this.coffeeItemRepository.findByIds(
      requestedIds.map((id) => EntityId.fromString('coffeeItem', id)),
    );

    const menu = new Map(items.map((item) => [item.id.toString(), item]));
    const unknownId = requestedIds.find((id) => !menu.has(id));
    if (unknownId) {
      return left(new CoffeeItemNotFoundError(unknownId));
    }

    return right(menu);
  }
}
