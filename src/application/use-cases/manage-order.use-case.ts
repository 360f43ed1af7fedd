import { Inject, Injectable, Logger } from '@nestjs/common';
import { Either, left, right } from '../common/either';
import { publishSavedEvents } from '../common/publish-saved-events';
import {
  AssignBaristaInputDto,
  CancelOrderInputDto,
  ChangeOrderStatusInputDto,
  ListOrdersInputDto,
  OrderOutputDto,
  toOrderOutput,
} from '../dtos/order.dto';
import {
  ApplicationError,
  BaristaInactiveError,
  BaristaNotFoundError,
  OrderNotFoundError,
  ValidationError,
  toApplicationError,
} from '@application/errors';
import { Order } from '@domain/entities';
import { EntityId, OrderStatus } from '@domain/value-objects';
import { IBaristaRepositoryPort, IDomainEventPublisherPort, IOrderRepositoryPort } from '../ports';
import { IManageOrderPort } from '@application/ports/inbound/manage-order.port';

/**
 * ManageOrderUseCase drives orders through their lifecycle after creation.
 *
 * Every command follows the same steps: load, apply one aggregate operation,
 * save with the version check, then publish whatever the aggregate recorded.
 * A command that records nothing (a no-op) is not saved.
 */
@Injectable()
export class ManageOrderUseCase implements IManageOrderPort {
  private readonly logger = new Logger(ManageOrderUseCase.name);

  constructor(
    @Inject('IOrderRepository')
    private readonly orderRepository: IOrderRepositoryPort,
    @Inject('IBaristaRepository')
    private readonly baristaRepository: IBaristaRepositoryPort,
    @Inject('IDomainEventPublisher')
    private readonly eventPublisher: IDomainEventPublisherPort,
  ) {}

  async getOrder(orderId: string): Promise<Either<ApplicationError, OrderOutputDto>> {
    try {
      const order = await this.findOrder(orderId);
      if (!order) {
        return left(new OrderNotFoundError(orderId));
      }
      return right(toOrderOutput(order));
    } catch (error) {
      return left(toApplicationError(error, orderId));
    }
  }

  async listOrders(input: ListOrdersInputDto): Promise<Either<ApplicationError, OrderOutputDto[]>> {
    try {
      const status = input.status ? OrderStatus.fromString(input.status).value : undefined;
      const orders = await this.orderRepository.findAll({
        status,
        customerId: input.customerId,
        baristaId: input.baristaId,
      });
      return right(orders.map(toOrderOutput));
    } catch (error) {
      return left(toApplicationError(error));
    }
  }

  async assignBarista(
    input: AssignBaristaInputDto,
  ): Promise<Either<ApplicationError, OrderOutputDto>> {
    try {
      if (!input.baristaId || input.baristaId.trim().length === 0) {
        return left(new ValidationError('Barista ID is required', 'baristaId'));
      }

      const order = await this.findOrder(input.orderId);
      if (!order) {
        return left(new OrderNotFoundError(input.orderId));
      }

      const barista = await this.baristaRepository.findById(
        EntityId.fromString('barista', input.baristaId),
      );
      if (!barista) {
        return left(new BaristaNotFoundError(input.baristaId));
      }
      if (!barista.isActive) {
        return left(new BaristaInactiveError(input.baristaId));
      }

      order.assignBarista(barista.id);
      return right(await this.persist(order));
    } catch (error) {
      return left(toApplicationError(error, input.orderId));
    }
  }

  changeStatus(
    input: ChangeOrderStatusInputDto,
  ): Promise<Either<ApplicationError, OrderOutputDto>> {
    return this.apply(input.orderId, (order) =>
      order.changeStatus(OrderStatus.fromString(input.status)),
    );
  }

  markAsReady(orderId: string): Promise<Either<ApplicationError, OrderOutputDto>> {
    return this.apply(orderId, (order) => order.markAsReady());
  }

  complete(orderId: string): Promise<Either<ApplicationError, OrderOutputDto>> {
    return this.apply(orderId, (order) => order.complete());
  }

  cancel(input: CancelOrderInputDto): Promise<Either<ApplicationError, OrderOutputDto>> {
    return this.apply(input.orderId, (order) => order.cancel(input.reason));
  }

  // ============ Private Helper Methods ============

  private async apply(
    orderId: string,
    operation: (order: Order) => void,
  ): Promise<Either<ApplicationError, OrderOutputDto>> {
    try {
      const order = await this.findOrder(orderId);
      if (!order) {
        return left(new OrderNotFoundError(orderId));
      }

      operation(order);
      return right(await this.persist(order));
    } catch (error) {
      return left(toApplicationError(error, orderId));
    }
  }

  // Save first, publish after: a failed save keeps the events on the aggregate
  private async persist(order: Order): Promise<OrderOutputDto> {
    if (order.domainEvents.length > 0) {
      await this.orderRepository.save(order);
      await publishSavedEvents(this.eventPublisher, order.pullDomainEvents(), this.logger);
    }
    return toOrderOutput(order);
  }

  private findOrder(orderId: string): Promise<Order | null> {
    return this.orderRepository.findById(EntityId.fromString('order', orderId));
  }
}
