import { Either } from '@application/common';
import { ApplicationError } from '@application/errors';
import {
  AssignBaristaInputDto,
  CancelOrderInputDto,
  ChangeOrderStatusInputDto,
  ListOrdersInputDto,
  OrderOutputDto,
} from '@application/dtos';

export interface IManageOrderPort {
  getOrder(orderId: string): Promise<Either<ApplicationError, OrderOutputDto>>;

  /**
   * Lists orders newest first. Filters combine with AND.
   */
  listOrders(input: ListOrdersInputDto): Promise<Either<ApplicationError, OrderOutputDto[]>>;

  /**
   * Hands a pending order to an active barista and starts preparation.
   */
  assignBarista(input: AssignBaristaInputDto): Promise<Either<ApplicationError, OrderOutputDto>>;

  /**
   * Moves the order to any status its current status allows.
   * Asking for the current status changes nothing.
   */
  changeStatus(
    input: ChangeOrderStatusInputDto,
  ): Promise<Either<ApplicationError, OrderOutputDto>>;

  markAsReady(orderId: string): Promise<Either<ApplicationError, OrderOutputDto>>;

  complete(orderId: string): Promise<Either<ApplicationError, OrderOutputDto>>;

  /**
   * Cancels an order that has not been completed.
   * Cancelling an already cancelled order changes nothing.
   */
  cancel(input: CancelOrderInputDto): Promise<Either<ApplicationError, OrderOutputDto>>;
}
