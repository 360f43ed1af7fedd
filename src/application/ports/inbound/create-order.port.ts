import { Either } from '@application/common';
import { ApplicationError } from '@application/errors';
import { CreateOrderInputDto, OrderOutputDto } from '@application/dtos';

export interface ICreateOrderPort {
  /**
   * Places a new order for an existing customer.
   *
   * Every requested item is looked up on the menu and its current price is
   * copied into the order line. The order starts in `pending`.
   *
   * @returns Either an error or the created order
   *
   * @example
   * ```typescript
   * const result = await createOrder.execute({
   *   customerId: 'cus_123',
   *   items: [{ coffeeItemId: 'itm_456', quantity: 2, specialInstructions: 'extra hot' }],
   * });
   * ```
   */
  execute(input: CreateOrderInputDto): Promise<Either<ApplicationError, OrderOutputDto>>;
}
