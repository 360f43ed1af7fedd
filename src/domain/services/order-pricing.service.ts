import { CoffeeItem } from '../entities';
import { CoffeeItemUnavailableException, ValidationException } from '../exceptions';
import { OrderLine } from '../value-objects';

export interface LineRequest {
  quantity: number;
  specialInstructions?: string | null;
}

/**
 * Domain Service that turns menu items into priced order lines.
 * The current menu price is copied into the line; the line never refers back to the item.
 */
export class OrderPricingService {
  /**
   * Prices a single line against the item as it is on the menu right now.
   * Throws CoffeeItemUnavailableException if the item is switched off.
   */
  priceLine(item: CoffeeItem, request: LineRequest): OrderLine {
    if (!item.isAvailable) {
      throw new CoffeeItemUnavailableException(item.id.toString(), item.name);
    }

    return OrderLine.create({
      coffeeItemId: item.id,
      itemName: item.name,
      quantity: request.quantity,
      unitPrice: item.price,
      specialInstructions: request.specialInstructions,
    });
  }

  /**
   * Prices every requested line. Lines keep the order of the requests.
   */
  priceLines(
    requests: ReadonlyArray<LineRequest & { coffeeItemId: string }>,
    menu: ReadonlyMap<string, CoffeeItem>,
  ): OrderLine[] {
    return requests.map((request) => {
      const item = menu.get(request.coffeeItemId);
      if (!item) {
        throw new ValidationException(
          'OrderLine',
          `coffee item "${request.coffeeItemId}" was not supplied for pricing`,
          'coffeeItemId',
        );
      }
      return this.priceLine(item, request);
    });
  }
}
