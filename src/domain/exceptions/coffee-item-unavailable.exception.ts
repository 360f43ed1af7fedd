import { DomainException } from './domain.exception';

/**
 * Thrown when an order line is priced against a menu item that is switched off.
 */
export class CoffeeItemUnavailableException extends DomainException {
  constructor(public readonly coffeeItemId: string, itemName: string) {
    super(`"${itemName}" is currently unavailable`, 'COFFEE_ITEM_UNAVAILABLE');
  }
}
