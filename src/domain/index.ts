/**
 * DOMAIN LAYER
 *
 * The coffee shop's business rules: the menu, and orders moving from placed to handed over.
 * This layer has NO external dependencies (no frameworks, no databases, no APIs).
 *
 * Contains:
 * - Entities: CoffeeItem and Order aggregates, plus Category, Customer, Barista and User
 * - Value Objects: EntityId, Money, Quantity, OrderStatus, OrderLine, Email
 * - Events: records queued on aggregates and drained after a successful save
 * - Exceptions: ValidationException, InvalidStateTransitionException
 * - Services: OrderPricingService (snapshots menu prices into order lines)
 *
 * Rules:
 * - NO imports from application or infrastructure layers
 * - NO imports from external libraries
 */

export * from './common';
export * from './entities';
export * from './events';
export * from './value-objects';
export * from './exceptions';
export * from './services';
