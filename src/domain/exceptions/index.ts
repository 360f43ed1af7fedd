export { DomainException } from './domain.exception';
export { ValidationException } from './validation.exception';
export { InvalidStateTransitionException } from './invalid-state-transition.exception';
export { CoffeeItemUnavailableException } from './coffee-item-unavailable.exception';
