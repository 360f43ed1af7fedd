export { IOrderRepositoryPort, OrderFilters } from './order-repository.port';
export { ICoffeeItemRepositoryPort, CoffeeItemFilters } from './coffee-item-repository.port';
export { ICategoryRepositoryPort } from './category-repository.port';
export { ICustomerRepositoryPort } from './customer-repository.port';
export { IBaristaRepositoryPort, BaristaFilters } from './barista-repository.port';
export { IUserRepositoryPort } from './user-repository.port';
export { IDomainEventPublisherPort } from './domain-event-publisher.port';
export { ITokenServicePort, TokenPayload, IssuedToken } from './token-service.port';
export { IPasswordHasherPort } from './password-hasher.port';
