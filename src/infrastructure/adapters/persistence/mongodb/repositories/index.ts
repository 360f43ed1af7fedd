export { MongoOrderRepository } from './mongo-order.repository';
export { MongoCoffeeItemRepository } from './mongo-coffee-item.repository';
export { MongoCategoryRepository } from './mongo-category.repository';
export { MongoCustomerRepository } from './mongo-customer.repository';
export { MongoBaristaRepository } from './mongo-barista.repository';
export { MongoUserRepository } from './mongo-user.repository';
