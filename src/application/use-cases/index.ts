export { CreateOrderUseCase } from './create-order.use-case';
export { ManageOrderUseCase } from './manage-order.use-case';
export { ManageMenuUseCase } from './manage-menu.use-case';
export { ManagePeopleUseCase } from './manage-people.use-case';
export { AuthUseCase } from './auth.use-case';
