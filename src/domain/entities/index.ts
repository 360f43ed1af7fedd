export { CoffeeItem } from './coffee-item.entity';
export { Order } from './order.entity';
export { Category } from './category.entity';
export { Customer } from './customer.entity';
export { Barista } from './barista.entity';
export { User } from './user.entity';
