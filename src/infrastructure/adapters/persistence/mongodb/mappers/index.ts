export { OrderMapper } from './order.mapper';
export { CoffeeItemMapper } from './coffee-item.mapper';
export { CategoryMapper, CustomerMapper, BaristaMapper, UserMapper } from './people.mapper';
