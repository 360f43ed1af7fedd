export { AuthController } from './auth.controller';
export { BaristasController } from './baristas.controller';
export { CustomersController } from './customers.controller';
export { HealthController } from './health.controller';
export { MenuController } from './menu.controller';
export { OrdersController } from './orders.controller';
