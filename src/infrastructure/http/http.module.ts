import { Module } from '@nestjs/common';
import {
  AuthUseCase,
  CreateOrderUseCase,
  ManageMenuUseCase,
  ManageOrderUseCase,
  ManagePeopleUseCase,
} from '@application/use-cases';
import { AuthModule } from '@infrastructure/adapters/auth';
import { EventsModule } from '@infrastructure/adapters/events';
import { MongoDBModule } from '@infrastructure/adapters/persistence/mongodb';
import { MetricsModule } from '@infrastructure/observability/metrics';
import {
  AuthController,
  BaristasController,
  CustomersController,
  HealthController,
  MenuController,
  OrdersController,
} from './controllers';
import { JwtAuthGuard, RolesGuard } from './guards';

/**
 * HTTP Module that configures all REST API endpoints.
 *
 * Use cases are bound to string tokens so controllers depend on the
 * inbound ports only.
 */
@Module({
  imports: [MongoDBModule, EventsModule, AuthModule, MetricsModule],
  controllers: [
    AuthController,
    MenuController,
    OrdersController,
    CustomersController,
    BaristasController,
    HealthController,
  ],
  providers: [
    { provide: 'CreateOrderUseCase', useClass: CreateOrderUseCase },
    { provide: 'ManageOrderUseCase', useClass: ManageOrderUseCase },
    { provide: 'ManageMenuUseCase', useClass: ManageMenuUseCase },
    { provide: 'ManagePeopleUseCase', useClass: ManagePeopleUseCase },
    { provide: 'AuthUseCase', useClass: AuthUseCase },
    JwtAuthGuard,
    RolesGuard,
  ],
})
export class HttpModule {}
