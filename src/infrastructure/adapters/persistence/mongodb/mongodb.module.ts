import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { MetricsModule } from '../../../observability/metrics/metrics.module';
import {
  BaristaDocument,
  BaristaSchema,
  CategoryDocument,
  CategorySchema,
  CoffeeItemDocument,
  CoffeeItemSchema,
  CustomerDocument,
  CustomerSchema,
  OrderDocument,
  OrderSchema,
  UserDocument,
  UserSchema,
} from './schemas';
import {
  MongoBaristaRepository,
  MongoCategoryRepository,
  MongoCoffeeItemRepository,
  MongoCustomerRepository,
  MongoOrderRepository,
  MongoUserRepository,
} from './repositories';
import { DbOperationTracker } from './db-operation.tracker';

/**
 * Module that configures MongoDB persistence layer.
 *
 * Registers every Mongoose schema and binds the repository implementations
 * to the port tokens the use cases inject.
 *
 * @example
 * ```typescript
 * constructor(
 *   @Inject('IOrderRepository')
 *   private readonly orderRepository: IOrderRepositoryPort,
 * ) {}
 * ```
 */
@Module({
  imports: [
    MetricsModule,
    MongooseModule.forFeature([
      { name: OrderDocument.name, schema: OrderSchema },
      { name: CoffeeItemDocument.name, schema: CoffeeItemSchema },
      { name: CategoryDocument.name, schema: CategorySchema },
      { name: CustomerDocument.name, schema: CustomerSchema },
      { name: BaristaDocument.name, schema: BaristaSchema },
      { name: UserDocument.name, schema: UserSchema },
    ]),
  ],
  providers: [
    DbOperationTracker,
    { provide: 'IOrderRepository', useClass: MongoOrderRepository },
    { provide: 'ICoffeeItemRepository', useClass: MongoCoffeeItemRepository },
    { provide: 'ICategoryRepository', useClass: MongoCategoryRepository },
    { provide: 'ICustomerRepository', useClass: MongoCustomerRepository },
    { provide: 'IBaristaRepository', useClass: MongoBaristaRepository },
    { provide: 'IUserRepository', useClass: MongoUserRepository },
  ],
  exports: [
    'IOrderRepository',
    'ICoffeeItemRepository',
    'ICategoryRepository',
    'ICustomerRepository',
    'IBaristaRepository',
    'IUserRepository',
  ],
})
export class MongoDBModule {}
