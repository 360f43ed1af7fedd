// Module
export { MongoDBModule } from './mongodb.module';
export { DbOperationTracker } from './db-operation.tracker';

// Repositories
export * from './repositories';

// Schemas
export * from './schemas';

// Mappers
export * from './mappers';
