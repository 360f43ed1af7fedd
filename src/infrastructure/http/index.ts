export { HttpModule } from './http.module';
export * from './controllers';
export * from './decorators';
export * from './filters';
export * from './guards';
export * from './responses';
