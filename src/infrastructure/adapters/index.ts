// Adapters barrel export
export * from './persistence/mongodb';
export * from './events';
export * from './auth';
