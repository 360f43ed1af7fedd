export * from './application.errors';
export { toApplicationError } from './domain-error.mapper';
