/**
 * INFRASTRUCTURE LAYER
 *
 * Contains all external implementations and framework-specific code.
 * This layer adapts external tools to work with our application.
 *
 * Contains:
 * - Adapters: Implementations of application ports
 *   - Persistence: MongoDB repositories
 *   - Events: domain event publisher (logs + metrics)
 *   - Auth: JWT tokens and password hashing
 * - HTTP: NestJS controllers, guards and the error filter
 * - Observability: pino logging and Prometheus metrics
 * - Config: Configuration modules and environment setup
 *
 * Rules:
 * - CAN import from domain and application layers
 * - Implements interfaces defined in application/ports
 * - Contains all framework-specific code (NestJS, Mongoose, etc.)
 */

export * from './adapters';
export * from './config';
export * from './http';
export * from './observability/logging';
export * from './observability/metrics';
