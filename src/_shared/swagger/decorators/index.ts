/**
 * Centralized Swagger decorators for the relay admin API
 *
 * These decorators provide consistent API documentation across all controllers
 * while keeping the controllers clean and focused on business logic.
 */

export * from './filter.decorators';
export * from './admin.decorators';
export * from './health.decorators';
