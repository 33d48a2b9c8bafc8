/**
 * Centralized DTOs for the relay admin API
 *
 * These DTOs provide input validation and Swagger documentation
 * for all API endpoints.
 */

export * from './filter.dto';
export * from './channel.dto';
export * from './settings.dto';
export * from './query.dto';
