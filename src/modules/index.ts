/**
 * Channel Relay - NestJS integration
 */

export * from './relay';
