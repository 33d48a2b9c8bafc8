/**
 * Relay Testing Utilities
 * Mock adapters and helpers for test-driven development
 */

// Mock adapters
export * from '../adapters/storage/mock';
export * from '../adapters/transport/mock';

// Test factories and helpers
export * from '../_shared/testing/mock-message-factory';

// Re-export core for convenience in tests
export * from '../core';
