import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse } from '@nestjs/swagger';

/**
 * Swagger decorator for basic health check
 */
export const ApiHealthCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Basic health check',
      description: 'Always public. Returns ok while the process is up',
    }),
    ApiResponse({
      status: 200,
      description: 'Service is up',
      schema: {
        type: 'object',
        properties: {
          status: { type: 'string', example: 'ok' },
        },
      },
    }),
  );
};

/**
 * Swagger decorator for readiness check
 */
export const ApiReadinessCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Readiness check with dependency status',
      description: 'Checks the state store and whether the transport is receiving',
    }),
    ApiResponse({
      status: 200,
      description: 'Service readiness status',
      schema: {
        type: 'object',
        properties: {
          status: {
            type: 'string',
            enum: ['ready', 'not_ready'],
            example: 'ready',
          },
          checks: {
            type: 'object',
            properties: {
              database: { type: 'boolean', example: true },
              transport: { type: 'boolean', example: true },
            },
          },
          details: {
            type: 'object',
            properties: {
              pipeline: {
                type: 'object',
                properties: {
                  stages: { type: 'array', items: { type: 'string' } },
                  inFlight: { type: 'number' },
                  outcomes: { type: 'object' },
                },
              },
              retention: {
                type: 'object',
                properties: {
                  phase: { type: 'string', example: 'wait' },
                },
              },
            },
          },
        },
      },
    }),
  );
};

/**
 * Swagger decorator for the forward counter
 */
export const ApiRelayStats = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Get relay stats',
      description:
        'Reads the persisted stats file. Missing file reports unknown, an unreadable one reports error',
    }),
    ApiResponse({
      status: 200,
      description: 'Relay stats',
      schema: {
        type: 'object',
        properties: {
          messages: { type: 'number', example: 42 },
          status: {
            type: 'string',
            enum: ['starting', 'running', 'stopped', 'reset', 'error', 'unknown'],
            example: 'running',
          },
          storage: {
            type: 'object',
            properties: {
              processed: { type: 'number' },
              duplicateCodes: { type: 'number' },
              filters: { type: 'number' },
              channels: { type: 'number' },
            },
          },
        },
      },
    }),
  );
};
