import { applyDecorators } from '@nestjs/common';
import {
  ApiOperation,
  ApiResponse,
  ApiParam,
  ApiBadRequestResponse,
  ApiForbiddenResponse,
  ApiServiceUnavailableResponse,
} from '@nestjs/swagger';
import { QueryResultDto } from '../../dto';

/**
 * Swagger decorator for per-channel statistics
 */
export const ApiChannelStats = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Per-source message counts',
      description:
        'Configured sources first, in configured order, then sources only present in the store',
    }),
    ApiResponse({
      status: 200,
      schema: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            sourceId: { type: 'number', example: -1001234567890 },
            name: { type: 'string', example: 'Deals channel' },
            messages: { type: 'number', example: 12 },
            configured: { type: 'boolean', example: true },
          },
        },
      },
    }),
  );
};

/**
 * Swagger decorator for labelling a source chat
 */
export const ApiUpsertChannel = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Add or relabel a source chat',
      description: 'Unknown chats are added to SOURCE_CHATS and relayed from now on',
    }),
    ApiParam({ name: 'sourceId', example: -1001234567890 }),
    ApiResponse({ status: 200, description: 'Saved label' }),
  );
};

const RETENTION_SCHEMA = {
  type: 'object',
  properties: {
    cleanupDays: { type: 'number', example: 30 },
    cleanupTime: { type: 'string', example: '00:05' },
    clearCodesWhenDisabled: { type: 'boolean', example: true },
  },
};

/**
 * Swagger decorator for reading or writing retention settings
 */
export const ApiRetentionSettings = (options: { update?: boolean } = {}) => {
  return applyDecorators(
    ApiOperation({
      summary: options.update ? 'Update retention settings' : 'Get retention settings',
      description: 'Effective values; applied from the next scheduler cycle',
    }),
    ApiResponse({ status: 200, schema: RETENTION_SCHEMA }),
    ...(options.update ? [ApiBadRequestResponse({ description: 'Invalid cleanup time' })] : []),
  );
};

/**
 * Swagger decorator for the duplicate-code pattern
 */
export const ApiDuplicateCodeSettings = (options: { update?: boolean } = {}) => {
  return applyDecorators(
    ApiOperation({
      summary: options.update ? 'Set the duplicate-code pattern' : 'Get the duplicate-code pattern',
    }),
    ApiResponse({
      status: 200,
      schema: {
        type: 'object',
        properties: {
          pattern: { type: 'string', example: '\\b[A-Za-z0-9]{6,}\\b' },
          custom: { type: 'boolean', example: false },
        },
      },
    }),
    ...(options.update
      ? [ApiBadRequestResponse({ description: 'Pattern is not a valid regular expression' })]
      : []),
  );
};

/**
 * Swagger decorator for a manual retention sweep
 */
export const ApiRunCleanup = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Run a retention sweep now',
      description: 'Uses the current retention settings',
    }),
    ApiResponse({
      status: 200,
      schema: {
        type: 'object',
        properties: {
          retentionDays: { type: 'number' },
          cutoff: { type: 'string', format: 'date-time', nullable: true },
          processedRemoved: { type: 'number' },
          codesRemoved: { type: 'number' },
          processedSweepSkipped: { type: 'boolean' },
          codesCleared: { type: 'boolean' },
          error: { type: 'string', nullable: true },
        },
      },
    }),
  );
};

/**
 * Swagger decorator for wiping processed ids and codes
 */
export const ApiClearState = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Clear relay state',
      description: 'Deletes all processed ids and duplicate codes. Filters and labels are kept',
    }),
    ApiResponse({ status: 204, description: 'Cleared' }),
  );
};

/**
 * Swagger decorator for ad-hoc queries
 */
export const ApiExecuteQuery = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Run a read-only SQL query',
      description:
        'Accepted only when SQLite reports the single statement as read-only and row-returning',
    }),
    ApiResponse({ status: 200, type: QueryResultDto }),
    ApiBadRequestResponse({ description: 'Empty query or SQL error' }),
    ApiForbiddenResponse({ description: 'Statement is not read-only' }),
    ApiServiceUnavailableResponse({ description: 'No SQLite database configured' }),
  );
};
