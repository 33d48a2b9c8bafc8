import { applyDecorators } from '@nestjs/common';
import {
  ApiOperation,
  ApiResponse,
  ApiParam,
  ApiBadRequestResponse,
  ApiNotFoundResponse,
} from '@nestjs/swagger';
import { FilterRuleResponseDto } from '../../dto';

const FILTER_ID_PARAM = ApiParam({
  name: 'id',
  description: 'Filter rule id',
  example: 1,
});

/**
 * Swagger decorator for listing filter rules
 */
export const ApiListFilters = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'List filter rules',
      description: 'Rules in the order the chain applies them',
    }),
    ApiResponse({ status: 200, type: [FilterRuleResponseDto] }),
  );
};

/**
 * Swagger decorator for adding or editing a filter rule
 */
export const ApiSaveFilter = (options: { update?: boolean } = {}) => {
  const decorators: MethodDecorator[] = [
    ApiOperation({
      summary: options.update ? 'Update a filter rule' : 'Add a filter rule',
      description: options.update
        ? 'Replaces the pattern and replacement; the position is kept'
        : 'Appends the rule at the end of the chain',
    }),
    ApiResponse({ status: options.update ? 200 : 201, type: FilterRuleResponseDto }),
    ApiBadRequestResponse({ description: 'Pattern is not a valid regular expression' }),
  ];

  if (options.update) {
    decorators.push(FILTER_ID_PARAM, ApiNotFoundResponse({ description: 'Unknown filter id' }));
  }

  return applyDecorators(...decorators);
};

/**
 * Swagger decorator for deleting a filter rule
 */
export const ApiDeleteFilter = () => {
  return applyDecorators(
    ApiOperation({ summary: 'Delete a filter rule' }),
    FILTER_ID_PARAM,
    ApiResponse({ status: 204, description: 'Deleted' }),
    ApiNotFoundResponse({ description: 'Unknown filter id' }),
  );
};

/**
 * Swagger decorator for reordering a filter rule
 */
export const ApiMoveFilter = (direction: 'up' | 'down') => {
  return applyDecorators(
    ApiOperation({
      summary: `Move a filter rule ${direction}`,
      description: `Swaps the rule with the one ${direction === 'up' ? 'before' : 'after'} it; no-op at the edge`,
    }),
    FILTER_ID_PARAM,
    ApiResponse({ status: 200, description: 'The reordered chain', type: [FilterRuleResponseDto] }),
    ApiNotFoundResponse({ description: 'Unknown filter id' }),
  );
};
