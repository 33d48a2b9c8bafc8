import {
  Controller,
  Get,
  Post,
  Put,
  Delete,
  Param,
  Body,
  HttpCode,
  HttpStatus,
  ParseIntPipe,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { FilterRule } from '../../../core';
import { AdminOnly } from '../decorators/admin.decorators';
import { FilterRulesService } from '../services/filter-rules.service';
import {
  ApiListFilters,
  ApiSaveFilter,
  ApiDeleteFilter,
  ApiMoveFilter,
} from '../../../_shared/swagger/decorators';
import {
  CreateFilterRuleDto,
  UpdateFilterRuleDto,
  FilterRuleResponseDto,
} from '../../../_shared/dto';

/**
 * Filters Controller
 * Ordered link filter rules
 */
@ApiTags('Filters')
@AdminOnly()
@Controller('filters')
export class FiltersController {
  constructor(private readonly filterRulesService: FilterRulesService) {}

  @Get()
  @ApiListFilters()
  async list(): Promise<FilterRuleResponseDto[]> {
    const rules = await this.filterRulesService.list();
    return rules.map(toFilterResponse);
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiSaveFilter()
  async create(@Body() dto: CreateFilterRuleDto): Promise<FilterRuleResponseDto> {
    const rule = await this.filterRulesService.create(dto.pattern, dto.replacement);
    return toFilterResponse(rule);
  }

  @Put(':id')
  @ApiSaveFilter({ update: true })
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateFilterRuleDto,
  ): Promise<FilterRuleResponseDto> {
    const rule = await this.filterRulesService.update(id, dto.pattern, dto.replacement);
    return toFilterResponse(rule);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiDeleteFilter()
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.filterRulesService.remove(id);
  }

  @Post(':id/move-up')
  @HttpCode(HttpStatus.OK)
  @ApiMoveFilter('up')
  async moveUp(@Param('id', ParseIntPipe) id: number): Promise<FilterRuleResponseDto[]> {
    const rules = await this.filterRulesService.move(id, 'up');
    return rules.map(toFilterResponse);
  }

  @Post(':id/move-down')
  @HttpCode(HttpStatus.OK)
  @ApiMoveFilter('down')
  async moveDown(@Param('id', ParseIntPipe) id: number): Promise<FilterRuleResponseDto[]> {
    const rules = await this.filterRulesService.move(id, 'down');
    return rules.map(toFilterResponse);
  }
}

export function toFilterResponse(rule: FilterRule): FilterRuleResponseDto {
  return {
    id: rule.id,
    pattern: rule.pattern,
    replacement: rule.replacement,
    sortOrder: rule.sortOrder,
    linkExpansion: rule.isLinkExpansion(),
  };
}
