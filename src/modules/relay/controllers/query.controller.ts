import {
  Controller,
  Post,
  Body,
  HttpCode,
  HttpStatus,
  BadRequestException,
  ForbiddenException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { QueryResult, ReadOnlyQueryError, StoreUnavailableError } from '../../../core';
import { AdminOnly } from '../decorators/admin.decorators';
import { AdminQueryService } from '../services/admin-query.service';
import { ApiExecuteQuery } from '../../../_shared/swagger/decorators';
import { ExecuteQueryDto } from '../../../_shared/dto';

/**
 * Query Controller
 * Read-only SQL over the state database
 */
@ApiTags('Query')
@AdminOnly()
@Controller('query')
export class QueryController {
  constructor(private readonly adminQueryService: AdminQueryService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @ApiExecuteQuery()
  async execute(@Body() dto: ExecuteQueryDto): Promise<QueryResult> {
    try {
      return await this.adminQueryService.execute(dto.query);
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        throw new ServiceUnavailableException(error.message);
      }
      if (!(error instanceof ReadOnlyQueryError)) {
        throw error;
      }

      switch (error.reason) {
        case 'not_read_only':
          throw new ForbiddenException(error.message);
        case 'unavailable':
          throw new ServiceUnavailableException(error.message);
        default:
          throw new BadRequestException(error.message);
      }
    }
  }
}
