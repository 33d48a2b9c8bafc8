import { Controller, Get, Put, Body } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { AdminOnly } from '../decorators/admin.decorators';
import { RetentionSettings, SettingsService } from '../services/settings.service';
import {
  ApiRetentionSettings,
  ApiDuplicateCodeSettings,
} from '../../../_shared/swagger/decorators';
import {
  UpdateRetentionSettingsDto,
  UpdateDuplicateCodePatternDto,
} from '../../../_shared/dto';

/**
 * Settings Controller
 * Hot settings stored in the `.env` file
 */
@ApiTags('Settings')
@AdminOnly()
@Controller('settings')
export class SettingsController {
  constructor(private readonly settingsService: SettingsService) {}

  @Get('retention')
  @ApiRetentionSettings()
  getRetention(): RetentionSettings {
    return this.settingsService.getRetention();
  }

  @Put('retention')
  @ApiRetentionSettings({ update: true })
  updateRetention(@Body() dto: UpdateRetentionSettingsDto): Promise<RetentionSettings> {
    return this.settingsService.updateRetention(dto);
  }

  @Get('duplicate-codes')
  @ApiDuplicateCodeSettings()
  getDuplicateCodes(): { pattern: string; custom: boolean } {
    return this.settingsService.getDuplicateCodePattern();
  }

  @Put('duplicate-codes')
  @ApiDuplicateCodeSettings({ update: true })
  updateDuplicateCodes(
    @Body() dto: UpdateDuplicateCodePatternDto,
  ): Promise<{ pattern: string; custom: boolean }> {
    return this.settingsService.updateDuplicateCodePattern(dto.regex);
  }
}
