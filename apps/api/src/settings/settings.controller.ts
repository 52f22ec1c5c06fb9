import { Body, Controller, Get, Post, Put } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { ConfigError } from './config.error';
import { SettingsService } from './settings.service';

type UpdateSettingsBody = {
  settings?: unknown;
};

@Controller('settings')
@ApiTags('settings')
export class SettingsController {
  constructor(private readonly settingsService: SettingsService) {}

  @Get()
  async get() {
    return { settings: await this.settingsService.getPublicSettings() };
  }

  @Put()
  async put(@Body() body: UpdateSettingsBody) {
    if (body?.settings === undefined) {
      throw new ConfigError(['settings is required.']);
    }
    const settings = await this.settingsService.updateSettings(body.settings);
    return { ok: true, settings };
  }

  @Post('theme/toggle')
  async toggleTheme() {
    const settings = await this.settingsService.toggleTheme();
    return { ok: true, settings };
  }

  @Post('radarr/reset')
  async resetRadarr() {
    const settings = await this.settingsService.resetRadarr();
    return { ok: true, settings };
  }
}
