import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Post,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { ConfigError } from '../settings/config.error';
import {
  ensureHttpBaseUrl,
  isValidHttpBaseUrl,
} from '../settings/settings.rules';
import { SettingsService } from '../settings/settings.service';
import { isRadarrError } from './radarr.errors';
import { RadarrService } from './radarr.service';

type TestConnectionBody = {
  baseUrl?: unknown;
  apiKey?: unknown;
};

function normalizeHttpBaseUrl(raw: string): string {
  const baseUrl = ensureHttpBaseUrl(raw);
  if (!baseUrl) throw new BadRequestException('baseUrl is required');
  if (!isValidHttpBaseUrl(baseUrl)) {
    throw new BadRequestException('baseUrl must be a valid http(s) URL');
  }
  return baseUrl;
}

function optionalString(raw: unknown, field: string): string | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (typeof raw !== 'string') {
    throw new BadRequestException(`${field} must be a string`);
  }
  return raw.trim() || undefined;
}

@Controller('radarr')
@ApiTags('radarr')
export class RadarrController {
  constructor(
    private readonly radarrService: RadarrService,
    private readonly settingsService: SettingsService,
  ) {}

  /**
   * Test the given (or stored) URL and key. The outcome is persisted: success
   * stores the pair and marks the connection verified, failure clears the flag.
   */
  @Post('test')
  async test(@Body() body: TestConnectionBody) {
    const current = await this.settingsService.getSettings();
    const baseUrl = normalizeHttpBaseUrl(
      optionalString(body?.baseUrl, 'baseUrl') ?? current.radarrUrl,
    );
    const apiKey =
      optionalString(body?.apiKey, 'apiKey') ?? current.radarrApiKey;
    if (!apiKey) throw new BadRequestException('apiKey is required');

    try {
      const result = await this.radarrService.testConnection({
        baseUrl,
        apiKey,
        timeoutMs: current.httpTimeoutSeconds * 1000,
      });
      const settings = await this.settingsService.recordConnectionTest({
        radarrUrl: baseUrl,
        radarrApiKey: apiKey,
        ok: true,
      });
      return { ...result, settings };
    } catch (err) {
      if (isRadarrError(err)) {
        await this.settingsService.recordConnectionTest({
          radarrUrl: baseUrl,
          radarrApiKey: apiKey,
          ok: false,
        });
      }
      throw err;
    }
  }

  @Get('tags')
  async tags() {
    const current = await this.settingsService.getSettings();
    if (!current.radarrOk) {
      throw new ConfigError([
        'Radarr connection is not verified: run Test Connection first.',
      ]);
    }
    const tags = await this.radarrService.listTags({
      baseUrl: current.radarrUrl,
      apiKey: current.radarrApiKey,
      timeoutMs: current.httpTimeoutSeconds * 1000,
    });
    const labels = tags
      .map((t) => t.label)
      .sort((a, b) => a.localeCompare(b, undefined, { sensitivity: 'base' }));
    return { tags: labels };
  }
}
