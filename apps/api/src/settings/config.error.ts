import { BadRequestException } from '@nestjs/common';

/**
 * Settings that do not allow the requested action (missing Radarr URL or
 * key, unverified connection, invalid values). Surfaced to the user as-is.
 */
export class ConfigError extends BadRequestException {
  constructor(readonly problems: string[]) {
    super(problems.join(' '));
  }
}
