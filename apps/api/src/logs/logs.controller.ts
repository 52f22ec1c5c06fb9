import { BadRequestException, Controller, Get, Query } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import {
  SERVER_LOG_LEVELS,
  serverLogs,
  type ServerLogLevel,
} from './server-logs.store';

function parseOptionalInt(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const n = Number.parseInt(raw, 10);
  return Number.isFinite(n) ? n : undefined;
}

function parseLevel(raw: string | undefined): ServerLogLevel | undefined {
  if (!raw) return undefined;
  const level = SERVER_LOG_LEVELS.find((l) => l === raw.trim().toLowerCase());
  if (!level) {
    throw new BadRequestException(
      `level must be one of ${SERVER_LOG_LEVELS.join(', ')}`,
    );
  }
  return level;
}

@Controller('logs')
@ApiTags('logs')
export class LogsController {
  @Get()
  getLogs(
    @Query('afterId') afterIdRaw?: string,
    @Query('limit') limitRaw?: string,
    @Query('level') levelRaw?: string,
  ) {
    const data = serverLogs.list({
      afterId: parseOptionalInt(afterIdRaw),
      limit: parseOptionalInt(limitRaw),
      minLevel: parseLevel(levelRaw),
    });
    return { ok: true, ...data };
  }
}
