import { BadGatewayException, HttpStatus } from '@nestjs/common';

export type RadarrErrorKind = 'connection' | 'timeout' | 'auth' | 'upstream';

/**
 * Base for every failure talking to Radarr. The `kind` lets callers tell
 * "bad credentials" apart from "host down" without matching on messages.
 */
export abstract class RadarrError extends BadGatewayException {
  protected constructor(
    readonly kind: RadarrErrorKind,
    message: string,
  ) {
    super({
      statusCode: HttpStatus.BAD_GATEWAY,
      error: 'Bad Gateway',
      message,
      kind,
    });
  }
}

export class ConnectionError extends RadarrError {
  constructor(message: string) {
    super('connection', message);
  }
}

export class TimeoutError extends RadarrError {
  constructor(message: string) {
    super('timeout', message);
  }
}

export class AuthError extends RadarrError {
  constructor(
    message: string,
    readonly upstreamStatus: number,
  ) {
    super('auth', message);
  }
}

export class UpstreamError extends RadarrError {
  constructor(
    message: string,
    readonly upstreamStatus: number | null,
  ) {
    super('upstream', message);
  }
}

export function isRadarrError(err: unknown): err is RadarrError {
  return err instanceof RadarrError;
}
