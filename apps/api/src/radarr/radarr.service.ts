import { Injectable, Logger } from '@nestjs/common';
import {
  AuthError,
  ConnectionError,
  TimeoutError,
  UpstreamError,
} from './radarr.errors';
import {
  parseRadarrMovies,
  parseRadarrSystemStatus,
  parseRadarrTags,
  type RadarrConnection,
  type RadarrMovie,
  type RadarrSystemStatus,
  type RadarrTag,
} from './radarr.types';

type HttpMethod = 'GET' | 'POST' | 'DELETE';

type SendParams = {
  method: HttpMethod;
  path: string;
  action: string;
  query?: Record<string, string>;
  body?: unknown;
  expectJson: boolean;
};

function errToMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

function describeFetchFailure(err: unknown): string {
  // Node's fetch wraps socket errors: TypeError('fetch failed', { cause }).
  const cause = err instanceof Error ? err.cause : undefined;
  if (cause && typeof cause === 'object') {
    const code = (cause as Record<string, unknown>)['code'];
    if (typeof code === 'string' && code) return code;
    if (cause instanceof Error && cause.message) return cause.message;
  }
  return errToMessage(err);
}

// A reverse proxy can answer 200 with its own JSON (a login or error page).
function expectArray(data: unknown, action: string): unknown[] {
  if (Array.isArray(data)) return data;
  throw new UpstreamError(
    `${action} failed: unexpected response (expected a JSON array)`,
    200,
  );
}

@Injectable()
export class RadarrService {
  private readonly logger = new Logger(RadarrService.name);

  async testConnection(conn: RadarrConnection): Promise<{
    ok: true;
    status: RadarrSystemStatus;
  }> {
    this.logger.log(
      `Testing Radarr connection: ${this.buildApiUrl(conn.baseUrl, 'api/v3/system/status')}`,
    );
    const data = await this.send(conn, {
      method: 'GET',
      path: 'api/v3/system/status',
      action: 'Radarr test',
      expectJson: true,
    });
    return { ok: true, status: parseRadarrSystemStatus(data) };
  }

  async listTags(conn: RadarrConnection): Promise<RadarrTag[]> {
    const action = 'Radarr list tags';
    const data = await this.send(conn, {
      method: 'GET',
      path: 'api/v3/tag',
      action,
      expectJson: true,
    });
    return parseRadarrTags(expectArray(data, action));
  }

  async listMovies(conn: RadarrConnection): Promise<RadarrMovie[]> {
    const action = 'Radarr list movies';
    const data = await this.send(conn, {
      method: 'GET',
      path: 'api/v3/movie',
      action,
      expectJson: true,
    });
    return parseRadarrMovies(expectArray(data, action));
  }

  async deleteMovie(
    conn: RadarrConnection,
    params: { movieId: number; deleteFiles: boolean },
  ): Promise<void> {
    const { movieId, deleteFiles } = params;
    await this.send(conn, {
      method: 'DELETE',
      path: `api/v3/movie/${movieId}`,
      action: 'Radarr delete movie',
      // Exclusions are registered through their own endpoint so the two side
      // effects can fail independently.
      query: {
        deleteFiles: String(deleteFiles),
        addImportExclusion: 'false',
      },
      expectJson: false,
    });
  }

  async addImportExclusion(
    conn: RadarrConnection,
    params: { tmdbId: number; title: string; year: number | null },
  ): Promise<void> {
    const { tmdbId, title, year } = params;
    await this.send(conn, {
      method: 'POST',
      path: 'api/v3/exclusions',
      action: 'Radarr add import exclusion',
      body: {
        tmdbId,
        movieTitle: title,
        movieYear: year ?? 0,
      },
      expectJson: false,
    });
  }

  private async send(
    conn: RadarrConnection,
    params: SendParams,
  ): Promise<unknown> {
    const { method, path, action, query, body, expectJson } = params;
    const url = new URL(this.buildApiUrl(conn.baseUrl, path));
    for (const [k, v] of Object.entries(query ?? {})) {
      url.searchParams.set(k, v);
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), conn.timeoutMs);

    try {
      let res: Response;
      try {
        res = await fetch(url.toString(), {
          method,
          headers: {
            Accept: 'application/json',
            ...(body !== undefined ? { 'Content-Type': 'application/json' } : {}),
            'X-Api-Key': conn.apiKey,
          },
          ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
          signal: controller.signal,
        });
      } catch (err) {
        if (controller.signal.aborted) {
          throw new TimeoutError(
            `${action} failed: timed out after ${conn.timeoutMs}ms`,
          );
        }
        throw new ConnectionError(
          `${action} failed: could not connect to ${url.origin} (${describeFetchFailure(err)})`,
        );
      }

      if (res.status === 401 || res.status === 403) {
        throw new AuthError(
          `${action} failed: unauthorized (HTTP ${res.status}), check the API key`,
          res.status,
        );
      }

      if (!res.ok) {
        const text = await res.text().catch(() => '');
        throw new UpstreamError(
          `${action} failed: HTTP ${res.status} ${text}`.trim(),
          res.status,
        );
      }

      if (!expectJson) return null;

      try {
        return (await res.json()) as unknown;
      } catch (err) {
        if (controller.signal.aborted) {
          throw new TimeoutError(
            `${action} failed: timed out after ${conn.timeoutMs}ms`,
          );
        }
        throw new UpstreamError(
          `${action} failed: unreadable response (${errToMessage(err)})`,
          res.status,
        );
      }
    } finally {
      clearTimeout(timeout);
    }
  }

  private buildApiUrl(baseUrl: string, path: string) {
    const normalized = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
    return new URL(path, normalized).toString();
  }
}
