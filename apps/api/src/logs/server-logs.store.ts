import { inspect } from 'node:util';

export type ServerLogLevel = 'debug' | 'info' | 'warn' | 'error';

export const SERVER_LOG_LEVELS: readonly ServerLogLevel[] = [
  'debug',
  'info',
  'warn',
  'error',
];

export type ServerLogEntry = {
  id: number;
  time: string;
  level: ServerLogLevel;
  message: string;
  context: string | null;
};

// Nest bootstrap chatter; only warnings and errors from these are kept.
const QUIET_CONTEXTS = new Set<string>([
  'NestFactory',
  'InstanceLoader',
  'RoutesResolver',
  'RouterExplorer',
  'NestApplication',
]);

const MAX_MESSAGE_LENGTH = 10_000;

function stringify(input: unknown): string {
  if (input === null || input === undefined) return '';
  if (typeof input === 'string') return input;
  if (input instanceof Error) return input.stack ?? input.message;
  if (typeof input === 'object') {
    try {
      return JSON.stringify(input) ?? inspect(input, { depth: 4 });
    } catch {
      // circular
      return inspect(input, { depth: 4 });
    }
  }
  return String(input);
}

/**
 * Fixed-size in-memory log history. Ids increase monotonically across
 * clears so clients can poll with `afterId`.
 */
export class ServerLogBuffer {
  private entries: ServerLogEntry[] = [];
  private nextId = 1;

  constructor(
    readonly capacity: number,
    private readonly now: () => Date = () => new Date(),
  ) {}

  get size(): number {
    return this.entries.length;
  }

  add(params: {
    level: ServerLogLevel;
    message: unknown;
    stack?: unknown;
    context?: unknown;
  }): ServerLogEntry | null {
    const message = stringify(params.message).trim();
    const stack = stringify(params.stack).trim();
    const text = [message, stack].filter(Boolean).join('\n');
    if (!text) return null;

    const context =
      typeof params.context === 'string' && params.context.trim()
        ? params.context.trim()
        : null;
    const important = params.level === 'warn' || params.level === 'error';
    if (!important && context && QUIET_CONTEXTS.has(context)) return null;

    const entry: ServerLogEntry = {
      id: this.nextId++,
      time: this.now().toISOString(),
      level: params.level,
      message:
        text.length > MAX_MESSAGE_LENGTH
          ? `${text.slice(0, MAX_MESSAGE_LENGTH)}...`
          : text,
      context,
    };
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
    return entry;
  }

  list(params: {
    afterId?: number;
    limit?: number;
    minLevel?: ServerLogLevel;
  } = {}): { logs: ServerLogEntry[]; latestId: number } {
    const limit = Math.max(1, Math.min(this.capacity, params.limit ?? 200));
    const minRank = SERVER_LOG_LEVELS.indexOf(params.minLevel ?? 'debug');
    const { afterId } = params;

    const logs = this.entries.filter(
      (e) =>
        (afterId === undefined || e.id > afterId) &&
        SERVER_LOG_LEVELS.indexOf(e.level) >= minRank,
    );
    return { logs: logs.slice(-limit), latestId: this.nextId - 1 };
  }

  pruneOlderThan(cutoff: Date): { removed: number; kept: number } {
    const cutoffMs = cutoff.getTime();
    const before = this.entries.length;
    this.entries = this.entries.filter((e) => Date.parse(e.time) >= cutoffMs);
    return { removed: before - this.entries.length, kept: this.entries.length };
  }
}

/** Process-wide buffer fed by BufferedLogger and served by GET /api/logs. */
export const serverLogs = new ServerLogBuffer(5000);
