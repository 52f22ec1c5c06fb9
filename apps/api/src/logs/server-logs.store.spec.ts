import { BufferedLogger } from './buffered-logger';
import { ServerLogBuffer, serverLogs } from './server-logs.store';

describe('ServerLogBuffer', () => {
  let clock: Date;
  let buffer: ServerLogBuffer;

  beforeEach(() => {
    clock = new Date('2024-06-30T12:00:00Z');
    buffer = new ServerLogBuffer(3, () => clock);
  });

  it('keeps only the newest entries up to its capacity', () => {
    for (const message of ['a', 'b', 'c', 'd']) {
      buffer.add({ level: 'info', message });
    }

    const { logs, latestId } = buffer.list();
    expect(logs.map((l) => [l.id, l.message])).toEqual([
      [2, 'b'],
      [3, 'c'],
      [4, 'd'],
    ]);
    expect(latestId).toBe(4);
  });

  it('filters by id, level and limit', () => {
    buffer.add({ level: 'debug', message: 'one' });
    buffer.add({ level: 'warn', message: 'two' });
    buffer.add({ level: 'error', message: 'three' });

    expect(buffer.list({ afterId: 1 }).logs.map((l) => l.message)).toEqual([
      'two',
      'three',
    ]);
    expect(
      buffer.list({ minLevel: 'error' }).logs.map((l) => l.message),
    ).toEqual(['three']);
    expect(buffer.list({ limit: 1 }).logs.map((l) => l.message)).toEqual([
      'three',
    ]);
  });

  it('drops framework chatter but keeps its warnings', () => {
    expect(
      buffer.add({ level: 'info', message: 'Mapped route', context: 'RouterExplorer' }),
    ).toBeNull();
    expect(
      buffer.add({ level: 'warn', message: 'odd route', context: 'RouterExplorer' }),
    ).toMatchObject({ context: 'RouterExplorer', message: 'odd route' });
  });

  it('joins message and stack and serialises objects', () => {
    const entry = buffer.add({
      level: 'error',
      message: { runId: 'r1' },
      stack: 'Error: boom',
      context: ' JobsService ',
    });

    expect(entry).toEqual({
      id: 1,
      time: '2024-06-30T12:00:00.000Z',
      level: 'error',
      message: '{"runId":"r1"}\nError: boom',
      context: 'JobsService',
    });
    expect(buffer.add({ level: 'info', message: '   ' })).toBeNull();
  });

  it('prunes entries older than the cutoff', () => {
    clock = new Date('2024-06-01T00:00:00Z');
    buffer.add({ level: 'info', message: 'old' });
    clock = new Date('2024-06-30T00:00:00Z');
    buffer.add({ level: 'info', message: 'new' });

    expect(buffer.pruneOlderThan(new Date('2024-06-15T00:00:00Z'))).toEqual({
      removed: 1,
      kept: 1,
    });
    expect(buffer.list().logs.map((l) => l.message)).toEqual(['new']);
  });
});

describe('BufferedLogger', () => {
  it('copies log lines into the server log buffer', () => {
    const { latestId } = serverLogs.list();
    const logger = new BufferedLogger();
    jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    jest.spyOn(process.stderr, 'write').mockImplementation(() => true);

    logger.log('Run started', 'TagCleanupJob');
    logger.error('Run failed', 'Error: boom', 'TagCleanupJob');

    expect(
      serverLogs
        .list({ afterId: latestId })
        .logs.map((l) => [l.level, l.message, l.context]),
    ).toEqual([
      ['info', 'Run started', 'TagCleanupJob'],
      ['error', 'Run failed\nError: boom', 'TagCleanupJob'],
    ]);
    jest.restoreAllMocks();
  });
});
