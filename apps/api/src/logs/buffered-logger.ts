import { ConsoleLogger } from '@nestjs/common';
import { serverLogs } from './server-logs.store';

/** Console output plus a copy of every line in the in-memory log buffer. */
export class BufferedLogger extends ConsoleLogger {
  override log(message: unknown, context?: string) {
    super.log(message, context);
    serverLogs.add({ level: 'info', message, context });
  }

  override warn(message: unknown, context?: string) {
    super.warn(message, context);
    serverLogs.add({ level: 'warn', message, context });
  }

  override error(message: unknown, stack?: string, context?: string) {
    super.error(message, stack, context);
    serverLogs.add({ level: 'error', message, stack, context });
  }

  override debug(message: unknown, context?: string) {
    super.debug(message, context);
    serverLogs.add({ level: 'debug', message, context });
  }

  override verbose(message: unknown, context?: string) {
    super.verbose(message, context);
    serverLogs.add({ level: 'debug', message, context });
  }
}
