import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { randomUUID } from 'node:crypto';
import { ensureBootstrapEnv } from '../bootstrap-env';
import { exitCodeForStatus } from '../jobs/run-result';
import { TagCleanupJob } from '../jobs/tag-cleanup.job';
import { RunOnceModule } from './run-once.module';

async function main() {
  await ensureBootstrapEnv();
  const app = await NestFactory.createApplicationContext(RunOnceModule, {
    logger: ['log', 'warn', 'error'],
  });

  try {
    const result = await app.get(TagCleanupJob).run({
      runId: randomUUID(),
      trigger: 'cli',
    });
    process.exitCode = exitCodeForStatus(result.status);
  } finally {
    await app.close();
  }
}

void main().catch((err) => {
  const logger = new Logger('RunOnce');
  logger.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
  process.exitCode = 1;
});
