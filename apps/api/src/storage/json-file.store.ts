import { Logger } from '@nestjs/common';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Single JSON document on disk. Writes go through a temp file and a rename so
 * a reader never sees a half-written document.
 */
export class JsonFileStore {
  private readonly logger = new Logger(JsonFileStore.name);

  constructor(readonly filePath: string) {}

  async read(): Promise<unknown> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException | undefined)?.code === 'ENOENT') {
        return null;
      }
      throw err;
    }

    try {
      return JSON.parse(raw) as unknown;
    } catch (err) {
      this.logger.warn(
        `Ignoring unreadable JSON in ${this.filePath}: ${(err as Error)?.message ?? String(err)}`,
      );
      return null;
    }
  }

  async write(value: unknown): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.tmp`;
    await writeFile(tmpPath, `${JSON.stringify(value, null, 2)}\n`, 'utf8');
    await rename(tmpPath, this.filePath);
  }
}
