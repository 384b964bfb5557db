import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { KeyedLock } from './keyedLock.js';
import { describeError, logger } from './logger.js';

export class JsonStorage<T> {
  private readonly writes = new KeyedLock();

  constructor(private readonly filePath: string, private readonly fallback: T) {}

  get path(): string {
    return this.filePath;
  }

  async read(): Promise<T> {
    try {
      const raw = await readFile(this.filePath, 'utf8');
      return JSON.parse(raw) as T;
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? error.code : undefined;
      if (code === 'ENOENT') {
        logger.info('Storage file not found, using default state', { file: this.filePath });
      } else {
        logger.warn('Failed reading storage, using default state', {
          file: this.filePath,
          error: describeError(error)
        });
      }
      return structuredClone(this.fallback);
    }
  }

  /** Replaces the file atomically via a sibling temp file. */
  write(data: T): Promise<void> {
    const serialized = JSON.stringify(data, null, 2);
    return this.writes.run(this.filePath, async () => {
      await mkdir(dirname(this.filePath), { recursive: true });
      const tempPath = `${this.filePath}.tmp`;
      await writeFile(tempPath, serialized, 'utf8');
      await rename(tempPath, this.filePath);
    });
  }
}
