// Append-only JSON-lines file.
//
// One self-contained JSON object per line. Writers are serialized twice: an
// in-process promise queue orders appends from the same instance, and a
// proper-lockfile lock keeps the HTTP server and the auditor CLI from
// interleaving writes to the same file. Pruning rewrites the file through a
// temp file and rename so a crash never leaves it truncated.

import { appendFile, mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import type { FastifyBaseLogger } from 'fastify';
import type { z } from 'zod';

import { withFileLock } from './file-lock.js';

export interface JsonlFileOptions<T> {
  /** Path of the log file; parent directories are created on first write */
  path: string;
  /** Schema every line is validated against when read back */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  logger: FastifyBaseLogger;
}

export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class JsonlFile<T> {
  readonly path: string;
  private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  private readonly logger: FastifyBaseLogger;
  private tail: Promise<void> = Promise.resolve();
  private dirReady = false;

  constructor(options: JsonlFileOptions<T>) {
    this.path = options.path;
    this.schema = options.schema;
    this.logger = options.logger;
  }

  /** Append one record as a single line. */
  async append(record: T): Promise<void> {
    const line = `${JSON.stringify(record)}\n`;
    await this.enqueue(async () => {
      await this.ensureDir();
      await withFileLock(this.path, () => appendFile(this.path, line, 'utf-8'));
    });
  }

  /**
   * Read every valid record top to bottom. A missing file reads as empty;
   * lines that are not valid JSON or fail the schema are skipped with a warning.
   */
  async readAll(): Promise<T[]> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (isNotFoundError(error)) {
        return [];
      }
      throw error;
    }

    const records: T[] = [];
    const lines = content.split('\n');
    for (let index = 0; index < lines.length; index++) {
      const line = lines[index]?.trim();
      if (!line) continue;

      const record = this.parseLine(line);
      if (record === undefined) {
        this.logger.warn({ path: this.path, line: index + 1 }, 'Skipping malformed log line');
        continue;
      }
      records.push(record);
    }
    return records;
  }

  /**
   * Keep only the most recent `maxLines` lines, preserving their order.
   *
   * @returns Number of lines dropped
   */
  async pruneToLast(maxLines: number): Promise<number> {
    return this.enqueue(async () => {
      await this.ensureDir();
      return withFileLock(this.path, async () => {
        let content: string;
        try {
          content = await readFile(this.path, 'utf-8');
        } catch (error) {
          if (isNotFoundError(error)) return 0;
          throw error;
        }

        const lines = content.split('\n').filter((line) => line.trim() !== '');
        if (lines.length <= maxLines) {
          return 0;
        }

        const kept = lines.slice(lines.length - maxLines);
        const tempPath = `${this.path}.${process.pid}.tmp`;
        await writeFile(tempPath, `${kept.join('\n')}\n`, 'utf-8');
        await rename(tempPath, this.path);
        return lines.length - kept.length;
      });
    });
  }

  private parseLine(line: string): T | undefined {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      return undefined;
    }
    const result = this.schema.safeParse(raw);
    return result.success ? result.data : undefined;
  }

  private enqueue<R>(task: () => Promise<R>): Promise<R> {
    const result = this.tail.then(task);
    // The queue only tracks ordering; the caller still sees the rejection.
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async ensureDir(): Promise<void> {
    if (this.dirReady) return;
    await mkdir(dirname(this.path), { recursive: true });
    this.dirReady = true;
  }
}
