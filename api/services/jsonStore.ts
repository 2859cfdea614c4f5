import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import path from 'path';
import type { ZodType } from 'zod';
import { KeyedMutex } from './keyedMutex';

let stagingCounter = 0;

function isMissing(error: unknown) {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Flat-file key/value persistence: one JSON object per file.
 *
 * - A missing file loads as an empty mapping.
 * - A file that does not parse, or whose entries fail the schema, also loads
 *   as an empty mapping. The next save overwrites it, so its contents are lost.
 * - Saves stage into a sibling temp file and rename it over the target, so a
 *   reader sees either the previous or the next version, never a torn one.
 */
export class JsonFileStore {
  constructor(private readonly locks = new KeyedMutex()) {}

  async load<T>(filePath: string, schema: ZodType<T>): Promise<Map<string, T>> {
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissing(error)) return new Map();
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      console.warn(`Ignoring unreadable store ${filePath}:`, error instanceof Error ? error.message : error);
      return new Map();
    }
    if (!isPlainObject(parsed)) {
      console.warn(`Ignoring store ${filePath}: top level is not an object`);
      return new Map();
    }

    const entries = new Map<string, T>();
    for (const [key, value] of Object.entries(parsed)) {
      const result = schema.safeParse(value);
      if (!result.success) {
        console.warn(`Ignoring store ${filePath}: entry "${key}" is malformed`);
        return new Map();
      }
      entries.set(key, result.data);
    }
    return entries;
  }

  async save<T>(filePath: string, entries: Map<string, T>): Promise<void> {
    await mkdir(path.dirname(filePath), { recursive: true });
    const payload = JSON.stringify(Object.fromEntries(entries), null, 2);
    stagingCounter += 1;
    const tempPath = `${filePath}.${process.pid}.${stagingCounter}.tmp`;
    try {
      await writeFile(tempPath, payload, 'utf-8');
      await rename(tempPath, filePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }

  /**
   * Load, mutate in place and save, with no other update of the same file in
   * between. If `mutate` throws, nothing is written.
   */
  async update<T, R>(
    filePath: string,
    schema: ZodType<T>,
    mutate: (entries: Map<string, T>) => R | Promise<R>,
  ): Promise<R> {
    return this.locks.runExclusive(filePath, async () => {
      const entries = await this.load(filePath, schema);
      const result = await mutate(entries);
      await this.save(filePath, entries);
      return result;
    });
  }
}
