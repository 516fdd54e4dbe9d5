import { mkdir, readFile, readdir, rename, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { StoreError, describeError } from './errors.js';

/**
 * Durable key-value storage addressed by caller id.
 * Implementations must survive process restarts; read failures other than
 * "not found" and all write failures surface as StoreError.
 */
export interface KeyValueStore<T> {
  get(key: string): Promise<T | undefined>;
  set(key: string, value: T): Promise<void>;
  delete(key: string): Promise<void>;
  keys(): Promise<string[]>;
}

export type Validator<T> = (value: unknown) => value is T;

/**
 * One pretty-printed JSON file per key under `dir`.
 * Writes go to `<file>.tmp` first and are renamed into place.
 * A file that fails to parse or validate is logged and treated as absent.
 */
export class JsonFileStore<T> implements KeyValueStore<T> {
  constructor(
    private readonly dir: string,
    private readonly validate: Validator<T>,
  ) {}

  async get(key: string): Promise<T | undefined> {
    const filePath = this.filePath(key);
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf8');
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw new StoreError(`Failed to read ${filePath}: ${describeError(err)}`, { cause: err });
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      if (this.validate(parsed)) return parsed;
      console.warn(`[store] ignoring ${filePath}: unexpected shape`);
    } catch (err) {
      console.warn(`[store] ignoring ${filePath}: ${describeError(err)}`);
    }
    return undefined;
  }

  async set(key: string, value: T): Promise<void> {
    const filePath = this.filePath(key);
    const tmpPath = filePath + '.tmp';
    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(tmpPath, JSON.stringify(value, null, 2) + '\n');
      await rename(tmpPath, filePath);
    } catch (err) {
      await unlink(tmpPath).catch(() => undefined);
      throw new StoreError(`Failed to write ${filePath}: ${describeError(err)}`, { cause: err });
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await unlink(this.filePath(key));
    } catch (err) {
      if (isNotFound(err)) return;
      throw new StoreError(`Failed to delete ${this.filePath(key)}: ${describeError(err)}`, { cause: err });
    }
  }

  async keys(): Promise<string[]> {
    let files: string[];
    try {
      files = await readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new StoreError(`Failed to list ${this.dir}: ${describeError(err)}`, { cause: err });
    }
    return files
      .filter((f) => f.endsWith('.json'))
      .map((f) => decodeURIComponent(f.slice(0, -'.json'.length)));
  }

  private filePath(key: string): string {
    // Keys are caller ids; encode so "../x" or "a/b" cannot escape the dir.
    return path.join(this.dir, `${encodeURIComponent(key)}.json`);
  }
}

/**
 * In-process store. Values are deep-copied on the way in and out so callers
 * cannot mutate stored state by accident, matching file-store semantics.
 */
export class MemoryStore<T> implements KeyValueStore<T> {
  private readonly data = new Map<string, T>();

  async get(key: string): Promise<T | undefined> {
    const value = this.data.get(key);
    return value === undefined ? undefined : structuredClone(value);
  }

  async set(key: string, value: T): Promise<void> {
    this.data.set(key, structuredClone(value));
  }

  async delete(key: string): Promise<void> {
    this.data.delete(key);
  }

  async keys(): Promise<string[]> {
    return [...this.data.keys()];
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
