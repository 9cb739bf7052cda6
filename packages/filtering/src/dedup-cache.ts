import { appendFileSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { PersistenceError } from './errors.js';

/**
 * Identifiers of jobs accepted so far. An identifier in the cache is never
 * accepted again; there is no removal or expiry.
 */
export interface DedupCache {
  readonly size: number;
  contains(id: string): boolean;
  record(id: string): void;
}

export class InMemoryDedupCache implements DedupCache {
  private readonly ids: Set<string>;

  constructor(ids: Iterable<string> = []) {
    this.ids = new Set(ids);
  }

  get size(): number {
    return this.ids.size;
  }

  contains(id: string): boolean {
    return this.ids.has(id);
  }

  record(id: string): void {
    this.ids.add(id);
  }
}

export interface OpenDedupCacheOptions {
  /** Take the `<store>.lock` advisory lock for the lifetime of the cache. Default true. */
  lock?: boolean;
}

function errorCode(error: unknown): unknown {
  return error instanceof Error && 'code' in error ? error.code : undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Signal 0 checks for existence only. EPERM means the process exists under another user.
function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errorCode(error) !== 'ESRCH';
  }
}

/**
 * Line-delimited store, one identifier per line, append-only.
 *
 * Every `record` is written through before it lands in memory, so a crash
 * mid-run keeps all acceptances made so far. Runs are expected to be
 * sequential; `open` guards that with an exclusive lock file.
 */
export class FileDedupCache implements DedupCache {
  readonly filePath: string;
  readonly lockPath: string;
  private readonly ids = new Set<string>();
  private locked = false;

  constructor(filePath: string) {
    this.filePath = filePath;
    this.lockPath = `${filePath}.lock`;
  }

  static open(filePath: string, options: OpenDedupCacheOptions = {}): FileDedupCache {
    const cache = new FileDedupCache(filePath);
    if (options.lock ?? true) {
      cache.lock();
    }

    try {
      cache.load();
    } catch (error) {
      cache.close();
      throw error;
    }

    return cache;
  }

  get size(): number {
    return this.ids.size;
  }

  get isLocked(): boolean {
    return this.locked;
  }

  /**
   * Read the store into memory, creating an empty one when it does not exist.
   */
  load(): ReadonlySet<string> {
    let raw: string;
    try {
      raw = readFileSync(this.filePath, 'utf8');
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        throw new PersistenceError(`Could not read dedup store ${this.filePath}: ${errorMessage(error)}`, this.filePath, {
          cause: error,
        });
      }
      this.create();
      raw = '';
    }

    this.ids.clear();
    for (const line of raw.split(/\r?\n/)) {
      if (line.length > 0) {
        this.ids.add(line);
      }
    }

    return this.ids;
  }

  contains(id: string): boolean {
    return this.ids.has(id);
  }

  record(id: string): void {
    if (this.ids.has(id)) return;

    if (/[\r\n]/.test(id)) {
      throw new PersistenceError(`Identifier ${JSON.stringify(id)} contains a line break`, this.filePath);
    }

    try {
      appendFileSync(this.filePath, `${id}\n`, 'utf8');
    } catch (error) {
      throw new PersistenceError(`Could not append to dedup store ${this.filePath}: ${errorMessage(error)}`, this.filePath, {
        cause: error,
      });
    }

    this.ids.add(id);
  }

  /**
   * Take the lock file. A lock whose recorded pid no longer exists is left
   * over from a crashed run and is taken over.
   */
  lock(): void {
    if (this.locked) return;

    this.ensureDirectory();
    try {
      this.writeLockFile();
    } catch (error) {
      if (errorCode(error) !== 'EEXIST') {
        throw new PersistenceError(`Could not lock dedup store ${this.filePath}: ${errorMessage(error)}`, this.filePath, {
          cause: error,
        });
      }
      this.takeOverStaleLock(error);
    }

    this.locked = true;
  }

  private writeLockFile(): void {
    writeFileSync(this.lockPath, `${process.pid}\n`, { flag: 'wx' });
  }

  private takeOverStaleLock(conflict: unknown): void {
    const holder = this.readLockHolder();
    if (holder === null || isProcessAlive(holder)) {
      const owner = holder === null ? 'another run' : `process ${holder}`;
      throw new PersistenceError(
        `Dedup store ${this.filePath} is locked by ${owner} (remove ${this.lockPath} if none is active)`,
        this.filePath,
        { cause: conflict },
      );
    }

    try {
      rmSync(this.lockPath, { force: true });
      this.writeLockFile();
    } catch (error) {
      throw new PersistenceError(
        `Could not take over stale lock ${this.lockPath}: ${errorMessage(error)}`,
        this.filePath,
        { cause: error },
      );
    }
  }

  private readLockHolder(): number | null {
    let raw: string;
    try {
      raw = readFileSync(this.lockPath, 'utf8');
    } catch {
      return null;
    }

    const content = raw.trim();
    if (!/^\d+$/.test(content)) return null;
    const pid = Number(content);
    return Number.isSafeInteger(pid) && pid > 0 ? pid : null;
  }

  /**
   * Release the lock. The in-memory set stays readable.
   */
  close(): void {
    if (!this.locked) return;

    try {
      rmSync(this.lockPath, { force: true });
    } catch (error) {
      throw new PersistenceError(`Could not release lock ${this.lockPath}: ${errorMessage(error)}`, this.filePath, {
        cause: error,
      });
    }

    this.locked = false;
  }

  private create(): void {
    this.ensureDirectory();
    try {
      writeFileSync(this.filePath, '', { flag: 'a' });
    } catch (error) {
      throw new PersistenceError(`Could not create dedup store ${this.filePath}: ${errorMessage(error)}`, this.filePath, {
        cause: error,
      });
    }
  }

  private ensureDirectory(): void {
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
    } catch (error) {
      throw new PersistenceError(`Could not create directory for ${this.filePath}: ${errorMessage(error)}`, this.filePath, {
        cause: error,
      });
    }
  }
}
