import { RWLock } from 'async-rwlock';
import type { RESPValue } from './types';

interface Entry {
  key: Buffer;
  value: RESPValue;
}

/**
 * The server's key space. Every operation runs under the write side of a
 * single lock, so operations from different connections never interleave.
 * Keys are binary; they are indexed by their latin1 spelling, which maps
 * bytes to string one-to-one.
 */
export class KeyValueStore {
  private kv: Map<string, Entry> = new Map();
  private lock = new RWLock();

  private async exclusive<T>(fn: () => T): Promise<T> {
    await this.lock.writeLock();
    try {
      return fn();
    } finally {
      this.lock.unlock();
    }
  }

  get size(): number {
    return this.kv.size;
  }

  /** Stored value, or null when the key is absent. */
  get(key: Buffer): Promise<RESPValue | null> {
    return this.exclusive(() => this.kv.get(key.toString('latin1'))?.value ?? null);
  }

  set(key: Buffer, value: RESPValue): Promise<number> {
    return this.exclusive(() => {
      this.kv.set(key.toString('latin1'), { key, value });
      return 1;
    });
  }

  delete(key: Buffer): Promise<number> {
    return this.exclusive(() => (this.kv.delete(key.toString('latin1')) ? 1 : 0));
  }

  flush(): Promise<number> {
    return this.exclusive(() => {
      const count = this.kv.size;
      this.kv.clear();
      return count;
    });
  }

  mget(keys: Buffer[]): Promise<(RESPValue | null)[]> {
    return this.exclusive(() =>
      keys.map((key) => this.kv.get(key.toString('latin1'))?.value ?? null)
    );
  }

  /** Apply pairs left to right; a repeated key ends with its last value. */
  mset(pairs: [Buffer, RESPValue][]): Promise<number> {
    return this.exclusive(() => {
      for (const [key, value] of pairs) {
        this.kv.set(key.toString('latin1'), { key, value });
      }
      return pairs.length;
    });
  }

  keys(): Promise<Buffer[]> {
    return this.exclusive(() => Array.from(this.kv.values(), (entry) => entry.key));
  }
}
