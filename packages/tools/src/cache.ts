/**
 * Tool catalog cache. The core only calls these four operations; the backend is injected.
 */

export interface ToolCache {
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
  /** True when the key is absent or older than `ttlSeconds` */
  isExpired(key: string, ttlSeconds: number): Promise<boolean>;
}

interface Entry {
  value: unknown;
  storedAt: number;
  ttlSeconds: number;
}

/** Process-local cache. Values are cloned on the way in and out. */
export class MemoryToolCache implements ToolCache {
  private readonly entries = new Map<string, Entry>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<unknown> {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.elapsedSeconds(entry) >= entry.ttlSeconds) {
      this.entries.delete(key);
      return undefined;
    }
    return structuredClone(entry.value);
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    this.entries.set(key, {
      value: structuredClone(value),
      storedAt: this.now(),
      ttlSeconds,
    });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async isExpired(key: string, ttlSeconds: number): Promise<boolean> {
    const entry = this.entries.get(key);
    if (!entry) return true;
    return this.elapsedSeconds(entry) >= ttlSeconds;
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  private elapsedSeconds(entry: Entry): number {
    return (this.now() - entry.storedAt) / 1000;
  }
}
