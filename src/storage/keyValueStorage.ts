import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";

/**
 * Minimal durable key-value backend. Values are opaque strings; callers own
 * their encoding.
 */
export interface KeyValueStorage {
  getItem(key: string): Promise<string | null>;
  setItem(key: string, value: string): Promise<void>;
  removeItem(key: string): Promise<void>;
  keys(): Promise<string[]>;
}

export class MemoryKeyValueStorage implements KeyValueStorage {
  private readonly items = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.items.set(key, value);
    }
  }

  async getItem(key: string): Promise<string | null> {
    return this.items.get(key) ?? null;
  }

  async setItem(key: string, value: string): Promise<void> {
    this.items.set(key, value);
  }

  async removeItem(key: string): Promise<void> {
    this.items.delete(key);
  }

  async keys(): Promise<string[]> {
    return [...this.items.keys()];
  }
}

// fs errors may come from another realm, so match on shape.
function isCode(error: unknown, code: string): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === code
  );
}

/**
 * Keeps every entry in one JSON object on disk. Writes are serialized through
 * a promise chain and land via rename, so a reader never sees half a file.
 */
export class FileKeyValueStorage implements KeyValueStorage {
  private items: Map<string, string> | null = null;
  private loading: Promise<Map<string, string>> | null = null;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  async getItem(key: string): Promise<string | null> {
    const items = await this.load();
    return items.get(key) ?? null;
  }

  setItem(key: string, value: string): Promise<void> {
    return this.update((items) => {
      if (items.get(key) === value) return false;
      items.set(key, value);
      return true;
    });
  }

  removeItem(key: string): Promise<void> {
    return this.update((items) => items.delete(key));
  }

  async keys(): Promise<string[]> {
    const items = await this.load();
    return [...items.keys()];
  }

  private load(): Promise<Map<string, string>> {
    if (this.items) return Promise.resolve(this.items);
    if (!this.loading) {
      this.loading = this.readFromDisk().then(
        (items) => {
          this.items = items;
          return items;
        },
        (error: unknown) => {
          this.loading = null;
          throw error;
        },
      );
    }
    return this.loading;
  }

  private async readFromDisk(): Promise<Map<string, string>> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isCode(error, "ENOENT")) return new Map();
      throw error;
    }
    const parsed: unknown = JSON.parse(raw);
    const items = new Map<string, string>();
    if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
      for (const [key, value] of Object.entries(parsed)) {
        if (typeof value === "string") items.set(key, value);
      }
    }
    return items;
  }

  /**
   * Applies `change` to a copy and makes the copy visible only once it is on
   * disk. Updates run one at a time.
   */
  private update(change: (items: Map<string, string>) => boolean): Promise<void> {
    const write = this.writeChain.then(async () => {
      const next = new Map(await this.load());
      if (!change(next)) return;
      await mkdir(path.dirname(this.filePath), { recursive: true });
      const tempPath = `${this.filePath}.tmp`;
      await writeFile(tempPath, JSON.stringify(Object.fromEntries(next)), "utf8");
      await rename(tempPath, this.filePath);
      this.items = next;
    });
    // Keep the chain alive after a failed write; the caller still sees it.
    this.writeChain = write.catch(() => undefined);
    return write;
  }
}
