export interface RegionRecord {
  name: string;
  adcode: string;
  citycode: string | null;
}

/** Write side of a transaction. Changes become visible only on commit. */
export interface RegionWriter {
  has(name: string): boolean;
  insert(record: RegionRecord): void;
  clear(): void;
}

export interface RegionStore {
  count(): Promise<number>;
  findByName(name: string): Promise<RegionRecord | null>;
  findByAdcode(adcode: string): Promise<RegionRecord | null>;
  /** All names in table order. */
  names(): Promise<string[]>;
  write<T>(transaction: (writer: RegionWriter) => T): Promise<T>;
}

/**
 * Region table held in memory. Writers run one at a time and work on a copy,
 * so a throwing transaction leaves the table untouched.
 */
export class MemoryRegionStore implements RegionStore {
  private byName = new Map<string, RegionRecord>();
  private byAdcode = new Map<string, RegionRecord>();
  private queue: Promise<unknown> = Promise.resolve();

  async count(): Promise<number> {
    await this.queue;
    return this.byName.size;
  }

  async findByName(name: string): Promise<RegionRecord | null> {
    await this.queue;
    return this.byName.get(name) ?? null;
  }

  async findByAdcode(adcode: string): Promise<RegionRecord | null> {
    await this.queue;
    return this.byAdcode.get(adcode) ?? null;
  }

  async names(): Promise<string[]> {
    await this.queue;
    return [...this.byName.keys()];
  }

  write<T>(transaction: (writer: RegionWriter) => T): Promise<T> {
    const run = this.queue.then(() => this.commit(transaction));
    this.queue = run.catch(() => undefined);
    return run;
  }

  private commit<T>(transaction: (writer: RegionWriter) => T): T {
    const byName = new Map(this.byName);
    const byAdcode = new Map(this.byAdcode);
    const writer: RegionWriter = {
      has: (name) => byName.has(name),
      insert: (record) => {
        byName.set(record.name, record);
        // First row wins for an adcode shared by several names.
        if (!byAdcode.has(record.adcode)) {
          byAdcode.set(record.adcode, record);
        }
      },
      clear: () => {
        byName.clear();
        byAdcode.clear();
      },
    };
    const value = transaction(writer);
    this.byName = byName;
    this.byAdcode = byAdcode;
    return value;
  }
}
