import type { StorageError } from "../../domain/errors";
import { ok, type Result } from "../../domain/result";
import type { RegionDatasetSource } from "../../storage/regionDataset";
import type {
  RegionRecord,
  RegionStore,
  RegionWriter,
} from "../../storage/regionStore";
import { safeStorage } from "../../storage/dbSafe";
import { COUNTRY_SENTINEL } from "../../utils/constants";

export interface SeedReport {
  inserted: number;
  skipped: number;
}

function parseRow(line: string): RegionRecord | null {
  const fields = line.split(",").map((field) => field.trim());
  if (fields.length < 2 || !fields[0] || !fields[1]) return null;
  return { name: fields[0], adcode: fields[1], citycode: fields[2] || null };
}

function importRows(csv: string, writer: RegionWriter): SeedReport {
  const report: SeedReport = { inserted: 0, skipped: 0 };
  const lines = csv.split(/\r?\n/).slice(1);
  for (const line of lines) {
    if (!line.trim()) continue;
    const record = parseRow(line);
    if (!record || record.name === COUNTRY_SENTINEL || writer.has(record.name)) {
      report.skipped += 1;
      continue;
    }
    writer.insert(record);
    report.inserted += 1;
  }
  return report;
}

/**
 * Maps region names to provider administrative codes. The table is seeded
 * from the bundled dataset the first time anything asks for it.
 */
export class RegionLookupService {
  private seeding: Promise<Result<SeedReport, StorageError>> | null = null;

  constructor(
    private readonly store: RegionStore,
    private readonly dataset: RegionDatasetSource,
  ) {}

  ensureSeeded(): Promise<Result<SeedReport, StorageError>> {
    if (!this.seeding) {
      this.seeding = this.seed().then((result) => {
        if (!result.ok) {
          // Let the next caller try again.
          this.seeding = null;
        }
        return result;
      });
    }
    return this.seeding;
  }

  /** Drops every row and re-imports the dataset in one transaction. */
  async reset(): Promise<Result<SeedReport, StorageError>> {
    const result = await safeStorage(async () => {
      const csv = await this.dataset();
      return this.store.write((writer) => {
        writer.clear();
        return importRows(csv, writer);
      });
    });
    if (result.ok) {
      this.seeding = Promise.resolve(result);
      console.info("Region table rebuilt:", result.value);
    }
    return result;
  }

  async getAdcode(name: string): Promise<Result<string | null, StorageError>> {
    return this.query(async () => {
      const record = await this.store.findByName(name.trim());
      return record?.adcode ?? null;
    });
  }

  async getRegionName(adcode: string): Promise<Result<string | null, StorageError>> {
    return this.query(async () => {
      const record = await this.store.findByAdcode(adcode.trim());
      return record?.name ?? null;
    });
  }

  async hasRegion(name: string): Promise<Result<boolean, StorageError>> {
    return this.query(async () => (await this.store.findByName(name.trim())) !== null);
  }

  /**
   * Prefix matches first, then names containing the query elsewhere. Both
   * groups keep table order.
   */
  async search(query: string, limit?: number): Promise<Result<string[], StorageError>> {
    const needle = query.trim();
    if (!needle) return ok([]);
    return this.query(async () => {
      const names = await this.store.names();
      const prefixed: string[] = [];
      const containing: string[] = [];
      for (const name of names) {
        if (name.startsWith(needle)) {
          prefixed.push(name);
        } else if (name.includes(needle)) {
          containing.push(name);
        }
      }
      const ranked = [...new Set([...prefixed, ...containing])];
      return limit === undefined ? ranked : ranked.slice(0, limit);
    });
  }

  private async query<T>(fn: () => Promise<T>): Promise<Result<T, StorageError>> {
    const seeded = await this.ensureSeeded();
    if (!seeded.ok) return seeded;
    return safeStorage(fn);
  }

  private async seed(): Promise<Result<SeedReport, StorageError>> {
    const result = await safeStorage(async () => {
      if ((await this.store.count()) > 0) {
        return { inserted: 0, skipped: 0 };
      }
      const csv = await this.dataset();
      return this.store.write((writer) => importRows(csv, writer));
    });
    if (result.ok && result.value.inserted > 0) {
      console.info("Region table seeded:", result.value);
    }
    return result;
  }
}
