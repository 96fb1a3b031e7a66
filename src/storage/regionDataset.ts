import { readFile } from "node:fs/promises";
import path from "node:path";

export const DEFAULT_REGION_DATASET_PATH = path.resolve(
  __dirname,
  "../../data/regions.csv",
);

/** Source of the raw region CSV text. */
export type RegionDatasetSource = () => Promise<string>;

export function fileRegionDataset(
  filePath: string = DEFAULT_REGION_DATASET_PATH,
): RegionDatasetSource {
  return () => readFile(filePath, "utf8");
}

export function inlineRegionDataset(csv: string): RegionDatasetSource {
  return async () => csv;
}
