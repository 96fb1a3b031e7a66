import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { FileKeyValueStorage, MemoryKeyValueStorage } from "../storage/keyValueStorage";

describe("MemoryKeyValueStorage", () => {
  it("round-trips values and lists keys", async () => {
    const storage = new MemoryKeyValueStorage({ a: "1" });

    await storage.setItem("b", "2");
    await storage.removeItem("a");

    await expect(storage.getItem("a")).resolves.toBeNull();
    await expect(storage.getItem("b")).resolves.toBe("2");
    await expect(storage.keys()).resolves.toEqual(["b"]);
  });
});

describe("FileKeyValueStorage", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "cityweather-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("starts empty when the file does not exist", async () => {
    const storage = new FileKeyValueStorage(path.join(dir, "nested", "store.json"));

    await expect(storage.keys()).resolves.toEqual([]);
    await expect(storage.getItem("missing")).resolves.toBeNull();
  });

  it("writes every entry into one JSON object", async () => {
    const file = path.join(dir, "nested", "store.json");
    const storage = new FileKeyValueStorage(file);

    await Promise.all([storage.setItem("a", "1"), storage.setItem("b", "2")]);

    expect(JSON.parse(await readFile(file, "utf8"))).toEqual({ a: "1", b: "2" });
  });

  it("reads values written by an earlier instance", async () => {
    const file = path.join(dir, "store.json");
    await writeFile(file, JSON.stringify({ city: "番禺区", ignored: 42 }), "utf8");

    const storage = new FileKeyValueStorage(file);

    await expect(storage.getItem("city")).resolves.toBe("番禺区");
    await expect(storage.keys()).resolves.toEqual(["city"]);
  });

  it("persists removals", async () => {
    const file = path.join(dir, "store.json");
    const storage = new FileKeyValueStorage(file);
    await storage.setItem("a", "1");
    await storage.setItem("b", "2");

    await storage.removeItem("a");

    expect(JSON.parse(await readFile(file, "utf8"))).toEqual({ b: "2" });
  });

  it("keeps a failed write invisible to later reads", async () => {
    const file = path.join(dir, "store.json");
    await writeFile(file, JSON.stringify({ a: "1" }), "utf8");
    await mkdir(`${file}.tmp`);
    const storage = new FileKeyValueStorage(file);

    await expect(storage.setItem("b", "2")).rejects.toMatchObject({ code: "EISDIR" });
    await expect(storage.removeItem("a")).rejects.toMatchObject({ code: "EISDIR" });

    await expect(storage.getItem("b")).resolves.toBeNull();
    await expect(storage.getItem("a")).resolves.toBe("1");
    await expect(storage.keys()).resolves.toEqual(["a"]);
    expect(JSON.parse(await readFile(file, "utf8"))).toEqual({ a: "1" });
  });

  it("accepts writes again once the failure is gone", async () => {
    const file = path.join(dir, "store.json");
    await mkdir(`${file}.tmp`);
    const storage = new FileKeyValueStorage(file);
    await expect(storage.setItem("a", "1")).rejects.toMatchObject({ code: "EISDIR" });

    await rm(`${file}.tmp`, { recursive: true });
    await storage.setItem("a", "1");

    expect(JSON.parse(await readFile(file, "utf8"))).toEqual({ a: "1" });
  });

  it("rejects when the file is not valid JSON", async () => {
    const file = path.join(dir, "store.json");
    await writeFile(file, "{oops", "utf8");

    await expect(new FileKeyValueStorage(file).getItem("a")).rejects.toThrow(SyntaxError);
  });
});
