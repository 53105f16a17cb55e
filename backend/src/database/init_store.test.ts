import fs from "fs/promises";
import os from "os";
import path from "path";
import { StorageReadError } from "../types/errors";
import { initStore } from "./init_store";
import { CsvRecordStore } from "./record_store";

describe("initStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "init-store-"));
    jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  test("creates the directory and a header-only file", async () => {
    const filePath = path.join(dir, "data", "elos.csv");

    expect(await initStore(new CsvRecordStore(filePath))).toBe(0);
    expect(await fs.readFile(filePath, "utf-8")).toBe("Name,Character,Rating,Confidence\n");
  });

  test("leaves an existing file untouched and counts its players", async () => {
    const filePath = path.join(dir, "elos.csv");
    const contents = "Name,Character,Rating,Confidence\nAbe,Fox,1500,0\nJT,Sheik,1610,0.4\n";
    await fs.writeFile(filePath, contents);

    expect(await initStore(new CsvRecordStore(filePath))).toBe(2);
    expect(await fs.readFile(filePath, "utf-8")).toBe(contents);
  });

  test("a malformed file fails startup", async () => {
    const filePath = path.join(dir, "elos.csv");
    await fs.writeFile(filePath, "Name,Character,Rating,Confidence\nAbe,Fox,not-a-number,0\n");

    await expect(initStore(new CsvRecordStore(filePath))).rejects.toThrow(StorageReadError);
  });
});
