import fs from "fs/promises";
import os from "os";
import path from "path";
import { hasErrorCode } from "./fs_errors";

describe("hasErrorCode", () => {
  test("matches the code of a real fs error", async () => {
    const missing = path.join(os.tmpdir(), "does-not-exist-dir", "x.csv");
    const err = await fs.readFile(missing).catch((e: unknown) => e);

    expect(hasErrorCode(err, "ENOENT")).toBe(true);
    expect(hasErrorCode(err, "EEXIST")).toBe(false);
  });

  test("works on plain objects and ignores non-objects", () => {
    expect(hasErrorCode({ code: "EEXIST" }, "EEXIST")).toBe(true);
    expect(hasErrorCode(new Error("no code"), "EEXIST")).toBe(false);
    expect(hasErrorCode("EEXIST", "EEXIST")).toBe(false);
    expect(hasErrorCode(null, "EEXIST")).toBe(false);
  });
});
