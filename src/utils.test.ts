import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { describe, expect, it } from "vitest";
import {
  formatDecimal,
  formatUtcTime,
  parseDecimal,
  readJsonFile,
  shortenAddress,
  writeJsonFile,
} from "./utils";

describe("decimal helpers", () => {
  it("keeps 18 fractional digits of precision", () => {
    const sum = parseDecimal("0.000000000000000001").add(parseDecimal("1"));

    expect(formatDecimal(sum)).toBe("1.000000000000000001");
  });

  it("rejects malformed values", () => {
    expect(() => parseDecimal("1e5")).toThrow();
  });
});

describe("shortenAddress", () => {
  it("abbreviates long addresses and leaves short ones", () => {
    expect(shortenAddress("0x1234567890abcdef1234567890abcdef12345678")).toBe(
      "0x1234...5678",
    );
    expect(shortenAddress("0x1234")).toBe("0x1234");
  });
});

describe("formatUtcTime", () => {
  it("renders ISO timestamps in UTC", () => {
    expect(formatUtcTime("2024-07-04T23:05:09.000+02:00")).toBe(
      "2024-07-04 21:05:09 UTC",
    );
  });
});

describe("JSON files", () => {
  it("writes atomically and reads back, returning undefined when missing", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "monitor-utils-"));
    const file = path.join(dir, "nested", "data.json");
    try {
      await expect(readJsonFile(file)).resolves.toBeUndefined();

      await writeJsonFile(file, { a: 1, b: ["x"] });

      await expect(readJsonFile(file)).resolves.toEqual({ a: 1, b: ["x"] });
      await expect(fs.readdir(path.dirname(file))).resolves.toEqual(["data.json"]);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
