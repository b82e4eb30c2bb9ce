import { describe, expect, it } from "vitest";
import { resolveAvailableName, StoragePath } from "../src/index.js";

function existing(...paths: string[]): (candidate: StoragePath) => Promise<boolean> {
  const keys = new Set(paths.map((path) => StoragePath.parse(path).key));
  return async (candidate) => keys.has(candidate.key);
}

describe("resolveAvailableName", () => {
  it("should return the path itself when it is free", async () => {
    const path = StoragePath.parse("dir/a.txt");
    expect(await resolveAvailableName(path, existing())).toBe(path);
  });

  it("should append the first free counter", async () => {
    const result = await resolveAvailableName(StoragePath.parse("dir/a.txt"), existing("dir/a.txt"));
    expect(result.toPosix()).toBe("dir/a (1).txt");
  });

  it("should skip counters that are taken", async () => {
    const exists = existing("out.txt", "out (1).txt", "out (2).txt");
    const result = await resolveAvailableName(StoragePath.parse("out.txt"), exists);
    expect(result.name).toBe("out (3).txt");
  });

  it("should replace a counter already present on the name", async () => {
    const exists = existing("out.txt", "out (1).txt");
    const result = await resolveAvailableName(StoragePath.parse("out (1).txt"), exists);
    expect(result.name).toBe("out (2).txt");
  });

  it("should only treat a spaced counter as a counter", async () => {
    const result = await resolveAvailableName(StoragePath.parse("a(1).txt"), existing("a(1).txt"));
    expect(result.name).toBe("a(1) (1).txt");
  });

  it("should handle names without extension", async () => {
    const result = await resolveAvailableName(StoragePath.parse("notes"), existing("NOTES"));
    expect(result.name).toBe("notes (1)");
  });
});
