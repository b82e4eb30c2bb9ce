/**
 * Parametrized test suite for IFileSystem backends
 *
 * Every backend the builder runs against must pass these tests.
 */

import { collectBytes, collectGenerator, type IFileSystem, NotFoundError } from "stagetree";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { fromBytes, path, readText, toBytes, writeText } from "../test-utils.js";

/**
 * Context provided by the filesystem factory
 */
export interface FileSystemTestContext {
  files: IFileSystem;
  cleanup?: () => Promise<void>;
}

/**
 * Factory function to create a fresh backend for each test
 */
export type FileSystemFactory = () => Promise<FileSystemTestContext>;

/**
 * Create the IFileSystem test suite with a specific factory
 *
 * @param name Name of the implementation (e.g., "MemFileSystem", "NodeFileSystem")
 * @param factory Factory function to create backend instances
 */
export function createFileSystemTests(name: string, factory: FileSystemFactory): void {
  describe(`IFileSystem [${name}]`, () => {
    let ctx: FileSystemTestContext;

    beforeEach(async () => {
      ctx = await factory();
    });

    afterEach(async () => {
      await ctx.cleanup?.();
    });

    // ========================================
    // 1. WRITE AND READ
    // ========================================

    describe("write() and read()", () => {
      it("should write and read a small text file", async () => {
        await writeText(ctx.files, "test.txt", "Hello, World!");
        expect(await readText(ctx.files, "test.txt")).toBe("Hello, World!");
      });

      it("should report the number of bytes written", async () => {
        const written = await ctx.files.write(path("count.txt"), [toBytes("12345")]);
        expect(written).toBe(5);
      });

      it("should write and read an empty file", async () => {
        await ctx.files.write(path("empty.txt"), [new Uint8Array(0)]);
        const result = await collectBytes(ctx.files.read(path("empty.txt")));
        expect(result.length).toBe(0);
      });

      it("should write from multiple chunks", async () => {
        await ctx.files.write(path("chunks.txt"), [toBytes("Hello, "), toBytes("World"), toBytes("!")]);
        expect(await readText(ctx.files, "chunks.txt")).toBe("Hello, World!");
      });

      it("should write from async iterable", async () => {
        async function* generate() {
          yield toBytes("Line 1\n");
          yield toBytes("Line 2\n");
        }

        await ctx.files.write(path("async.txt"), generate());
        expect(await readText(ctx.files, "async.txt")).toBe("Line 1\nLine 2\n");
      });

      it("should replace the content of an existing file", async () => {
        await writeText(ctx.files, "overwrite.txt", "first content");
        await writeText(ctx.files, "overwrite.txt", "second");
        expect(await readText(ctx.files, "overwrite.txt")).toBe("second");
      });

      it("should create parent directories automatically", async () => {
        await writeText(ctx.files, "deep/nested/path/file.txt", "deep");
        expect(await readText(ctx.files, "deep/nested/path/file.txt")).toBe("deep");

        const stats = await ctx.files.stats(path("deep/nested"));
        expect(stats?.kind).toBe("directory");
      });

      it("should handle binary data with null bytes", async () => {
        const binary = new Uint8Array([0, 1, 0, 2, 0, 3, 0, 0, 0]);
        await ctx.files.write(path("binary.bin"), [binary]);

        const result = await collectBytes(ctx.files.read(path("binary.bin")));
        expect(Array.from(result)).toEqual(Array.from(binary));
      });

      it("should read content larger than one chunk", async () => {
        const data = new Uint8Array(20000);
        for (let i = 0; i < data.length; i++) data[i] = i % 251;
        await ctx.files.write(path("large.bin"), [data]);

        const result = await collectBytes(ctx.files.read(path("large.bin")));
        expect(result.length).toBe(20000);
        expect(result[0]).toBe(0);
        expect(result[19999]).toBe(19999 % 251);
      });

      it("should fail to read a missing file", async () => {
        await expect(collectBytes(ctx.files.read(path("missing.txt")))).rejects.toBeInstanceOf(
          NotFoundError,
        );
      });

      it("should fail to read a directory as a file", async () => {
        await ctx.files.mkdir(path("folder"));
        await expect(collectBytes(ctx.files.read(path("folder")))).rejects.toBeInstanceOf(
          NotFoundError,
        );
      });
    });

    // ========================================
    // 2. STATS
    // ========================================

    describe("stats()", () => {
      it("should return file stats for existing file", async () => {
        await writeText(ctx.files, "info.txt", "content here");

        const stats = await ctx.files.stats(path("info.txt"));
        expect(stats?.kind).toBe("file");
        expect(stats?.name).toBe("info.txt");
        expect(stats?.size).toBe(12);
        expect(stats?.lastModified).toBeGreaterThan(0);
      });

      it("should return directory stats", async () => {
        await writeText(ctx.files, "mydir/file.txt", "x");

        const stats = await ctx.files.stats(path("mydir"));
        expect(stats?.kind).toBe("directory");
        expect(stats?.name).toBe("mydir");
      });

      it("should return undefined for non-existent path", async () => {
        expect(await ctx.files.stats(path("does-not-exist.txt"))).toBeUndefined();
      });

      it("should treat the empty path as an existing directory", async () => {
        const stats = await ctx.files.stats(path(""));
        expect(stats?.kind).toBe("directory");
      });
    });

    // ========================================
    // 3. LIST
    // ========================================

    describe("list()", () => {
      beforeEach(async () => {
        await writeText(ctx.files, "listdir/a.txt", "a");
        await writeText(ctx.files, "listdir/b.txt", "b");
        await writeText(ctx.files, "listdir/sub/c.txt", "c");
      });

      it("should list direct children only", async () => {
        const entries = await collectGenerator(ctx.files.list(path("listdir")));
        const names = entries.map((e) => e.name).sort();
        expect(names).toEqual(["a.txt", "b.txt", "sub"]);
      });

      it("should include kind and full path", async () => {
        const entries = await collectGenerator(ctx.files.list(path("listdir")));

        const file = entries.find((e) => e.name === "a.txt");
        expect(file?.kind).toBe("file");
        expect(file?.path.toPosix()).toBe("listdir/a.txt");

        const dir = entries.find((e) => e.name === "sub");
        expect(dir?.kind).toBe("directory");
        expect(dir?.path.toPosix()).toBe("listdir/sub");
      });

      it("should return nothing for a non-existent directory", async () => {
        const entries = await collectGenerator(ctx.files.list(path("nonexistent")));
        expect(entries).toEqual([]);
      });
    });

    // ========================================
    // 4. MKDIR AND REMOVE
    // ========================================

    describe("mkdir() and remove()", () => {
      it("should create nested directories", async () => {
        await ctx.files.mkdir(path("one/two/three"));
        expect((await ctx.files.stats(path("one/two/three")))?.kind).toBe("directory");
        expect((await ctx.files.stats(path("one/two")))?.kind).toBe("directory");
      });

      it("should keep an existing directory and its content", async () => {
        await writeText(ctx.files, "keep/file.txt", "kept");
        await ctx.files.mkdir(path("keep"));
        expect(await readText(ctx.files, "keep/file.txt")).toBe("kept");
      });

      it("should remove a file", async () => {
        await writeText(ctx.files, "temp.txt", "x");
        expect(await ctx.files.remove(path("temp.txt"))).toBe(true);
        expect(await ctx.files.stats(path("temp.txt"))).toBeUndefined();
      });

      it("should remove an empty directory", async () => {
        await ctx.files.mkdir(path("vacant"));
        expect(await ctx.files.remove(path("vacant"))).toBe(true);
        expect(await ctx.files.stats(path("vacant"))).toBeUndefined();
      });

      it("should return false when removing a non-existent entry", async () => {
        expect(await ctx.files.remove(path("nonexistent.txt"))).toBe(false);
      });

      it("should refuse to remove a directory that is not empty", async () => {
        await writeText(ctx.files, "full/file.txt", "x");
        await expect(ctx.files.remove(path("full"))).rejects.toThrow();
        expect(fromBytes(await collectBytes(ctx.files.read(path("full/file.txt"))))).toBe("x");
      });
    });
  });
}
