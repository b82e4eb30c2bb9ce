/**
 * Parametrized test suite for DirectoryBuilder commits
 *
 * Runs the commit pipeline against a real backend: the expected state is
 * read back through the same backend.
 */

import {
  ConflictError,
  ConflictPolicy,
  DirectoryBuilder,
  type IFileSystem,
  InvalidPathError,
  NotFoundError,
} from "stagetree";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  directoryExists,
  fileExists,
  memoryArchive,
  path,
  readText,
  writeText,
} from "../test-utils.js";
import type { FileSystemFactory, FileSystemTestContext } from "./file-system.suite.js";

function builder(files: IFileSystem, conflictPolicy?: ConflictPolicy): DirectoryBuilder {
  return new DirectoryBuilder({ files, root: "out", conflictPolicy });
}

/**
 * Create the DirectoryBuilder test suite with a specific backend factory
 */
export function createDirectoryBuilderTests(name: string, factory: FileSystemFactory): void {
  describe(`DirectoryBuilder [${name}]`, () => {
    let ctx: FileSystemTestContext;

    beforeEach(async () => {
      ctx = await factory();
    });

    afterEach(async () => {
      await ctx.cleanup?.();
    });

    describe("build()", () => {
      it("should create staged directories and files under the root", async () => {
        await builder(ctx.files)
          .addDirectory("sub")
          .addFile("sub/a.txt", "hi")
          .addFile("root.txt", "top")
          .build();

        expect(await directoryExists(ctx.files, "out/sub")).toBe(true);
        expect(await readText(ctx.files, "out/sub/a.txt")).toBe("hi");
        expect(await readText(ctx.files, "out/root.txt")).toBe("top");
      });

      it("should create the root for an empty builder", async () => {
        await builder(ctx.files).build();
        expect(await directoryExists(ctx.files, "out")).toBe(true);
      });

      it("should create parents implied by file destinations", async () => {
        await builder(ctx.files).addFile("a/b/c.txt", "deep").build();
        expect(await directoryExists(ctx.files, "out/a/b")).toBe(true);
        expect(await readText(ctx.files, "out/a/b/c.txt")).toBe("deep");
      });

      it("should write binary content", async () => {
        await builder(ctx.files)
          .addFile("data.bin", new Uint8Array([104, 105]))
          .build();
        expect(await readText(ctx.files, "out/data.bin")).toBe("hi");
      });

      it("should be a no-op when built twice", async () => {
        const target = builder(ctx.files).addFile("once.txt", "1");
        await target.build();
        await writeText(ctx.files, "out/once.txt", "changed");
        await target.build();
        expect(await readText(ctx.files, "out/once.txt")).toBe("changed");
      });
    });

    describe("conflict policies", () => {
      beforeEach(async () => {
        await writeText(ctx.files, "out/out.txt", "first");
        await writeText(ctx.files, "out/out (1).txt", "second");
      });

      it("should rename to the next free counter", async () => {
        await builder(ctx.files, ConflictPolicy.Rename).addFile("out.txt", "third").build();

        expect(await readText(ctx.files, "out/out.txt")).toBe("first");
        expect(await readText(ctx.files, "out/out (1).txt")).toBe("second");
        expect(await readText(ctx.files, "out/out (2).txt")).toBe("third");
      });

      it("should overwrite the existing file", async () => {
        await builder(ctx.files, ConflictPolicy.Overwrite).addFile("out.txt", "replaced").build();
        expect(await readText(ctx.files, "out/out.txt")).toBe("replaced");
      });

      it("should skip the write and keep going", async () => {
        await builder(ctx.files, ConflictPolicy.Skip)
          .addFile("out.txt", "ignored")
          .addFile("fresh.txt", "written")
          .build();

        expect(await readText(ctx.files, "out/out.txt")).toBe("first");
        expect(await readText(ctx.files, "out/fresh.txt")).toBe("written");
      });

      it("should fail on conflict and keep earlier writes", async () => {
        const commit = builder(ctx.files, ConflictPolicy.ThrowOnConflict)
          .addFile("before.txt", "kept")
          .addFile("out.txt", "rejected")
          .addFile("after.txt", "never")
          .build();

        await expect(commit).rejects.toBeInstanceOf(ConflictError);
        expect(await readText(ctx.files, "out/before.txt")).toBe("kept");
        expect(await readText(ctx.files, "out/out.txt")).toBe("first");
        expect(await fileExists(ctx.files, "out/after.txt")).toBe(false);
      });
    });

    describe("delete()", () => {
      it("should delete files and directory trees before writing", async () => {
        await writeText(ctx.files, "out/data/x.txt", "old");
        await writeText(ctx.files, "out/data/nested/y.txt", "old");
        await writeText(ctx.files, "out/stale.txt", "old");

        await builder(ctx.files)
          .addFile("data/z.txt", "new")
          .delete("data")
          .delete("stale.txt")
          .build();

        expect(await fileExists(ctx.files, "out/data/x.txt")).toBe(false);
        expect(await directoryExists(ctx.files, "out/data/nested")).toBe(false);
        expect(await fileExists(ctx.files, "out/stale.txt")).toBe(false);
        expect(await readText(ctx.files, "out/data/z.txt")).toBe("new");
      });

      it("should fail when nothing exists at the path", async () => {
        await expect(builder(ctx.files).delete("missing").build()).rejects.toBeInstanceOf(
          NotFoundError,
        );
      });
    });

    describe("addExisting()", () => {
      beforeEach(async () => {
        await writeText(ctx.files, "src/one.txt", "1");
        await writeText(ctx.files, "src/nested/two.txt", "2");
        await ctx.files.mkdir(path("src/nested/empty"));
        await writeText(ctx.files, "single.txt", "s");
      });

      it("should copy a directory tree", async () => {
        await builder(ctx.files).addExisting("copy", "src").build();

        expect(await readText(ctx.files, "out/copy/one.txt")).toBe("1");
        expect(await readText(ctx.files, "out/copy/nested/two.txt")).toBe("2");
        expect(await directoryExists(ctx.files, "out/copy/nested/empty")).toBe(true);
      });

      it("should copy a single file", async () => {
        await builder(ctx.files).addExisting("renamed.txt", "single.txt").build();
        expect(await readText(ctx.files, "out/renamed.txt")).toBe("s");
      });

      it("should fail when the source is missing", async () => {
        await expect(
          builder(ctx.files).addExisting("copy", "nowhere").build(),
        ).rejects.toBeInstanceOf(NotFoundError);
      });
    });

    describe("extractArchive()", () => {
      it("should write every entry below the destination", async () => {
        const archive = memoryArchive({ "x.txt": "ex", "dir/y.txt": "why" });

        await builder(ctx.files).extractArchive("unpacked", archive).build();

        expect(await readText(ctx.files, "out/unpacked/x.txt")).toBe("ex");
        expect(await readText(ctx.files, "out/unpacked/dir/y.txt")).toBe("why");
        expect(archive.closed).toBe(true);
      });

      it("should create directory records", async () => {
        const archive = memoryArchive({ "folder/": "" });

        await builder(ctx.files).extractArchive("unpacked", archive).build();

        expect(await directoryExists(ctx.files, "out/unpacked/folder")).toBe(true);
      });

      it("should reject entries that leave the destination", async () => {
        const archive = memoryArchive({ "../escape.txt": "bad" });

        await expect(
          builder(ctx.files).extractArchive("unpacked", archive).build(),
        ).rejects.toBeInstanceOf(InvalidPathError);
        expect(await fileExists(ctx.files, "out/escape.txt")).toBe(false);
        expect(archive.closed).toBe(true);
      });
    });
  });
}
