import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  collectGenerator,
  FileSystem,
  MemFileSystem,
  NotFoundError,
  StoragePath,
} from "../src/index.js";

function path(raw: string): StoragePath {
  return StoragePath.parse(raw);
}

class TreeFileSystem extends MemFileSystem {
  removeTree = vi.fn(async (_path: StoragePath) => true);
}

describe("FileSystem", () => {
  let files: FileSystem;

  beforeEach(async () => {
    files = FileSystem.wrap(new MemFileSystem());
    await files.writeText(path("root/a.txt"), "a");
    await files.writeText(path("root/b.txt"), "b");
    await files.writeText(path("root/sub/c.txt"), "c");
    await files.writeText(path("root/sub/deeper/d.txt"), "d");
    await files.mkdir(path("root/empty"));
    await files.writeText(path("sibling.txt"), "s");
  });

  it("should not wrap a wrapper twice", () => {
    expect(FileSystem.wrap(files)).toBe(files);
  });

  it("should tell files and directories apart", async () => {
    expect(await files.exists(path("root"))).toBe(true);
    expect(await files.fileExists(path("root"))).toBe(false);
    expect(await files.directoryExists(path("root"))).toBe(true);
    expect(await files.fileExists(path("root/a.txt"))).toBe(true);
    expect(await files.exists(path("root/missing.txt"))).toBe(false);
  });

  it("should enumerate direct files and directories", async () => {
    const fileNames = (await collectGenerator(files.enumerateFiles(path("root"))))
      .map((entry) => entry.toPosix())
      .sort();
    const dirNames = (await collectGenerator(files.enumerateDirectories(path("root"))))
      .map((entry) => entry.toPosix())
      .sort();

    expect(fileNames).toEqual(["root/a.txt", "root/b.txt"]);
    expect(dirNames).toEqual(["root/empty", "root/sub"]);
  });

  it("should read and write text", async () => {
    await files.writeText(path("root/a.txt"), "rewritten");
    expect(await files.readText(path("root/a.txt"))).toBe("rewritten");
    expect((await files.readAllBytes(path("root/b.txt"))).length).toBe(1);
  });

  describe("deleteFile()", () => {
    it("should delete an existing file", async () => {
      await files.deleteFile(path("root/a.txt"));
      expect(await files.exists(path("root/a.txt"))).toBe(false);
    });

    it("should fail for a missing file or a directory", async () => {
      await expect(files.deleteFile(path("root/missing.txt"))).rejects.toBeInstanceOf(
        NotFoundError,
      );
      await expect(files.deleteFile(path("root/sub"))).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("deleteDirectoryRecursive()", () => {
    it("should delete a whole tree without a native implementation", async () => {
      await files.deleteDirectoryRecursive(path("root"));

      expect(await files.exists(path("root"))).toBe(false);
      expect(await files.exists(path("root/sub/deeper/d.txt"))).toBe(false);
      expect(await files.exists(path("root/empty"))).toBe(false);
      expect(await files.readText(path("sibling.txt"))).toBe("s");
    });

    it("should use the native implementation when available", async () => {
      const native = new TreeFileSystem();
      await native.mkdir(path("tree"));

      await FileSystem.wrap(native).deleteDirectoryRecursive(path("tree"));

      expect(native.removeTree).toHaveBeenCalledTimes(1);
      expect(native.removeTree.mock.calls[0]?.[0].toPosix()).toBe("tree");
    });

    it("should fail when no directory exists", async () => {
      const error = await files.deleteDirectoryRecursive(path("nowhere")).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(NotFoundError);
      expect(error instanceof NotFoundError && error.path.toPosix()).toBe("nowhere");
    });
  });
});
