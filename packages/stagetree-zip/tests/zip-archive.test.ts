import { strToU8, zipSync } from "fflate";
import {
  collectBytes,
  DirectoryBuilder,
  FileSystem,
  InvalidOperationError,
  InvalidPathError,
  MemFileSystem,
  NotFoundError,
  StoragePath,
} from "stagetree";
import { beforeEach, describe, expect, it } from "vitest";
import { ZipArchive } from "../src/index.js";

const decoder = new TextDecoder();

function path(raw: string): StoragePath {
  return StoragePath.parse(raw);
}

function sampleZip(): Uint8Array {
  return zipSync({
    "readme.txt": strToU8("hello zip"),
    "docs/": new Uint8Array(0),
    "docs/guide.md": strToU8("# Guide"),
  });
}

describe("ZipArchive", () => {
  let files: FileSystem;

  beforeEach(() => {
    files = FileSystem.wrap(new MemFileSystem());
  });

  it("should list entries in archive order", () => {
    const archive = ZipArchive.fromBytes(sampleZip());
    expect(archive.names).toEqual(["readme.txt", "docs/", "docs/guide.md"]);
    expect([...archive.entries()].map((entry) => entry.name)).toEqual(archive.names);
  });

  it("should open entry content", async () => {
    const archive = ZipArchive.fromBytes(sampleZip());
    const readme = [...archive.entries()].find((entry) => entry.name === "readme.txt");

    const data = await collectBytes(await (readme?.open() ?? []));
    expect(decoder.decode(data)).toBe("hello zip");
  });

  it("should read an archive from a filesystem", async () => {
    await files.writeAllBytes(path("in/bundle.zip"), sampleZip());

    const archive = await ZipArchive.open(files, "in/bundle.zip");
    expect(archive.names).toContain("docs/guide.md");
  });

  it("should fail to open a missing archive", async () => {
    await expect(ZipArchive.open(files, "in/missing.zip")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("should refuse access once closed", () => {
    const archive = ZipArchive.fromBytes(sampleZip());
    const [entry] = [...archive.entries()];
    archive.close();

    expect(archive.isClosed).toBe(true);
    expect(() => archive.names).toThrow(InvalidOperationError);
    expect(() => entry?.open()).toThrow(InvalidOperationError);
  });

  describe("with DirectoryBuilder", () => {
    it("should extract every entry below the destination", async () => {
      const archive = ZipArchive.fromBytes(sampleZip());

      await new DirectoryBuilder({ files, root: "out" }).extractArchive("site", archive).build();

      expect(await files.readText(path("out/site/readme.txt"))).toBe("hello zip");
      expect(await files.readText(path("out/site/docs/guide.md"))).toBe("# Guide");
      expect(await files.directoryExists(path("out/site/docs"))).toBe(true);
      expect(archive.isClosed).toBe(true);
    });

    it("should extract an archive read from the same filesystem", async () => {
      await files.writeAllBytes(path("in/bundle.zip"), sampleZip());

      await new DirectoryBuilder({ files, root: "out" })
        .extractArchive("", await ZipArchive.open(files, "in/bundle.zip"))
        .build();

      expect(await files.readText(path("out/readme.txt"))).toBe("hello zip");
    });

    it("should reject entries escaping the destination", async () => {
      const archive = ZipArchive.fromBytes(zipSync({ "../outside.txt": strToU8("x") }));

      await expect(
        new DirectoryBuilder({ files, root: "out" }).extractArchive("site", archive).build(),
      ).rejects.toBeInstanceOf(InvalidPathError);
      expect(await files.exists(path("outside.txt"))).toBe(false);
      expect(archive.isClosed).toBe(true);
    });
  });
});
