import { describe, expect, it, vi } from "vitest";
import {
  type ArchiveHandle,
  ByteSource,
  collectBytes,
  MutationSet,
  openByteSource,
  StoragePath,
} from "../src/index.js";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function path(raw: string): StoragePath {
  return StoragePath.parse(raw);
}

function emptyArchive(close: () => void | Promise<void> = () => {}): ArchiveHandle {
  return { entries: () => [], close };
}

describe("ByteSource", () => {
  it("should encode strings as UTF-8", async () => {
    const source = ByteSource.from("héllo");
    expect(source.kind).toBe("bytes");
    expect(decoder.decode(await collectBytes(await openByteSource(source)))).toBe("héllo");
  });

  it("should keep byte arrays as they are", () => {
    const data = encoder.encode("raw");
    const source = ByteSource.from(data);
    expect(source.kind === "bytes" && source.data).toBe(data);
  });

  it("should pass existing sources through", () => {
    const source = ByteSource.deferred(() => []);
    expect(ByteSource.from(source)).toBe(source);
  });

  it("should open deferred content lazily", async () => {
    const open = vi.fn(() => [encoder.encode("later")]);
    const source = ByteSource.deferred(open);
    expect(open).not.toHaveBeenCalled();

    const stream = await openByteSource(source);
    expect(decoder.decode(await collectBytes(stream))).toBe("later");
    expect(open).toHaveBeenCalledTimes(1);
  });

  it("should read an open stream", async () => {
    async function* generate() {
      yield encoder.encode("a");
      yield encoder.encode("b");
    }
    const source = ByteSource.fromStream(generate());
    expect(decoder.decode(await collectBytes(await openByteSource(source)))).toBe("ab");
  });
});

describe("MutationSet", () => {
  it("should count staged intents", () => {
    const set = new MutationSet();
    expect(set.isEmpty).toBe(true);

    set.addFile(path("a.txt"), ByteSource.fromText("a"));
    set.addDirectory(path("dir"));
    set.addDelete(path("old"));
    expect(set.size).toBe(3);
    expect(set.isEmpty).toBe(false);
  });

  it("should group drained intents by kind in staging order", () => {
    const set = new MutationSet();
    set.addFile(path("f1"), ByteSource.fromText(""));
    set.addDirectory(path("d"));
    set.addArchive(path("z"), emptyArchive());
    set.addCopy(path("c"), path("src"));
    set.addDelete(path("x"));
    set.addFile(path("f2"), ByteSource.fromText(""));

    const { files, directories, copies, archives, deletions } = set.drain();
    expect(files.map((intent) => intent.path.toPosix())).toEqual(["f1", "f2"]);
    expect(directories.map((intent) => intent.path.toPosix())).toEqual(["d"]);
    expect(copies.map((intent) => intent.path.toPosix())).toEqual(["c"]);
    expect(archives.map((intent) => intent.path.toPosix())).toEqual(["z"]);
    expect(deletions.map((intent) => intent.path.toPosix())).toEqual(["x"]);
  });

  it("should hand over every intent on drain", () => {
    const set = new MutationSet();
    set.addFile(path("a.txt"), ByteSource.fromText("a"));
    set.addCopy(path("copy"), path("src"));

    const drained = set.drain();
    expect(drained.files.map((intent) => intent.path.toPosix())).toEqual(["a.txt"]);
    expect(drained.copies[0]?.source.toPosix()).toBe("src");
    expect(set.size).toBe(0);
  });

  it("should release deferred sources and close archives", async () => {
    const release = vi.fn();
    const close = vi.fn();
    const set = new MutationSet();
    set.addFile(path("a.txt"), ByteSource.deferred(() => [], release));
    set.addFile(path("b.txt"), ByteSource.fromText("b"));
    set.addArchive(path("z"), emptyArchive(close));

    await set.release();

    expect(release).toHaveBeenCalledTimes(1);
    expect(close).toHaveBeenCalledTimes(1);
    expect(set.isEmpty).toBe(true);
  });

  it("should rethrow a single release failure as is", async () => {
    const failure = new Error("release failed");
    const set = new MutationSet();
    set.addFile(
      path("a.txt"),
      ByteSource.deferred(
        () => [],
        () => {
          throw failure;
        },
      ),
    );

    await expect(set.release()).rejects.toBe(failure);
    expect(set.isEmpty).toBe(true);
  });

  it("should attempt every release and aggregate failures", async () => {
    const close = vi.fn(() => {
      throw new Error("close failed");
    });
    const release = vi.fn(async () => {
      throw new Error("release failed");
    });
    const set = new MutationSet();
    set.addFile(path("a.txt"), ByteSource.deferred(() => [], release));
    set.addArchive(path("one"), emptyArchive(close));
    set.addArchive(path("two"), emptyArchive(close));

    await expect(set.release()).rejects.toBeInstanceOf(AggregateError);
    expect(release).toHaveBeenCalledTimes(1);
    expect(close).toHaveBeenCalledTimes(2);
    expect(set.isEmpty).toBe(true);
  });
});
