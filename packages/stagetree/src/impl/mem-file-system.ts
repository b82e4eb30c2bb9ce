/**
 * In-memory implementation of IFileSystem for testing
 */

import { InvalidOperationError, NotFoundError } from "../errors.js";
import { StoragePath } from "../storage-path.js";
import type { BinaryStream, EntryInfo, IFileSystem } from "../types.js";
import { collectBytes } from "../utils/collect-stream.js";

interface FileEntry {
  kind: "file";
  path: StoragePath;
  content: Uint8Array;
  lastModified: number;
}

interface DirEntry {
  kind: "directory";
  path: StoragePath;
  lastModified: number;
}

type Entry = FileEntry | DirEntry;

const CHUNK_SIZE = 8192;

function toInfo(entry: Entry): EntryInfo {
  const info: EntryInfo = {
    kind: entry.kind,
    name: entry.path.name,
    path: entry.path,
    lastModified: entry.lastModified,
  };
  if (entry.kind === "file") {
    info.size = entry.content.length;
  }
  return info;
}

/**
 * Entries are keyed by `StoragePath.key`, so lookups ignore case the same
 * way path comparison does. The empty path is the root and always exists.
 */
export class MemFileSystem implements IFileSystem {
  private store = new Map<string, Entry>();

  async stats(path: StoragePath): Promise<EntryInfo | undefined> {
    if (path.isEmpty) {
      return { kind: "directory", name: "", path, lastModified: 0 };
    }
    const entry = this.store.get(path.key);
    return entry ? toInfo(entry) : undefined;
  }

  async *list(dir: StoragePath): AsyncGenerator<EntryInfo> {
    // Snapshot so callers may mutate the store while iterating
    const entries = [...this.store.values()];
    for (const entry of entries) {
      const relative = entry.path.relativeTo(dir);
      if (relative?.segments.length === 1) {
        yield toInfo(entry);
      }
    }
  }

  async *read(path: StoragePath): AsyncGenerator<Uint8Array> {
    const entry = this.store.get(path.key);
    if (entry?.kind !== "file") {
      throw new NotFoundError(path, `No file at '${path}'`);
    }
    const content = entry.content;
    for (let position = 0; position < content.length; position += CHUNK_SIZE) {
      yield content.subarray(position, position + CHUNK_SIZE);
    }
  }

  async write(path: StoragePath, content: BinaryStream): Promise<number> {
    const existing = this.store.get(path.key);
    if (existing?.kind === "directory" || path.isEmpty) {
      throw new InvalidOperationError(`Cannot write a file over the directory '${path}'`);
    }
    if (path.segments.length > 1) {
      await this.mkdir(path.parent);
    }

    const data = await collectBytes(content);
    this.store.set(path.key, {
      kind: "file",
      path: existing?.path ?? path,
      content: data,
      lastModified: Date.now(),
    });
    return data.length;
  }

  async mkdir(path: StoragePath): Promise<void> {
    for (let length = 1; length <= path.segments.length; length++) {
      const dir = StoragePath.of(...path.segments.slice(0, length));
      const existing = this.store.get(dir.key);
      if (existing?.kind === "file") {
        throw new InvalidOperationError(`Cannot create directory '${path}': '${dir}' is a file`);
      }
      if (!existing) {
        this.store.set(dir.key, { kind: "directory", path: dir, lastModified: Date.now() });
      }
    }
  }

  async remove(path: StoragePath): Promise<boolean> {
    const entry = this.store.get(path.key);
    if (!entry) return false;

    if (entry.kind === "directory") {
      const prefix = `${path.key}/`;
      for (const key of this.store.keys()) {
        if (key.startsWith(prefix)) {
          throw new InvalidOperationError(`The directory '${path}' is not empty`);
        }
      }
    }

    this.store.delete(path.key);
    return true;
  }
}
