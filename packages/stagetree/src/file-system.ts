/**
 * FileSystem wrapper class providing convenience methods on top of IFileSystem
 */

import { NotFoundError } from "./errors.js";
import type { StoragePath } from "./storage-path.js";
import type { BinaryStream, EntryInfo, IFileSystem } from "./types.js";
import { collectBytes, collectGenerator } from "./utils/collect-stream.js";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export class FileSystem implements IFileSystem {
  constructor(private fs: IFileSystem) {}

  /**
   * Returns `files` itself when it already is a wrapper.
   */
  static wrap(files: IFileSystem): FileSystem {
    return files instanceof FileSystem ? files : new FileSystem(files);
  }

  // ========================================
  // IFileSystem delegation
  // ========================================

  stats(path: StoragePath): Promise<EntryInfo | undefined> {
    return this.fs.stats(path);
  }

  list(dir: StoragePath): AsyncGenerator<EntryInfo> {
    return this.fs.list(dir);
  }

  read(path: StoragePath): AsyncGenerator<Uint8Array> {
    return this.fs.read(path);
  }

  write(path: StoragePath, content: BinaryStream): Promise<number> {
    return this.fs.write(path, content);
  }

  mkdir(path: StoragePath): Promise<void> {
    return this.fs.mkdir(path);
  }

  remove(path: StoragePath): Promise<boolean> {
    return this.fs.remove(path);
  }

  // ========================================
  // Convenience methods built on core API
  // ========================================

  async exists(path: StoragePath): Promise<boolean> {
    return (await this.stats(path)) !== undefined;
  }

  async fileExists(path: StoragePath): Promise<boolean> {
    return (await this.stats(path))?.kind === "file";
  }

  async directoryExists(path: StoragePath): Promise<boolean> {
    return (await this.stats(path))?.kind === "directory";
  }

  async *enumerateFiles(dir: StoragePath): AsyncGenerator<StoragePath> {
    for await (const entry of this.list(dir)) {
      if (entry.kind === "file") yield entry.path;
    }
  }

  async *enumerateDirectories(dir: StoragePath): AsyncGenerator<StoragePath> {
    for await (const entry of this.list(dir)) {
      if (entry.kind === "directory") yield entry.path;
    }
  }

  readAllBytes(path: StoragePath): Promise<Uint8Array> {
    return collectBytes(this.read(path));
  }

  async readText(path: StoragePath): Promise<string> {
    return decoder.decode(await this.readAllBytes(path));
  }

  async writeAllBytes(path: StoragePath, data: Uint8Array): Promise<void> {
    await this.write(path, [data]);
  }

  async writeText(path: StoragePath, text: string): Promise<void> {
    await this.writeAllBytes(path, encoder.encode(text));
  }

  /**
   * @throws NotFoundError when no file exists at `path`
   */
  async deleteFile(path: StoragePath): Promise<void> {
    if (!(await this.fileExists(path))) {
      throw new NotFoundError(path, `No file at '${path}'`);
    }
    await this.remove(path);
  }

  /**
   * Deletes a directory with everything below it.
   * Uses the native implementation if available, otherwise walks the tree.
   * @throws NotFoundError when no directory exists at `path`
   */
  async deleteDirectoryRecursive(path: StoragePath): Promise<void> {
    if (!(await this.directoryExists(path))) {
      throw new NotFoundError(path, `No directory at '${path}'`);
    }

    if (this.fs.removeTree) {
      await this.fs.removeTree(path);
      return;
    }

    // Files go first; directories are removed once empty, deepest first
    const pending: StoragePath[] = [path];
    const visited: StoragePath[] = [];
    for (let dir = pending.pop(); dir !== undefined; dir = pending.pop()) {
      visited.push(dir);
      for (const entry of await collectGenerator(this.list(dir))) {
        if (entry.kind === "directory") {
          pending.push(entry.path);
        } else {
          await this.remove(entry.path);
        }
      }
    }
    for (const dir of visited.reverse()) {
      await this.remove(dir);
    }
  }
}
