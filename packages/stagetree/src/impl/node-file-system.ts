/**
 * Node.js implementation of IFileSystem
 */

import type { Dirent } from "node:fs";
import type * as NodeFS from "node:fs/promises";
import { InvalidPathError, NotFoundError } from "../errors.js";
import { PathSeparator, StoragePath } from "../storage-path.js";
import type { BinaryStream, EntryInfo, IFileSystem } from "../types.js";
import { toAsync } from "../utils/collect-stream.js";

export interface NodeFileSystemOptions {
  fs: typeof NodeFS;

  /**
   * Host directory that relative paths are resolved under. Paths carrying a
   * drive marker are passed through untouched.
   * @default "" (the host filesystem root)
   */
  rootDir?: string;

  /**
   * Buffer size for streaming reads.
   * @default 8192
   */
  bufferSize?: number;
}

function isNotFound(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) return false;
  return error.code === "ENOENT" || error.code === "ENOTDIR";
}

export class NodeFileSystem implements IFileSystem {
  private fs: typeof NodeFS;
  private rootDir: string;
  private bufferSize: number;

  constructor(options: NodeFileSystemOptions) {
    this.fs = options.fs;
    this.rootDir = (options.rootDir ?? "").replace(/[\\/]+$/, "");
    this.bufferSize = options.bufferSize ?? 8192;
  }

  /**
   * Converts a path to a host path.
   * @example resolvePath(StoragePath.parse("docs/file.txt")) => "<rootDir>/docs/file.txt"
   */
  private resolvePath(path: StoragePath): string {
    if (path.isAbsolute) {
      return path.render(PathSeparator.ForwardSlash);
    }
    return this.rootDir + path.render(PathSeparator.ForwardSlash, true);
  }

  async stats(path: StoragePath): Promise<EntryInfo | undefined> {
    try {
      const stat = await this.fs.stat(this.resolvePath(path));
      return {
        kind: stat.isDirectory() ? "directory" : "file",
        name: path.name,
        path,
        size: stat.size,
        lastModified: stat.mtimeMs,
      };
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw error;
    }
  }

  async *list(dir: StoragePath): AsyncGenerator<EntryInfo> {
    const dirPath = this.resolvePath(dir);

    let entries: Dirent[];
    try {
      entries = await this.fs.readdir(dirPath, { withFileTypes: true });
    } catch (error) {
      if (isNotFound(error)) return;
      throw error;
    }

    for (const entry of entries) {
      // Each host name must map to exactly one segment
      const name = StoragePath.parse(entry.name);
      if (name.segments.length !== 1) {
        throw new InvalidPathError(`The entry '${entry.name}' in '${dir}' is not a valid name`);
      }
      const entryPath = dir.combine(name);
      const stat = await this.fs.stat(this.resolvePath(entryPath));
      yield {
        kind: entry.isDirectory() ? "directory" : "file",
        name: entry.name,
        path: entryPath,
        size: stat.size,
        lastModified: stat.mtimeMs,
      };
    }
  }

  async *read(path: StoragePath): AsyncGenerator<Uint8Array> {
    const info = await this.stats(path);
    if (info?.kind !== "file") {
      throw new NotFoundError(path, `No file at '${path}'`);
    }

    const handle = await this.fs.open(this.resolvePath(path), "r");
    try {
      let position = 0;
      while (true) {
        const buffer = new Uint8Array(this.bufferSize);
        const { bytesRead } = await handle.read(buffer, 0, buffer.length, position);
        if (bytesRead === 0) break;
        yield buffer.subarray(0, bytesRead);
        position += bytesRead;
      }
    } finally {
      await handle.close();
    }
  }

  async write(path: StoragePath, content: BinaryStream): Promise<number> {
    const fullPath = this.resolvePath(path);

    // Ensure parent directory exists
    if (path.segments.length > 1) {
      await this.fs.mkdir(this.resolvePath(path.parent), { recursive: true });
    }

    const handle = await this.fs.open(fullPath, "w");
    try {
      let bytesWritten = 0;
      for await (const chunk of toAsync(content)) {
        const { bytesWritten: written } = await handle.write(chunk, 0, chunk.length, bytesWritten);
        bytesWritten += written;
      }
      return bytesWritten;
    } finally {
      await handle.close();
    }
  }

  async mkdir(path: StoragePath): Promise<void> {
    await this.fs.mkdir(this.resolvePath(path), { recursive: true });
  }

  async remove(path: StoragePath): Promise<boolean> {
    const info = await this.stats(path);
    if (!info) return false;

    const fullPath = this.resolvePath(path);
    if (info.kind === "directory") {
      await this.fs.rmdir(fullPath);
    } else {
      await this.fs.unlink(fullPath);
    }
    return true;
  }

  async removeTree(path: StoragePath): Promise<boolean> {
    if (!(await this.stats(path))) return false;
    await this.fs.rm(this.resolvePath(path), { recursive: true });
    return true;
  }
}
