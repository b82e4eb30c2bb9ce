/**
 * Type definitions for the filesystem and archive collaborators
 */

import type { StoragePath } from "./storage-path.js";

export type EntryKind = "file" | "directory";

export interface EntryInfo {
  kind: EntryKind;
  name: string;
  path: StoragePath;
  size?: number;
  lastModified: number;
}

export type BinaryStream = AsyncIterable<Uint8Array> | Iterable<Uint8Array>;

/**
 * Core filesystem interface - minimal contract for backends.
 * Paths live in the backend's own namespace.
 */
export interface IFileSystem {
  stats(path: StoragePath): Promise<EntryInfo | undefined>;

  /**
   * Direct children of a directory; nothing when it does not exist.
   */
  list(dir: StoragePath): AsyncGenerator<EntryInfo>;

  /**
   * @throws NotFoundError when no file exists at `path`
   */
  read(path: StoragePath): AsyncGenerator<Uint8Array>;

  /**
   * Replaces the file content, creating parent directories as needed.
   * @returns The number of bytes written
   */
  write(path: StoragePath, content: BinaryStream): Promise<number>;

  /**
   * Creates the directory and its parents; existing directories are kept.
   */
  mkdir(path: StoragePath): Promise<void>;

  /**
   * Removes a file or an empty directory.
   * @returns false when nothing was there
   */
  remove(path: StoragePath): Promise<boolean>;

  removeTree?(path: StoragePath): Promise<boolean>;
}

/**
 * One entry of an archive. `name` is the full name inside the archive,
 * using `/` or `\` between its parts.
 */
export interface ArchiveEntry {
  readonly name: string;
  open(): BinaryStream | Promise<BinaryStream>;
}

export interface ArchiveHandle {
  entries(): Iterable<ArchiveEntry> | AsyncIterable<ArchiveEntry>;

  /**
   * Releases the archive and every entry stream it handed out.
   */
  close(): void | Promise<void>;
}
