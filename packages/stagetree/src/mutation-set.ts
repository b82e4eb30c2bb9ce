/**
 * Pending, not yet applied filesystem mutations
 */

import { type ByteSource, releaseByteSource } from "./byte-source.js";
import type { StoragePath } from "./storage-path.js";
import type { ArchiveHandle } from "./types.js";

export interface FileIntent {
  readonly kind: "file";
  readonly path: StoragePath;
  readonly source: ByteSource;
}

export interface DirectoryIntent {
  readonly kind: "directory";
  readonly path: StoragePath;
}

/**
 * Copy of an existing file or directory tree; `source` is a path in the
 * filesystem namespace, `path` the destination below the root.
 */
export interface CopyIntent {
  readonly kind: "copy";
  readonly path: StoragePath;
  readonly source: StoragePath;
}

export interface ArchiveIntent {
  readonly kind: "archive";
  readonly path: StoragePath;
  readonly archive: ArchiveHandle;
}

export interface DeleteIntent {
  readonly kind: "delete";
  readonly path: StoragePath;
}

/**
 * Intents grouped by kind, each list in staging order.
 */
export interface PendingMutations {
  files: FileIntent[];
  directories: DirectoryIntent[];
  copies: CopyIntent[];
  archives: ArchiveIntent[];
  deletions: DeleteIntent[];
}

function emptyMutations(): PendingMutations {
  return { files: [], directories: [], copies: [], archives: [], deletions: [] };
}

/**
 * Releases every deferred source and closes every archive in `pending`,
 * then empties its lists. All resources are attempted even when one fails;
 * the failures are rethrown afterwards.
 */
export async function releaseMutations(pending: PendingMutations): Promise<void> {
  const errors: unknown[] = [];

  for (const file of pending.files) {
    try {
      await releaseByteSource(file.source);
    } catch (error) {
      errors.push(error);
    }
  }
  for (const { archive } of pending.archives) {
    try {
      await archive.close();
    } catch (error) {
      errors.push(error);
    }
  }
  Object.assign(pending, emptyMutations());

  if (errors.length === 1) throw errors[0];
  if (errors.length > 1) {
    throw new AggregateError(errors, "Failed to release staged resources");
  }
}

export class MutationSet {
  private pending: PendingMutations = emptyMutations();

  addFile(path: StoragePath, source: ByteSource): void {
    this.pending.files.push({ kind: "file", path, source });
  }

  addDirectory(path: StoragePath): void {
    this.pending.directories.push({ kind: "directory", path });
  }

  addCopy(path: StoragePath, source: StoragePath): void {
    this.pending.copies.push({ kind: "copy", path, source });
  }

  addArchive(path: StoragePath, archive: ArchiveHandle): void {
    this.pending.archives.push({ kind: "archive", path, archive });
  }

  addDelete(path: StoragePath): void {
    this.pending.deletions.push({ kind: "delete", path });
  }

  get size(): number {
    const { files, directories, copies, archives, deletions } = this.pending;
    return files.length + directories.length + copies.length + archives.length + deletions.length;
  }

  get isEmpty(): boolean {
    return this.size === 0;
  }

  /**
   * Hands every pending intent to the caller, which takes over ownership
   * of their resources, and leaves this set empty.
   */
  drain(): PendingMutations {
    const drained = this.pending;
    this.pending = emptyMutations();
    return drained;
  }

  /**
   * Releases every resource held by pending intents and clears the set.
   */
  release(): Promise<void> {
    return releaseMutations(this.drain());
  }
}
