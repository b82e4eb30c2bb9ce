/**
 * Stages file, directory, copy, archive and delete operations and applies
 * them to a root directory in one pass.
 *
 * The commit is not transactional: it stops at the first failure and
 * leaves whatever it already applied in place.
 */

import {
  ByteSource,
  type FileContent,
  openByteSource,
  releaseByteSource,
} from "./byte-source.js";
import { ConflictPolicy, resolveAvailableName } from "./conflict-policy.js";
import {
  ConflictError,
  InvalidOperationError,
  InvalidPathError,
  NotFoundError,
} from "./errors.js";
import { FileSystem } from "./file-system.js";
import {
  type ArchiveIntent,
  type CopyIntent,
  MutationSet,
  type PendingMutations,
  releaseMutations,
} from "./mutation-set.js";
import { type PathLike, StoragePath } from "./storage-path.js";
import type { ArchiveHandle, EntryKind, IFileSystem } from "./types.js";
import { collectBytes, toAsync } from "./utils/collect-stream.js";

/**
 * Progress reported while a commit runs. Paths are resolved against the
 * builder's root.
 */
export type BuildEvent =
  | { type: "mkdir"; path: StoragePath }
  | { type: "delete"; path: StoragePath; kind: EntryKind }
  | { type: "copy"; source: StoragePath; path: StoragePath; kind: EntryKind }
  | { type: "extract"; path: StoragePath; entries: number }
  | { type: "write"; path: StoragePath; bytes: number }
  | { type: "skip"; path: StoragePath }
  | { type: "rename"; path: StoragePath; target: StoragePath };

export interface DirectoryBuilderOptions {
  /**
   * Filesystem the commit is applied to.
   */
  files: IFileSystem;

  /**
   * Target directory; created on commit when missing.
   */
  root: PathLike;

  /**
   * @default "throw"
   */
  conflictPolicy?: ConflictPolicy;

  onEvent?: (event: BuildEvent) => void;
}

const TRAILING_SEPARATOR = /[\\/]$/;

/**
 * Runs `cleanup` after `error`, then rethrows `error`; a failing cleanup
 * joins it in an AggregateError.
 */
async function rethrowAfter(
  error: unknown,
  cleanup: () => void | Promise<void>,
  message: string,
): Promise<never> {
  try {
    await cleanup();
  } catch (cleanupError) {
    throw new AggregateError([error, cleanupError], message);
  }
  throw error;
}

export class DirectoryBuilder {
  readonly root: StoragePath;

  /**
   * Applied to every file write of the next commit.
   */
  conflictPolicy: ConflictPolicy;

  private files: FileSystem;
  private mutations = new MutationSet();
  private onEvent?: (event: BuildEvent) => void;
  private building = false;

  constructor(options: DirectoryBuilderOptions) {
    this.files = FileSystem.wrap(options.files);
    this.root = StoragePath.from(options.root);
    this.conflictPolicy = options.conflictPolicy ?? ConflictPolicy.ThrowOnConflict;
    this.onEvent = options.onEvent;
  }

  /**
   * Number of staged operations waiting for the next commit.
   */
  get pendingCount(): number {
    return this.mutations.size;
  }

  // ========================================
  // Staging
  // ========================================

  /**
   * Stages a file. Strings are written as UTF-8.
   * @throws InvalidPathError when `path` is absolute, empty or leaves the root
   */
  addFile(path: PathLike, content: FileContent = ""): this {
    this.mutations.addFile(this.destination(path, true), ByteSource.from(content));
    return this;
  }

  addDirectory(path: PathLike): this {
    this.mutations.addDirectory(this.destination(path, false));
    return this;
  }

  /**
   * Stages a copy of the file or directory tree at `source` to `path`.
   * The source is looked up when the commit runs.
   */
  addExisting(path: PathLike, source: PathLike): this {
    this.mutations.addCopy(this.destination(path, false), StoragePath.from(source));
    return this;
  }

  /**
   * Stages every entry of `archive` below `path`. The builder owns the
   * archive from here on and closes it.
   */
  extractArchive(path: PathLike, archive: ArchiveHandle): this {
    this.mutations.addArchive(this.destination(path, false), archive);
    return this;
  }

  delete(path: PathLike): this {
    this.mutations.addDelete(this.destination(path, true));
    return this;
  }

  // ========================================
  // Commit
  // ========================================

  /**
   * Applies every staged operation, in this order: ensure the root, delete,
   * expand copies, expand archives, create directories, write files.
   *
   * The builder is empty afterwards whether the commit succeeds or not;
   * resources of operations that never ran are released on failure.
   */
  async build(): Promise<void> {
    this.assertIdle();
    this.building = true;
    const pending = this.mutations.drain();
    try {
      await this.commit(pending);
    } catch (error) {
      await rethrowAfter(
        error,
        () => releaseMutations(pending),
        "Commit failed and staged resources could not be released",
      );
    } finally {
      this.building = false;
    }
  }

  /**
   * Drops every staged operation, closing archives and releasing deferred
   * file content.
   */
  async dispose(): Promise<void> {
    this.assertIdle();
    await this.mutations.release();
  }

  private async commit(pending: PendingMutations): Promise<void> {
    const known = new Set<string>();

    await this.ensureDirectory(this.root, known);

    for (let intent = pending.deletions.shift(); intent; intent = pending.deletions.shift()) {
      await this.deleteEntry(this.root.combine(intent.path));
    }

    for (let intent = pending.copies.shift(); intent; intent = pending.copies.shift()) {
      await this.expandCopy(intent, pending);
    }

    for (let intent = pending.archives.shift(); intent; intent = pending.archives.shift()) {
      const { archive } = intent;
      try {
        await this.expandArchive(intent, pending);
      } catch (error) {
        await rethrowAfter(
          error,
          () => archive.close(),
          `Failed to extract '${intent.path}' and to close the archive`,
        );
      }
      await archive.close();
    }

    for (let intent = pending.directories.shift(); intent; intent = pending.directories.shift()) {
      await this.ensureDirectory(this.root.combine(intent.path), known);
    }
    for (const intent of pending.files) {
      await this.ensureDirectory(this.root.combine(intent.path).parent, known);
    }

    for (let intent = pending.files.shift(); intent; intent = pending.files.shift()) {
      await this.writeFile(this.root.combine(intent.path), intent.source, known);
    }
  }

  private async deleteEntry(path: StoragePath): Promise<void> {
    const info = await this.files.stats(path);
    if (!info) {
      throw new NotFoundError(path);
    }
    if (info.kind === "file") {
      await this.files.deleteFile(path);
    } else {
      await this.files.deleteDirectoryRecursive(path);
    }
    this.emit({ type: "delete", path, kind: info.kind });
  }

  /**
   * Turns a copy into file and directory intents. Directory trees are
   * walked breadth first with an explicit queue.
   */
  private async expandCopy(intent: CopyIntent, pending: PendingMutations): Promise<void> {
    const info = await this.files.stats(intent.source);
    if (!info) {
      throw new NotFoundError(intent.source);
    }
    this.emit({
      type: "copy",
      source: intent.source,
      path: this.root.combine(intent.path),
      kind: info.kind,
    });

    if (info.kind === "file") {
      if (intent.path.isEmpty) {
        throw new InvalidPathError(`A copy of the file '${intent.source}' needs a destination name`);
      }
      pending.files.push({ kind: "file", path: intent.path, source: this.readLater(intent.source) });
      return;
    }

    const queue = [{ source: intent.source, path: intent.path }];
    for (let dir = queue.shift(); dir; dir = queue.shift()) {
      pending.directories.push({ kind: "directory", path: dir.path });
      for await (const entry of this.files.list(dir.source)) {
        const path = dir.path.combine(StoragePath.of(entry.name));
        if (entry.kind === "directory") {
          queue.push({ source: entry.path, path });
        } else {
          pending.files.push({ kind: "file", path, source: this.readLater(entry.path) });
        }
      }
    }
  }

  /**
   * Reads every entry of the archive into a file intent. Entry names that
   * end with a separator are directories.
   */
  private async expandArchive(intent: ArchiveIntent, pending: PendingMutations): Promise<void> {
    let count = 0;
    for await (const entry of toAsync(intent.archive.entries())) {
      const relative = StoragePath.parse(entry.name);
      if (relative.isAbsolute || relative.segments[0] === "..") {
        throw new InvalidPathError(
          `The archive entry '${entry.name}' points outside '${intent.path}'`,
        );
      }

      const path = intent.path.combine(relative);
      if (relative.isEmpty || TRAILING_SEPARATOR.test(entry.name)) {
        pending.directories.push({ kind: "directory", path });
        continue;
      }

      const data = await collectBytes(await entry.open());
      pending.files.push({ kind: "file", path, source: ByteSource.fromBytes(data) });
      count++;
    }
    this.emit({ type: "extract", path: this.root.combine(intent.path), entries: count });
  }

  /**
   * Writes one file under the conflict policy. The source is released
   * whenever the write does not consume it.
   */
  private async writeFile(path: StoragePath, source: ByteSource, known: Set<string>): Promise<void> {
    let settled = false;
    try {
      await this.ensureDirectory(path.parent, known);

      let target = path;
      if (await this.files.fileExists(path)) {
        switch (this.conflictPolicy) {
          case "overwrite":
            break;
          case "skip":
            settled = true;
            await releaseByteSource(source);
            this.emit({ type: "skip", path });
            return;
          case "throw":
            throw new ConflictError(path);
          case "rename":
            target = await resolveAvailableName(path, (candidate) => this.files.exists(candidate));
            this.emit({ type: "rename", path, target });
            break;
        }
      }

      const bytes = await this.files.write(target, await openByteSource(source));
      settled = true;
      this.emit({ type: "write", path: target, bytes });
    } catch (error) {
      if (settled) throw error;
      await rethrowAfter(
        error,
        () => releaseByteSource(source),
        `Failed to write '${path}' and to release its content`,
      );
    }
  }

  private async ensureDirectory(path: StoragePath, known: Set<string>): Promise<void> {
    if (known.has(path.key)) return;
    if (!(await this.files.directoryExists(path))) {
      await this.files.mkdir(path);
      this.emit({ type: "mkdir", path });
    }
    known.add(path.key);
  }

  private readLater(path: StoragePath): ByteSource {
    return ByteSource.deferred(() => this.files.read(path));
  }

  /**
   * Validates a staged destination, which is always relative to the root.
   */
  private destination(path: PathLike, requireName: boolean): StoragePath {
    this.assertIdle();
    const relative = StoragePath.from(path);
    if (relative.isAbsolute) {
      throw new InvalidPathError(`The path '${relative}' is not a relative path`);
    }
    if (relative.segments[0] === "..") {
      throw new InvalidPathError(`The path '${relative}' points outside the root directory`);
    }
    if (requireName && relative.isEmpty) {
      throw new InvalidPathError("The path must name an entry below the root directory");
    }
    return relative;
  }

  private assertIdle(): void {
    if (this.building) {
      throw new InvalidOperationError("A commit is running; wait for build() to settle");
    }
  }

  private emit(event: BuildEvent): void {
    this.onEvent?.(event);
  }
}
