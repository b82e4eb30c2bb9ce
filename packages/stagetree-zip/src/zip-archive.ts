/**
 * Zip implementation of ArchiveHandle
 *
 * The archive is decoded in memory with fflate; entries are handed out in
 * archive order. Directory records keep their trailing `/`.
 */

import { type Unzipped, unzipSync } from "fflate";
import {
  type ArchiveEntry,
  type ArchiveHandle,
  FileSystem,
  type IFileSystem,
  InvalidOperationError,
  type PathLike,
  StoragePath,
} from "stagetree";

export class ZipArchive implements ArchiveHandle {
  private contents: Unzipped | undefined;

  private constructor(contents: Unzipped) {
    this.contents = contents;
  }

  static fromBytes(data: Uint8Array): ZipArchive {
    return new ZipArchive(unzipSync(data));
  }

  /**
   * Reads a zip file from a filesystem.
   * @throws NotFoundError when no file exists at `path`
   */
  static async open(files: IFileSystem, path: PathLike): Promise<ZipArchive> {
    const data = await FileSystem.wrap(files).readAllBytes(StoragePath.from(path));
    return ZipArchive.fromBytes(data);
  }

  get isClosed(): boolean {
    return this.contents === undefined;
  }

  get names(): string[] {
    return Object.keys(this.unzipped());
  }

  *entries(): Generator<ArchiveEntry> {
    for (const [name, data] of Object.entries(this.unzipped())) {
      yield {
        name,
        open: () => {
          this.unzipped();
          return [data];
        },
      };
    }
  }

  close(): void {
    this.contents = undefined;
  }

  private unzipped(): Unzipped {
    if (!this.contents) {
      throw new InvalidOperationError("The zip archive is closed");
    }
    return this.contents;
  }
}
