/**
 * Test utilities for IFileSystem backends and DirectoryBuilder
 */

import {
  type ArchiveEntry,
  type ArchiveHandle,
  collectBytes,
  FileSystem,
  type IFileSystem,
  StoragePath,
} from "stagetree";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function toBytes(str: string): Uint8Array {
  return encoder.encode(str);
}

export function fromBytes(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

export function path(raw: string): StoragePath {
  return StoragePath.parse(raw);
}

export async function readText(files: IFileSystem, raw: string): Promise<string> {
  return fromBytes(await collectBytes(files.read(path(raw))));
}

export async function writeText(files: IFileSystem, raw: string, text: string): Promise<void> {
  await files.write(path(raw), [toBytes(text)]);
}

export function fileExists(files: IFileSystem, raw: string): Promise<boolean> {
  return FileSystem.wrap(files).fileExists(path(raw));
}

export function directoryExists(files: IFileSystem, raw: string): Promise<boolean> {
  return FileSystem.wrap(files).directoryExists(path(raw));
}

export interface MemoryArchive extends ArchiveHandle {
  readonly closed: boolean;
}

/**
 * Archive over text entries, in insertion order. Names ending in `/` are
 * directory records.
 */
export function memoryArchive(entries: Record<string, string>): MemoryArchive {
  let closed = false;
  return {
    get closed() {
      return closed;
    },
    entries(): ArchiveEntry[] {
      return Object.entries(entries).map(([name, text]) => ({
        name,
        open: () => [toBytes(text)],
      }));
    },
    close() {
      closed = true;
    },
  };
}
