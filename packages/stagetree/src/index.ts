/**
 * stagetree - normalized paths and staged directory building
 */

export {
  ByteSource,
  type BytesSource,
  type DeferredSource,
  type FileContent,
  openByteSource,
  releaseByteSource,
} from "./byte-source.js";
export { ConflictPolicy, resolveAvailableName } from "./conflict-policy.js";
// Builder
export {
  type BuildEvent,
  DirectoryBuilder,
  type DirectoryBuilderOptions,
} from "./directory-builder.js";
export {
  ArgumentError,
  ConflictError,
  InvalidOperationError,
  InvalidPathError,
  NotFoundError,
  StageTreeError,
} from "./errors.js";
// Wrapper class
export { FileSystem } from "./file-system.js";
// Implementations
export { MemFileSystem } from "./impl/mem-file-system.js";
export { NodeFileSystem, type NodeFileSystemOptions } from "./impl/node-file-system.js";
export {
  type ArchiveIntent,
  type CopyIntent,
  type DeleteIntent,
  type DirectoryIntent,
  type FileIntent,
  MutationSet,
  type PendingMutations,
  releaseMutations,
} from "./mutation-set.js";
// Paths
export { type PathLike, PathSeparator, StoragePath } from "./storage-path.js";
// Types
export type {
  ArchiveEntry,
  ArchiveHandle,
  BinaryStream,
  EntryInfo,
  EntryKind,
  IFileSystem,
} from "./types.js";
export {
  collectBytes,
  collectGenerator,
  concatBytes,
  isAsyncIterable,
  toAsync,
  toAsyncIterable,
} from "./utils/collect-stream.js";
