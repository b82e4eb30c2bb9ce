/**
 * Error taxonomy shared by paths, filesystems and the builder
 */

import type { StoragePath } from "./storage-path.js";

export class StageTreeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A segment holds a forbidden character, or a relative/absolute path was
 * used where the other kind is required.
 */
export class InvalidPathError extends StageTreeError {}

/**
 * A referenced filesystem entry does not exist.
 */
export class NotFoundError extends StageTreeError {
  constructor(
    readonly path: StoragePath,
    message = `No file or directory at '${path}'`,
  ) {
    super(message);
  }
}

/**
 * A file already exists at a write destination under the "throw" policy.
 */
export class ConflictError extends StageTreeError {
  constructor(
    readonly path: StoragePath,
    message = `The file '${path.name}' already exists at '${path}'`,
  ) {
    super(message);
  }
}

export class ArgumentError extends StageTreeError {}

export class InvalidOperationError extends StageTreeError {}
