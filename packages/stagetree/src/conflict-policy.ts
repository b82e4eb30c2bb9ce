/**
 * What a commit does when a file already exists at a write destination
 */

import type { StoragePath } from "./storage-path.js";

/**
 * - `overwrite` replaces the existing file
 * - `skip` leaves it alone and drops the write
 * - `throw` aborts the commit with a ConflictError
 * - `rename` writes next to it as `name (N).ext`
 */
export type ConflictPolicy = "overwrite" | "skip" | "throw" | "rename";

export const ConflictPolicy = {
  Overwrite: "overwrite",
  Skip: "skip",
  ThrowOnConflict: "throw",
  Rename: "rename",
} as const satisfies Record<string, ConflictPolicy>;

const COUNTER_SUFFIX = /\s\(\d+\)$/;

/**
 * Finds the first free `name (N).ext` sibling of `path`, counting from 1.
 * A counter already present on the name is replaced rather than nested,
 * so `out (1).txt` yields `out (2).txt` and not `out (1) (1).txt`.
 *
 * @returns `path` itself when nothing exists there
 */
export async function resolveAvailableName(
  path: StoragePath,
  exists: (candidate: StoragePath) => Promise<boolean>,
): Promise<StoragePath> {
  if (!(await exists(path))) return path;

  const base = path.nameWithoutExtension.replace(COUNTER_SUFFIX, "");
  const extension = path.extension;
  for (let counter = 1; ; counter++) {
    const candidate = path.withName(`${base} (${counter})${extension}`);
    if (!(await exists(candidate))) return candidate;
  }
}
