/**
 * Immutable, segment-based path value.
 *
 * Both `/` and `\` are accepted as separators; repeated separators collapse,
 * `.` fragments are dropped and `..` is resolved eagerly against the
 * preceding segment. A leading `..` that has nothing to remove is kept, so a
 * relative path can still point above its base.
 *
 * A path is absolute when its first segment carries a drive marker (`C:`).
 * Comparison is case-insensitive.
 */

import { ArgumentError, InvalidOperationError, InvalidPathError } from "./errors.js";

export type PathSeparator = "/" | "\\";

export const PathSeparator = {
  ForwardSlash: "/",
  BackSlash: "\\",
} as const satisfies Record<string, PathSeparator>;

/**
 * Anything accepted where a path is expected: a parsed path or a raw string.
 */
export type PathLike = StoragePath | string;

const INVALID_PATH_CHARS = /["<>|\u0000-\u001f]/;
const INVALID_NAME_CHARS = /["<>|:*?\u0000-\u001f]/;

const PARENT = "..";
const CURRENT = ".";

function splitFragments(raw: string): string[] {
  return raw
    .replaceAll(PathSeparator.ForwardSlash, PathSeparator.BackSlash)
    .split(PathSeparator.BackSlash)
    .filter((fragment) => fragment.trim() !== "" && fragment !== CURRENT);
}

/**
 * Folds split fragments into normalized segments.
 * The first segment may hold a drive marker; later ones are plain names.
 */
function foldSegments(fragments: Iterable<string>): string[] {
  const segments: string[] = [];
  for (const fragment of fragments) {
    if (fragment === PARENT && segments.length > 0 && segments.at(-1) !== PARENT) {
      segments.pop();
      continue;
    }
    const invalid = segments.length === 0 ? INVALID_PATH_CHARS : INVALID_NAME_CHARS;
    if (invalid.test(fragment)) {
      throw new InvalidPathError(`The path segment '${fragment}' contains invalid characters`);
    }
    segments.push(fragment);
  }
  return segments;
}

export class StoragePath {
  static readonly empty: StoragePath = new StoragePath([]);

  readonly segments: readonly string[];

  private constructor(segments: string[]) {
    this.segments = Object.freeze(segments);
  }

  /**
   * Parses a raw path string.
   * @throws InvalidPathError when a segment contains a forbidden character
   */
  static parse(raw: string): StoragePath {
    return new StoragePath(foldSegments(splitFragments(raw)));
  }

  /**
   * Builds a path from fragments; each fragment may itself contain separators.
   */
  static of(...fragments: string[]): StoragePath {
    return new StoragePath(foldSegments(fragments.flatMap(splitFragments)));
  }

  static from(path: PathLike): StoragePath {
    return typeof path === "string" ? StoragePath.parse(path) : path;
  }

  get isEmpty(): boolean {
    return this.segments.length === 0;
  }

  get isAbsolute(): boolean {
    return this.segments[0]?.includes(":") ?? false;
  }

  get name(): string {
    return this.segments.at(-1) ?? "";
  }

  /**
   * Suffix of the last segment from its last `.` (dot included), or "".
   */
  get extension(): string {
    const name = this.name;
    const dotIndex = name.lastIndexOf(".");
    return dotIndex < 0 ? "" : name.substring(dotIndex);
  }

  get hasExtension(): boolean {
    return this.extension !== "";
  }

  get nameWithoutExtension(): string {
    const name = this.name;
    return name.substring(0, name.length - this.extension.length);
  }

  get parent(): StoragePath {
    return this.getNthParent(1);
  }

  /**
   * Lower-cased form that agrees with `equals`; use it for map and set keys.
   */
  get key(): string {
    return this.segments.map((segment) => segment.toLowerCase()).join("/");
  }

  /**
   * Appends `other` and re-normalizes the result.
   * @throws ArgumentError when `other` is absolute and this path is not empty
   */
  combine(other: PathLike): StoragePath {
    const next = StoragePath.from(other);
    if (next.isAbsolute) {
      if (this.isEmpty) return next;
      throw new ArgumentError(`Cannot append the absolute path '${next}' to '${this}'`);
    }
    if (next.isEmpty) return this;
    return new StoragePath(foldSegments([...this.segments, ...next.segments]));
  }

  /**
   * Ascends `count` levels by appending `..` segments.
   * @throws ArgumentError when `count` is negative or not an integer
   * @throws InvalidOperationError when ascending past the root of an absolute path
   */
  getNthParent(count: number): StoragePath {
    if (!Number.isInteger(count) || count < 0) {
      throw new ArgumentError(`Parent count must be a non-negative integer, got ${count}`);
    }
    if (this.isAbsolute && count >= this.segments.length) {
      throw new InvalidOperationError(
        `Cannot remove ${count} segment(s) from the absolute path '${this}'`,
      );
    }
    if (count === 0) return this;
    const ascend = new Array<string>(count).fill(PARENT);
    return new StoragePath(foldSegments([...this.segments, ...ascend]));
  }

  /**
   * Replaces the extension of the last segment. A missing leading dot is
   * added; an empty extension strips the current one.
   */
  setExtension(extension: string): StoragePath {
    const suffix = extension === "" || extension.startsWith(".") ? extension : `.${extension}`;
    if (this.isEmpty) {
      return suffix === "" ? this : StoragePath.of(suffix);
    }
    return this.withName(this.nameWithoutExtension + suffix);
  }

  /**
   * Replaces the last segment.
   * @throws InvalidPathError when `name` is not a single plain segment
   */
  withName(name: string): StoragePath {
    const parts = splitFragments(name);
    if (parts.length !== 1 || parts[0] === PARENT) {
      throw new InvalidPathError(`'${name}' is not a valid file or directory name`);
    }
    return new StoragePath(foldSegments([...this.segments.slice(0, -1), ...parts]));
  }

  /**
   * Returns the remainder of this path below `base`, or undefined when
   * `base` is not a prefix of it.
   */
  relativeTo(base: PathLike): StoragePath | undefined {
    const prefix = StoragePath.from(base).segments;
    if (prefix.length > this.segments.length) return undefined;
    for (let i = 0; i < prefix.length; i++) {
      if (prefix[i].toLowerCase() !== this.segments[i].toLowerCase()) return undefined;
    }
    return new StoragePath(this.segments.slice(prefix.length));
  }

  equals(other: PathLike): boolean {
    return this.compare(other) === 0;
  }

  /**
   * Case-insensitive ordering, segment by segment; a prefix sorts first.
   */
  compare(other: PathLike): number {
    const right = StoragePath.from(other).segments;
    const length = Math.min(this.segments.length, right.length);
    for (let i = 0; i < length; i++) {
      const a = this.segments[i].toLowerCase();
      const b = right[i].toLowerCase();
      if (a !== b) return a < b ? -1 : 1;
    }
    return Math.sign(this.segments.length - right.length);
  }

  /**
   * Joins the segments with `separator`. The leading separator is only
   * added to paths that are not absolute.
   */
  render(
    separator: PathSeparator = PathSeparator.BackSlash,
    leadingSlash = false,
    trailingSlash = false,
  ): string {
    let result = this.segments.join(separator);
    if (leadingSlash && !this.isAbsolute) {
      result = separator + result;
    }
    if (trailingSlash) {
      result += separator;
    }
    return result;
  }

  toPosix(): string {
    return this.render(PathSeparator.ForwardSlash);
  }

  toString(): string {
    return this.render();
  }
}
