/**
 * Tests for NodeFileSystem implementation
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import {
  collectGenerator,
  DirectoryBuilder,
  InvalidPathError,
  NodeFileSystem,
  StoragePath,
} from "stagetree";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createDirectoryBuilderTests } from "../src/suites/directory-builder.suite.js";
import {
  createFileSystemTests,
  type FileSystemTestContext,
} from "../src/suites/file-system.suite.js";

async function createContext(prefix: string): Promise<FileSystemTestContext> {
  // Create unique temp directory for each test
  const testDir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));

  return {
    files: new NodeFileSystem({ fs, rootDir: testDir }),
    cleanup: async () => {
      await fs.rm(testDir, { recursive: true, force: true });
    },
  };
}

createFileSystemTests("NodeFileSystem", () => createContext("stagetree-fs-"));

createDirectoryBuilderTests("NodeFileSystem", () => createContext("stagetree-builder-"));

describe("NodeFileSystem host names", () => {
  let testDir: string;
  let files: NodeFileSystem;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), "stagetree-names-"));
    files = new NodeFileSystem({ fs, rootDir: testDir });
    await fs.mkdir(path.join(testDir, "src", " "), { recursive: true });
    await fs.writeFile(path.join(testDir, "src", "a.txt"), "a");
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it("should reject a blank entry name when listing", async () => {
    await expect(collectGenerator(files.list(StoragePath.parse("src")))).rejects.toBeInstanceOf(
      InvalidPathError,
    );
  });

  it("should fail a copy of a tree holding a blank entry name", async () => {
    const commit = new DirectoryBuilder({ files, root: "out" }).addExisting("copy", "src").build();
    await expect(commit).rejects.toBeInstanceOf(InvalidPathError);
  });
});
