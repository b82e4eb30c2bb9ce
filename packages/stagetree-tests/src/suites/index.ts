/**
 * Test suites exports
 */

export { createDirectoryBuilderTests } from "./directory-builder.suite.js";
export {
  createFileSystemTests,
  type FileSystemFactory,
  type FileSystemTestContext,
} from "./file-system.suite.js";
