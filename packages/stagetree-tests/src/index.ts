/**
 * stagetree-tests
 *
 * Parametrized test suites for IFileSystem backends and DirectoryBuilder.
 * Use these suites to check any backend against the standard contracts.
 */

// Test suites
export * from "./suites/index.js";
// Test utilities
export * from "./test-utils.js";
