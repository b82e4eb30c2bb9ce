/**
 * stagetree-zip - zip archives for DirectoryBuilder.extractArchive
 */

export { ZipArchive } from "./zip-archive.js";
