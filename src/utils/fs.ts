/**
 * File System Utilities
 * Reading schema documents and override files
 */

import * as fsPromises from "node:fs/promises";
import * as path from "node:path";

/**
 * Read a text file, UTF-8 unless told otherwise
 */
export async function readFileWithEncoding(
  filePath: string,
  encoding: BufferEncoding = "utf-8"
): Promise<string> {
  return fsPromises.readFile(filePath, { encoding });
}

/**
 * Whether a document path should be parsed as JSON rather than YAML
 */
export function isJsonPath(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === ".json";
}
