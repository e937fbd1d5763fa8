/**
 * File access shared by the file-based source adapters
 */

import { readFile, stat } from "fs/promises";
import { SourceNotFoundError, SourceReadError } from "../../utils/errors.js";

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");
}

/**
 * Fail with SourceNotFoundError unless `path` is an existing regular file
 */
export async function assertFileExists(path: string): Promise<void> {
  try {
    const stats = await stat(path);
    if (!stats.isFile()) {
      throw new SourceNotFoundError(path);
    }
  } catch (error) {
    if (error instanceof SourceNotFoundError) {
      throw error;
    }
    if (isNotFound(error)) {
      throw new SourceNotFoundError(path, { cause: error });
    }
    throw new SourceReadError(`Cannot access source file: ${path}`, { path }, { cause: error });
  }
}

/**
 * Read a whole source file as text, without a leading byte order mark
 */
export async function readSourceFile(path: string, encoding: BufferEncoding = "utf-8"): Promise<string> {
  await assertFileExists(path);

  let content: string;
  try {
    content = await readFile(path, encoding);
  } catch (error) {
    throw new SourceReadError(`Failed to read source file: ${path}`, { path }, { cause: error });
  }

  content = content.replace(/^\uFEFF/, "");
  if (content.trim() === "") {
    throw new SourceReadError(`Source file is empty: ${path}`, { path });
  }
  return content;
}
