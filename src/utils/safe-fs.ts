/**
 * File reads behind path validation.
 *
 * Paths come from the command line and config, so each one is checked and
 * resolved against the working directory before it reaches the file system.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as fsSync from 'node:fs';
import * as path from 'node:path';

/**
 * Error thrown when a path is empty or contains a null byte.
 */
export class PathValidationError extends Error {
  /** The rejected path. */
  public readonly invalidPath: string;

  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

const BYTE_ORDER_MARK = '\uFEFF';

/**
 * Validates a path and resolves it against the working directory.
 *
 * @param filePath - Path as given by the user.
 * @returns The absolute, normalized path.
 * @throws {PathValidationError} If the path is empty or contains a null byte.
 */
export function validatePath(filePath: string): string {
  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }
  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }
  return path.resolve(filePath);
}

function stripByteOrderMark(text: string): string {
  return text.startsWith(BYTE_ORDER_MARK) ? text.slice(BYTE_ORDER_MARK.length) : text;
}

/**
 * Reads a UTF-8 text file, dropping a leading byte order mark.
 *
 * @throws {PathValidationError} If the path is invalid.
 * @throws The file system error (ENOENT, EACCES, EISDIR, ...) if the read fails.
 */
export async function safeReadTextFile(filePath: string): Promise<string> {
  return stripByteOrderMark(await fs.readFile(validatePath(filePath), 'utf-8'));
}

/**
 * Synchronous form of {@link safeReadTextFile}.
 */
export function safeReadTextFileSync(filePath: string): string {
  return stripByteOrderMark(fsSync.readFileSync(validatePath(filePath), 'utf-8'));
}

/**
 * Checks whether a path exists.
 *
 * @throws {PathValidationError} If the path is invalid.
 */
export function safeExistsSync(filePath: string): boolean {
  return fsSync.existsSync(validatePath(filePath));
}
