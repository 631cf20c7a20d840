/**
 * File system helpers with path validation.
 *
 * Config documents are read and written synchronously so that resolution
 * runs to completion in a single call. Every path is validated and resolved
 * to an absolute path before the file system is touched.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  /**
   * Creates a new PathValidationError.
   *
   * @param message - Human-readable error message.
   * @param invalidPath - The path that failed validation.
   */
  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates and resolves a file system path.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty or contains null bytes.
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

/**
 * Synchronously reads a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @returns The file contents.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be read (e.g., file not found, permission denied).
 */
export function safeReadTextFileSync(filePath: string): string {
  return fs.readFileSync(validatePath(filePath), 'utf-8');
}

/**
 * Synchronously writes to a file after validating the path.
 *
 * @param filePath - The path to the file to write.
 * @param data - The data to write to the file.
 * @param encoding - Text encoding of `data`.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be written (e.g., permission denied, directory does not exist).
 */
export function safeWriteFileSync(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): void {
  fs.writeFileSync(validatePath(filePath), data, encoding);
}
