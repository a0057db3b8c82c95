import fs from 'fs';
import path from 'path';

import { ErrorWithCode, EXIT_INVALID_ARGS } from './exit-codes';

const FILE_ENCODING_UTF8 = 'utf-8';

/**
 * Safely extracts an error message from an unknown error value.
 * Handles Error objects, objects with message property, and converts other types to strings.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

/**
 * Creates a validation error with a custom error code.
 *
 * @param message - The error message to associate with the error.
 * @param code - The numeric error code indicating the exit or validation type.
 * @returns An Error carrying the given `code`.
 */
export function createValidationError(message: string, code: number): ErrorWithCode {
  const err: ErrorWithCode = new Error(message);
  err.code = code;
  return err;
}

/**
 * Restricts a value to the closed interval [min, max].
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Reads and parses a JSON file relative to the current working directory.
 * The parsed value is returned as `unknown`; callers validate its shape.
 *
 * @param filePath - The path to the JSON file.
 * @param errorContext - Label used in error messages (e.g. "Config file").
 * @throws A validation error with EXIT_INVALID_ARGS if the file is missing, not a file, or not valid JSON.
 */
export function readJsonFile(filePath: string, errorContext: string = 'File'): unknown {
  const abs = path.resolve(process.cwd(), filePath);
  if (!fs.existsSync(abs)) {
    throw createValidationError(`${errorContext} not found: ${abs}`, EXIT_INVALID_ARGS);
  }
  const stat = fs.statSync(abs);
  if (!stat.isFile()) {
    throw createValidationError(`Path is not a file: ${abs}`, EXIT_INVALID_ARGS);
  }
  const raw = fs.readFileSync(abs, FILE_ENCODING_UTF8);
  try {
    return JSON.parse(raw);
  } catch (parseError: unknown) {
    throw createValidationError(`Invalid JSON format in ${errorContext.toLowerCase()}: ${abs} (${getErrorMessage(parseError)})`, EXIT_INVALID_ARGS);
  }
}

/**
 * Writes content to a file, creating parent directories if needed.
 *
 * @param relativePath - The file path relative to the current working directory.
 * @param content - The content to write to the file.
 * @returns Promise resolving to the absolute path of the file that was written.
 */
export async function writeFileWithDirectories(relativePath: string, content: string): Promise<string> {
  const absolutePath = path.resolve(process.cwd(), relativePath);

  const parentDir = path.dirname(absolutePath);
  if (!fs.existsSync(parentDir)) {
    fs.mkdirSync(parentDir, { recursive: true });
  }

  await fs.promises.writeFile(absolutePath, content, FILE_ENCODING_UTF8);

  return absolutePath;
}

/**
 * Narrows an unknown value to a plain string-keyed object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
