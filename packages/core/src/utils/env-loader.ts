import fs from 'fs';
import path from 'path';

import dotenv from 'dotenv';

import { writeStderr } from './console';

const DEFAULT_ENV_FILENAME = '.env';
const ERROR_ENV_FILE_NOT_FOUND = 'Environment file not found';
const WARN_DEFAULT_ENV_MISSING = 'No .env file found at';
const ERROR_ENV_FILE_LOAD_FAILED = 'Failed to load environment file';

/**
 * Loads provider API keys and other settings from a .env file into `process.env`.
 *
 * A missing default `.env` is not an error (a warning is written in verbose mode);
 * a missing explicitly named file is.
 *
 * @param envFilePath - Optional path to a custom .env file, relative to the invocation directory.
 * @param verbose - Whether to report a missing default file on stderr.
 * @returns The absolute path that was loaded, or undefined when the default file is absent.
 * @throws {Error} If an explicitly specified file doesn't exist or dotenv fails to parse it.
 */
export function loadEnvironmentFile(envFilePath?: string, verbose?: boolean): string | undefined {
  const fileName = envFilePath || DEFAULT_ENV_FILENAME;
  const baseDir = process.env.INIT_CWD || process.cwd();
  const resolvedPath = path.resolve(baseDir, fileName);

  if (!fs.existsSync(resolvedPath)) {
    if (envFilePath) {
      throw new Error(`${ERROR_ENV_FILE_NOT_FOUND}: ${resolvedPath}`);
    }
    if (verbose === true) {
      writeStderr(`${WARN_DEFAULT_ENV_MISSING} ${resolvedPath}. Continuing without loading environment variables.\n`);
    }
    return undefined;
  }

  const result = dotenv.config({ path: resolvedPath });
  if (result.error) {
    throw new Error(`${ERROR_ENV_FILE_LOAD_FAILED}: ${result.error.message}`);
  }
  return resolvedPath;
}
