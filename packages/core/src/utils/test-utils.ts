import fs from 'fs';
import os from 'os';
import path from 'path';

import { RandomSource } from '../agents/random-source';
import { Senator } from '../types/senate.types';

import { ErrorWithCode } from './exit-codes';
import { EngineLogger, LogFields } from './logger';

/**
 * Creates a temporary directory for testing and returns a cleanup function.
 *
 * @param prefix - Optional prefix for the temporary directory name (default: 'test-')
 */
export function createTempDir(prefix: string = 'test-'): { tmpDir: string; cleanup: () => void } {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  return {
    tmpDir,
    cleanup: (): void => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    },
  };
}

/**
 * Runs `fn` and returns what it threw. Fails the test if it returns normally.
 */
export function captureError(fn: () => unknown): ErrorWithCode {
  try {
    fn();
  } catch (error: unknown) {
    if (error instanceof Error) return error;
    throw new Error(`Expected an Error to be thrown, got ${String(error)}`);
  }
  throw new Error('Expected function to throw');
}

/**
 * A random source that replays the given draws in order and throws once they run out,
 * so a test fails loudly if the code under test draws more often than expected.
 */
export function scriptedRandom(values: readonly number[]): RandomSource & { remaining: () => number } {
  let index = 0;
  return {
    next: () => {
      if (index >= values.length) {
        throw new RangeError(`Scripted random source exhausted after ${values.length} draws`);
      }
      return values[index++];
    },
    remaining: () => values.length - index,
  };
}

export function makeSenator(overrides: Partial<Senator> = {}): Senator {
  return { id: 'sen-1', name: 'Cato', faction: 'Optimates', rank: 2, ...overrides };
}

export interface LogEntry {
  level: 'debug' | 'info' | 'warn';
  message: string;
  fields?: LogFields;
}

/**
 * Logger that keeps every entry for later assertions.
 */
export function createCapturingLogger(): EngineLogger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    debug: (message, fields) => entries.push({ level: 'debug', message, ...(fields && { fields }) }),
    info: (message, fields) => entries.push({ level: 'info', message, ...(fields && { fields }) }),
    warn: (message, fields) => entries.push({ level: 'warn', message, ...(fields && { fields }) }),
  };
}
