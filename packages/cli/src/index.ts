#!/usr/bin/env node
import { Command } from 'commander';
import { EXIT_GENERAL_ERROR, logInfo, logWarning } from 'curia-core';

import packageJson from '../package.json';

import { debateCommand, loadConfig as loadDebateConfig } from './commands/debate';

export const PROGRAM_NAME = 'curia';

/**
 * Outputs a warning message to stderr with unified formatting.
 */
export function warnUser(message: string): void {
  logWarning(message);
}

/**
 * Outputs an info message to stderr with unified formatting.
 */
export function infoUser(message: string): void {
  logInfo(message);
}

/**
 * Runs the CLI.
 *
 * @param argv - Command-line arguments, excluding 'node' and the script name.
 * @throws Any error raised while parsing or running a command; it carries an exit `code` when known.
 */
export async function runCli(argv: string[]): Promise<void> {
  const program = new Command();
  program
    .name(PROGRAM_NAME)
    .description('Senate debate simulator: senators react, interject and change their minds')
    .version(packageJson.version);

  debateCommand(program);

  await program.parseAsync(['node', PROGRAM_NAME, ...argv]);
}

if (require.main === module) {
  runCli(process.argv.slice(2)).catch((err: unknown) => {
    const code = err && typeof err === 'object' && 'code' in err && typeof err.code === 'number' ? err.code : EXIT_GENERAL_ERROR;
    const msg = err && typeof err === 'object' && 'message' in err && typeof err.message === 'string' ? err.message : 'Unknown error';
    process.stderr.write(msg + '\n');
    process.exit(code);
  });
}

export const loadConfig = loadDebateConfig;

export { DebateProgressUI } from './utils/progress-ui';
