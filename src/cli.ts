/**
 * ecg-hrm command line driver
 *
 * Usage:
 *   ecg-hrm                                  interactive prompts
 *   ecg-hrm <file.csv> [--window s,e] [--allow-flagged]
 *   ecg-hrm --batch <dir> [--allow-flagged]  one <name>_logs.txt per file
 *
 * @module cli
 */

import { readdirSync } from 'fs';
import { basename, extname, join } from 'path';
import { createInterface } from 'readline/promises';
import type { AnalysisWindow } from './types';
import { loadConfig, type HrmConfig } from './config/env';
import { processFile } from './pipeline';
import { isHrmError } from './utils/errors';
import {
  configureLogger,
  createFileOutputHandler,
  createLogger,
  type Logger,
} from './utils/logger';
import { ValidationError, parseFiniteNumber, parseWindow } from './utils/validation';

export type CliCommand =
  | { mode: 'interactive'; allowFlagged: boolean }
  | { mode: 'file'; file: string; window?: AnalysisWindow; allowFlagged: boolean }
  | { mode: 'batch'; dir: string; allowFlagged: boolean };

/**
 * Parse command line arguments (without node and script path)
 *
 * @throws ValidationError on unknown flags or a malformed window
 */
export function parseArgs(argv: readonly string[]): CliCommand {
  let file: string | undefined;
  let dir: string | undefined;
  let window: AnalysisWindow | undefined;
  let allowFlagged = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--window':
        window = parseWindow(argv[++i] ?? '');
        break;
      case '--batch':
        dir = argv[++i];
        if (!dir) throw new ValidationError('Missing directory', 'batch', dir);
        break;
      case '--allow-flagged':
        allowFlagged = true;
        break;
      default:
        if (arg.startsWith('--')) {
          throw new ValidationError('Unknown option', 'argv', arg);
        }
        if (file !== undefined) {
          throw new ValidationError('Only one input file is accepted', 'argv', arg);
        }
        file = arg;
    }
  }

  if (dir !== undefined) {
    if (file !== undefined) {
      throw new ValidationError('An input file cannot be combined with --batch', 'argv', file);
    }
    if (window !== undefined) {
      throw new ValidationError('A window cannot be combined with --batch', 'window', window);
    }
    return { mode: 'batch', dir, allowFlagged };
  }
  if (file !== undefined) {
    return { mode: 'file', file, window, allowFlagged };
  }
  return { mode: 'interactive', allowFlagged };
}

/**
 * Source of answers for interactive mode
 */
export interface Prompt {
  ask(question: string): Promise<string>;
}

/**
 * Ask for a file name and, optionally, a BPM window
 */
export async function promptForRequest(
  prompt: Prompt
): Promise<{ file: string; window?: AnalysisWindow }> {
  const file = (await prompt.ask('Please enter a file name: ')).trim();
  const wantsWindow = await prompt.ask(
    'Would you like to enter a duration for BPM calculation? Enter 1 for yes, 0 for no: '
  );

  if (wantsWindow.trim() !== '1') {
    return { file };
  }

  const start = parseFiniteNumber(
    await prompt.ask('Start of the BPM window in seconds: '),
    'window.start'
  );
  const end = parseFiniteNumber(
    await prompt.ask('End of the BPM window in seconds: '),
    'window.end'
  );
  return { file, window: { start, end } };
}

/**
 * Process one file; returns false on a fatal error, which is logged
 */
function runFile(
  file: string,
  window: AnalysisWindow | undefined,
  allowFlagged: boolean,
  config: HrmConfig,
  logger: Logger
): boolean {
  try {
    processFile(file, { window, allowFlagged, config, reporter: logger });
    return true;
  } catch (err) {
    if (isHrmError(err)) {
      logger.error(`Could not process ${file}`, err, { kind: err.kind });
      return false;
    }
    if (err instanceof Error) {
      logger.error(`Could not process ${file}`, err);
      return false;
    }
    throw err;
  }
}

/**
 * Process every CSV in a directory, logging each to `<name>_logs.txt`
 *
 * @returns number of files that failed
 */
export function runBatch(dir: string, allowFlagged: boolean, config: HrmConfig): number {
  const files = readdirSync(dir, { withFileTypes: true })
    .filter(entry => entry.isFile() && extname(entry.name).toLowerCase() === '.csv')
    .map(entry => entry.name)
    .sort();

  let failures = 0;
  for (const name of files) {
    const base = basename(name, extname(name));
    const logger = createLogger(base, {
      minLevel: config.logLevel,
      outputHandler: createFileOutputHandler(join(dir, `${base}_logs.txt`)),
    });
    if (!runFile(join(dir, name), undefined, allowFlagged, config, logger)) {
      failures++;
    }
  }
  return failures;
}

async function runInteractive(
  prompt: Prompt,
  allowFlagged: boolean,
  config: HrmConfig,
  logger: Logger
): Promise<number> {
  const request = await promptForRequest(prompt);
  return runFile(request.file, request.window, allowFlagged, config, logger) ? 0 : 1;
}

/**
 * Run the CLI; resolves to the process exit code
 */
export async function main(argv: readonly string[], prompt?: Prompt): Promise<number> {
  const config = loadConfig();
  configureLogger({ minLevel: config.logLevel, jsonOutput: config.jsonLogs });
  const logger = createLogger('ecg-hrm');

  const command = parseArgs(argv);

  switch (command.mode) {
    case 'batch':
      return runBatch(command.dir, command.allowFlagged, config) > 0 ? 1 : 0;
    case 'file':
      return runFile(command.file, command.window, command.allowFlagged, config, logger) ? 0 : 1;
    case 'interactive': {
      if (prompt) {
        return runInteractive(prompt, command.allowFlagged, config, logger);
      }
      const rl = createInterface({ input: process.stdin, output: process.stdout });
      try {
        return await runInteractive(
          { ask: question => rl.question(question) },
          command.allowFlagged,
          config,
          logger
        );
      } finally {
        rl.close();
      }
    }
  }
}
