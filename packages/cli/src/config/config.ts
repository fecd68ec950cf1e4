/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';
import process from 'node:process';
import {
  DebugLogger,
  DEFAULT_UNDO_LIMIT,
  FatalConfigError,
  type ComposerOptions,
} from '@modal-composer/core';

export const DEFAULT_MAX_HEIGHT = 5;
export const DEFAULT_PLACEHOLDER = 'Type your message (Esc for Normal mode)';

export interface CliArgs {
  placeholder: string;
  width: number | undefined;
  maxHeight: number;
  undoLimit: number;
  text: string | undefined;
  debug: boolean;
}

const isPositiveInteger = (value: unknown): boolean =>
  typeof value === 'number' && Number.isInteger(value) && value > 0;

export function parseArguments(argv: string[] = hideBin(process.argv)): CliArgs {
  const yargsInstance = yargs(argv)
    .locale('en')
    .scriptName('composer')
    .usage(
      'Usage: composer [options]\n\nComposer playground - type messages in a modal editor. Enter in Normal mode or Ctrl+S submits, Ctrl+C exits.',
    )
    .option('placeholder', {
      type: 'string',
      nargs: 1,
      description: 'Text shown while the composer is empty',
      default: DEFAULT_PLACEHOLDER,
    })
    .option('width', {
      alias: 'w',
      type: 'number',
      description: 'Composer width in columns (defaults to the terminal width)',
    })
    .option('max-height', {
      type: 'number',
      description: 'Most lines the composer grows to before it scrolls',
      default: DEFAULT_MAX_HEIGHT,
    })
    .option('undo-limit', {
      type: 'number',
      description: 'Number of undo checkpoints kept',
      default: DEFAULT_UNDO_LIMIT,
    })
    .option('text', {
      alias: 't',
      type: 'string',
      nargs: 1,
      description: 'Initial text of the composer',
    })
    .option('debug', {
      alias: 'd',
      type: 'boolean',
      description: 'Mirror engine debug messages to the console',
      default: false,
    })
    .fail((msg, err) => {
      if (err) throw err;
      throw new FatalConfigError(msg);
    })
    .check((args) => {
      for (const name of ['width', 'max-height', 'undo-limit'] as const) {
        const value = args[name];
        if (value !== undefined && !isPositiveInteger(value)) {
          return `Invalid value for --${name}: expected a positive integer, got ${value}`;
        }
      }
      return true;
    })
    .help()
    .alias('h', 'help')
    .strict()
    .exitProcess(false);

  const result = yargsInstance.parseSync();
  if (result['help']) {
    process.exit(0);
  }

  return {
    placeholder: result.placeholder,
    width: result.width,
    maxHeight: result.maxHeight,
    undoLimit: result.undoLimit,
    text: result.text,
    debug: result.debug,
  };
}

/** Height of a composer showing `lineCount` lines, between 1 and `maxHeight`. */
export const composerHeight = (lineCount: number, maxHeight: number): number =>
  Math.max(1, Math.min(lineCount, maxHeight));

/**
 * Turns parsed arguments into engine options. `columns` is the terminal width
 * used when no `--width` was given.
 */
export function loadComposerOptions(
  args: CliArgs,
  columns: number,
): ComposerOptions {
  const initialText = args.text ?? '';
  const logFile = process.env['COMPOSER_DEBUG_LOG_FILE'];
  return {
    initialText,
    placeholder: args.placeholder,
    width: args.width ?? Math.max(1, columns - 4),
    height: composerHeight(initialText.split('\n').length, args.maxHeight),
    undoLimit: args.undoLimit,
    logger:
      args.debug || logFile
        ? new DebugLogger({ logFile, mirrorToConsole: args.debug })
        : undefined,
  };
}
