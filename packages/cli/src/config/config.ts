/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';
import {
  EditorConfig,
  FatalInputError,
  getErrorMessage,
} from '@lined/core';
import type { Settings } from './settings.js';

export interface CliArgs {
  file: string | undefined;
  maxLines: number | undefined;
  maxLineLength: number | undefined;
  debug: boolean;
  settings: string | undefined;
  /** Set when --help or --version already printed its output. */
  exitEarly: boolean;
}

function isPositiveIntegerOrAbsent(value: number | undefined): boolean {
  return value === undefined || (Number.isInteger(value) && value > 0);
}

export async function parseArguments(
  rawArgv: string[] = hideBin(process.argv),
): Promise<CliArgs> {
  const yargsInstance = yargs(rawArgv)
    .locale('en')
    .scriptName('lined')
    .usage(
      'Usage: lined [options] [file]\n\nLine-oriented text editor. Type ? at the * prompt for commands.',
    )
    .option('max-lines', {
      type: 'number',
      description: 'Maximum number of lines the buffer holds',
    })
    .option('max-line-length', {
      type: 'number',
      description: 'Maximum length of a single line',
    })
    .option('debug', {
      alias: 'd',
      type: 'boolean',
      description: 'Log each command and its line range',
      default: false,
    })
    .option('settings', {
      type: 'string',
      description: 'Path to a settings file (default ~/.lined/settings.json)',
    })
    .fail((msg, err) => {
      if (err) throw err;
      throw new Error(msg);
    })
    .check((argv) => {
      if (argv._.length > 1) {
        return 'Only one file can be edited at a time';
      }
      if (!isPositiveIntegerOrAbsent(argv['max-lines'])) {
        return '--max-lines must be a positive integer';
      }
      if (!isPositiveIntegerOrAbsent(argv['max-line-length'])) {
        return '--max-line-length must be a positive integer';
      }
      return true;
    })
    .version()
    .alias('v', 'version')
    .help()
    .alias('h', 'help')
    .strict()
    .exitProcess(false);

  let result;
  try {
    result = await yargsInstance.parse();
  } catch (e) {
    throw new FatalInputError(getErrorMessage(e));
  }

  const [file] = result._;
  return {
    file: file === undefined ? undefined : String(file),
    maxLines: result.maxLines,
    maxLineLength: result.maxLineLength,
    debug: result.debug,
    settings: result.settings,
    exitEarly: Boolean(result['help'] || result['version']),
  };
}

/** Flags override the settings file, which overrides the built-in defaults. */
export function loadEditorConfig(
  argv: CliArgs,
  settings: Settings,
): EditorConfig {
  return new EditorConfig({
    maxLines: argv.maxLines ?? settings.maxLines,
    maxLineLength: argv.maxLineLength ?? settings.maxLineLength,
    tabWidth: settings.tabWidth,
    viewportRows: settings.viewportRows,
    debugMode: argv.debug || (settings.debug ?? false),
  });
}
