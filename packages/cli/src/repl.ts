/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as readline from 'node:readline';
import chalk from 'chalk';
import type {
  CommandIO,
  EditorSession,
  MessageActionReturn,
} from '@lined/core';
import {
  debugLogger,
  errorMessage,
  executeCommandLine,
  formatStatusLine,
  getErrorMessage,
  TEXT_ENCODING,
  loadFile,
  toBufferError,
  writeToStdout,
} from '@lined/core';
import { runVisualMode } from './ui/runVisualMode.js';

export const PROMPT = '* ';

/**
 * Hands out input lines one at a time. The underlying readline interface can
 * be detached while another reader (visual mode) owns the input; lines that
 * were already received stay queued.
 */
class LineReader {
  private readonly queue: string[] = [];
  private waiting: ((line: string | undefined) => void) | undefined;
  private rl: readline.Interface | undefined;
  private ended = false;

  constructor(private readonly input: NodeJS.ReadableStream) {
    this.attach();
  }

  attach(): void {
    if (this.ended || this.rl) {
      return;
    }
    // Ink switches stdin to utf8; typed text must match file bytes.
    this.input.setEncoding(TEXT_ENCODING);
    const rl = readline.createInterface({
      input: this.input,
      crlfDelay: Infinity,
      terminal: false,
    });
    rl.on('line', (line) => this.push(line));
    rl.on('close', () => {
      // Only an interface closed by end of input ends the session.
      if (this.rl === rl) {
        this.rl = undefined;
        this.ended = true;
        this.resolveWaiting(undefined);
      }
    });
    this.rl = rl;
  }

  detach(): void {
    const rl = this.rl;
    this.rl = undefined;
    rl?.close();
  }

  next(): Promise<string | undefined> {
    const line = this.queue.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }
    if (!this.rl) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  private push(line: string): void {
    if (this.waiting) {
      this.resolveWaiting(line);
    } else {
      this.queue.push(line);
    }
  }

  private resolveWaiting(line: string | undefined): void {
    const waiting = this.waiting;
    this.waiting = undefined;
    waiting?.(line);
  }
}

export interface ReplOptions {
  input?: NodeJS.ReadableStream;
  write?: (text: string) => void;
  runVisual?: (session: EditorSession) => Promise<void>;
}

function defaultWrite(text: string): void {
  writeToStdout(Buffer.from(text, TEXT_ENCODING));
}

export function formatMessage(result: MessageActionReturn): string {
  if (result.messageType === 'error' && !process.env['NO_COLOR']) {
    return chalk.red(result.content);
  }
  return result.content;
}

/**
 * Loads the file named on the command line. A file that cannot be loaded
 * still becomes the current file, so the first `W` creates it.
 */
export async function openStartupFile(
  session: EditorSession,
  filePath: string,
  write: (text: string) => void = defaultWrite,
): Promise<void> {
  try {
    await loadFile(session, filePath);
  } catch (error) {
    if (!toBufferError(error)) {
      throw error;
    }
    debugLogger.debug(`Could not load ${filePath}:`, getErrorMessage(error));
    session.setCurrentFile(filePath);
    write(`! couldn't open '${filePath}' (starting empty)\n`);
  }
}

/**
 * Runs the `* ` prompt loop until `Q` or end of input. The status line is
 * printed at startup and after every command.
 */
export async function runRepl(
  session: EditorSession,
  options: ReplOptions = {},
): Promise<void> {
  const write = options.write ?? defaultWrite;
  const runVisual = options.runVisual ?? runVisualMode;
  const reader = new LineReader(options.input ?? process.stdin);

  const io: CommandIO = {
    print: (line) => write(`${line}\n`),
    readLine: (prompt) => {
      write(prompt);
      return reader.next();
    },
  };

  write(`${formatStatusLine(session)}\n`);

  try {
    for (;;) {
      write(PROMPT);
      const line = await reader.next();
      if (line === undefined) {
        break;
      }

      const result = await executeCommandLine(session, line, io);
      if (result.type === 'noop') {
        continue;
      }
      if (result.type === 'quit') {
        break;
      }
      if (result.type === 'visual') {
        reader.detach();
        try {
          await runVisual(session);
        } catch (error) {
          debugLogger.debug('Visual mode failed:', error);
          const failure = errorMessage(
            `! visual mode failed: ${getErrorMessage(error)}`,
          );
          write(`${formatMessage(failure)}\n`);
        } finally {
          reader.attach();
        }
      } else {
        write(`${formatMessage(result)}\n`);
      }
      write(`${formatStatusLine(session)}\n`);
    }
  } finally {
    reader.detach();
  }
}
