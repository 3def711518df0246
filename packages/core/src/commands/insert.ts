/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { EditorSession } from '../session/editorSession.js';
import { CapacityError } from '../utils/errors.js';
import { formatLineNumber } from './format.js';
import type { CommandIO, MessageActionReturn } from './types.js';
import { errorMessage, infoMessage } from './types.js';

/** A line holding only this ends insert mode. */
export const INSERT_TERMINATOR = '.';

/**
 * Reads lines from `io` and inserts them before line `n`, which is clamped
 * into `[1, count + 1]`. Each line is committed as soon as it is read.
 */
export async function insertLines(
  session: EditorSession,
  n: number,
  io: CommandIO,
): Promise<MessageActionReturn> {
  const { store } = session;
  const first = Math.min(Math.max(n, 1), store.count + 1);
  let pos = first - 1;

  io.print(`-- Insert at  Line ${formatLineNumber(first - 1)}  --`);

  const recordInserted = () => {
    if (pos > first - 1) {
      session.setLastRange(first, pos);
    }
  };

  for (;;) {
    const text = await io.readLine(`${formatLineNumber(pos + 1)}: `);
    if (text === undefined || text === INSERT_TERMINATOR) {
      break;
    }
    try {
      store.makeRoom(pos, 1);
    } catch (error) {
      if (error instanceof CapacityError) {
        recordInserted();
        return errorMessage('! out of space');
      }
      throw error;
    }
    store.setLine(pos, text);
    pos++;
  }

  recordInserted();
  return infoMessage(`-- inserted ${pos - (first - 1)} line(s)`);
}
