/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { EditorSession } from '../session/editorSession.js';
import { formatLineNumber, formatListingLine } from './format.js';
import type { CommandIO, MessageActionReturn } from './types.js';
import { errorMessage, infoMessage } from './types.js';

/** Shows line `n` and replaces it with the next line read from `io`. */
export async function editLine(
  session: EditorSession,
  n: number,
  io: CommandIO,
): Promise<MessageActionReturn> {
  const { store } = session;
  if (!Number.isInteger(n) || n < 1 || n > store.count) {
    return errorMessage('! bad line');
  }

  io.print(formatListingLine(n - 1, store.getLine(n - 1)));
  session.setLastRange(n, n);

  const text = await io.readLine(`${formatLineNumber(n)}: `);
  if (text === undefined) {
    return infoMessage(`-- line ${n} unchanged`);
  }
  store.setLine(n - 1, text);

  return infoMessage(`-- line ${n} replaced`);
}
