/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { LineRange } from '../buffer/range.js';
import { normalizeRange, rangeSize } from '../buffer/range.js';
import type { EditorSession } from '../session/editorSession.js';
import { formatListingLine } from './format.js';
import type { CommandIO, MessageActionReturn } from './types.js';
import { infoMessage } from './types.js';

export function listLines(
  session: EditorSession,
  range: LineRange,
  io: CommandIO,
): MessageActionReturn {
  const { store } = session;
  if (store.count === 0) {
    return infoMessage('(empty)');
  }

  const { start, end } = normalizeRange(range, store.count);
  for (let line = start; line <= end; line++) {
    io.print(formatListingLine(line - 1, store.getLine(line - 1)));
  }
  session.setLastRange(start, end);

  return infoMessage(`-- listed ${rangeSize({ start, end })} line(s)`);
}
