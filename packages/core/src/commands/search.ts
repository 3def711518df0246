/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { findCaseInsensitive, parseSearchSpec } from '../buffer/pattern.js';
import type { LineRange } from '../buffer/range.js';
import { normalizeRange } from '../buffer/range.js';
import type { EditorSession } from '../session/editorSession.js';
import { PatternSyntaxError } from '../utils/errors.js';
import { formatListingLine } from './format.js';
import type { CommandIO, MessageActionReturn } from './types.js';
import { errorMessage, infoMessage } from './types.js';

export const SEARCH_USAGE = '! syntax: S a,b /text/';

/** Prints every line in range containing the pattern, ignoring case. */
export function searchLines(
  session: EditorSession,
  range: LineRange,
  spec: string,
  io: CommandIO,
): MessageActionReturn {
  let needle: string;
  try {
    needle = parseSearchSpec(spec);
  } catch (error) {
    if (error instanceof PatternSyntaxError) {
      return errorMessage(SEARCH_USAGE);
    }
    throw error;
  }

  const { store } = session;
  const { start, end } = normalizeRange(range, store.count);
  let matches = 0;

  for (let line = start; line <= end; line++) {
    const text = store.getLine(line - 1);
    if (findCaseInsensitive(text, needle) >= 0) {
      io.print(formatListingLine(line - 1, text));
      matches++;
    }
  }
  session.setLastRange(start, end);

  return infoMessage(`-- ${matches} match(es)`);
}
