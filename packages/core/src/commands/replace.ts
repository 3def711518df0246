/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ReplaceSpec } from '../buffer/pattern.js';
import { parseReplaceSpec, replaceInLine } from '../buffer/pattern.js';
import type { LineRange } from '../buffer/range.js';
import { normalizeRange } from '../buffer/range.js';
import type { EditorSession } from '../session/editorSession.js';
import { PatternSyntaxError } from '../utils/errors.js';
import type { MessageActionReturn } from './types.js';
import { errorMessage, infoMessage } from './types.js';

export const REPLACE_USAGE = '! syntax: R a,b /old/new/[g]';

export function replaceText(
  session: EditorSession,
  range: LineRange,
  spec: string,
): MessageActionReturn {
  let parsed: ReplaceSpec;
  try {
    parsed = parseReplaceSpec(spec);
  } catch (error) {
    if (error instanceof PatternSyntaxError) {
      return errorMessage(REPLACE_USAGE);
    }
    throw error;
  }

  const { store } = session;
  const { start, end } = normalizeRange(range, store.count);
  let total = 0;

  for (let line = start; line <= end; line++) {
    const result = replaceInLine(
      store.getLine(line - 1),
      parsed.oldText,
      parsed.newText,
      parsed.global,
      store.maxLineLength,
    );
    if (result.count > 0) {
      store.setLine(line - 1, result.text);
      total += result.count;
    }
  }
  session.setLastRange(start, end);

  return infoMessage(`Replaced ${total} occurrence(s).`);
}
