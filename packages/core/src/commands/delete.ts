/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { LineRange } from '../buffer/range.js';
import { normalizeRange } from '../buffer/range.js';
import type { EditorSession } from '../session/editorSession.js';
import type { MessageActionReturn } from './types.js';
import { infoMessage } from './types.js';

export function deleteLines(
  session: EditorSession,
  range: LineRange,
): MessageActionReturn {
  const { store } = session;
  const { start, end } = normalizeRange(range, store.count);
  if (store.count === 0 || start > end) {
    return infoMessage('-- nothing to delete');
  }

  const removed = end - start + 1;
  store.closeGap(start - 1, removed);
  session.setLastRange(start, Math.min(start, store.count));

  return infoMessage(`-- deleted ${removed} line(s)`);
}
