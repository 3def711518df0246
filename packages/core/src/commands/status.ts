/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { formatRange } from '../buffer/range.js';
import type { EditorSession } from '../session/editorSession.js';

export function formatStatusLine(session: EditorSession): string {
  return `Lines: ${session.lineCount}  File: ${session.getCurrentFile() ?? '(none)'}`;
}

export function formatSessionStatus(session: EditorSession): string {
  return `${formatStatusLine(session)}  Last range: ${formatRange(session.getLastRange())}`;
}

export const HELP_TEXT = [
  'Commands:',
  '  L [a][,b]              list lines',
  '  I [n]                  insert before line n (end with a lone .)',
  '  D a[,b]                delete lines',
  '  E n                    edit line n',
  '  R [a][,b] /old/new/[g] replace text',
  '  S [a][,b] /text/       search, ignoring case',
  '  O name                 open a file',
  '  W [name]               write the buffer',
  '  V                      visual mode',
  '  P                      show status',
  '  H or ?                 this help',
  '  Q                      quit',
].join('\n');
