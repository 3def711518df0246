/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { render } from 'ink';
import type { EditorSession } from '@lined/core';
import { debugLogger, enterVisualMode } from '@lined/core';
import { VisualEditor } from './VisualEditor.js';

/**
 * Shows the full-screen editor on the terminal until the user presses Esc.
 * Every edit goes straight to the session's line store.
 */
export async function runVisualMode(session: EditorSession): Promise<void> {
  if (!process.stdin.isTTY) {
    throw new Error('input is not a terminal');
  }
  const model = enterVisualMode(session);
  debugLogger.debug(`Entering visual mode with ${model.lineCount} line(s)`);

  const instance = render(<VisualEditor session={session} model={model} />, {
    stdin: process.stdin,
    stdout: process.stdout,
    exitOnCtrlC: false,
    patchConsole: false,
  });
  try {
    await instance.waitUntilExit();
  } finally {
    instance.cleanup();
    // Ink unrefs stdin when it leaves raw mode; the prompt reads from it next.
    process.stdin.ref();
  }
}
