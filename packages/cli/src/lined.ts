/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { EditorSession, debugLogger } from '@lined/core';
import { loadEditorConfig, parseArguments } from './config/config.js';
import { loadSettings } from './config/settings.js';
import { openStartupFile, runRepl } from './repl.js';

export async function main(): Promise<void> {
  const argv = await parseArguments();
  if (argv.exitEarly) {
    return;
  }

  const settings = loadSettings(argv.settings);
  const config = loadEditorConfig(argv, settings);
  debugLogger.setDebugMode(config.getDebugMode());
  debugLogger.debug(
    `Limits: ${config.getMaxLines()} lines of ${config.getMaxLineLength()} characters`,
  );

  const session = new EditorSession(config);
  if (argv.file) {
    await openStartupFile(session, argv.file);
  }

  await runRepl(session);
}
