/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import { homedir } from 'node:os';
import * as path from 'node:path';
import stripJsonComments from 'strip-json-comments';
import { FatalConfigError, getErrorMessage } from '@lined/core';
import type { Settings } from './settings-validation.js';
import {
  formatValidationError,
  validateSettings,
} from './settings-validation.js';

export type { Settings } from './settings-validation.js';

export const SETTINGS_DIRECTORY_NAME = '.lined';

export function getUserSettingsPath(): string {
  return path.join(homedir(), SETTINGS_DIRECTORY_NAME, 'settings.json');
}

/**
 * Reads a JSON-with-comments settings file. A missing file yields empty
 * settings; unreadable or invalid content is fatal.
 */
export function loadSettings(
  settingsPath: string = getUserSettingsPath(),
): Settings {
  if (!fs.existsSync(settingsPath)) {
    return {};
  }

  let rawSettings: unknown;
  try {
    const content = fs.readFileSync(settingsPath, 'utf-8');
    rawSettings = JSON.parse(stripJsonComments(content));
  } catch (error: unknown) {
    throw new FatalConfigError(
      `Error in ${settingsPath}: ${getErrorMessage(error)}\nPlease fix the configuration file and try again.`,
    );
  }

  const validationResult = validateSettings(rawSettings);
  if (!validationResult.success) {
    throw new FatalConfigError(
      `${formatValidationError(validationResult.error, settingsPath)}\nPlease fix the configuration file and try again.`,
    );
  }
  return validationResult.data;
}
