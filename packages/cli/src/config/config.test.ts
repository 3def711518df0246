/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_MAX_LINE_LENGTH,
  DEFAULT_MAX_LINES,
  FatalInputError,
} from '@lined/core';
import type { CliArgs } from './config.js';
import { loadEditorConfig, parseArguments } from './config.js';

describe('parseArguments', () => {
  it('should read the file and limits', async () => {
    const argv = await parseArguments(['notes.txt', '--max-lines', '50']);
    expect(argv).toEqual({
      file: 'notes.txt',
      maxLines: 50,
      maxLineLength: undefined,
      debug: false,
      settings: undefined,
      exitEarly: false,
    });
  });

  it('should start without a file', async () => {
    const argv = await parseArguments(['--debug']);
    expect(argv.file).toBeUndefined();
    expect(argv.debug).toBe(true);
  });

  it('should accept a settings path', async () => {
    const argv = await parseArguments(['--settings', '/tmp/lined.json']);
    expect(argv.settings).toBe('/tmp/lined.json');
  });

  it('should reject unknown options', async () => {
    await expect(parseArguments(['--bogus'])).rejects.toThrow(
      FatalInputError,
    );
  });

  it('should reject more than one file', async () => {
    await expect(parseArguments(['a.txt', 'b.txt'])).rejects.toThrow(
      'Only one file can be edited at a time',
    );
  });

  it('should reject a non-positive line limit', async () => {
    await expect(parseArguments(['--max-lines', '0'])).rejects.toThrow(
      '--max-lines must be a positive integer',
    );
  });
});

describe('loadEditorConfig', () => {
  const baseArgs: CliArgs = {
    file: undefined,
    maxLines: undefined,
    maxLineLength: undefined,
    debug: false,
    settings: undefined,
    exitEarly: false,
  };

  it('should fall back to the defaults', () => {
    const config = loadEditorConfig(baseArgs, {});
    expect(config.getMaxLines()).toBe(DEFAULT_MAX_LINES);
    expect(config.getMaxLineLength()).toBe(DEFAULT_MAX_LINE_LENGTH);
    expect(config.getDebugMode()).toBe(false);
  });

  it('should prefer flags over settings', () => {
    const config = loadEditorConfig(
      { ...baseArgs, maxLines: 10 },
      { maxLines: 20, maxLineLength: 30, tabWidth: 4 },
    );
    expect(config.getMaxLines()).toBe(10);
    expect(config.getMaxLineLength()).toBe(30);
    expect(config.getTabWidth()).toBe(4);
  });

  it('should enable debug mode from either source', () => {
    expect(loadEditorConfig(baseArgs, { debug: true }).getDebugMode()).toBe(
      true,
    );
    expect(
      loadEditorConfig({ ...baseArgs, debug: true }, {}).getDebugMode(),
    ).toBe(true);
  });
});
