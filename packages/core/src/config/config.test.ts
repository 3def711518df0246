/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_MAX_LINES,
  DEFAULT_MAX_LINE_LENGTH,
  DEFAULT_TAB_WIDTH,
  DEFAULT_VIEWPORT_ROWS,
  EditorConfig,
} from './config.js';
import { StandardFileSystemService } from '../services/fileSystemService.js';
import { EditorSession } from '../session/editorSession.js';

describe('EditorConfig', () => {
  it('should use the defaults when nothing is given', () => {
    const config = new EditorConfig();
    expect(config.getMaxLines()).toBe(DEFAULT_MAX_LINES);
    expect(config.getMaxLineLength()).toBe(DEFAULT_MAX_LINE_LENGTH);
    expect(config.getTabWidth()).toBe(DEFAULT_TAB_WIDTH);
    expect(config.getViewportRows()).toBe(DEFAULT_VIEWPORT_ROWS);
    expect(config.getDebugMode()).toBe(false);
    expect(config.getFileSystemService()).toBeInstanceOf(
      StandardFileSystemService,
    );
  });

  it('should ignore limits that are not positive integers', () => {
    const config = new EditorConfig({
      maxLines: 0,
      maxLineLength: -5,
      tabWidth: 2.5,
    });
    expect(config.getMaxLines()).toBe(1200);
    expect(config.getMaxLineLength()).toBe(255);
    expect(config.getTabWidth()).toBe(8);
  });

  it('should size the session store from its limits', () => {
    const session = new EditorSession(
      new EditorConfig({ maxLines: 5, maxLineLength: 40 }),
    );
    expect(session.store.maxLines).toBe(5);
    expect(session.store.maxLineLength).toBe(40);
    expect(session.lineCount).toBe(0);
    expect(session.getCurrentFile()).toBeUndefined();
    expect(session.getLastRange()).toBeUndefined();
  });
});
