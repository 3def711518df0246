/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { LineStore } from '../buffer/lineStore.js';
import type { LineRange } from '../buffer/range.js';
import { EditorConfig } from '../config/config.js';

/**
 * Everything one editing session owns: the buffer, the current file name and
 * the last range a command worked on. Passed explicitly to every command.
 */
export class EditorSession {
  readonly store: LineStore;
  private currentFile: string | undefined;
  private lastRange: LineRange | undefined;

  constructor(readonly config: EditorConfig = new EditorConfig()) {
    this.store = new LineStore({
      maxLines: config.getMaxLines(),
      maxLineLength: config.getMaxLineLength(),
    });
  }

  get lineCount(): number {
    return this.store.count;
  }

  getCurrentFile(): string | undefined {
    return this.currentFile;
  }

  setCurrentFile(name: string): void {
    this.currentFile = name;
  }

  /** Display aid only; commands never default to it. */
  getLastRange(): LineRange | undefined {
    return this.lastRange ? { ...this.lastRange } : undefined;
  }

  setLastRange(start: number, end: number): void {
    this.lastRange = { start, end };
  }
}
