/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { FileSystemService } from '../services/fileSystemService.js';
import { StandardFileSystemService } from '../services/fileSystemService.js';

export const DEFAULT_MAX_LINES = 1200;
export const DEFAULT_MAX_LINE_LENGTH = 255;
export const DEFAULT_TAB_WIDTH = 8;
/** Text rows of the visual screen; one more row holds the status line. */
export const DEFAULT_VIEWPORT_ROWS = 23;

export interface EditorConfigParameters {
  maxLines?: number;
  maxLineLength?: number;
  tabWidth?: number;
  viewportRows?: number;
  debugMode?: boolean;
  fileSystemService?: FileSystemService;
}

export class EditorConfig {
  private readonly maxLines: number;
  private readonly maxLineLength: number;
  private readonly tabWidth: number;
  private readonly viewportRows: number;
  private readonly debugMode: boolean;
  private readonly fileSystemService: FileSystemService;

  constructor(params: EditorConfigParameters = {}) {
    this.maxLines = positiveOr(params.maxLines, DEFAULT_MAX_LINES);
    this.maxLineLength = positiveOr(
      params.maxLineLength,
      DEFAULT_MAX_LINE_LENGTH,
    );
    this.tabWidth = positiveOr(params.tabWidth, DEFAULT_TAB_WIDTH);
    this.viewportRows = positiveOr(params.viewportRows, DEFAULT_VIEWPORT_ROWS);
    this.debugMode = params.debugMode ?? false;
    this.fileSystemService =
      params.fileSystemService ?? new StandardFileSystemService();
  }

  getMaxLines(): number {
    return this.maxLines;
  }

  getMaxLineLength(): number {
    return this.maxLineLength;
  }

  getTabWidth(): number {
    return this.tabWidth;
  }

  getViewportRows(): number {
    return this.viewportRows;
  }

  getDebugMode(): boolean {
    return this.debugMode;
  }

  getFileSystemService(): FileSystemService {
    return this.fileSystemService;
  }
}

function positiveOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isInteger(value) && value > 0
    ? value
    : fallback;
}
