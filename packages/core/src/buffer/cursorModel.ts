/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { EditorSession } from '../session/editorSession.js';
import type { LineStore } from './lineStore.js';
import { CapacityError } from '../utils/errors.js';

export interface CursorState {
  /** 0-based line index. */
  row: number;
  /** 0-based character offset within the row. */
  col: number;
  /** First row shown by the screen; only the renderer reads it. */
  topLine: number;
}

function clamp(v: number, min: number, max: number): number {
  return v < min ? min : v > max ? max : v;
}

/**
 * Character-level editing over a session's line store, used by visual mode.
 * The mutators return `true` when the buffer changed.
 */
export class CursorEditModel {
  private cursor: CursorState = { row: 0, col: 0, topLine: 0 };

  constructor(private readonly store: LineStore) {}

  getCursor(): CursorState {
    return { ...this.cursor };
  }

  get lineCount(): number {
    return this.store.count;
  }

  getLine(row: number): string {
    return row >= 0 && row < this.store.count ? this.store.getLine(row) : '';
  }

  ensureExists(row: number): boolean {
    return this.store.ensureExists(row);
  }

  private currentLength(): number {
    return this.getLine(this.cursor.row).length;
  }

  private clampColumn(): void {
    this.cursor.col = clamp(this.cursor.col, 0, this.currentLength());
  }

  insertChar(ch: string): boolean {
    if (ch.length !== 1 || !this.ensureExists(this.cursor.row)) {
      return false;
    }
    this.clampColumn();
    const { row, col } = this.cursor;
    const line = this.store.getLine(row);
    if (line.length >= this.store.maxLineLength) {
      return false;
    }
    this.store.setLine(row, line.slice(0, col) + ch + line.slice(col));
    this.cursor.col = col + 1;
    return true;
  }

  insertTab(width: number): boolean {
    let changed = false;
    for (let i = 0; i < width; i++) {
      changed = this.insertChar(' ') || changed;
    }
    return changed;
  }

  /**
   * Removes the character under the cursor. At end of line the next line is
   * joined on, unless the joined line would be too long.
   */
  deleteChar(): boolean {
    const { row, col } = this.cursor;
    if (row >= this.store.count) {
      return false;
    }
    const line = this.store.getLine(row);
    if (col < line.length) {
      this.store.setLine(row, line.slice(0, col) + line.slice(col + 1));
      return true;
    }
    if (row + 1 >= this.store.count) {
      return false;
    }
    const next = this.store.getLine(row + 1);
    if (line.length + next.length > this.store.maxLineLength) {
      return false;
    }
    this.store.setLine(row, line + next);
    this.store.closeGap(row + 1, 1);
    return true;
  }

  backspace(): boolean {
    if (this.cursor.col > 0) {
      this.clampColumn();
      this.cursor.col--;
      return this.deleteChar();
    }
    if (this.cursor.row > 0) {
      this.cursor.row--;
      this.cursor.col = this.currentLength();
      return this.deleteChar();
    }
    return false;
  }

  /** Splits the line at the cursor and moves to the start of the new line. */
  insertNewline(): boolean {
    if (!this.ensureExists(this.cursor.row)) {
      return false;
    }
    this.clampColumn();
    const { row, col } = this.cursor;
    const line = this.store.getLine(row);
    try {
      this.store.makeRoom(row + 1, 1);
    } catch (error) {
      if (error instanceof CapacityError) {
        return false;
      }
      throw error;
    }
    this.store.setLine(row + 1, line.slice(col));
    this.store.setLine(row, line.slice(0, col));
    this.cursor.row = row + 1;
    this.cursor.col = 0;
    return true;
  }

  moveLeft(): void {
    if (this.cursor.col > 0) {
      this.clampColumn();
      this.cursor.col--;
    } else if (this.cursor.row > 0) {
      this.cursor.row--;
      this.cursor.col = this.currentLength();
    }
  }

  moveRight(): void {
    if (this.cursor.row >= this.store.count) {
      return;
    }
    if (this.cursor.col < this.currentLength()) {
      this.cursor.col++;
    } else if (this.cursor.row < this.store.count - 1) {
      this.cursor.row++;
      this.cursor.col = 0;
    }
  }

  moveUp(): void {
    if (this.cursor.row > 0) {
      this.cursor.row--;
      this.clampColumn();
    }
  }

  moveDown(): void {
    if (this.cursor.row < this.store.count - 1) {
      this.cursor.row++;
      this.clampColumn();
    }
  }

  moveHome(): void {
    this.cursor.col = 0;
  }

  moveEnd(): void {
    this.cursor.col = this.currentLength();
  }

  pageUp(rows: number): void {
    this.cursor.row = Math.max(0, this.cursor.row - rows);
    this.cursor.topLine = this.cursor.row;
    this.clampColumn();
  }

  pageDown(rows: number): void {
    this.cursor.row = Math.max(
      0,
      Math.min(this.cursor.row + rows, this.store.count - 1),
    );
    this.cursor.topLine = this.cursor.row;
    this.clampColumn();
  }

  /** Moves `topLine` so the cursor row is one of the `rows` visible rows. */
  scrollIntoView(rows: number): void {
    if (this.cursor.row < this.cursor.topLine) {
      this.cursor.topLine = this.cursor.row;
    } else if (this.cursor.row >= this.cursor.topLine + rows) {
      this.cursor.topLine = this.cursor.row - rows + 1;
    }
  }
}

/**
 * Starts visual mode on a session: an empty buffer gets one empty line and
 * the cursor starts at the top-left corner.
 */
export function enterVisualMode(session: EditorSession): CursorEditModel {
  if (session.store.count === 0) {
    session.store.ensureExists(0);
  }
  return new CursorEditModel(session.store);
}
