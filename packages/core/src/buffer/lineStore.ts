/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { CapacityError, LineBoundsError } from '../utils/errors.js';

export interface LineStoreLimits {
  maxLines: number;
  maxLineLength: number;
}

/**
 * Ordered, 0-based collection of the buffer's lines.
 *
 * Invariants: `count <= maxLines`, every slot below `count` holds a string
 * (possibly empty) and no line is longer than `maxLineLength`. Callers must
 * re-fetch by index after any mutation since indices shift on insert/delete.
 */
export class LineStore {
  private lines: string[] = [];

  constructor(readonly limits: LineStoreLimits) {}

  get count(): number {
    return this.lines.length;
  }

  get maxLines(): number {
    return this.limits.maxLines;
  }

  get maxLineLength(): number {
    return this.limits.maxLineLength;
  }

  getLine(idx: number): string {
    this.assertIndex(idx);
    return this.lines[idx];
  }

  /** A copy; later mutations of the store are not reflected in it. */
  getLines(): readonly string[] {
    return [...this.lines];
  }

  /**
   * Opens `n` empty slots at `pos`, shifting the lines at or after `pos`
   * forward. Throws without mutating when the store would exceed `maxLines`.
   */
  makeRoom(pos: number, n: number): void {
    if (n <= 0) {
      return;
    }
    if (pos < 0 || pos > this.lines.length) {
      throw new LineBoundsError(pos, this.lines.length);
    }
    if (this.lines.length + n > this.limits.maxLines) {
      throw new CapacityError(
        `Buffer is full (${this.limits.maxLines} lines)`,
        this.limits.maxLines,
      );
    }
    this.lines.splice(pos, 0, ...new Array<string>(n).fill(''));
  }

  /** Removes lines `pos..pos+n-1`; later lines move back by `n`. */
  closeGap(pos: number, n: number): void {
    if (n <= 0) {
      return;
    }
    this.assertIndex(pos);
    this.lines.splice(pos, n);
  }

  /**
   * Replaces the content at `idx`. Text past `maxLineLength` is dropped.
   */
  setLine(idx: number, text: string): void {
    this.assertIndex(idx);
    const next = this.fit(text);
    this.lines[idx] = next;
  }

  /**
   * Appends empty lines until `idx` is addressable. Growth stops quietly at
   * capacity; the return value tells whether `idx` exists afterwards.
   */
  ensureExists(idx: number): boolean {
    while (this.lines.length <= idx) {
      if (this.lines.length >= this.limits.maxLines) {
        return false;
      }
      this.lines.push('');
    }
    return idx >= 0;
  }

  /**
   * Swaps in a complete set of lines, e.g. a freshly read file. All lines
   * are validated before the current content is discarded.
   */
  replaceAll(lines: readonly string[]): void {
    if (lines.length > this.limits.maxLines) {
      throw new CapacityError(
        `${lines.length} lines exceed the ${this.limits.maxLines} line limit`,
        this.limits.maxLines,
      );
    }
    const next = lines.map((line) => this.fit(line));
    this.lines = next;
  }

  private fit(text: string): string {
    return text.length > this.limits.maxLineLength
      ? text.slice(0, this.limits.maxLineLength)
      : text;
  }

  private assertIndex(idx: number): void {
    if (!Number.isInteger(idx) || idx < 0 || idx >= this.lines.length) {
      throw new LineBoundsError(idx, this.lines.length);
    }
  }
}
