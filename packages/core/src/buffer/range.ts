/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { RangeSyntaxError } from '../utils/errors.js';

/** 1-based, inclusive line positions. */
export interface LineRange {
  start: number;
  end: number;
}

const LEADING_INT = /^\s*([+-]?\d+)/;

/**
 * Reads a leading integer: optional whitespace and sign, then as
 * many digits as follow. Anything else reads as 0.
 */
export function parseLeadingInt(text: string): number {
  const match = LEADING_INT.exec(text);
  if (!match) {
    return 0;
  }
  const value = Number.parseInt(match[1], 10);
  return Number.isSafeInteger(value) ? value : 0;
}

/**
 * Resolves a textual range against the current line count.
 *
 *   ``     → (1, count)
 *   `,Y`   → (1, Y)
 *   `X`    → (X, X)
 *   `X,Y`  → (X, Y)
 *
 * A missing or non-positive X means 1; a missing or non-positive Y means
 * `count`. The result is not normalized, see {@link normalizeRange}.
 *
 * @throws RangeSyntaxError when the text starts with anything but a digit or
 *   a comma.
 */
export function resolveRange(text: string, count: number): LineRange {
  const rest = text.trimStart();

  if (rest === '') {
    return { start: 1, end: count };
  }

  if (rest.startsWith(',')) {
    const y = parseLeadingInt(rest.slice(1));
    return { start: 1, end: y > 0 ? y : count };
  }

  const digits = /^\d+/.exec(rest);
  if (!digits) {
    throw new RangeSyntaxError(text);
  }

  const x = parseLeadingInt(digits[0]);
  const afterX = rest.slice(digits[0].length).trimStart();
  let y = x;
  if (afterX.startsWith(',')) {
    const yText = afterX.slice(1).trimStart();
    y = yText === '' ? count : parseLeadingInt(yText);
  }

  return {
    start: x > 0 ? x : 1,
    end: y > 0 ? y : count,
  };
}

/**
 * Coerces a resolved range into `1 <= start <= end <= count`. An empty buffer
 * yields `{ start: 1, end: 0 }`, which iterates over nothing.
 */
export function normalizeRange(range: LineRange, count: number): LineRange {
  if (count <= 0) {
    return { start: 1, end: 0 };
  }

  let { start, end } = range;

  if (start < 1) {
    start = 1;
  }
  if (end < 1 || end > count) {
    end = count;
  }
  if (start > end) {
    [start, end] = [end, start];
  }
  // A start past the last line swaps into `end`; pull it back in bounds.
  end = Math.min(end, count);
  start = Math.min(start, end);

  return { start, end };
}

/** Resolve then normalize; what every ranged command iterates over. */
export function parseRange(text: string, count: number): LineRange {
  return normalizeRange(resolveRange(text, count), count);
}

export function rangeSize(range: LineRange): number {
  return Math.max(0, range.end - range.start + 1);
}

export function formatRange(range: LineRange | undefined): string {
  return range ? `${range.start},${range.end}` : '(none)';
}
