/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/** Zero-padded to five digits: 7 → `00007`. */
export function formatLineNumber(index: number): string {
  return String(index).padStart(5, '0');
}

/** One listing row, keyed by the line's 0-based index. */
export function formatListingLine(index: number, text: string): string {
  return `${formatLineNumber(index)}: ${text}`;
}
