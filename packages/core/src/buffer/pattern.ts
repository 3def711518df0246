/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { PatternSyntaxError } from '../utils/errors.js';

export const MAX_REPLACEMENTS_PER_LINE = 1024;

const PATTERN_DELIMITER = '/';

/** ASCII-only lower-casing; other characters are left alone. */
export function foldAsciiCase(text: string): string {
  return text.replace(/[A-Z]/g, (ch) =>
    String.fromCharCode(ch.charCodeAt(0) + 32),
  );
}

/**
 * Index of the first case-insensitive occurrence of `needle`, or -1.
 * The empty needle is found at index 0 of any haystack.
 */
export function findCaseInsensitive(haystack: string, needle: string): number {
  if (needle === '') {
    return 0;
  }
  return foldAsciiCase(haystack).indexOf(foldAsciiCase(needle));
}

export interface ReplaceResult {
  text: string;
  count: number;
}

/**
 * Literal, case-sensitive replacement of `oldText` with `newText`.
 *
 * Scanning resumes after each inserted `newText`, so a replacement that
 * contains the pattern is never rewritten again. A replacement that would push
 * the line past `maxLineLength` ends the scan and keeps the edits made so far.
 * An empty `oldText` never matches.
 */
export function replaceInLine(
  line: string,
  oldText: string,
  newText: string,
  global: boolean,
  maxLineLength: number,
): ReplaceResult {
  if (oldText === '') {
    return { text: line, count: 0 };
  }

  let text = line;
  let count = 0;
  let from = 0;

  for (let i = 0; i < MAX_REPLACEMENTS_PER_LINE; i++) {
    const found = text.indexOf(oldText, from);
    if (found < 0) {
      break;
    }
    const nextLength = text.length - oldText.length + newText.length;
    if (nextLength > maxLineLength) {
      break;
    }
    text = text.slice(0, found) + newText + text.slice(found + oldText.length);
    from = found + newText.length;
    count++;
    if (!global) {
      break;
    }
  }

  return { text, count };
}

export interface ReplaceSpec {
  oldText: string;
  newText: string;
  global: boolean;
}

/**
 * Reads one `/`-delimited segment starting at `pos`, which must hold the
 * opening delimiter. Returns the text and the index of the closing delimiter.
 */
function readSegment(
  spec: string,
  pos: number,
): { text: string; close: number } | undefined {
  if (spec[pos] !== PATTERN_DELIMITER) {
    return undefined;
  }
  const close = spec.indexOf(PATTERN_DELIMITER, pos + 1);
  if (close < 0) {
    return undefined;
  }
  return { text: spec.slice(pos + 1, close), close };
}

/**
 * Parses `/old/new/` with an optional trailing `g` (any case) for global.
 */
export function parseReplaceSpec(spec: string): ReplaceSpec {
  const start = spec.length - spec.trimStart().length;
  const oldSegment = readSegment(spec, start);
  if (!oldSegment) {
    throw new PatternSyntaxError(spec);
  }
  const newSegment = readSegment(spec, oldSegment.close);
  if (!newSegment) {
    throw new PatternSyntaxError(spec);
  }
  const flags = spec.slice(newSegment.close + 1).trimStart();
  return {
    oldText: oldSegment.text,
    newText: newSegment.text,
    global: flags[0] === 'g' || flags[0] === 'G',
  };
}

/**
 * Parses a search pattern: `/text/`, or the bare remainder of the argument
 * after leading whitespace.
 */
export function parseSearchSpec(spec: string): string {
  const rest = spec.trimStart();
  if (!rest.startsWith(PATTERN_DELIMITER)) {
    return rest;
  }
  const segment = readSegment(rest, 0);
  if (!segment) {
    throw new PatternSyntaxError(spec);
  }
  return segment.text;
}
