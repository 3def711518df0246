/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ExitCodes } from './exitCodes.js';

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  try {
    return String(error);
  } catch {
    return 'Failed to get error details';
  }
}

export type BufferErrorKind =
  | 'syntax'
  | 'bounds'
  | 'capacity'
  | 'allocation'
  | 'io';

/**
 * Base class for every failure a single editor command can report. These are
 * recovered at the command boundary and never terminate the process.
 */
export abstract class BufferError extends Error {
  abstract readonly kind: BufferErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class RangeSyntaxError extends BufferError {
  readonly kind = 'syntax';

  constructor(readonly rangeText: string) {
    super(`Malformed range: '${rangeText}'`);
  }
}

export class PatternSyntaxError extends BufferError {
  readonly kind = 'syntax';

  constructor(readonly spec: string) {
    super(`Malformed pattern: '${spec}'`);
  }
}

export class LineBoundsError extends BufferError {
  readonly kind = 'bounds';

  constructor(
    readonly line: number,
    readonly lineCount: number,
  ) {
    super(`Line ${line} is outside the buffer (${lineCount} line(s))`);
  }
}

export class CapacityError extends BufferError {
  readonly kind = 'capacity';

  constructor(
    message: string,
    readonly limit: number,
  ) {
    super(message);
  }
}

export class AllocationError extends BufferError {
  readonly kind = 'allocation';
}

export class FileIOError extends BufferError {
  readonly kind = 'io';

  constructor(
    readonly filePath: string,
    readonly operation: 'read' | 'write',
    cause: unknown,
  ) {
    super(`Cannot ${operation} '${filePath}': ${getErrorMessage(cause)}`, {
      cause,
    });
  }
}

/**
 * Maps a runtime failure raised while building line content onto the
 * editor's error kinds. Oversized strings surface as `RangeError` in V8.
 */
export function toBufferError(error: unknown): BufferError | undefined {
  if (error instanceof BufferError) {
    return error;
  }
  if (error instanceof RangeError) {
    return new AllocationError(error.message, { cause: error });
  }
  return undefined;
}

export class FatalError extends Error {
  constructor(
    message: string,
    readonly exitCode: number,
  ) {
    super(message);
  }
}

export class FatalInputError extends FatalError {
  constructor(message: string) {
    super(message, ExitCodes.FATAL_INPUT_ERROR);
  }
}
export class FatalConfigError extends FatalError {
  constructor(message: string) {
    super(message, ExitCodes.FATAL_CONFIG_ERROR);
  }
}
