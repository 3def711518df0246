/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { LineRange } from '../buffer/range.js';
import { parseLeadingInt, resolveRange } from '../buffer/range.js';
import type { EditorSession } from '../session/editorSession.js';
import { debugLogger } from '../utils/debugLogger.js';
import type { BufferError } from '../utils/errors.js';
import {
  RangeSyntaxError,
  getErrorMessage,
  toBufferError,
} from '../utils/errors.js';
import { deleteLines } from './delete.js';
import { editLine } from './edit.js';
import { loadFile, saveFile } from './file.js';
import { insertLines } from './insert.js';
import { listLines } from './list.js';
import { REPLACE_USAGE, replaceText } from './replace.js';
import { searchLines } from './search.js';
import { HELP_TEXT, formatSessionStatus } from './status.js';
import type {
  CommandActionReturn,
  CommandIO,
  MessageActionReturn,
} from './types.js';
import { errorMessage, infoMessage } from './types.js';

/**
 * Resolves `text` as a range, or returns the error result a command reports
 * for a malformed one.
 */
function rangeOr(
  text: string,
  count: number,
  usage: string,
): LineRange | MessageActionReturn {
  try {
    return resolveRange(text, count);
  } catch (error) {
    if (error instanceof RangeSyntaxError) {
      return errorMessage(usage);
    }
    throw error;
  }
}

function isRange(value: LineRange | MessageActionReturn): value is LineRange {
  return 'start' in value;
}

function describeBufferError(error: BufferError): string {
  switch (error.kind) {
    case 'capacity':
      return '! out of space';
    case 'allocation':
      return '! alloc failed';
    case 'bounds':
      return '! bad line';
    case 'syntax':
      return '! bad range';
    case 'io':
      return `! ${error.message}`;
    default: {
      const unreachable: never = error.kind;
      return `! ${String(unreachable)}`;
    }
  }
}

async function dispatch(
  session: EditorSession,
  verb: string,
  args: string,
  io: CommandIO,
): Promise<CommandActionReturn> {
  const count = session.lineCount;

  switch (verb) {
    case 'L': {
      const range = rangeOr(args, count, '! bad range');
      return isRange(range) ? listLines(session, range, io) : range;
    }
    case 'I':
      return insertLines(
        session,
        args === '' ? count + 1 : parseLeadingInt(args),
        io,
      );
    case 'D': {
      const range = rangeOr(args, count, '! need D a[,b]');
      return isRange(range) ? deleteLines(session, range) : range;
    }
    case 'E':
      if (args === '') {
        return errorMessage('! need E n');
      }
      return editLine(session, parseLeadingInt(args), io);
    case 'R': {
      const slash = args.indexOf('/');
      if (slash < 0) {
        return errorMessage(REPLACE_USAGE);
      }
      const range = rangeOr(args.slice(0, slash), count, '! bad range');
      return isRange(range)
        ? replaceText(session, range, args.slice(slash))
        : range;
    }
    case 'S': {
      const slash = args.indexOf('/');
      if (slash < 0) {
        return searchLines(session, { start: 1, end: count }, args, io);
      }
      const range = rangeOr(args.slice(0, slash), count, '! bad range');
      return isRange(range)
        ? searchLines(session, range, args.slice(slash), io)
        : range;
    }
    case 'O':
      if (args === '') {
        return errorMessage('! need filename');
      }
      try {
        return await loadFile(session, args);
      } catch (error) {
        const bufferError = toBufferError(error);
        if (bufferError?.kind === 'capacity') {
          return errorMessage(`! open failed: ${bufferError.message}`);
        }
        if (bufferError?.kind === 'io') {
          debugLogger.debug('Load failed:', bufferError.cause);
          return errorMessage('! open failed');
        }
        throw error;
      }
    case 'W': {
      const target = args || session.getCurrentFile();
      if (!target) {
        return errorMessage('! W needs filename (no current file)');
      }
      try {
        return await saveFile(session, target);
      } catch (error) {
        const bufferError = toBufferError(error);
        if (bufferError?.kind === 'io') {
          debugLogger.debug('Save failed:', bufferError.cause);
          return errorMessage('! write failed');
        }
        throw error;
      }
    }
    case 'V':
      return { type: 'visual' };
    case 'P':
      return infoMessage(formatSessionStatus(session));
    case 'H':
    case '?':
      return infoMessage(HELP_TEXT);
    case 'Q':
      return { type: 'quit' };
    default:
      return errorMessage('?');
  }
}

/**
 * Parses and runs one command line against `session`. The first
 * non-blank character is the verb and the rest, minus leading whitespace, is
 * its argument text. Nothing a command throws escapes this function.
 */
export async function executeCommandLine(
  session: EditorSession,
  line: string,
  io: CommandIO,
): Promise<CommandActionReturn> {
  const trimmed = line.trimStart();
  if (trimmed === '') {
    return { type: 'noop' };
  }

  const verb = trimmed[0].toUpperCase();
  const args = trimmed.slice(1).trimStart();

  try {
    const result = await dispatch(session, verb, args, io);
    debugLogger.debug(
      `Command ${verb} '${args}' -> ${result.type}; last range`,
      session.getLastRange(),
    );
    return result;
  } catch (error) {
    const bufferError = toBufferError(error);
    if (bufferError) {
      debugLogger.debug(`Command ${verb} failed:`, bufferError.message);
      return errorMessage(describeBufferError(bufferError));
    }
    debugLogger.error(`Command ${verb} failed:`, error);
    return errorMessage(`! ${getErrorMessage(error)}`);
  }
}
