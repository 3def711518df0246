/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { EditorSession } from '../session/editorSession.js';
import { FileIOError } from '../utils/errors.js';
import type { MessageActionReturn } from './types.js';
import { infoMessage } from './types.js';

/**
 * Splits file content into lines: `\n` separates, one trailing `\r` per line
 * is dropped, and the empty tail after a final newline is not a line.
 */
export function splitLines(content: string): string[] {
  if (content === '') {
    return [];
  }
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

/**
 * Replaces the buffer with the content of `filePath`. The file is read in
 * full before anything changes, so a failure leaves the session as it was.
 *
 * @throws FileIOError when the file cannot be read.
 * @throws CapacityError when the file has more lines than the store holds.
 */
export async function loadFile(
  session: EditorSession,
  filePath: string,
): Promise<MessageActionReturn> {
  let content: string;
  try {
    content = await session.config
      .getFileSystemService()
      .readTextFile(filePath);
  } catch (error) {
    throw new FileIOError(filePath, 'read', error);
  }

  session.store.replaceAll(splitLines(content));
  session.setCurrentFile(filePath);
  session.setLastRange(1, session.store.count);

  return infoMessage(`-- loaded ${session.store.count} line(s)`);
}

/**
 * Writes every line followed by `\n` and records `filePath` as the current
 * file.
 *
 * @throws FileIOError when the file cannot be written.
 */
export async function saveFile(
  session: EditorSession,
  filePath: string,
): Promise<MessageActionReturn> {
  const lines = session.store.getLines();
  const content = lines.map((line) => `${line}\n`).join('');
  try {
    await session.config
      .getFileSystemService()
      .writeTextFile(filePath, content);
  } catch (error) {
    throw new FileIOError(filePath, 'write', error);
  }

  session.setCurrentFile(filePath);
  return infoMessage(`-- wrote ${lines.length} line(s) to ${filePath}`);
}
