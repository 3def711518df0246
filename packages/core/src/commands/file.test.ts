/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { EditorSession } from '../session/editorSession.js';
import { CapacityError, FileIOError } from '../utils/errors.js';
import { EditorConfig } from '../config/config.js';
import { loadFile, saveFile, splitLines } from './file.js';

describe('splitLines', () => {
  it('should drop the empty tail after a final newline', () => {
    expect(splitLines('a\nb\n')).toEqual(['a', 'b']);
  });

  it('should keep a last line without a newline', () => {
    expect(splitLines('a\nb')).toEqual(['a', 'b']);
  });

  it('should strip one carriage return per line', () => {
    expect(splitLines('a\r\nb\r\r\n')).toEqual(['a', 'b\r']);
  });

  it('should keep interior blank lines', () => {
    expect(splitLines('\n\nx\n')).toEqual(['', '', 'x']);
  });

  it('should read empty content as no lines', () => {
    expect(splitLines('')).toEqual([]);
  });
});

describe('loadFile and saveFile', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lined-file-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should reproduce the saved lines on load', async () => {
    const filePath = path.join(tempDir, 'notes.txt');
    const lines = ['first', '', '  indented', 'café'];

    const writer = new EditorSession();
    writer.store.replaceAll(lines);
    const saved = await saveFile(writer, filePath);
    expect(saved.content).toBe(`-- wrote 4 line(s) to ${filePath}`);
    expect(await fs.readFile(filePath, 'latin1')).toBe(
      'first\n\n  indented\ncafé\n',
    );

    const reader = new EditorSession();
    const loaded = await loadFile(reader, filePath);
    expect(loaded.content).toBe('-- loaded 4 line(s)');
    expect(reader.store.getLines()).toEqual(lines);
    expect(reader.getCurrentFile()).toBe(filePath);
  });

  it('should truncate lines longer than the maximum', async () => {
    const filePath = path.join(tempDir, 'wide.txt');
    await fs.writeFile(filePath, 'abcdefgh\nxy\n');
    const session = new EditorSession(new EditorConfig({ maxLineLength: 4 }));
    await loadFile(session, filePath);
    expect(session.store.getLines()).toEqual(['abcd', 'xy']);
  });

  it('should load a file of exactly the maximum line count', async () => {
    const filePath = path.join(tempDir, 'full.txt');
    await fs.writeFile(filePath, 'a\nb\nc\n');
    const session = new EditorSession(new EditorConfig({ maxLines: 3 }));
    await loadFile(session, filePath);
    expect(session.store.count).toBe(3);
  });

  it('should throw a capacity error and keep the buffer', async () => {
    const filePath = path.join(tempDir, 'over.txt');
    await fs.writeFile(filePath, 'a\nb\nc\nd\n');
    const session = new EditorSession(new EditorConfig({ maxLines: 3 }));
    session.store.replaceAll(['keep']);
    await expect(loadFile(session, filePath)).rejects.toThrow(CapacityError);
    expect(session.store.getLines()).toEqual(['keep']);
  });

  it('should wrap a missing file in a FileIOError', async () => {
    const session = new EditorSession();
    const filePath = path.join(tempDir, 'absent.txt');
    await expect(loadFile(session, filePath)).rejects.toThrow(FileIOError);
    expect(session.getCurrentFile()).toBeUndefined();
  });

  it('should wrap an unwritable target in a FileIOError', async () => {
    const session = new EditorSession();
    const filePath = path.join(tempDir, 'no-such-dir', 'out.txt');
    await expect(saveFile(session, filePath)).rejects.toThrow(FileIOError);
    expect(session.getCurrentFile()).toBeUndefined();
  });
});
