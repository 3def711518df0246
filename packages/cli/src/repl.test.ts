/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { PassThrough } from 'node:stream';
import { EditorSession } from '@lined/core';
import { openStartupFile, runRepl } from './repl.js';

function scriptedInput(text: string): PassThrough {
  const input = new PassThrough();
  input.end(text);
  return input;
}

function createOutput() {
  const chunks: string[] = [];
  return {
    write: (text: string) => {
      chunks.push(text);
    },
    text: () => chunks.join(''),
  };
}

describe('runRepl', () => {
  beforeEach(() => {
    vi.stubEnv('NO_COLOR', '1');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should run commands until Q and print the status after each', async () => {
    const session = new EditorSession();
    const output = createOutput();
    await runRepl(session, {
      input: scriptedInput('I\nhello\n.\nL\n\nQ\nL\n'),
      write: output.write,
    });
    expect(output.text()).toBe(
      [
        'Lines: 0  File: (none)',
        '* -- Insert at  Line 00000  --',
        '00001: 00002: -- inserted 1 line(s)',
        'Lines: 1  File: (none)',
        '* 00000: hello',
        '-- listed 1 line(s)',
        'Lines: 1  File: (none)',
        '* * ',
      ].join('\n'),
    );
    expect(session.store.getLines()).toEqual(['hello']);
  });

  it('should print error results', async () => {
    const session = new EditorSession();
    const output = createOutput();
    await runRepl(session, {
      input: scriptedInput('Z\nQ\n'),
      write: output.write,
    });
    expect(output.text()).toBe(
      'Lines: 0  File: (none)\n* ?\nLines: 0  File: (none)\n* ',
    );
  });

  it('should stop at end of input', async () => {
    const session = new EditorSession();
    const output = createOutput();
    await runRepl(session, {
      input: scriptedInput('L\r\n'),
      write: output.write,
    });
    expect(output.text()).toBe(
      'Lines: 0  File: (none)\n* (empty)\nLines: 0  File: (none)\n* ',
    );
  });

  it('should report a visual mode failure and keep prompting', async () => {
    const session = new EditorSession();
    const output = createOutput();
    const runVisual = vi.fn(async () => {
      throw new Error('input is not a terminal');
    });
    await runRepl(session, {
      input: scriptedInput('V\nL\nQ\n'),
      write: output.write,
      runVisual,
    });
    expect(output.text()).toBe(
      [
        'Lines: 0  File: (none)',
        '* ! visual mode failed: input is not a terminal',
        'Lines: 0  File: (none)',
        '* (empty)',
        'Lines: 0  File: (none)',
        '* ',
      ].join('\n'),
    );
  });

  it('should hand the session to visual mode and resume the prompt', async () => {
    const session = new EditorSession();
    const output = createOutput();
    const runVisual = vi.fn(async (visualSession: EditorSession) => {
      visualSession.store.replaceAll(['from visual']);
    });
    await runRepl(session, {
      input: scriptedInput('V\nL\nQ\n'),
      write: output.write,
      runVisual,
    });
    expect(runVisual).toHaveBeenCalledWith(session);
    expect(output.text()).toBe(
      [
        'Lines: 0  File: (none)',
        '* Lines: 1  File: (none)',
        '* 00000: from visual',
        '-- listed 1 line(s)',
        'Lines: 1  File: (none)',
        '* ',
      ].join('\n'),
    );
  });
});

describe('runRepl with files', () => {
  let tempDir: string;

  beforeEach(() => {
    vi.stubEnv('NO_COLOR', '1');
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lined-repl-test-'));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should treat typed text and file text as the same bytes', async () => {
    const filePath = path.join(tempDir, 'notes.txt');
    fs.writeFileSync(filePath, Buffer.from('café\n', 'utf8'));
    const session = new EditorSession();
    const output = createOutput();
    const input = new PassThrough();
    input.end(
      Buffer.from(`O ${filePath}\nS café\nI\nnaïve €\n.\nW\nQ\n`, 'utf8'),
    );

    await runRepl(session, { input, write: output.write });

    expect(output.text()).toContain(
      '00000: caf\u00c3\u00a9\n-- 1 match(es)\n',
    );
    expect(fs.readFileSync(filePath)).toEqual(
      Buffer.from('café\nnaïve €\n', 'utf8'),
    );
  });
});

describe('openStartupFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lined-repl-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should load an existing file silently', async () => {
    const filePath = path.join(tempDir, 'notes.txt');
    fs.writeFileSync(filePath, 'one\ntwo\n');
    const session = new EditorSession();
    const output = createOutput();
    await openStartupFile(session, filePath, output.write);
    expect(session.store.getLines()).toEqual(['one', 'two']);
    expect(session.getCurrentFile()).toBe(filePath);
    expect(output.text()).toBe('');
  });

  it('should start empty and keep the name of a missing file', async () => {
    const filePath = path.join(tempDir, 'new.txt');
    const session = new EditorSession();
    const output = createOutput();
    await openStartupFile(session, filePath, output.write);
    expect(session.store.count).toBe(0);
    expect(session.getCurrentFile()).toBe(filePath);
    expect(output.text()).toBe(
      `! couldn't open '${filePath}' (starting empty)\n`,
    );
  });
});
