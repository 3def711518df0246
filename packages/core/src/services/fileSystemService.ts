/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import fs from 'node:fs/promises';

/**
 * Encoding of every text the editor reads or writes. `latin1` maps each byte
 * to one character and back, so arbitrary bytes survive a load/save cycle.
 */
export const TEXT_ENCODING: BufferEncoding = 'latin1';

/**
 * Abstraction over the file operations the editor performs, so sessions can
 * run against an in-memory implementation in tests.
 */
export interface FileSystemService {
  readTextFile(filePath: string): Promise<string>;
  writeTextFile(filePath: string, content: string): Promise<void>;
}

/** Reads and writes whole files in {@link TEXT_ENCODING}. */
export class StandardFileSystemService implements FileSystemService {
  async readTextFile(filePath: string): Promise<string> {
    return fs.readFile(filePath, TEXT_ENCODING);
  }

  async writeTextFile(filePath: string, content: string): Promise<void> {
    await fs.writeFile(filePath, content, TEXT_ENCODING);
  }
}
