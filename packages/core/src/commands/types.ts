/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * The return type for a command that reports a single human-readable
 * result line.
 */
export interface MessageActionReturn {
  type: 'message';
  messageType: 'info' | 'error';
  content: string;
}

/** The user asked to leave the editor. */
export interface QuitActionReturn {
  type: 'quit';
}

/** The user asked for the full-screen visual editor. */
export interface VisualModeActionReturn {
  type: 'visual';
}

/** Blank input; nothing ran. */
export interface NoopActionReturn {
  type: 'noop';
}

export type CommandActionReturn =
  | MessageActionReturn
  | QuitActionReturn
  | VisualModeActionReturn
  | NoopActionReturn;

/**
 * Line-oriented I/O a command uses while it runs: listings are printed line
 * by line, and Insert/Edit read their text through `readLine`.
 */
export interface CommandIO {
  print(line: string): void;
  /** Resolves to `undefined` once input is exhausted. */
  readLine(prompt: string): Promise<string | undefined>;
}

export function infoMessage(content: string): MessageActionReturn {
  return { type: 'message', messageType: 'info', content };
}

export function errorMessage(content: string): MessageActionReturn {
  return { type: 'message', messageType: 'error', content };
}
