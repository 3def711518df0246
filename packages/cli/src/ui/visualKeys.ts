/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Key } from 'ink';
import type { CursorEditModel } from '@lined/core';

export type VisualKey = Partial<
  Pick<
    Key,
    | 'upArrow'
    | 'downArrow'
    | 'leftArrow'
    | 'rightArrow'
    | 'pageUp'
    | 'pageDown'
    | 'return'
    | 'escape'
    | 'ctrl'
    | 'meta'
    | 'tab'
    | 'backspace'
    | 'delete'
  >
>;

export type MoveDirection =
  | 'left'
  | 'right'
  | 'up'
  | 'down'
  | 'home'
  | 'end'
  | 'pageUp'
  | 'pageDown';

export type VisualAction =
  | { type: 'insert'; text: string }
  | { type: 'newline' }
  | { type: 'backspace' }
  | { type: 'delete' }
  | { type: 'tab' }
  | { type: 'move'; direction: MoveDirection }
  | { type: 'save' }
  | { type: 'help' }
  | { type: 'exit' }
  | { type: 'none' };

const CTRL_ACTIONS: Record<string, VisualAction> = {
  a: { type: 'move', direction: 'home' },
  e: { type: 'move', direction: 'end' },
  d: { type: 'delete' },
  s: { type: 'save' },
  g: { type: 'help' },
};

const PRINTABLE_ASCII = /^[\x20-\x7e]$/;

/**
 * Maps one Ink keypress to an editor action. Terminals send DEL for the
 * Backspace key, which Ink reports as `delete`, so both erase to the left;
 * Ctrl+D deletes under the cursor.
 */
export function decodeVisualKey(input: string, key: VisualKey): VisualAction {
  if (key.escape) {
    return { type: 'exit' };
  }
  if (key.ctrl) {
    return CTRL_ACTIONS[input.toLowerCase()] ?? { type: 'none' };
  }
  if (key.return) {
    return { type: 'newline' };
  }
  if (key.backspace || key.delete) {
    return { type: 'backspace' };
  }
  if (key.tab) {
    return { type: 'tab' };
  }
  if (key.upArrow) return { type: 'move', direction: 'up' };
  if (key.downArrow) return { type: 'move', direction: 'down' };
  if (key.leftArrow) return { type: 'move', direction: 'left' };
  if (key.rightArrow) return { type: 'move', direction: 'right' };
  if (key.pageUp) return { type: 'move', direction: 'pageUp' };
  if (key.pageDown) return { type: 'move', direction: 'pageDown' };
  if (key.meta) {
    return { type: 'none' };
  }

  const text = Array.from(input)
    .filter((ch) => PRINTABLE_ASCII.test(ch))
    .join('');
  return text ? { type: 'insert', text } : { type: 'none' };
}

export interface VisualLayout {
  tabWidth: number;
  viewportRows: number;
}

/**
 * Applies an editing or movement action to the model and scrolls the cursor
 * into view. Returns whether the buffer changed.
 */
export function applyVisualAction(
  model: CursorEditModel,
  action: VisualAction,
  layout: VisualLayout,
): boolean {
  let changed = false;

  switch (action.type) {
    case 'insert':
      for (const ch of action.text) {
        changed = model.insertChar(ch) || changed;
      }
      break;
    case 'newline':
      changed = model.insertNewline();
      break;
    case 'backspace':
      changed = model.backspace();
      break;
    case 'delete':
      changed = model.deleteChar();
      break;
    case 'tab':
      changed = model.insertTab(layout.tabWidth);
      break;
    case 'move':
      moveCursor(model, action.direction, layout.viewportRows);
      break;
    default:
      return false;
  }

  model.scrollIntoView(layout.viewportRows);
  return changed;
}

function moveCursor(
  model: CursorEditModel,
  direction: MoveDirection,
  viewportRows: number,
): void {
  switch (direction) {
    case 'left':
      model.moveLeft();
      break;
    case 'right':
      model.moveRight();
      break;
    case 'up':
      model.moveUp();
      break;
    case 'down':
      model.moveDown();
      break;
    case 'home':
      model.moveHome();
      break;
    case 'end':
      model.moveEnd();
      break;
    case 'pageUp':
      model.pageUp(viewportRows);
      break;
    case 'pageDown':
      model.pageDown(viewportRows);
      break;
    default: {
      const unreachable: never = direction;
      throw new Error(`Unknown direction: ${String(unreachable)}`);
    }
  }
}
