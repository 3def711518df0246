/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type React from 'react';
import { useCallback, useState } from 'react';
import { Box, Text, useApp, useInput } from 'ink';
import type { CursorEditModel, EditorSession } from '@lined/core';
import { getErrorMessage, saveFile } from '@lined/core';
import { applyVisualAction, decodeVisualKey } from './visualKeys.js';

export const VISUAL_HELP_LINES = [
  'Visual mode keys',
  '',
  '  Arrows         move the cursor',
  '  PgUp / PgDn    move by one screen',
  '  Ctrl+A/Ctrl+E  start / end of line',
  '  Enter          split the line',
  '  Backspace      delete left, joining lines at column 1',
  '  Ctrl+D         delete under the cursor',
  '  Tab            insert spaces',
  '  Ctrl+S         save to the current file',
  '  Ctrl+G         show or hide this help',
  '  Esc            return to the * prompt',
];

/** Saves from visual mode and describes the outcome for the status row. */
export async function saveFromVisualMode(
  session: EditorSession,
): Promise<string> {
  const filePath = session.getCurrentFile();
  if (!filePath) {
    return 'No current file; use W name at the * prompt';
  }
  try {
    const result = await saveFile(session, filePath);
    return result.content;
  } catch (error) {
    return `Save failed: ${getErrorMessage(error)}`;
  }
}

export function formatVisualStatus(
  session: EditorSession,
  model: CursorEditModel,
): string {
  const { row, col } = model.getCursor();
  return `Ctrl+G=Help Ctrl+S=Save Esc=Exit | Line ${row + 1}/${model.lineCount} Col ${col + 1} | ${session.getCurrentFile() ?? '(none)'}`;
}

interface TextRowProps {
  text: string;
  cursorCol: number | undefined;
}

const TextRow: React.FC<TextRowProps> = ({ text, cursorCol }) => {
  if (cursorCol === undefined) {
    // An empty Text collapses to zero height.
    return <Text wrap="truncate-end">{text || ' '}</Text>;
  }
  return (
    <Text wrap="truncate-end">
      {text.slice(0, cursorCol)}
      <Text inverse>{text[cursorCol] ?? ' '}</Text>
      {text.slice(cursorCol + 1)}
    </Text>
  );
};

interface VisualEditorProps {
  session: EditorSession;
  model: CursorEditModel;
}

export const VisualEditor: React.FC<VisualEditorProps> = ({
  session,
  model,
}) => {
  const { exit } = useApp();
  const [, setRevision] = useState(0);
  const [showHelp, setShowHelp] = useState(false);
  const [notice, setNotice] = useState<string | undefined>(undefined);
  const viewportRows = session.config.getViewportRows();
  const tabWidth = session.config.getTabWidth();

  const save = useCallback(() => {
    saveFromVisualMode(session).then(setNotice, (error: unknown) =>
      setNotice(`Save failed: ${getErrorMessage(error)}`),
    );
  }, [session]);

  useInput((input, key) => {
    const action = decodeVisualKey(input, key);
    switch (action.type) {
      case 'exit':
        exit();
        return;
      case 'help':
        setShowHelp((shown) => !shown);
        return;
      case 'save':
        save();
        return;
      case 'none':
        return;
      default:
        applyVisualAction(model, action, { tabWidth, viewportRows });
        setNotice(undefined);
        setRevision((revision) => revision + 1);
    }
  });

  const { row, col, topLine } = model.getCursor();
  const rows = Array.from({ length: viewportRows }, (_, i) => topLine + i);
  const status = formatVisualStatus(session, model);

  return (
    <Box flexDirection="column">
      {showHelp
        ? rows.map((index, i) => (
            <Text key={index}>{VISUAL_HELP_LINES[i] || ' '}</Text>
          ))
        : rows.map((index) =>
            index < model.lineCount ? (
              <TextRow
                key={index}
                text={model.getLine(index)}
                cursorCol={index === row ? col : undefined}
              />
            ) : (
              <Text key={index}>~</Text>
            ),
          )}
      <Text inverse wrap="truncate-end">
        {notice ? `${status} | ${notice}` : status}
      </Text>
    </Box>
  );
};
